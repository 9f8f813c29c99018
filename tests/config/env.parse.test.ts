/**
 * Table-driven tests covering the environment parsing helpers. Each case feeds
 * a plain record so nothing leaks into `process.env`.
 */
import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readOptionalBool,
  readInt,
  readOptionalInt,
  readNumber,
  readOptionalNumber,
  readOptionalEnum,
  readEnum,
  readOptionalString,
} from "../../src/config/env.js";

describe("config/env helpers", () => {
  it("interprets boolean flags case-insensitively", () => {
    const cases: Array<[string | undefined, boolean | undefined]> = [
      ["YES", true],
      ["on", true],
      ["1", true],
      ["Off", false],
      ["0", false],
      ["maybe", undefined],
      ["   ", undefined],
      [undefined, undefined],
    ];
    for (const [raw, expected] of cases) {
      expect(readOptionalBool("FLAG", { FLAG: raw }), String(raw)).to.equal(expected);
    }
    expect(readBool("FLAG", true, { FLAG: "maybe" })).to.equal(true);
    expect(readBool("FLAG", true, { FLAG: "no" })).to.equal(false);
  });

  it("parses integers strictly and honours bounds", () => {
    expect(readOptionalInt("COUNT", undefined, { COUNT: " 42 " })).to.equal(42);
    expect(readOptionalInt("COUNT", undefined, { COUNT: "-7" })).to.equal(-7);
    expect(readOptionalInt("COUNT", undefined, { COUNT: "4.5" })).to.equal(undefined);
    expect(readOptionalInt("COUNT", undefined, { COUNT: "1e3" })).to.equal(undefined);
    expect(readOptionalInt("COUNT", undefined, { COUNT: "99999999999999999999" })).to.equal(undefined);
    expect(readInt("COUNT", 12, { min: 1, max: 256 }, { COUNT: "0" })).to.equal(12);
    expect(readInt("COUNT", 12, { min: 1, max: 256 }, { COUNT: "257" })).to.equal(12);
    expect(readInt("COUNT", 12, { min: 1, max: 256 }, { COUNT: "256" })).to.equal(256);
  });

  it("parses finite numbers including exponent notation", () => {
    expect(readOptionalNumber("RATIO", undefined, { RATIO: "1e-7" })).to.equal(1e-7);
    expect(readOptionalNumber("RATIO", undefined, { RATIO: "0.25" })).to.equal(0.25);
    expect(readOptionalNumber("RATIO", undefined, { RATIO: "Infinity" })).to.equal(undefined);
    expect(readOptionalNumber("RATIO", undefined, { RATIO: "abc" })).to.equal(undefined);
    expect(readNumber("RATIO", 3, { min: Number.MIN_VALUE }, { RATIO: "0" })).to.equal(3);
    expect(readNumber("RATIO", 3, undefined, {})).to.equal(3);
  });

  it("matches enum values case-insensitively and returns the canonical spelling", () => {
    const algorithms = ["bfs", "dijkstra", "a-star"] as const;
    expect(readOptionalEnum("ALGO", algorithms, { ALGO: "A-STAR" })).to.equal("a-star");
    expect(readOptionalEnum("ALGO", algorithms, { ALGO: "greedy" })).to.equal(undefined);
    expect(readEnum("ALGO", algorithms, "bfs", { ALGO: "greedy" })).to.equal("bfs");
  });

  it("trims strings and treats blank values as unset", () => {
    expect(readOptionalString("PATH_VALUE", { PATH_VALUE: "  /tmp/router.log " })).to.equal("/tmp/router.log");
    expect(readOptionalString("PATH_VALUE", { PATH_VALUE: "   " })).to.equal(undefined);
  });

  describe("process environment fallback", () => {
    const key = "STARLANE_TEST_FALLBACK";
    const original = process.env[key];

    afterEach(() => {
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    });

    it("reads process.env when no source is given", () => {
      process.env[key] = "true";
      expect(readBool(key, false)).to.equal(true);
    });
  });
});
