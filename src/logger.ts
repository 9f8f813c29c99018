import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Mirror file; rotated to `<file>.1`, `<file>.2`, ... once it grows past the size cap. */
  readonly logFile?: string | null;
  /** 0 disables rotation. */
  readonly maxFileSizeBytes?: number;
  /** Files kept, the active one included. */
  readonly maxFileCount?: number;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly minLevel?: LogLevel;
  readonly stdout?: boolean;
  readonly onEntry?: (entry: LogEntry) => void;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Reports a logger failure on stderr, outside the logger itself. */
function reportFailure(message: string, payload: Record<string, unknown>): void {
  const entry: LogEntry = { timestamp: new Date().toISOString(), level: "error", message, payload };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

/**
 * JSON-lines logger. Entries go to stdout and the `onEntry` listener
 * synchronously; file writes are queued so they land in emission order.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly minRank: number;
  private readonly writeStdout: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.minRank = LEVEL_RANK[options.minLevel ?? "debug"];
    this.writeStdout = options.stdout ?? true;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Resolves once every queued file write has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.writeStdout) {
      process.stdout.write(line);
    }
    this.entryListener?.(structuredClone(entry));

    const logFile = this.logFile;
    if (logFile) {
      this.writeQueue = this.writeQueue.then(() => this.append(logFile, line));
    }
  }

  /** Never rejects, so one failed write does not stall the queue. */
  private async append(logFile: string, line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(logFile), { recursive: true });
        this.directoryReady = true;
      }
      await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
      await appendFile(logFile, line, "utf8");
    } catch (error) {
      reportFailure("log_file_write_failed", { file: logFile, error: describeError(error) });
      this.directoryReady = false;
    }
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    if (this.maxFileSizeBytes <= 0) {
      return;
    }
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }
    try {
      await this.rotate(logFile);
    } catch (error) {
      // The entry is still appended to the oversized file.
      reportFailure("log_file_rotation_failed", { file: logFile, error: describeError(error) });
    }
  }

  private async rotate(logFile: string): Promise<void> {
    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${keep - 1}`, { force: true });
    for (let generation = keep - 1; generation >= 1; generation -= 1) {
      const source = generation === 1 ? logFile : `${logFile}.${generation - 1}`;
      try {
        await rename(source, `${logFile}.${generation}`);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }
  }
}
