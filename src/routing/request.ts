import { z } from "zod";

import { ROUTE_ALGORITHMS } from "./planners.js";

/** Raw route request accepted by the orchestrator. */
export const RouteRequestSchema = z
  .object({
    start: z.string().trim().min(1, "start must not be empty"),
    goal: z.string().trim().min(1, "goal must not be empty"),
    algorithm: z.enum(ROUTE_ALGORITHMS).optional(),
    maxJump: z.number().optional(),
    avoid: z.array(z.string().trim().min(1)).default([]),
    avoidGates: z.boolean().default(false),
    maxTemperature: z.number().optional(),
    avoidCriticalHeat: z.boolean().default(false),
    /** Ship name resolved through the loadout provider. */
    ship: z.string().trim().min(1).optional(),
  })
  .strict();

export type RouteRequestInput = z.input<typeof RouteRequestSchema>;
export type RouteRequest = z.output<typeof RouteRequestSchema>;
