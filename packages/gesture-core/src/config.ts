import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { GestureEngineOptions } from "./types";

export const MAX_ANGULAR_THRESHOLD_DEGREES = 45;

const DEFAULTS: Required<GestureEngineOptions> = {
  angularThresholdDegrees: 35,
  stabilityDistance: 15,
  cooldownSeconds: 0.05,
  minConfidenceFrames: 1,
};

export const angularThresholdSchema = z
  .number()
  .finite()
  .min(0)
  .lt(MAX_ANGULAR_THRESHOLD_DEGREES, {
    message: `must be less than ${MAX_ANGULAR_THRESHOLD_DEGREES} (direction bands would overlap)`,
  });

export const gestureEngineOptionsSchema = z
  .object({
    angularThresholdDegrees: angularThresholdSchema.default(DEFAULTS.angularThresholdDegrees),
    stabilityDistance: z.number().finite().nonnegative().default(DEFAULTS.stabilityDistance),
    cooldownSeconds: z.number().finite().nonnegative().default(DEFAULTS.cooldownSeconds),
    minConfidenceFrames: z.number().int().min(1).default(DEFAULTS.minConfidenceFrames),
  })
  .strict();

/** Fills in defaults and rejects out-of-range values; nothing is clamped. */
export function resolveGestureEngineOptions(opts?: GestureEngineOptions): Required<GestureEngineOptions> {
  const result = gestureEngineOptionsSchema.safeParse(opts ?? {});
  if (!result.success) {
    throw new ConfigurationError(result.error.issues);
  }
  return result.data;
}

export { DEFAULTS as defaultGestureEngineOptions };
