import type { ControlAction } from "@handkeys/control-core";
import { angularThresholdSchema, defaultGestureEngineOptions } from "./config";
import { normalizeAngle } from "./classifier";
import { ConfigurationError } from "./errors";
import type { RawGesture } from "./types";

/**
 * Maps a pointing angle onto the right (0/360), up (90) and left (180) bands,
 * each `thresholdDegrees` wide on either side. There is no down band: down is
 * only reachable through the fist.
 */
export function mapAngleToAction(
  angle: number,
  thresholdDegrees: number = defaultGestureEngineOptions.angularThresholdDegrees
): ControlAction {
  assertAngularThreshold(thresholdDegrees);
  return matchBand(angle, thresholdDegrees);
}

/**
 * Per-frame mapping of a raw gesture to a candidate action. The threshold is
 * trusted here; `GestureEngine` validates it once at construction.
 */

export function toCandidateAction(
  raw: RawGesture,
  thresholdDegrees: number = defaultGestureEngineOptions.angularThresholdDegrees
): ControlAction {
  switch (raw.kind) {
    case "roll":
      return "down";
    case "direction":
      return matchBand(raw.angle, thresholdDegrees);
    case "ambiguous":
      return "none";
    default: {
      const unreachable: never = raw;
      return unreachable;
    }
  }
}

function matchBand(angle: number, thresholdDegrees: number): ControlAction {
  const a = normalizeAngle(angle);
  if (a <= thresholdDegrees || a >= 360 - thresholdDegrees) return "right";
  if (Math.abs(a - 90) <= thresholdDegrees) return "up";
  if (Math.abs(a - 180) <= thresholdDegrees) return "left";
  return "none";
}

function assertAngularThreshold(thresholdDegrees: number): void {
  const result = angularThresholdSchema.safeParse(thresholdDegrees);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues);
  }
}
