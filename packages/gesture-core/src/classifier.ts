import { defaultGestureEngineOptions } from "./config";
import { parseLandmarkSet } from "./schemas";
import type { ClassifierOptions, Landmark, RawGesture } from "./types";

export const WRIST = 0;
export const INDEX_TIP = 8;
export const MIDDLE_TIP = 12;

// (tip, pip) pairs for index, middle, ring and pinky; the thumb is never read.
export const FINGER_JOINTS: ReadonlyArray<readonly [tip: number, pip: number]> = [
  [8, 6],
  [12, 10],
  [16, 14],
  [20, 18],
];

const MAX_EXTENDED_FOR_ROLL = 2;

/**
 * Reads one frame of hand landmarks as a roll (closed fist), a pointing angle
 * in degrees, or ambiguous. Throws `InvalidInputError` for anything that is
 * not 21 finite 2-D points.
 *
 * Angles are counter-clockwise from the positive x axis with screen-up at 90,
 * so image coordinates (y growing downward) are expected.
 */
export function classifyGesture(landmarks: readonly Landmark[], opts?: ClassifierOptions): RawGesture {
  const points = parseLandmarkSet(landmarks);
  const stabilityDistance = opts?.stabilityDistance ?? defaultGestureEngineOptions.stabilityDistance;

  // A closed fist wins over any apparent pointing direction.
  if (countExtendedFingers(points) <= MAX_EXTENDED_FOR_ROLL) {
    return { kind: "roll" };
  }

  const wrist = points[WRIST];
  const indexTip = points[INDEX_TIP];
  const middleTip = points[MIDDLE_TIP];
  const dx = (indexTip.x + middleTip.x) / 2 - wrist.x;
  const dy = (indexTip.y + middleTip.y) / 2 - wrist.y;

  if (dx * dx + dy * dy < stabilityDistance * stabilityDistance) {
    return { kind: "ambiguous" };
  }

  const degrees = (Math.atan2(-dy, dx) * 180) / Math.PI;
  return { kind: "direction", angle: normalizeAngle(degrees) };
}

/** A finger is extended when its tip lies farther from the wrist than its pip joint. */
export function countExtendedFingers(landmarks: readonly Landmark[]): number {
  const wrist = landmarks[WRIST];
  let extended = 0;
  for (const [tip, pip] of FINGER_JOINTS) {
    if (distanceSq(wrist, landmarks[tip]) > distanceSq(wrist, landmarks[pip])) {
      extended += 1;
    }
  }
  return extended;
}

export function normalizeAngle(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

function distanceSq(a: Landmark, b: Landmark): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}
