import { z } from "zod";
import { InvalidInputError } from "./errors";
import type { Landmark } from "./types";

export const LANDMARK_COUNT = 21;

export const landmarkSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  // Depth is carried along but never read; a bad value is dropped, not rejected.
  z: z.number().optional().catch(undefined),
});

export const landmarkSetSchema = z.array(landmarkSchema).length(LANDMARK_COUNT);

export const trackedHandSchema = z.object({
  handedness: z.enum(["Left", "Right"]),
  landmarks: landmarkSetSchema,
});

export const handFrameSchema = z.object({
  hands: z.array(trackedHandSchema),
  timestamp: z.number().finite(),
});

export function parseLandmarkSet(landmarks: unknown): Landmark[] {
  const result = landmarkSetSchema.safeParse(landmarks);
  if (!result.success) {
    throw new InvalidInputError(result.error.issues);
  }
  return result.data;
}
