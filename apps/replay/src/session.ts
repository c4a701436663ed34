import { readFile } from "node:fs/promises";
import { z } from "zod";

// Landmarks are checked loosely here: a glitched frame must reach the engine,
// which reads it as "no hand", rather than reject the whole session.
const recordedLandmarkSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
});

export const recordedFrameSchema = z.object({
  timestamp: z.number(),
  hands: z.array(
    z.object({
      handedness: z.enum(["Left", "Right"]),
      landmarks: z.array(recordedLandmarkSchema),
    })
  ),
});

export const sessionSchema = z.object({
  frames: z.array(recordedFrameSchema),
});

export type RecordedFrame = z.infer<typeof recordedFrameSchema>;
export type RecordedSession = z.infer<typeof sessionSchema>;

export async function loadSession(path: string | URL): Promise<RecordedSession> {
  const text = await readFile(path, "utf8");
  const result = sessionSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`Invalid session file ${String(path)}: ${result.error.message}`);
  }
  return result.data;
}
