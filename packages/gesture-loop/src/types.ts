import type { ControlAction } from "@handkeys/control-core";
import type { GestureDebugState } from "@handkeys/gesture-core";

/** Produces raw frames for the detector; `null` means the stream has ended. */
export interface FrameSource<TInput> {
  read(): Promise<TInput | null>;
}

export type LoopError = { type: "detector-failed"; error: unknown };

export interface GestureLoopOptions {
  /** Frames dropped between two processed frames. Default: 0 */
  skipFrames?: number;
  /** Upper bound on processed frames per second. Unbounded when unset. */
  fps?: number;
  /** Include per-frame timings in debug frames. Default: false */
  debug?: boolean;
}

export type GestureDebugFrame = {
  timestamp: number;
  frameIndex: number;
  handCount: number;
  debugState: GestureDebugState;
  action: ControlAction;
  timings?: { estimateMs: number; updateMs: number; dispatchMs: number; totalMs: number };
};

export type StepResult =
  | { status: "ended" }
  | { status: "skipped"; frameIndex: number }
  | { status: "processed"; frameIndex: number; action: ControlAction };

export interface LoopSummary {
  framesRead: number;
  framesProcessed: number;
  /** Keys the dispatcher actually sent. */
  actionsEmitted: number;
}
