import type { ControlAction, KeyAction } from "@handkeys/control-core";

export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface TrackedHand {
  handedness: Handedness;
  landmarks: Landmark[];
}

export interface HandFrame {
  hands: TrackedHand[];
  /** Monotonic clock reading, in seconds. */
  timestamp: number;
}

export type RawGesture =
  | { kind: "roll" }
  | { kind: "direction"; angle: number }
  | { kind: "ambiguous" };

export interface GestureEngineOptions {
  /**
   * Half-width of the right/up/left angular bands. Must stay below 45 so the
   * bands never overlap.
   * Default: 35
   */
  angularThresholdDegrees?: number;
  /** Minimum wrist-to-fingertip distance for a readable direction, in landmark units. */
  stabilityDistance?: number;
  /** Minimum interval between two emissions of the same action. */
  cooldownSeconds?: number;
  /** Consecutive identical frames needed before a new action is adopted. */
  minConfidenceFrames?: number;
}

export type ClassifierOptions = Pick<GestureEngineOptions, "stabilityDistance">;

export type StabilizerOptions = Pick<GestureEngineOptions, "cooldownSeconds" | "minConfidenceFrames">;

export interface StabilizerState {
  lastStableAction: KeyAction | null;
  lastEmittedAt: Record<KeyAction, number>;
  pendingAction: ControlAction | null;
  pendingCount: number;
}

export interface GestureDebugState {
  raw: RawGesture;
  candidate: ControlAction;
  stableAction: KeyAction | null;
  emitted: ControlAction;
  /** Why the last frame's landmarks were rejected, if they were. */
  invalidInput: string | null;
}
