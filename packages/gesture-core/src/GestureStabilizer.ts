import { isKeyAction } from "@handkeys/control-core";
import type { ControlAction, KeyAction } from "@handkeys/control-core";
import { resolveGestureEngineOptions } from "./config";
import type { StabilizerOptions, StabilizerState } from "./types";

function initialState(): StabilizerState {
  return {
    lastStableAction: null,
    lastEmittedAt: { left: -Infinity, right: -Infinity, up: -Infinity, down: -Infinity },
    pendingAction: null,
    pendingCount: 0,
  };
}

/**
 * Turns per-frame candidate actions into rate-limited emissions.
 *
 * A new non-neutral candidate is adopted as the stable action as soon as it
 * has been seen on `minConfidenceFrames` consecutive frames. Neutral frames
 * (and unconfirmed candidates) keep reporting the stable action. Each action
 * then has its own cooldown clock, so alternating actions are not throttled
 * by each other.
 */
export class GestureStabilizer {
  private readonly cooldownSeconds: number;
  private readonly minConfidenceFrames: number;
  private state: StabilizerState = initialState();

  constructor(opts?: StabilizerOptions) {
    const { cooldownSeconds, minConfidenceFrames } = resolveGestureEngineOptions(opts);
    this.cooldownSeconds = cooldownSeconds;
    this.minConfidenceFrames = minConfidenceFrames;
  }

  /** Returns the action to emit for this frame, or `none`. `now` is in seconds. */
  update(candidate: ControlAction, now: number): ControlAction {
    const action = this.resolve(candidate);
    if (!isKeyAction(action)) {
      return "none";
    }
    if (now - this.state.lastEmittedAt[action] > this.cooldownSeconds) {
      this.state.lastEmittedAt[action] = now;
      return action;
    }
    return "none";
  }

  getState(): StabilizerState {
    return {
      ...this.state,
      lastEmittedAt: { ...this.state.lastEmittedAt },
    };
  }

  reset(): void {
    this.state = initialState();
  }

  private resolve(candidate: ControlAction): ControlAction {
    const streak = this.trackStreak(candidate);
    const stable: KeyAction | null = this.state.lastStableAction;

    if (!isKeyAction(candidate)) {
      return stable ?? "none";
    }
    if (candidate !== stable && streak < this.minConfidenceFrames) {
      return stable ?? "none";
    }
    this.state.lastStableAction = candidate;
    return candidate;
  }

  private trackStreak(candidate: ControlAction): number {
    if (candidate === this.state.pendingAction) {
      this.state.pendingCount += 1;
    } else {
      this.state.pendingAction = candidate;
      this.state.pendingCount = 1;
    }
    return this.state.pendingCount;
  }
}
