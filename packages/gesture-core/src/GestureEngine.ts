import type { ControlAction } from "@handkeys/control-core";
import { toCandidateAction } from "./bands";
import { classifyGesture } from "./classifier";
import { resolveGestureEngineOptions } from "./config";
import { InvalidInputError } from "./errors";
import { GestureStabilizer } from "./GestureStabilizer";
import type { GestureDebugState, GestureEngineOptions, HandFrame, RawGesture } from "./types";

const AMBIGUOUS: RawGesture = { kind: "ambiguous" };

type FrameReading = {
  raw: RawGesture;
  invalidInput: string | null;
};

function initialDebugState(): GestureDebugState {
  return { raw: AMBIGUOUS, candidate: "none", stableAction: null, emitted: "none", invalidInput: null };
}

export class GestureEngine {
  private readonly options: Required<GestureEngineOptions>;
  private readonly stabilizer: GestureStabilizer;
  private debugState: GestureDebugState = initialDebugState();

  constructor(opts?: GestureEngineOptions) {
    this.options = resolveGestureEngineOptions(opts);
    this.stabilizer = new GestureStabilizer(this.options);
  }

  /** Classifies the first hand of the frame and returns the action to emit, if any. */
  update(frame: HandFrame): ControlAction {
    const { raw, invalidInput } = this.read(frame);
    const candidate = toCandidateAction(raw, this.options.angularThresholdDegrees);
    const emitted = this.stabilizer.update(candidate, frame.timestamp);

    this.debugState = {
      raw,
      candidate,
      stableAction: this.stabilizer.getState().lastStableAction,
      emitted,
      invalidInput,
    };
    return emitted;
  }

  getDebugState(): GestureDebugState {
    return { ...this.debugState };
  }

  getOptions(): Required<GestureEngineOptions> {
    return { ...this.options };
  }

  reset(): void {
    this.stabilizer.reset();
    this.debugState = initialDebugState();
  }

  private read(frame: HandFrame): FrameReading {
    if (frame.hands.length === 0) {
      return { raw: AMBIGUOUS, invalidInput: null };
    }
    try {
      return { raw: classifyGesture(frame.hands[0].landmarks, this.options), invalidInput: null };
    } catch (err) {
      // A malformed frame counts as no hand; it must not stop the control loop.
      if (err instanceof InvalidInputError) {
        return { raw: AMBIGUOUS, invalidInput: err.message };
      }
      throw err;
    }
  }
}
