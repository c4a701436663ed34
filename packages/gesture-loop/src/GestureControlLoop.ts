import type { KeyDispatcher } from "@handkeys/control-core";
import { ConfigurationError, GestureEngine } from "@handkeys/gesture-core";
import type { GestureEngineOptions, TrackedHand } from "@handkeys/gesture-core";
import type { HandModel } from "@handkeys/handtracking-tfjs";
import { z } from "zod";
import type {
  FrameSource,
  GestureDebugFrame,
  GestureLoopOptions,
  LoopError,
  LoopSummary,
  StepResult,
} from "./types";

const DEFAULTS = {
  skipFrames: 0,
  debug: false,
};

const loopOptionsSchema = z.object({
  skipFrames: z.number().int().nonnegative().default(DEFAULTS.skipFrames),
  fps: z.number().finite().positive().optional(),
  debug: z.boolean().default(DEFAULTS.debug),
});

export interface GestureControlLoopConfig<TInput> extends GestureLoopOptions {
  source: FrameSource<TInput>;
  model: HandModel<TInput>;
  dispatcher: KeyDispatcher;
  gestureOptions?: GestureEngineOptions;
  /** Clock in seconds. Default: `performance.now() / 1000` */
  now?: () => number;
  sleep?: (seconds: number) => Promise<void>;
  onError?: (err: LoopError) => void;
  onDebugFrame?: (frame: GestureDebugFrame) => void;
}

function defaultSleep(seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

/**
 * Pulls frames from a source, runs the detector on every `skipFrames + 1`th
 * one and turns the detected hand into key presses. Source failures end the
 * run; detector and key-sender failures are reported and the loop carries on.
 */
export class GestureControlLoop<TInput> {
  readonly engine: GestureEngine;
  private readonly options: z.infer<typeof loopOptionsSchema>;
  private readonly now: () => number;
  private readonly sleep: (seconds: number) => Promise<void>;
  private framesRead = 0;
  private framesProcessed = 0;
  private actionsEmitted = 0;
  private lastProcessedAt: number | null = null;
  private running = false;

  constructor(private readonly config: GestureControlLoopConfig<TInput>) {
    const parsed = loopOptionsSchema.safeParse({
      skipFrames: config.skipFrames,
      fps: config.fps,
      debug: config.debug,
    });
    if (!parsed.success) {
      throw new ConfigurationError(parsed.error.issues);
    }
    this.options = parsed.data;
    this.engine = new GestureEngine(config.gestureOptions);
    this.now = config.now ?? (() => performance.now() / 1000);
    this.sleep = config.sleep ?? defaultSleep;
  }

  async run(): Promise<LoopSummary> {
    this.running = true;
    try {
      while (this.running) {
        const result = await this.step();
        if (result.status === "ended") break;
      }
    } finally {
      this.running = false;
    }
    return this.getSummary();
  }

  stop(): void {
    this.running = false;
  }

  async step(): Promise<StepResult> {
    const input = await this.config.source.read();
    if (input === null) {
      return { status: "ended" };
    }
    this.framesRead += 1;
    const frameIndex = this.framesRead;
    if (frameIndex % (this.options.skipFrames + 1) !== 0) {
      return { status: "skipped", frameIndex };
    }

    const timestamp = await this.throttle();
    this.lastProcessedAt = timestamp;
    this.framesProcessed += 1;

    const estimateStart = performance.now();
    const hands = await this.detect(input);
    const estimateMs = performance.now() - estimateStart;

    const updateStart = performance.now();
    const action = this.engine.update({ hands, timestamp });
    const updateMs = performance.now() - updateStart;

    const dispatchStart = performance.now();
    if (await this.config.dispatcher.handle(action, timestamp)) {
      this.actionsEmitted += 1;
    }
    const dispatchMs = performance.now() - dispatchStart;

    this.config.onDebugFrame?.({
      timestamp,
      frameIndex,
      handCount: hands.length,
      debugState: this.engine.getDebugState(),
      action,
      timings: this.options.debug
        ? { estimateMs, updateMs, dispatchMs, totalMs: estimateMs + updateMs + dispatchMs }
        : undefined,
    });

    return { status: "processed", frameIndex, action };
  }

  getSummary(): LoopSummary {
    return {
      framesRead: this.framesRead,
      framesProcessed: this.framesProcessed,
      actionsEmitted: this.actionsEmitted,
    };
  }

  private async throttle(): Promise<number> {
    const now = this.now();
    const { fps } = this.options;
    if (!fps || this.lastProcessedAt === null) return now;
    const wait = 1 / fps - (now - this.lastProcessedAt);
    if (wait <= 0) return now;
    await this.sleep(wait);
    return this.now();
  }

  private async detect(input: TInput): Promise<TrackedHand[]> {
    try {
      return await this.config.model.estimateHands(input);
    } catch (error) {
      this.handleError({ type: "detector-failed", error });
      return [];
    }
  }

  private handleError(err: LoopError) {
    this.config.onError?.(err);
    console.error(err);
  }
}

export { DEFAULTS as defaultGestureLoopOptions };
