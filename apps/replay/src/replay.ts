import { KeyDispatcher, RecordingKeySender } from "@handkeys/control-core";
import type { ArrowKey, KeySender } from "@handkeys/control-core";
import type { GestureEngineOptions, TrackedHand } from "@handkeys/gesture-core";
import type { HandModel } from "@handkeys/handtracking-tfjs";
import { GestureControlLoop } from "@handkeys/gesture-loop";
import type { FrameSource, GestureDebugFrame, LoopSummary } from "@handkeys/gesture-loop";
import type { RecordedFrame, RecordedSession } from "./session";

/** Plays recorded frames back in order, exposing the timestamp of the last one read. */
export class RecordedFrameSource implements FrameSource<RecordedFrame> {
  private index = 0;
  private current = 0;

  constructor(private readonly frames: readonly RecordedFrame[]) {}

  async read(): Promise<RecordedFrame | null> {
    const frame = this.frames[this.index];
    if (!frame) return null;
    this.index += 1;
    this.current = frame.timestamp;
    return frame;
  }

  currentTimestamp(): number {
    return this.current;
  }
}

/** The hands were detected at record time, so detection is a lookup. */
export class RecordedHandModel implements HandModel<RecordedFrame> {
  async estimateHands(frame: RecordedFrame): Promise<TrackedHand[]> {
    return frame.hands;
  }
}

export interface ReplayOptions {
  skipFrames?: number;
  gestureOptions?: GestureEngineOptions;
  sender?: KeySender;
  debug?: boolean;
  onDebugFrame?: (frame: GestureDebugFrame) => void;
}

export interface ReplayResult {
  summary: LoopSummary;
  keys: ArrowKey[];
}

export async function replaySession(session: RecordedSession, options: ReplayOptions = {}): Promise<ReplayResult> {
  const recorder = new RecordingKeySender();
  const forward = options.sender;
  const sender: KeySender = {
    press: async (key) => {
      recorder.press(key);
      await forward?.press(key);
    },
  };
  const source = new RecordedFrameSource(session.frames);
  const loop = new GestureControlLoop({
    source,
    model: new RecordedHandModel(),
    dispatcher: new KeyDispatcher(sender, { debug: options.debug }),
    skipFrames: options.skipFrames,
    gestureOptions: options.gestureOptions,
    debug: options.debug,
    now: () => source.currentTimestamp(),
    onDebugFrame: options.onDebugFrame,
  });

  const summary = await loop.run();
  return { summary, keys: [...recorder.pressed] };
}
