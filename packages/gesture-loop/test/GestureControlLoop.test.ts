import { afterEach, describe, expect, it, vi } from "vitest";
import { KeyDispatcher, RecordingKeySender } from "@handkeys/control-core";
import type { ArrowKey } from "@handkeys/control-core";
import { ConfigurationError } from "@handkeys/gesture-core";
import type { Landmark, TrackedHand } from "@handkeys/gesture-core";
import type { HandModel } from "@handkeys/handtracking-tfjs";
import { GestureControlLoop } from "../src";
import type { FrameSource, GestureDebugFrame, LoopError } from "../src";

// Wrist at (50,50); all four fingers extended towards +x.
const POINTING_RIGHT: Landmark[] = [
  [50, 50], [55, 45], [60, 42], [64, 40], [68, 38],
  [65, 48], [72, 49], [82, 50], [90, 50],
  [65, 51], [72, 51], [82, 52], [90, 52],
  [64, 54], [70, 55], [80, 55], [88, 55],
  [62, 57], [68, 58], [76, 58], [84, 58],
].map(([x, y]) => ({ x, y }));

// Every fingertip curled back inside its pip joint.
const FIST: Landmark[] = POINTING_RIGHT.map((point, i) =>
  [8, 12, 16, 20].includes(i) ? { x: 58, y: point.y } : point
);

type Frame = TrackedHand[];

const right: Frame = [{ handedness: "Right", landmarks: POINTING_RIGHT }];
const fist: Frame = [{ handedness: "Right", landmarks: FIST }];
const empty: Frame = [];

function arraySource(frames: Frame[]): FrameSource<Frame> {
  const queue = [...frames];
  return { read: async () => queue.shift() ?? null };
}

function passthroughModel(): HandModel<Frame> {
  return { estimateHands: async (hands) => hands };
}

function clock(times: number[]): () => number {
  const queue = [...times];
  return () => queue.shift() ?? Number.NaN;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GestureControlLoop", () => {
  it("presses keys for processed frames until the source ends", async () => {
    const sender = new RecordingKeySender();
    const loop = new GestureControlLoop({
      source: arraySource([right, right, right, empty, fist]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(sender),
      now: clock([0, 0.02, 0.1, 0.2, 0.3]),
    });

    const summary = await loop.run();

    expect(sender.pressed).toEqual(["ArrowRight", "ArrowRight", "ArrowRight", "ArrowDown"]);
    expect(summary).toEqual({ framesRead: 5, framesProcessed: 5, actionsEmitted: 4 });
  });

  it("skips frames between processed ones", async () => {
    const estimateHands = vi.fn(async (hands: Frame) => hands);
    const frames = [right, fist, right, fist, right];
    const loop = new GestureControlLoop({
      source: arraySource(frames),
      model: { estimateHands },
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
      skipFrames: 1,
      now: clock([0, 1]),
    });

    const first = await loop.step();
    const second = await loop.step();
    const summary = await loop.run();

    expect(first).toEqual({ status: "skipped", frameIndex: 1 });
    expect(second).toEqual({ status: "processed", frameIndex: 2, action: "down" });
    expect(estimateHands).toHaveBeenCalledTimes(2);
    expect(estimateHands.mock.calls.map(([input]) => input)).toEqual([fist, fist]);
    expect(summary).toEqual({ framesRead: 5, framesProcessed: 2, actionsEmitted: 2 });
  });

  it("reports detector failures and keeps going", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = new Error("model crashed");
    const estimateHands = vi
      .fn<[Frame], Promise<TrackedHand[]>>()
      .mockRejectedValueOnce(failure)
      .mockImplementation(async (hands) => hands);
    const errors: LoopError[] = [];
    const sender = new RecordingKeySender();
    const loop = new GestureControlLoop({
      source: arraySource([right, right]),
      model: { estimateHands },
      dispatcher: new KeyDispatcher(sender),
      now: clock([0, 1]),
      onError: (err) => errors.push(err),
    });

    expect(await loop.step()).toEqual({ status: "processed", frameIndex: 1, action: "none" });
    expect(await loop.step()).toEqual({ status: "processed", frameIndex: 2, action: "right" });
    expect(errors).toEqual([{ type: "detector-failed", error: failure }]);
    expect(sender.pressed).toEqual(["ArrowRight"]);
  });

  it("counts only keys that were actually sent", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const press = vi
      .fn<[ArrowKey], void>()
      .mockImplementationOnce(() => {
        throw new Error("injector offline");
      })
      .mockImplementation(() => {});
    const loop = new GestureControlLoop({
      source: arraySource([right, fist]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher({ press }),
      now: clock([0, 1]),
    });

    const summary = await loop.run();

    expect(press).toHaveBeenCalledTimes(2);
    expect(summary).toEqual({ framesRead: 2, framesProcessed: 2, actionsEmitted: 1 });
  });

  it("stops when asked", async () => {
    const frames = Array.from({ length: 10 }, () => right);
    let t = 0;
    const loop: GestureControlLoop<Frame> = new GestureControlLoop({
      source: arraySource(frames),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
      now: () => (t += 1),
      onDebugFrame: (frame) => {
        if (frame.frameIndex === 3) loop.stop();
      },
    });

    const summary = await loop.run();
    expect(summary.framesRead).toBe(3);
  });

  it("sends debug frames, with timings only in debug mode", async () => {
    const frames: GestureDebugFrame[] = [];
    const quiet = new GestureControlLoop({
      source: arraySource([fist]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
      now: clock([4]),
      onDebugFrame: (frame) => frames.push(frame),
    });
    await quiet.run();

    expect(frames).toEqual([
      {
        timestamp: 4,
        frameIndex: 1,
        handCount: 1,
        debugState: {
          raw: { kind: "roll" },
          candidate: "down",
          stableAction: "down",
          emitted: "down",
          invalidInput: null,
        },
        action: "down",
        timings: undefined,
      },
    ]);

    const verbose = new GestureControlLoop({
      source: arraySource([empty]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
      now: clock([5]),
      debug: true,
      onDebugFrame: (frame) => frames.push(frame),
    });
    await verbose.run();

    expect(frames[1].handCount).toBe(0);
    expect(frames[1].timings?.totalMs).toBeGreaterThanOrEqual(0);
  });

  it("waits to respect the fps limit", async () => {
    const sleep = vi.fn(async (_seconds: number) => {});
    const loop = new GestureControlLoop({
      source: arraySource([right, right]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
      fps: 10,
      now: clock([0, 0.01, 0.1]),
      sleep,
    });

    await loop.run();

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0][0]).toBeCloseTo(0.09);
  });

  it("ends the run when the source fails", async () => {
    const loop = new GestureControlLoop({
      source: { read: () => Promise.reject(new Error("camera unplugged")) },
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
    });
    await expect(loop.run()).rejects.toThrow("camera unplugged");
  });

  it("passes gesture options to its engine", () => {
    const loop = new GestureControlLoop({
      source: arraySource([]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
      gestureOptions: { cooldownSeconds: 0.5 },
    });
    expect(loop.engine.getOptions().cooldownSeconds).toBe(0.5);
  });

  it("rejects invalid loop options", () => {
    const base = {
      source: arraySource([]),
      model: passthroughModel(),
      dispatcher: new KeyDispatcher(new RecordingKeySender()),
    };
    expect(() => new GestureControlLoop({ ...base, skipFrames: -1 })).toThrow(ConfigurationError);
    expect(() => new GestureControlLoop({ ...base, fps: 0 })).toThrow(/fps/);
    expect(() => new GestureControlLoop({ ...base, gestureOptions: { angularThresholdDegrees: 45 } })).toThrow(
      ConfigurationError
    );
  });
});
