import type { Handedness, Landmark, TrackedHand } from "@handkeys/gesture-core";
import type { Tensor3D } from "@tensorflow/tfjs-core";

type HandPoseDetection = typeof import("@tensorflow-models/hand-pose-detection");
type HandDetector = Awaited<ReturnType<HandPoseDetection["createDetector"]>>;

export interface HandModel<TInput> {
  estimateHands(input: TInput): Promise<TrackedHand[]>;
}

export type ModelType = "lite" | "full";

export interface TFJSHandModelOptions {
  modelType?: ModelType;
  /** Mirror landmarks horizontally, as for a selfie camera. Default: true */
  mirror?: boolean;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface MapDetectionsOptions {
  mirror?: boolean;
}

/** Structural view of a hand-pose-detection result. */
export interface HandDetection {
  handedness?: Handedness | { label?: Handedness };
  keypoints: { x: number; y: number; z?: number }[];
}

const detectorPromises: Record<ModelType, Promise<HandDetector> | null> = {
  lite: null,
  full: null,
};
let tfBackendReady: Promise<void> | null = null;

async function loadDetector(modelType: ModelType): Promise<HandDetector> {
  const cached = detectorPromises[modelType];
  if (cached) return cached;
  const created = (async () => {
    await ensureTfjsBackend();
    const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
    const { SupportedModels } = handPoseDetection;
    return handPoseDetection.createDetector(SupportedModels.MediaPipeHands, {
      runtime: "tfjs",
      modelType,
      maxHands: 1,
    });
  })();
  detectorPromises[modelType] = created;
  return created;
}

class TFJSHandModel implements HandModel<Tensor3D> {
  private readonly modelType: ModelType;
  private readonly mirror: boolean;

  constructor(options: TFJSHandModelOptions = {}) {
    this.modelType = options.modelType ?? "lite";
    this.mirror = options.mirror ?? true;
  }

  async estimateHands(frame: Tensor3D): Promise<TrackedHand[]> {
    const [height, width] = frame.shape;
    if (!width || !height) {
      return [];
    }
    try {
      const detector = await loadDetector(this.modelType);
      const predictions = await detector.estimateHands(frame);
      return mapDetectionsToTrackedHands(predictions, { width, height }, { mirror: this.mirror });
    } catch (err) {
      console.error("handtracking-tfjs estimateHands failed", err);
      // Drop the cached backend and detector so the next frame re-creates them.
      tfBackendReady = null;
      detectorPromises[this.modelType] = null;
      return [];
    }
  }
}

/**
 * Converts detector output into tracked hands in pixel coordinates. Keypoints
 * already in [0, 1] are scaled by the frame size.
 */
export function mapDetectionsToTrackedHands(
  detections: readonly HandDetection[],
  frame: FrameSize,
  options: MapDetectionsOptions = {}
): TrackedHand[] {
  const width = frame.width || 1;
  const height = frame.height || 1;

  return detections.map((detection) => {
    const landmarks = detection.keypoints.map((kp): Landmark => {
      const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
      const x = isNormalized ? kp.x * width : kp.x;
      const y = isNormalized ? kp.y * height : kp.y;
      return { x: options.mirror ? width - x : x, y, z: kp.z };
    });
    return { handedness: readHandedness(detection.handedness), landmarks };
  });
}

function readHandedness(value: HandDetection["handedness"]): Handedness {
  if (typeof value === "string") return value;
  return value?.label ?? "Right";
}

async function ensureTfjsBackend() {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    // Node has no WebGL; the CPU backend registers itself on import.
    await import("@tensorflow/tfjs-backend-cpu");
    if (tf.getBackend() !== "cpu") {
      await tf.setBackend("cpu");
    }
    await tf.ready();
  })();
  return tfBackendReady;
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel<Tensor3D>> {
  return new TFJSHandModel(options);
}

/** Model for environments without TFJS support; never finds a hand. */
export class StubHandModel<TInput = unknown> implements HandModel<TInput> {
  async estimateHands(_input: TInput): Promise<TrackedHand[]> {
    return [];
  }
}
