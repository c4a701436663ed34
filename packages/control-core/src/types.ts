export type KeyAction = "left" | "right" | "up" | "down";

export type ControlAction = KeyAction | "none";

export type ArrowKey = "ArrowLeft" | "ArrowRight" | "ArrowUp" | "ArrowDown";

/**
 * Collaborator that injects a key press into the controlled application.
 * Implementations may be synchronous or return a promise.
 */
export interface KeySender {
  press(key: ArrowKey): void | Promise<void>;
}

export type DispatchError = {
  type: "key-send-failed";
  action: KeyAction;
  key: ArrowKey;
  error: unknown;
};

export interface KeyDispatcherOptions {
  /** Log every key that was sent. Default: false */
  debug?: boolean;
  onError?: (err: DispatchError) => void;
}
