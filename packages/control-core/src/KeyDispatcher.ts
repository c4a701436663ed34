import { ARROW_KEYS, isKeyAction } from "./actions";
import type { ControlAction, DispatchError, KeyDispatcherOptions, KeySender } from "./types";

const DEFAULTS: Required<Omit<KeyDispatcherOptions, "onError">> = {
  debug: false,
};

export class KeyDispatcher {
  private readonly debug: boolean;
  private readonly onError?: (err: DispatchError) => void;

  constructor(private readonly sender: KeySender, opts?: KeyDispatcherOptions) {
    this.debug = opts?.debug ?? DEFAULTS.debug;
    this.onError = opts?.onError;
  }

  /**
   * Presses the arrow key for `action`. Resolves to true when a key was sent;
   * `none` and failed sends resolve to false. Send failures are reported, not
   * retried.
   */
  async handle(action: ControlAction, timestamp: number): Promise<boolean> {
    if (!isKeyAction(action)) {
      return false;
    }
    const key = ARROW_KEYS[action];
    try {
      await this.sender.press(key);
    } catch (error) {
      this.handleError({ type: "key-send-failed", action, key, error });
      return false;
    }
    if (this.debug) {
      console.log(`Sent key: ${key} at ${timestamp.toFixed(2)}`);
    }
    return true;
  }

  private handleError(err: DispatchError) {
    this.onError?.(err);
    console.error(err);
  }
}

export { DEFAULTS as defaultKeyDispatcherOptions };
