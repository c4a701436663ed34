import type { ArrowKey, KeySender } from "./types";

/** Keeps pressed keys in memory; used by tests and replays. */
export class RecordingKeySender implements KeySender {
  readonly pressed: ArrowKey[] = [];

  press(key: ArrowKey): void {
    this.pressed.push(key);
  }

  clear(): void {
    this.pressed.length = 0;
  }
}

export class ConsoleKeySender implements KeySender {
  press(key: ArrowKey): void {
    console.log(`press ${key}`);
  }
}
