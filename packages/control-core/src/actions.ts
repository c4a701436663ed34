import type { ArrowKey, ControlAction, KeyAction } from "./types";

export const KEY_ACTIONS: readonly KeyAction[] = ["left", "right", "up", "down"];

export const ARROW_KEYS: Readonly<Record<KeyAction, ArrowKey>> = {
  left: "ArrowLeft",
  right: "ArrowRight",
  up: "ArrowUp",
  down: "ArrowDown",
};

export function isKeyAction(action: ControlAction): action is KeyAction {
  return action !== "none";
}
