/**
 * Keyboard commands for the diagram.
 * Keys use DOM `KeyboardEvent.key` names; letters match in either case.
 */

import type { SceneModel } from "./scene-model";

export type SceneCommand =
  | "toggle-running"
  | "toggle-labels"
  | "toggle-values"
  | "toggle-angle-arc"
  | "increment-rate"
  | "decrement-rate"
  | "reset-theta"
  | "reset-rate"
  | "increment-radius"
  | "decrement-radius"
  | "reset-radius";

export const DEFAULT_KEY_BINDINGS: Readonly<Record<string, SceneCommand>> = {
  " ": "toggle-running",
  l: "toggle-labels",
  v: "toggle-values",
  t: "toggle-angle-arc",
  ArrowUp: "increment-rate",
  ArrowDown: "decrement-rate",
  r: "reset-theta",
  s: "reset-rate",
  "=": "increment-radius",
  "+": "increment-radius",
  "-": "decrement-radius",
  "0": "reset-radius",
};

/**
 * Look up the command bound to a key.
 * @returns The bound command, or null for unbound keys
 */
export function resolveKeyCommand(
  key: string,
  bindings: Readonly<Record<string, SceneCommand>> = DEFAULT_KEY_BINDINGS
): SceneCommand | null {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  return Object.hasOwn(bindings, normalized) ? bindings[normalized] : null;
}

export function applySceneCommand(scene: SceneModel, command: SceneCommand): void {
  switch (command) {
    case "toggle-running":
      scene.toggleRunning();
      break;
    case "toggle-labels":
      scene.toggleLabels();
      break;
    case "toggle-values":
      scene.toggleValues();
      break;
    case "toggle-angle-arc":
      scene.toggleAngleArc();
      break;
    case "increment-rate":
      scene.incrementRate();
      break;
    case "decrement-rate":
      scene.decrementRate();
      break;
    case "reset-theta":
      scene.resetTheta();
      break;
    case "reset-rate":
      scene.resetRate();
      break;
    case "increment-radius":
      scene.incrementRadius();
      break;
    case "decrement-radius":
      scene.decrementRadius();
      break;
    case "reset-radius":
      scene.resetRadius();
      break;
  }
}

/**
 * Resolve and apply a key press.
 * @returns Whether the key was bound
 */
export function handleKeyPress(scene: SceneModel, key: string): boolean {
  const command = resolveKeyCommand(key);
  if (!command) return false;
  applySceneCommand(scene, command);
  return true;
}
