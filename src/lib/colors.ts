import chroma from "chroma-js";
import type { TrigFunction } from "./labels";

/**
 * Diagram palette: one hue per trig function on a black canvas, grey guides
 * and a white highlight for the angle.
 */

/** Fade a hex color toward the canvas; `amount` 1 yields the background itself. */
export function dimColor(color: string, amount: number, background = colors.background): string {
  return chroma.mix(color, background, amount, "rgb").hex();
}

export const colors = {
  background: "#000000",

  // One hue per function segment and label
  trig: {
    sin: chroma.gl(1, 0, 0).hex(),
    cos: chroma.gl(0, 1, 0).hex(),
    tan: chroma.gl(1, 1, 0).hex(),
    cot: chroma.gl(1, 0.5, 0).hex(),
    sec: chroma.gl(1, 0, 1).hex(),
    csc: chroma.gl(0, 1, 1).hex(),
  } satisfies Record<TrigFunction, string>,

  // Axes, unit circle and rate readout
  guide: "#808080",
  // Unit radius label
  guideLabel: "#d3d3d3",
  // Angle arc, node and theta readout
  highlight: "#ffffff",
};
