/**
 * Label anchor positions for the unit-circle diagram.
 *
 * Each label sits beside the segment it names. The offsets are hand-tuned
 * presentation constants, kept exactly as tuned.
 */

import type { Label } from "./labels";
import type { Point } from "./label-overlap-fader";
import { clampInfinite } from "./math-utils";
import type { TrigValues } from "./trig-engine";

export interface AnchorInput {
  theta: number;
  radius: number;
  /** Raw (unit) trig values, clamped */
  values: TrigValues;
  /** Radius-scaled trig values, clamped */
  scaled: TrigValues;
}

function point(x: number, y: number): Point {
  return { x: clampInfinite(x), y: clampInfinite(y) };
}

export function computeLabelAnchors({ theta, radius, values, scaled }: AnchorInput): Record<Label, Point> {
  // cot label flips sides on the lower half of the circle
  const cotDirection = theta >= Math.PI ? -1 : 1;
  const unitAngle = theta - Math.PI * 0.5;

  return {
    cos: point(scaled.cos * 0.5, 15),
    sin: point(scaled.cos + 22, scaled.sin * 0.5),
    tan: point(radius + 23, scaled.tan * 0.5),
    cot: point(
      scaled.cos * 0.5 + cotDirection * values.cos * 20,
      (scaled.sin + scaled.csc) * 0.5 + 12 + Math.abs(values.sin) * 8
    ),
    sec: point(radius * 0.5 - values.tan * 7, scaled.tan * 0.5 + 18),
    csc: point(-25, scaled.csc * 0.5),
    theta: point(
      Math.cos(theta * 0.5) * radius * 0.93,
      Math.sin(theta * 0.5) * radius * 0.93
    ),
    unit: point(
      scaled.cos * 0.5 + 15 * Math.cos(unitAngle),
      scaled.sin * 0.5 + 15 * Math.sin(unitAngle)
    ),
  };
}
