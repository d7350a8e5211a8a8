/**
 * Value panel: text formatting for the live readout beside the diagram, and the
 * fixed rows a pointer can click to show or hide a function.
 */

import * as THREE from "three";
import type { Point } from "./label-overlap-fader";
import { LABEL_TEXT, type TrigFunction } from "./labels";

/** Magnitudes beyond this read as infinite (the sentinel stands in for Infinity) */
const LARGE_VALUE_LIMIT = 1.0e9;

export const VALUE_PANEL_X = 430;

export const VALUE_ROW_Y: Record<TrigFunction | "theta" | "rate", number> = {
  theta: 200,
  sin: 150,
  cos: 100,
  tan: 50,
  cot: -50,
  sec: -100,
  csc: -150,
  rate: -200,
};

/** Half-extent of a clickable value row */
export const VALUE_ROW_HIT_EXTENT = { x: 90, y: 14 };

export function formatTrigValue(value: number): string {
  if (value > LARGE_VALUE_LIMIT) return "inf";
  if (value < -LARGE_VALUE_LIMIT) return "-inf";
  return value.toFixed(2);
}

export function formatTrigLine(fn: TrigFunction, value: number): string {
  return `${LABEL_TEXT[fn]} = ${formatTrigValue(value)}`;
}

export function formatThetaLine(theta: number): string {
  return `θ = ${theta.toFixed(2)} (${THREE.MathUtils.radToDeg(theta).toFixed(0)}º)`;
}

/** Two lines: radians per second, then degrees per second */
export function formatRateLines(rate: number): [string, string] {
  return [
    `rate = ${rate.toFixed(2)} rad/s`,
    `(${THREE.MathUtils.radToDeg(rate).toFixed(0)} deg/s)`,
  ];
}

export function valueRowRect(fn: TrigFunction): THREE.Box2 {
  const center = new THREE.Vector2(VALUE_PANEL_X, VALUE_ROW_Y[fn]);
  const size = new THREE.Vector2(VALUE_ROW_HIT_EXTENT.x * 2, VALUE_ROW_HIT_EXTENT.y * 2);
  return new THREE.Box2().setFromCenterAndSize(center, size);
}

const ROW_ORDER: readonly TrigFunction[] = ["sin", "cos", "tan", "cot", "sec", "csc"];

/**
 * Find the function row under a scene-space point.
 * @returns The function whose row contains the point, or null
 */
export function hitTestValueRows(pointer: Point): TrigFunction | null {
  const target = new THREE.Vector2(pointer.x, pointer.y);
  for (const fn of ROW_ORDER) {
    if (valueRowRect(fn).containsPoint(target)) return fn;
  }
  return null;
}
