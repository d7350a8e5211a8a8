/**
 * Animation clock for the diagram angle and the six trig values derived from it.
 */

import { clampInfinite, wrapAngle } from "./math-utils";
import type { TrigFunction } from "./labels";

export type TrigValues = Record<TrigFunction, number>;

export const ZERO_TRIG_VALUES: Readonly<TrigValues> = {
  sin: 0,
  cos: 0,
  tan: 0,
  cot: 0,
  sec: 0,
  csc: 0,
};

/**
 * Compute all six values for an angle.
 * cot, sec and csc are reciprocals of tan, cos and sin, so they reach
 * ±Infinity at their asymptotes. Callers clamp.
 */
export function computeTrigValues(theta: number): TrigValues {
  const sin = Math.sin(theta);
  const cos = Math.cos(theta);
  const tan = Math.tan(theta);
  return {
    sin,
    cos,
    tan,
    cot: 1 / tan,
    sec: 1 / cos,
    csc: 1 / sin,
  };
}

export function scaleTrigValues(values: TrigValues, factor: number): TrigValues {
  return {
    sin: values.sin * factor,
    cos: values.cos * factor,
    tan: values.tan * factor,
    cot: values.cot * factor,
    sec: values.sec * factor,
    csc: values.csc * factor,
  };
}

/** Replace ±Infinity in every field with the signed sentinel. */
export function clampTrigValues(values: TrigValues): TrigValues {
  return {
    sin: clampInfinite(values.sin),
    cos: clampInfinite(values.cos),
    tan: clampInfinite(values.tan),
    cot: clampInfinite(values.cot),
    sec: clampInfinite(values.sec),
    csc: clampInfinite(values.csc),
  };
}

export interface TrigEngine {
  /** Advance the angle by rate * dt when running, wrapping into [0, 2π) */
  advance(dt: number, rate: number, running: boolean): void;
  /** Recompute raw and radius-scaled values from the current angle */
  compute(radius: number): void;
  getTheta(): number;
  /** Jump to an angle (wrapped into range) */
  setTheta(theta: number): void;
  getValues(): TrigValues;
  getScaledValues(): TrigValues;
  reset(): void;
}

export function createTrigEngine(initialTheta = 0): TrigEngine {
  let theta = wrapAngle(initialTheta);
  let values: TrigValues = { ...ZERO_TRIG_VALUES };
  let scaledValues: TrigValues = { ...ZERO_TRIG_VALUES };

  return {
    advance(dt, rate, running) {
      if (!running) return;
      theta = wrapAngle(theta + rate * dt);
    },

    compute(radius) {
      const raw = computeTrigValues(theta);
      // Scale before clamping: a sentinel times the radius would overflow back to Infinity
      scaledValues = clampTrigValues(scaleTrigValues(raw, radius));
      values = clampTrigValues(raw);
    },

    getTheta: () => theta,

    setTheta(next) {
      theta = wrapAngle(next);
    },

    getValues: () => ({ ...values }),
    getScaledValues: () => ({ ...scaledValues }),

    reset() {
      theta = 0;
      values = { ...ZERO_TRIG_VALUES };
      scaledValues = { ...ZERO_TRIG_VALUES };
    },
  };
}
