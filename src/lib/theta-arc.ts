import type { Point } from "./label-overlap-fader";
import { TAU } from "./math-utils";

/**
 * Sample the angle arc from 0 to theta on a circle of the given radius.
 *
 * Sample count grows with the swept fraction of a full turn, so a full
 * circle uses `maxPoints` segments. Returns no points at theta = 0.
 */
export function computeThetaArcPoints(theta: number, radius: number, maxPoints = 128): Point[] {
  const segments = Math.ceil(maxPoints * (theta / TAU));
  if (segments <= 0) return [];

  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    const angle = theta * (i / segments);
    points.push({ x: Math.cos(angle) * radius, y: Math.sin(angle) * radius });
  }
  return points;
}
