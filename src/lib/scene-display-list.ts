/**
 * Renderer-agnostic draw commands for one frame of the diagram.
 *
 * Coordinates are scene units: origin at the circle centre, y pointing up.
 * Renderers apply their own viewport transform.
 */

import { colors, dimColor } from "./colors";
import type { Point } from "./label-overlap-fader";
import { LABEL_TEXT, TRIG_FUNCTIONS, type Label, type TrigFunction } from "./labels";
import type { SceneFrame } from "./scene-model";
import { computeThetaArcPoints } from "./theta-arc";
import {
  formatRateLines,
  formatThetaLine,
  formatTrigLine,
  VALUE_PANEL_X,
  VALUE_ROW_Y,
} from "./value-readout";

export const STROKE_WEIGHT = 3;
const AXIS_LENGTH = 1000;
const NODE_RADIUS = 8;
const LABEL_FONT_SIZE = 13;
const VALUE_FONT_SIZE = 18;
const RATE_LINE_SPACING = 21;
/** How far a hidden function's readout row is mixed toward the background */
const HIDDEN_ROW_DIM = 0.6;

export type TextAlign = "center" | "left";

export type DrawCommand =
  | { kind: "line"; from: Point; to: Point; color: string; weight: number }
  | { kind: "circle"; center: Point; radius: number; stroke: string | null; fill: string | null; weight: number }
  | { kind: "polyline"; points: Point[]; color: string; weight: number }
  | {
      kind: "text";
      text: string;
      position: Point;
      color: string;
      fontSize: number;
      align: TextAlign;
      italic: boolean;
      opacity: number;
    };

export interface DisplayListOptions {
  thetaArcPoints?: number;
}

function line(from: Point, to: Point, color: string, weight = STROKE_WEIGHT): DrawCommand {
  return { kind: "line", from, to, color, weight };
}

function labelText(frame: SceneFrame, label: Label, color: string): DrawCommand {
  const { position, opacity } = frame.labels[label];
  return {
    kind: "text",
    text: LABEL_TEXT[label],
    position,
    color,
    fontSize: LABEL_FONT_SIZE,
    align: "center",
    italic: false,
    opacity,
  };
}

function valueText(text: string, position: Point, color: string): DrawCommand {
  return {
    kind: "text",
    text,
    position,
    color,
    fontSize: VALUE_FONT_SIZE,
    align: "left",
    italic: true,
    opacity: 1,
  };
}

/** Segment endpoints of each function, in scene units */
function trigSegment(frame: SceneFrame, fn: TrigFunction): [Point, Point] {
  const { scaled, radius } = frame;
  const origin = { x: 0, y: 0 };
  switch (fn) {
    case "sin":
      return [{ x: scaled.cos, y: 0 }, { x: scaled.cos, y: scaled.sin }];
    case "cos":
      return [origin, { x: scaled.cos, y: 0 }];
    case "tan":
      return [{ x: radius, y: 0 }, { x: radius, y: scaled.tan }];
    case "cot":
      return [{ x: scaled.cos, y: scaled.sin }, { x: 0, y: scaled.csc }];
    case "sec":
      return [origin, { x: radius, y: scaled.tan }];
    case "csc":
      return [origin, { x: 0, y: scaled.csc }];
  }
}

function buildGuides(frame: SceneFrame): DrawCommand[] {
  const { scaled, radius, flags } = frame;
  const commands: DrawCommand[] = [
    line({ x: -AXIS_LENGTH, y: 0 }, { x: AXIS_LENGTH, y: 0 }, colors.guide, STROKE_WEIGHT - 1),
    line({ x: 0, y: AXIS_LENGTH }, { x: 0, y: -AXIS_LENGTH }, colors.guide, STROKE_WEIGHT - 1),
    line({ x: 0, y: 0 }, { x: scaled.cos, y: scaled.sin }, colors.guide, STROKE_WEIGHT - 0.8),
  ];
  if (flags.showLabels) {
    commands.push(labelText(frame, "unit", colors.guideLabel));
  }

  commands.push({
    kind: "circle",
    center: { x: 0, y: 0 },
    radius,
    stroke: colors.guide,
    fill: null,
    weight: STROKE_WEIGHT - 0.3,
  });
  return commands;
}

function buildAngleArc(frame: SceneFrame, maxPoints: number): DrawCommand[] {
  if (!frame.flags.showAngleArc) return [];

  const commands: DrawCommand[] = [];
  if (frame.flags.showLabels) {
    commands.push(labelText(frame, "theta", colors.highlight));
  }
  const points = computeThetaArcPoints(frame.theta, frame.radius, maxPoints);
  if (points.length > 0) {
    commands.push({ kind: "polyline", points, color: colors.highlight, weight: STROKE_WEIGHT });
  }
  return commands;
}

function buildTrigSegments(frame: SceneFrame): DrawCommand[] {
  const commands: DrawCommand[] = [];
  for (const fn of TRIG_FUNCTIONS) {
    if (!frame.visible[fn]) continue;
    const [from, to] = trigSegment(frame, fn);
    commands.push(line(from, to, colors.trig[fn]));
    if (frame.flags.showLabels) {
      commands.push(labelText(frame, fn, colors.trig[fn]));
    }
  }
  return commands;
}

function buildValuePanel(frame: SceneFrame): DrawCommand[] {
  if (!frame.flags.showValues) return [];

  const commands: DrawCommand[] = [];
  for (const fn of TRIG_FUNCTIONS) {
    const color = frame.visible[fn] ? colors.trig[fn] : dimColor(colors.trig[fn], HIDDEN_ROW_DIM);
    commands.push(
      valueText(formatTrigLine(fn, frame.values[fn]), { x: VALUE_PANEL_X, y: VALUE_ROW_Y[fn] }, color)
    );
  }

  if (frame.flags.showAngleArc) {
    commands.push(
      valueText(formatThetaLine(frame.theta), { x: VALUE_PANEL_X, y: VALUE_ROW_Y.theta }, colors.highlight)
    );
  }

  const rate = frame.flags.running ? frame.rate : 0;
  const [radians, degrees] = formatRateLines(rate);
  commands.push(valueText(radians, { x: VALUE_PANEL_X, y: VALUE_ROW_Y.rate }, colors.guide));
  commands.push(
    valueText(degrees, { x: VALUE_PANEL_X, y: VALUE_ROW_Y.rate - RATE_LINE_SPACING }, colors.guide)
  );
  return commands;
}

/**
 * Build the frame's draw commands in painting order: guides, angle arc,
 * function segments with labels, the point on the circle, then the readout.
 */
export function buildDisplayList(frame: SceneFrame, options: DisplayListOptions = {}): DrawCommand[] {
  const { thetaArcPoints = 128 } = options;
  const node: DrawCommand = {
    kind: "circle",
    center: { x: frame.scaled.cos, y: frame.scaled.sin },
    radius: NODE_RADIUS,
    stroke: null,
    fill: colors.highlight,
    weight: 0,
  };

  return [
    ...buildGuides(frame),
    ...buildAngleArc(frame, thetaArcPoints),
    ...buildTrigSegments(frame),
    node,
    ...buildValuePanel(frame),
  ];
}
