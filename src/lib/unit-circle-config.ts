export interface LabelExtent {
  /** Half-width of a label's bounding box (scene units) */
  x: number;
  /** Half-height of a label's bounding box (scene units) */
  y: number;
}

export interface UnitCircleConfig {
  /** Angular speed at startup and after a rate reset (rad/s) */
  defaultRate: number;
  /** Step applied by the rate up/down commands (rad/s) */
  rateIncrement: number;
  /** Radius of the unit circle in scene units */
  defaultRadius: number;
  radiusIncrement: number;
  /** Radius never drops below this */
  minRadius: number;
  fade: {
    /** Seconds for a full 0→1 swing while fading out */
    outSeconds: number;
    /** Seconds for a full 0→1 swing while fading back in */
    inSeconds: number;
    /** Opacity floor is 1 - intensity */
    intensity: number;
  };
  labelExtent: LabelExtent;
  /** Sample count of the angle arc for a full turn */
  thetaArcPoints: number;
  canvas: {
    width: number;
    height: number;
    /** Horizontal shift applied to the whole scene when drawn */
    offsetX: number;
  };
}

export const DEFAULT_UNIT_CIRCLE_CONFIG: UnitCircleConfig = {
  defaultRate: 0.25,
  rateIncrement: 0.08,
  defaultRadius: 200,
  radiusIncrement: 10,
  minRadius: 20,
  fade: {
    outSeconds: 0.3,
    inSeconds: 0.3,
    intensity: 0.8,
  },
  labelExtent: { x: 20, y: 15 },
  thetaArcPoints: 128,
  canvas: {
    width: 800,
    height: 800,
    offsetX: -120,
  },
};

export type UnitCircleConfigOverrides = Partial<
  Omit<UnitCircleConfig, "fade" | "labelExtent" | "canvas">
> & {
  fade?: Partial<UnitCircleConfig["fade"]>;
  labelExtent?: Partial<LabelExtent>;
  canvas?: Partial<UnitCircleConfig["canvas"]>;
};

export function cloneUnitCircleConfig(config: UnitCircleConfig): UnitCircleConfig {
  return {
    ...config,
    fade: { ...config.fade },
    labelExtent: { ...config.labelExtent },
    canvas: { ...config.canvas },
  };
}

const MIN_FADE_SECONDS = 1e-3;

function positiveOr(value: number, fallback: number): number {
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function sanitizeUnitCircleConfig(config: UnitCircleConfig): UnitCircleConfig {
  const defaults = DEFAULT_UNIT_CIRCLE_CONFIG;
  const minRadius = Math.max(0, config.minRadius);

  return {
    defaultRate: Math.max(0, config.defaultRate),
    rateIncrement: Math.max(0, config.rateIncrement),
    defaultRadius: Math.max(minRadius, config.defaultRadius),
    radiusIncrement: Math.max(0, config.radiusIncrement),
    minRadius,
    fade: {
      outSeconds: Math.max(MIN_FADE_SECONDS, config.fade.outSeconds),
      inSeconds: Math.max(MIN_FADE_SECONDS, config.fade.inSeconds),
      intensity: Math.max(0, Math.min(1, config.fade.intensity)),
    },
    labelExtent: {
      x: positiveOr(config.labelExtent.x, defaults.labelExtent.x),
      y: positiveOr(config.labelExtent.y, defaults.labelExtent.y),
    },
    thetaArcPoints: Math.max(1, Math.round(config.thetaArcPoints)),
    canvas: {
      width: positiveOr(config.canvas.width, defaults.canvas.width),
      height: positiveOr(config.canvas.height, defaults.canvas.height),
      offsetX: config.canvas.offsetX,
    },
  };
}

/**
 * Merge overrides onto the defaults and sanitize the result.
 */
export function resolveUnitCircleConfig(
  overrides: UnitCircleConfigOverrides = {}
): UnitCircleConfig {
  const base = DEFAULT_UNIT_CIRCLE_CONFIG;
  return sanitizeUnitCircleConfig({
    ...base,
    ...overrides,
    fade: { ...base.fade, ...overrides.fade },
    labelExtent: { ...base.labelExtent, ...overrides.labelExtent },
    canvas: { ...base.canvas, ...overrides.canvas },
  });
}

// ==============================================================================
// Debug helpers
// ==============================================================================
export function logConfig(config: UnitCircleConfig = DEFAULT_UNIT_CIRCLE_CONFIG): void {
  console.log("[Unit Circle Config]", {
    rate: [config.defaultRate, config.rateIncrement],
    radius: [config.minRadius, config.defaultRadius, config.radiusIncrement],
    fade: config.fade,
    labelExtent: config.labelExtent,
  });
}
