/**
 * Scene model for the unit-circle diagram.
 *
 * Owns the animation state and runs the per-frame pipeline in a fixed order:
 * advance angle → trig values → label anchors → overlap fader → opacity ramp.
 * Toggles and rate/radius adjustments are plain mutations driven by host input.
 */

import { computeLabelAnchors } from "./label-anchors";
import { createLabelOverlapFader, type Point } from "./label-overlap-fader";
import { mapLabels, mapTrigFunctions, TRIG_FUNCTIONS, type Label, type TrigFunction } from "./labels";
import { createTrigEngine, type TrigValues } from "./trig-engine";
import {
  resolveUnitCircleConfig,
  type UnitCircleConfig,
  type UnitCircleConfigOverrides,
} from "./unit-circle-config";
import { hitTestValueRows } from "./value-readout";

export interface PointerInput extends Point {
  /** Primary button held this frame */
  primaryDown: boolean;
}

export interface LabelFrame {
  position: Point;
  opacity: number;
}

export interface SceneFlags {
  running: boolean;
  showLabels: boolean;
  showValues: boolean;
  showAngleArc: boolean;
}

/** Everything a renderer needs for one frame */
export interface SceneFrame {
  theta: number;
  rate: number;
  radius: number;
  values: TrigValues;
  scaled: TrigValues;
  labels: Record<Label, LabelFrame>;
  flags: SceneFlags;
  visible: Record<TrigFunction, boolean>;
}

export interface SceneModel {
  update(dt: number, pointer?: PointerInput): void;

  toggleRunning(): void;
  toggleLabels(): void;
  toggleValues(): void;
  toggleAngleArc(): void;
  toggleFunction(fn: TrigFunction): void;

  incrementRate(): void;
  /** Never drops below zero */
  decrementRate(): void;
  resetRate(): void;

  incrementRadius(): void;
  /** Never drops below the configured minimum */
  decrementRadius(): void;
  resetRadius(): void;

  resetTheta(): void;
  setTheta(theta: number): void;

  getTheta(): number;
  getRate(): number;
  /** Rate shown in the readout: zero while paused */
  displayedRate(): number;
  getRadius(): number;
  getFlags(): SceneFlags;
  isVisible(fn: TrigFunction): boolean;
  getLabelPosition(label: Label): Point;
  getLabelOpacity(label: Label): number;
  getFrame(): SceneFrame;
  getConfig(): UnitCircleConfig;
}

export function createSceneModel(overrides: UnitCircleConfigOverrides = {}): SceneModel {
  const config = resolveUnitCircleConfig(overrides);

  const engine = createTrigEngine();
  const fader = createLabelOverlapFader({
    extent: config.labelExtent,
    fadeOutSeconds: config.fade.outSeconds,
    fadeInSeconds: config.fade.inSeconds,
    fadeIntensity: config.fade.intensity,
  });

  let rate = config.defaultRate;
  let radius = config.defaultRadius;
  const flags: SceneFlags = {
    running: true,
    showLabels: true,
    showValues: true,
    showAngleArc: true,
  };
  const visible = mapTrigFunctions(() => true);

  let wasPrimaryDown = false;

  function syncLabelActivity() {
    for (const fn of TRIG_FUNCTIONS) {
      fader.setActive(fn, visible[fn]);
    }
    fader.setActive("theta", flags.showAngleArc);
  }

  function handlePointer(pointer: PointerInput) {
    const pressed = pointer.primaryDown && !wasPrimaryDown;
    wasPrimaryDown = pointer.primaryDown;
    if (!pressed) return;

    const hit = hitTestValueRows(pointer);
    if (hit) toggleFunction(hit);
  }

  function toggleFunction(fn: TrigFunction) {
    visible[fn] = !visible[fn];
    syncLabelActivity();
  }

  function update(dt: number, pointer?: PointerInput) {
    if (pointer) handlePointer(pointer);

    engine.advance(dt, rate, flags.running);
    engine.compute(radius);

    const anchors = computeLabelAnchors({
      theta: engine.getTheta(),
      radius,
      values: engine.getValues(),
      scaled: engine.getScaledValues(),
    });
    fader.update(anchors, dt);
  }

  function getFrame(): SceneFrame {
    return {
      theta: engine.getTheta(),
      rate,
      radius,
      values: engine.getValues(),
      scaled: engine.getScaledValues(),
      labels: mapLabels((label) => ({
        position: fader.getPosition(label),
        opacity: fader.getOpacity(label),
      })),
      flags: { ...flags },
      visible: { ...visible },
    };
  }

  // Theta and radius changes are picked up by the next update
  return {
    update,

    toggleRunning() {
      flags.running = !flags.running;
    },
    toggleLabels() {
      flags.showLabels = !flags.showLabels;
    },
    toggleValues() {
      flags.showValues = !flags.showValues;
    },
    toggleAngleArc() {
      flags.showAngleArc = !flags.showAngleArc;
      syncLabelActivity();
    },
    toggleFunction,

    incrementRate() {
      rate += config.rateIncrement;
    },
    decrementRate() {
      rate = Math.max(0, rate - config.rateIncrement);
    },
    resetRate() {
      rate = config.defaultRate;
    },

    incrementRadius() {
      radius += config.radiusIncrement;
    },
    decrementRadius() {
      radius = Math.max(config.minRadius, radius - config.radiusIncrement);
    },
    resetRadius() {
      radius = config.defaultRadius;
    },

    resetTheta() {
      engine.setTheta(0);
    },
    setTheta: (theta) => engine.setTheta(theta),

    getTheta: () => engine.getTheta(),
    getRate: () => rate,
    displayedRate: () => (flags.running ? rate : 0),
    getRadius: () => radius,
    getFlags: () => ({ ...flags }),
    isVisible: (fn) => visible[fn],
    getLabelPosition: (label) => fader.getPosition(label),
    getLabelOpacity: (label) => fader.getOpacity(label),
    getFrame,
    getConfig: () => config,
  };
}
