import { describe, it, expect, beforeEach } from "vitest";
import { createSceneModel, type SceneModel } from "../scene-model";
import { TAU } from "../math-utils";

/** Paused scene frozen at theta = 0 */
function frozenAtZero(): SceneModel {
  const scene = createSceneModel();
  scene.toggleRunning();
  scene.setTheta(0);
  return scene;
}

describe("createSceneModel", () => {
  let scene: SceneModel;

  beforeEach(() => {
    scene = createSceneModel();
  });

  describe("initial state", () => {
    it("starts running at the default rate and radius", () => {
      expect(scene.getTheta()).toBe(0);
      expect(scene.getRate()).toBe(0.25);
      expect(scene.getRadius()).toBe(200);
      expect(scene.getFlags()).toEqual({
        running: true,
        showLabels: true,
        showValues: true,
        showAngleArc: true,
      });
      expect(scene.isVisible("sec")).toBe(true);
    });

    it("accepts configuration overrides", () => {
      const custom = createSceneModel({ defaultRate: 1, defaultRadius: 150 });
      expect(custom.getRate()).toBe(1);
      expect(custom.getRadius()).toBe(150);
    });
  });

  describe("update", () => {
    it("advances the angle by rate * dt", () => {
      scene.update(1);
      expect(scene.getTheta()).toBe(0.25);
    });

    it("wraps the angle after a full turn", () => {
      scene.setTheta(6.2);
      scene.update(1);
      expect(scene.getTheta()).toBeCloseTo(0.25 - (TAU - 6.2), 10);
    });

    it("holds the angle while paused", () => {
      scene.update(1);
      scene.toggleRunning();
      scene.update(5);
      expect(scene.getTheta()).toBe(0.25);
      expect(scene.displayedRate()).toBe(0);
      expect(scene.getRate()).toBe(0.25);
    });

    it("moves labels to their anchors", () => {
      const frozen = frozenAtZero();
      frozen.update(0.016);
      expect(frozen.getLabelPosition("sin")).toEqual({ x: 222, y: 0 });
      expect(frozen.getLabelPosition("cos")).toEqual({ x: 100, y: 15 });
    });

    it("fades the labels that crowd each other at theta = 0", () => {
      const frozen = frozenAtZero();
      frozen.update(0.1);

      // sin/tan, cos/sec, theta/sin and unit/cos collide at theta = 0
      expect(frozen.getLabelOpacity("sin")).toBeCloseTo(2 / 3, 10);
      expect(frozen.getLabelOpacity("cos")).toBeCloseTo(2 / 3, 10);
      expect(frozen.getLabelOpacity("theta")).toBeCloseTo(2 / 3, 10);
      expect(frozen.getLabelOpacity("unit")).toBeCloseTo(2 / 3, 10);
      expect(frozen.getLabelOpacity("sec")).toBe(1);
      expect(frozen.getLabelOpacity("tan")).toBe(1);
    });
  });

  describe("rate adjustment", () => {
    it("steps the rate up and down", () => {
      scene.incrementRate();
      expect(scene.getRate()).toBeCloseTo(0.33, 10);
      scene.decrementRate();
      scene.decrementRate();
      expect(scene.getRate()).toBeCloseTo(0.17, 10);
    });

    it("never drops below zero", () => {
      for (let i = 0; i < 10; i++) scene.decrementRate();
      expect(scene.getRate()).toBe(0);
    });

    it("resets to the default", () => {
      scene.incrementRate();
      scene.resetRate();
      expect(scene.getRate()).toBe(0.25);
    });
  });

  describe("radius adjustment", () => {
    it("steps the radius and floors it at the minimum", () => {
      scene.incrementRadius();
      expect(scene.getRadius()).toBe(210);
      for (let i = 0; i < 40; i++) scene.decrementRadius();
      expect(scene.getRadius()).toBe(20);
      scene.resetRadius();
      expect(scene.getRadius()).toBe(200);
    });

    it("feeds the new radius into the next frame", () => {
      const frozen = frozenAtZero();
      frozen.incrementRadius();
      frozen.update(0);
      expect(frozen.getFrame().scaled.cos).toBe(210);
      expect(frozen.getLabelPosition("tan")).toEqual({ x: 233, y: 0 });
    });
  });

  describe("toggles", () => {
    it("flips each display flag", () => {
      scene.toggleLabels();
      scene.toggleValues();
      scene.toggleAngleArc();
      expect(scene.getFlags()).toEqual({
        running: true,
        showLabels: false,
        showValues: false,
        showAngleArc: false,
      });
    });

    it("resets theta to zero", () => {
      scene.update(2);
      scene.resetTheta();
      expect(scene.getTheta()).toBe(0);
    });

    it("stops a hidden function's label from triggering fades", () => {
      const frozen = frozenAtZero();
      frozen.update(0.1);
      frozen.toggleFunction("tan");
      frozen.update(0.1);

      expect(frozen.isVisible("tan")).toBe(false);
      expect(frozen.getLabelOpacity("sin")).toBeCloseTo(1, 10);
    });

    it("stops the theta label from fading while the arc is hidden", () => {
      const frozen = frozenAtZero();
      frozen.toggleAngleArc();
      frozen.update(0.1);
      expect(frozen.getLabelOpacity("theta")).toBe(1);
    });
  });

  describe("pointer", () => {
    const onTanRow = { x: 430, y: 50 };

    it("toggles a function when its value row is pressed", () => {
      scene.update(0, { ...onTanRow, primaryDown: true });
      expect(scene.isVisible("tan")).toBe(false);
    });

    it("only toggles on the press edge", () => {
      scene.update(0, { ...onTanRow, primaryDown: true });
      scene.update(0, { ...onTanRow, primaryDown: true });
      expect(scene.isVisible("tan")).toBe(false);

      scene.update(0, { ...onTanRow, primaryDown: false });
      scene.update(0, { ...onTanRow, primaryDown: true });
      expect(scene.isVisible("tan")).toBe(true);
    });

    it("ignores presses outside the value rows", () => {
      scene.update(0, { x: 0, y: 0, primaryDown: true });
      expect(scene.getFrame().visible).toEqual({
        sin: true,
        cos: true,
        tan: true,
        cot: true,
        sec: true,
        csc: true,
      });
    });
  });

  describe("getFrame", () => {
    it("snapshots angle, values and label state", () => {
      const frozen = frozenAtZero();
      frozen.update(0.1);
      const frame = frozen.getFrame();

      expect(frame.theta).toBe(0);
      expect(frame.radius).toBe(200);
      expect(frame.values.cos).toBe(1);
      expect(frame.scaled.sec).toBe(200);
      expect(frame.labels.sin.position).toEqual({ x: 222, y: 0 });
      expect(frame.labels.sin.opacity).toBe(frozen.getLabelOpacity("sin"));
      expect(frame.flags.running).toBe(false);
    });

    it("is not affected by later updates", () => {
      const frame = scene.getFrame();
      scene.toggleLabels();
      scene.update(1);
      expect(frame.flags.showLabels).toBe(true);
      expect(frame.theta).toBe(0);
    });
  });
});
