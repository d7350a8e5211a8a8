/**
 * Label overlap fader.
 *
 * Each label owns a fixed-size box that follows its anchor point. Every frame,
 * watched labels test their box against the labels they are sensitive to
 * (see `shouldFade` in ./labels) and ramp their opacity linearly toward the
 * faded floor while overlapping, or back toward 1 otherwise.
 *
 * Overlap decisions are buffered and applied after the scan, so no label's
 * result depends on another label's state from the same pass.
 */

import * as THREE from "three";
import {
  ALL_LABELS,
  isLabel,
  isWatched,
  shouldFade,
  WATCHED_LABELS,
  type Label,
} from "./labels";
import type { LabelExtent } from "./unit-circle-config";

export interface Point {
  x: number;
  y: number;
}

export interface LabelRect {
  min: Point;
  max: Point;
}

export interface LabelFadeOptions {
  /** Half-extent of every label box */
  extent: LabelExtent;
  /** Seconds for a full 0→1 opacity swing while fading out */
  fadeOutSeconds: number;
  /** Seconds for a full 0→1 opacity swing while fading in */
  fadeInSeconds: number;
  /** Opacity never drops below 1 - intensity */
  fadeIntensity: number;
}

export interface LabelOverlapFader {
  /** Recentre a label's box on a new anchor point */
  setPosition(label: Label, point: Point): void;
  /** Inactive labels are skipped as overlap targets and never fade */
  setActive(label: Label, active: boolean): void;
  /** Recompute the fade flag of every watched label from current boxes */
  evaluateOverlaps(): void;
  /** Step watched opacities by dt seconds */
  advanceOpacity(dt: number): void;
  /** Set all positions, evaluate overlaps and advance opacity in one call */
  update(positions: Record<Label, Point>, dt: number): void;
  /** Unknown and unwatched labels report full opacity */
  getOpacity(label: string): number;
  /** Throws for a label outside the closed set */
  getPosition(label: string): Point;
  getRect(label: Label): LabelRect;
  isFading(label: Label): boolean;
  isActive(label: Label): boolean;
  /** Back to the initial state: boxes at the origin, fully opaque */
  reset(): void;
}

interface LabelRecord {
  center: THREE.Vector2;
  rect: THREE.Box2;
  shouldFade: boolean;
  opacity: number;
  active: boolean;
}

function createRecord(): LabelRecord {
  return {
    center: new THREE.Vector2(0, 0),
    // Degenerate box at the origin until the first position arrives
    rect: new THREE.Box2(new THREE.Vector2(0, 0), new THREE.Vector2(0, 0)),
    shouldFade: false,
    opacity: 1,
    active: true,
  };
}

export function createLabelOverlapFader(options: LabelFadeOptions): LabelOverlapFader {
  const { fadeOutSeconds, fadeInSeconds, fadeIntensity } = options;
  const size = new THREE.Vector2(options.extent.x * 2, options.extent.y * 2);
  const minOpacity = 1 - fadeIntensity;

  const records = new Map<Label, LabelRecord>();
  for (const label of ALL_LABELS) {
    records.set(label, createRecord());
  }

  function recordFor(label: string): LabelRecord {
    const record = isLabel(label) ? records.get(label) : undefined;
    if (!record) {
      throw new Error(`Unknown label: ${label}`);
    }
    return record;
  }

  function setPosition(label: Label, point: Point) {
    const record = recordFor(label);
    record.center.set(point.x, point.y);
    record.rect.setFromCenterAndSize(record.center, size);
  }

  function findTrigger(label: Label, record: LabelRecord): boolean {
    if (!record.active) return false;

    for (const [other, otherRecord] of records) {
      if (other === label || !otherRecord.active) continue;
      if (shouldFade(label, other) && record.rect.intersectsBox(otherRecord.rect)) {
        return true;
      }
    }
    return false;
  }

  function evaluateOverlaps() {
    const decisions: Array<[LabelRecord, boolean]> = [];
    for (const label of WATCHED_LABELS) {
      const record = recordFor(label);
      decisions.push([record, findTrigger(label, record)]);
    }
    for (const [record, fading] of decisions) {
      record.shouldFade = fading;
    }
  }

  function advanceOpacity(dt: number) {
    for (const label of WATCHED_LABELS) {
      const record = recordFor(label);
      const step = record.shouldFade ? -dt / fadeOutSeconds : dt / fadeInSeconds;
      record.opacity = THREE.MathUtils.clamp(record.opacity + step, minOpacity, 1);
    }
  }

  return {
    setPosition,

    setActive(label, active) {
      recordFor(label).active = active;
    },

    evaluateOverlaps,
    advanceOpacity,

    update(positions, dt) {
      for (const label of ALL_LABELS) {
        setPosition(label, positions[label]);
      }
      evaluateOverlaps();
      advanceOpacity(dt);
    },

    getOpacity(label) {
      if (!isLabel(label) || !isWatched(label)) return 1;
      return records.get(label)?.opacity ?? 1;
    },

    getPosition(label) {
      const { center } = recordFor(label);
      return { x: center.x, y: center.y };
    },

    getRect(label) {
      const { rect } = recordFor(label);
      return {
        min: { x: rect.min.x, y: rect.min.y },
        max: { x: rect.max.x, y: rect.max.y },
      };
    },

    isFading: (label) => recordFor(label).shouldFade,
    isActive: (label) => recordFor(label).active,

    reset() {
      for (const label of ALL_LABELS) {
        records.set(label, createRecord());
      }
    },
  };
}
