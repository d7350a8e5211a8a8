/**
 * Print a per-frame table of label fade state while the angle sweeps.
 *
 * Useful when tuning label offsets: shows which watched labels are fading
 * and their opacities, sampled at a fixed interval.
 *
 * ## Usage
 *
 *   npm run script scripts/trace-label-fades.ts -- --seconds 25 --sample 0.5
 */

import { parseFlags, parseNonNegative } from "@/lib/cli-utils";
import { WATCHED_LABELS } from "@/lib/labels";
import { createSceneModel } from "@/lib/scene-model";

const FRAME_DT = 1 / 60;

function main() {
  const { flags } = parseFlags(process.argv.slice(2));
  const seconds = parseNonNegative(flags.get("seconds"), 25);
  const sample = parseNonNegative(flags.get("sample"), 0.5);
  const rate = parseNonNegative(flags.get("rate"), 0.25);

  const scene = createSceneModel({ defaultRate: rate });
  const rows: Array<Record<string, string>> = [];

  let elapsed = 0;
  let nextSample = 0;
  while (elapsed < seconds) {
    scene.update(FRAME_DT);
    elapsed += FRAME_DT;
    if (elapsed < nextSample) continue;
    nextSample += sample;

    const row: Record<string, string> = {
      t: elapsed.toFixed(2),
      theta: scene.getTheta().toFixed(3),
    };
    for (const label of WATCHED_LABELS) {
      row[label] = scene.getLabelOpacity(label).toFixed(2);
    }
    rows.push(row);
  }

  console.table(rows);
  console.log(`[Trace] ${rows.length} samples over ${seconds}s at ${rate} rad/s`);
}

try {
  main();
} catch (error: unknown) {
  console.error("[Trace] Failed:", error instanceof Error ? error.message : error);
  process.exit(1);
}
