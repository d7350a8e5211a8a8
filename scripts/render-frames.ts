/**
 * Render the animated diagram headlessly to a series of SVG files.
 *
 * Steps the scene model with a fixed frame time and writes every Nth frame,
 * so label fades can be inspected frame by frame without a window.
 *
 * ## Usage
 *
 *   npm run script scripts/render-frames.ts -- --frames 240 --every 20 --out out/frames
 *
 * ## Flags
 *
 * - `--frames`: frames to simulate (default 120)
 * - `--dt`: seconds per frame (default 1/60)
 * - `--every`: write one SVG per this many frames (default 10)
 * - `--theta`: starting angle in radians (default 0)
 * - `--keys`: comma-separated key presses applied before the first frame,
 *   e.g. `--keys ArrowUp,ArrowUp,l`
 * - `--out`: output directory (default out/frames)
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { parseCount, parseFlags, parseNonNegative } from "@/lib/cli-utils";
import { colors } from "@/lib/colors";
import { handleKeyPress } from "@/lib/key-bindings";
import { buildDisplayList } from "@/lib/scene-display-list";
import { createSceneModel } from "@/lib/scene-model";
import { renderSvg } from "@/lib/svg-renderer";
import { logConfig } from "@/lib/unit-circle-config";

async function main() {
  const { flags } = parseFlags(process.argv.slice(2));
  const frames = parseCount(flags.get("frames"), 120);
  const dt = parseNonNegative(flags.get("dt"), 1 / 60);
  const every = parseCount(flags.get("every"), 10);
  const startTheta = parseNonNegative(flags.get("theta"), 0);
  const outDir = path.resolve(flags.get("out") ?? "out/frames");

  const scene = createSceneModel();
  const config = scene.getConfig();
  logConfig(config);

  scene.setTheta(startTheta);
  for (const key of (flags.get("keys") ?? "").split(",").filter(Boolean)) {
    if (!handleKeyPress(scene, key)) {
      console.warn(`[Render Frames] Ignoring unbound key: ${key}`);
    }
  }

  await mkdir(outDir, { recursive: true });

  const viewport = { ...config.canvas, background: colors.background };
  let written = 0;
  for (let frame = 1; frame <= frames; frame++) {
    scene.update(dt);
    if (frame % every !== 0) continue;

    const svg = renderSvg(
      buildDisplayList(scene.getFrame(), { thetaArcPoints: config.thetaArcPoints }),
      viewport
    );
    const file = path.join(outDir, `frame-${String(frame).padStart(5, "0")}.svg`);
    await writeFile(file, svg, "utf8");
    written++;
  }

  console.log(`[Render Frames] Wrote ${written} frames to ${outDir}`);
}

main().catch((error: unknown) => {
  console.error("[Render Frames] Failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
