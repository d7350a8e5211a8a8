/**
 * Serialize draw commands into a standalone SVG document.
 */

import * as d3 from "d3";
import type { DrawCommand } from "./scene-display-list";
import type { Point } from "./label-overlap-fader";

export interface SvgViewport {
  width: number;
  height: number;
  /** Horizontal shift of the scene origin from the canvas centre */
  offsetX: number;
  background: string;
}

/** Sentinel-sized coordinates are pulled in to this magnitude */
const RENDER_LIMIT = 1e6;
const DECIMALS = 2;

function round(value: number): number {
  const limited = Math.max(-RENDER_LIMIT, Math.min(RENDER_LIMIT, value));
  const factor = 10 ** DECIMALS;
  // Normalize -0 so output never reads "-0"
  return Math.round(limited * factor) / factor + 0;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function createSceneToSvg(viewport: SvgViewport): (point: Point) => Point {
  const originX = viewport.width / 2 + viewport.offsetX;
  const originY = viewport.height / 2;
  return (point) => ({
    x: round(originX + round(point.x)),
    y: round(originY - round(point.y)),
  });
}

function renderCommand(command: DrawCommand, toSvg: (point: Point) => Point): string {
  switch (command.kind) {
    case "line": {
      const from = toSvg(command.from);
      const to = toSvg(command.to);
      return `<line x1="${from.x}" y1="${from.y}" x2="${to.x}" y2="${to.y}" stroke="${command.color}" stroke-width="${command.weight}" stroke-linecap="round"/>`;
    }
    case "circle": {
      const center = toSvg(command.center);
      const fill = command.fill ?? "none";
      const stroke = command.stroke ? ` stroke="${command.stroke}" stroke-width="${command.weight}"` : "";
      return `<circle cx="${center.x}" cy="${center.y}" r="${round(command.radius)}" fill="${fill}"${stroke}/>`;
    }
    case "polyline": {
      const path = d3.pathRound(DECIMALS);
      command.points.forEach((point, i) => {
        const { x, y } = toSvg(point);
        if (i === 0) path.moveTo(x, y);
        else path.lineTo(x, y);
      });
      return `<path d="${path.toString()}" fill="none" stroke="${command.color}" stroke-width="${command.weight}"/>`;
    }
    case "text": {
      const { x, y } = toSvg(command.position);
      const anchor = command.align === "center" ? "middle" : "start";
      const style = command.italic ? ` font-style="italic"` : "";
      const opacity = command.opacity < 1 ? ` opacity="${round(command.opacity)}"` : "";
      return `<text x="${x}" y="${y}" fill="${command.color}" font-size="${command.fontSize}" text-anchor="${anchor}" dominant-baseline="middle"${style}${opacity}>${escapeXml(command.text)}</text>`;
    }
  }
}

export function renderSvg(commands: DrawCommand[], viewport: SvgViewport): string {
  const toSvg = createSceneToSvg(viewport);
  const body = commands.map((command) => `  ${renderCommand(command, toSvg)}`);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${viewport.width}" height="${viewport.height}" viewBox="0 0 ${viewport.width} ${viewport.height}" font-family="Times New Roman, serif">`,
    `  <rect width="100%" height="100%" fill="${viewport.background}"/>`,
    ...body,
    "</svg>",
    "",
  ].join("\n");
}
