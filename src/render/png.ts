// path: src/render/png.ts
// Dev note: Rasterizes the warrior SVG to PNG with sharp, for previews outside of wallets/marketplaces.

import sharp from "sharp";
import type { StatRecord } from "../stats/types";
import { WARRIOR_CANVAS_SIZE, renderWarriorSvg } from "./warriorSvg";

export async function renderWarriorPng(stats: StatRecord): Promise<Buffer> {
  const svg = Buffer.from(renderWarriorSvg(stats), "utf8");
  return sharp(svg)
    .resize(WARRIOR_CANVAS_SIZE, WARRIOR_CANVAS_SIZE)
    .png()
    .toBuffer();
}
