// path: src/render/warriorSvg.ts
// Dev note: Builds the warrior card SVG. Every interpolated string is XML-escaped.

import type { StatRecord } from "../stats/types";

export const WARRIOR_CANVAS_SIZE = 350;
export const WARRIOR_TITLE = "Warrior";

const SVG_OPEN =
  '<svg xmlns="http://www.w3.org/2000/svg" preserveAspectRatio="xMinYMin meet" viewBox="0 0 350 350">';
const SVG_STYLE =
  "<style>.base { fill: white; font-family: serif; font-size: 14px; }</style>";
const SVG_BACKGROUND = '<rect width="100%" height="100%" fill="black" />';

export function escXml(s: string): string {
  return s
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&apos;");
}

function centeredText(content: string, yPercent: number): string {
  return `<text x="50%" y="${yPercent}%" class="base" dominant-baseline="middle" text-anchor="middle">${escXml(content)}</text>`;
}

/**
 * Title at 40% of the height, then one line per entry every 10% below it.
 */
export function renderLabelledSvg(title: string, lines: string[]): string {
  const body = lines.map((line, i) => centeredText(line, 50 + i * 10));
  return [SVG_OPEN, SVG_STYLE, SVG_BACKGROUND, centeredText(title, 40), ...body, "</svg>"].join("");
}

export function renderWarriorSvg(stats: StatRecord): string {
  return renderLabelledSvg(WARRIOR_TITLE, [`Levels: ${stats.level.toString()}`]);
}
