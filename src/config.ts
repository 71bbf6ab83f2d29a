// path: src/config.ts
// Dev note: Loads environment variables and sets default values for the entire app.

import "dotenv/config";
import type { StatsVariant } from "./stats/types";

// MongoDB config
export const MONGO_URI =
  process.env.MONGO_URI || "mongodb://localhost:27017/chain-battles";
export const MONGO_MAX_RETRIES = parseInt(
  process.env.MONGO_MAX_RETRIES || "5",
  10
);

export function parseStatsVariant(raw: string | undefined): StatsVariant {
  if (!raw || raw === "full") return "full";
  if (raw === "reduced") return "reduced";
  console.warn(
    `[config] Unknown STATS_VARIANT "${raw}", falling back to "full".`
  );
  return "full";
}

// Record shape used for every newly minted warrior
export const STATS_VARIANT = parseStatsVariant(process.env.STATS_VARIANT);

// Scripts
export const REBUILD_CONCURRENCY = parseInt(
  process.env.REBUILD_CONCURRENCY || "20",
  10
);
export const PNG_EXPORT_DIR = process.env.PNG_EXPORT_DIR || "./exports";
