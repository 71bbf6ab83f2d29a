// path: src/stats/types.ts
// Dev note: Stat record shapes for a warrior token and their baseline values at mint.

import type { Address } from "viem";

export type TokenId = number;

export type StatsVariant = "full" | "reduced";

export interface FullStats {
  kind: "full";
  level: number;
  health: number;
  strength: number;
  speed: number;
}

export interface ReducedStats {
  kind: "reduced";
  level: number;
}

export type StatRecord = FullStats | ReducedStats;

/**
 * Block-style context a train call runs in.
 * `timestamp` is in unix seconds; `txOrigin` is the account that started the
 * call chain, when it differs from the caller.
 */
export interface TrainContext {
  timestamp: bigint;
  txOrigin?: Address;
}

export const FULL_BASELINE: FullStats = {
  kind: "full",
  level: 0,
  health: 10,
  strength: 6,
  speed: 3,
};

export const REDUCED_BASELINE: ReducedStats = {
  kind: "reduced",
  level: 0,
};

export function baselineStats(variant: StatsVariant): StatRecord {
  return variant === "full" ? { ...FULL_BASELINE } : { ...REDUCED_BASELINE };
}

export function cloneStats(stats: StatRecord): StatRecord {
  return { ...stats };
}
