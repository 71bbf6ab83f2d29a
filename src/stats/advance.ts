// path: src/stats/advance.ts
/**
 * Stat growth for a "train" action.
 *
 * Every roll hashes the same seed (timestamp, caller, token id as text) with
 * keccak256 over tightly packed ABI encoding, then reduces it modulo the stat's
 * range. The hash is recomputed per stat, so the three deltas are residues of
 * one value and move together.
 */

import { encodePacked, hexToBigInt, keccak256, type Address } from "viem";
import { InvalidTrainContextError } from "../errors";
import type { StatRecord, TokenId, TrainContext } from "./types";

export const HEALTH_ROLL = 10n;
export const STRENGTH_ROLL = 6n;
export const SPEED_ROLL = 3n;

/**
 * Pseudo-random number in `[0, modulus)` derived from the train seed.
 * Not suitable as a secret: anyone with the inputs can reproduce it.
 */
export function rollStat(
  modulus: bigint,
  timestamp: bigint,
  caller: Address,
  tokenId: TokenId
): number {
  const seed = keccak256(
    encodePacked(
      ["uint256", "address", "string"],
      [timestamp, caller, tokenId.toString()]
    )
  );
  return Number(hexToBigInt(seed) % modulus);
}

export function advanceStats(
  tokenId: TokenId,
  current: StatRecord,
  caller: Address,
  context: TrainContext
): StatRecord {
  const { timestamp } = context;
  if (timestamp < 0n) {
    throw new InvalidTrainContextError(
      `Timestamp must be a non-negative unix time, got ${timestamp}.`
    );
  }

  if (current.kind === "reduced") {
    return { kind: "reduced", level: current.level + 1 };
  }

  return {
    kind: "full",
    level: current.level + 1,
    health: current.health + rollStat(HEALTH_ROLL, timestamp, caller, tokenId),
    strength:
      current.strength + rollStat(STRENGTH_ROLL, timestamp, caller, tokenId),
    speed: current.speed + rollStat(SPEED_ROLL, timestamp, caller, tokenId),
  };
}
