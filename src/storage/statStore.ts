// path: src/storage/statStore.ts
// Dev note: Storage contract for stat records, plus the in-memory implementation.

import { StatRecordExistsError, TokenNotFoundError } from "../errors";
import {
  baselineStats,
  cloneStats,
  type StatRecord,
  type StatsVariant,
  type TokenId,
} from "../stats/types";

export interface StatStore {
  /** Inserts the baseline record. Throws StatRecordExistsError if one is already stored. */
  create(tokenId: TokenId, variant: StatsVariant): Promise<StatRecord>;
  get(tokenId: TokenId): Promise<StatRecord | null>;
  /** Overwrites an existing record. Throws TokenNotFoundError if there is none. */
  set(tokenId: TokenId, stats: StatRecord): Promise<void>;
  /** Deletes a record. Only used to roll back a mint that failed. */
  remove(tokenId: TokenId): Promise<void>;
  /** Every stored token id, ascending. */
  ids(): Promise<TokenId[]>;
}

export class MemoryStatStore implements StatStore {
  private readonly records = new Map<TokenId, StatRecord>();

  async create(tokenId: TokenId, variant: StatsVariant): Promise<StatRecord> {
    if (this.records.has(tokenId)) {
      throw new StatRecordExistsError(tokenId);
    }
    const stats = baselineStats(variant);
    this.records.set(tokenId, stats);
    return cloneStats(stats);
  }

  async get(tokenId: TokenId): Promise<StatRecord | null> {
    const stats = this.records.get(tokenId);
    return stats ? cloneStats(stats) : null;
  }

  async set(tokenId: TokenId, stats: StatRecord): Promise<void> {
    if (!this.records.has(tokenId)) {
      throw new TokenNotFoundError(tokenId);
    }
    this.records.set(tokenId, cloneStats(stats));
  }

  async remove(tokenId: TokenId): Promise<void> {
    this.records.delete(tokenId);
  }

  async ids(): Promise<TokenId[]> {
    return [...this.records.keys()].sort((a, b) => a - b);
  }
}
