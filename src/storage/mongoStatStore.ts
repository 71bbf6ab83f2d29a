// path: src/storage/mongoStatStore.ts
// Dev note: StatStore backed by the Warrior collection.

import mongoose from "mongoose";
import { StatRecordExistsError, TokenNotFoundError } from "../errors";
import { Warrior, fromWarriorDoc, toWarriorDoc } from "../db/warrior.model";
import {
  baselineStats,
  type StatRecord,
  type StatsVariant,
  type TokenId,
} from "../stats/types";
import type { StatStore } from "./statStore";

const DUPLICATE_KEY = 11000;

export class MongoStatStore implements StatStore {
  async create(tokenId: TokenId, variant: StatsVariant): Promise<StatRecord> {
    const stats = baselineStats(variant);
    try {
      await Warrior.create(toWarriorDoc(tokenId, stats));
    } catch (err) {
      if (
        err instanceof mongoose.mongo.MongoServerError &&
        err.code === DUPLICATE_KEY
      ) {
        throw new StatRecordExistsError(tokenId);
      }
      throw err;
    }
    return stats;
  }

  async get(tokenId: TokenId): Promise<StatRecord | null> {
    const doc = await Warrior.findOne({ tokenId }).lean();
    return doc ? fromWarriorDoc(doc) : null;
  }

  async set(tokenId: TokenId, stats: StatRecord): Promise<void> {
    const res = await Warrior.replaceOne(
      { tokenId },
      toWarriorDoc(tokenId, stats)
    );
    if (res.matchedCount === 0) {
      throw new TokenNotFoundError(tokenId);
    }
  }

  async remove(tokenId: TokenId): Promise<void> {
    await Warrior.deleteOne({ tokenId });
  }

  async ids(): Promise<TokenId[]> {
    const docs = await Warrior.find({}, { tokenId: 1 })
      .sort({ tokenId: 1 })
      .lean();
    return docs.map((doc) => doc.tokenId);
  }
}
