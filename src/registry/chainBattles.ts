// path: src/registry/chainBattles.ts
/**
 * The registry: mints warriors, trains them and keeps each token's metadata URI
 * snapshot in the ownership ledger up to date.
 *
 * Every write to a token happens inside that token's mutex, so a mint and the
 * trains that follow it are applied (and their URIs stored) in order. When a
 * later write of a mint or train fails, the earlier ones are rolled back.
 */

import type { Address } from "viem";
import { ChainBattlesError, TokenNotFoundError } from "../errors";
import type { OwnershipLedger } from "../ledger/ownershipLedger";
import { buildTokenUri } from "../metadata/tokenUri";
import { advanceStats } from "../stats/advance";
import {
  baselineStats,
  type StatRecord,
  type StatsVariant,
  type TokenId,
  type TrainContext,
} from "../stats/types";
import type { IdentifierIssuer } from "../storage/issuer";
import type { StatStore } from "../storage/statStore";
import { authorizeMutation, normalizeCaller } from "./accessGuard";
import { TokenMutex } from "./tokenMutex";

export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export interface ChainBattlesOptions {
  store: StatStore;
  issuer: IdentifierIssuer;
  ledger: OwnershipLedger;
  variant?: StatsVariant;
  /** Unix seconds used when `train` is called without a context. */
  clock?: Clock;
}

export class ChainBattles {
  readonly variant: StatsVariant;

  private readonly store: StatStore;
  private readonly issuer: IdentifierIssuer;
  private readonly ledger: OwnershipLedger;
  private readonly clock: Clock;
  private readonly mutex = new TokenMutex();

  constructor(options: ChainBattlesOptions) {
    this.store = options.store;
    this.issuer = options.issuer;
    this.ledger = options.ledger;
    this.variant = options.variant ?? "full";
    this.clock = options.clock ?? systemClock;
  }

  async mint(caller: string): Promise<TokenId> {
    const owner = normalizeCaller(caller);
    const tokenId = await this.issuer.nextId();

    await this.mutex.runExclusive(tokenId, async () => {
      const uri = buildTokenUri(tokenId, baselineStats(this.variant));

      await this.ledger.assign(tokenId, owner);
      try {
        await this.store.create(tokenId, this.variant);
        try {
          await this.ledger.setUri(tokenId, uri);
        } catch (err) {
          await this.undo(tokenId, "stat record creation", () => this.store.remove(tokenId));
          throw err;
        }
      } catch (err) {
        await this.undo(tokenId, "ownership assignment", () => this.ledger.release(tokenId));
        throw err;
      }
    });

    console.log(`[ChainBattles] Minted token #${tokenId} to ${owner}.`);
    return tokenId;
  }

  async train(
    tokenId: TokenId,
    caller: string,
    context?: TrainContext
  ): Promise<StatRecord> {
    const trainer = normalizeCaller(caller);
    const ctx: TrainContext = context ?? { timestamp: this.clock() };

    return this.mutex.runExclusive(tokenId, async () => {
      try {
        await authorizeMutation(this.ledger, tokenId, trainer);
      } catch (err) {
        if (err instanceof ChainBattlesError) {
          console.warn(`[ChainBattles] Train rejected for token #${tokenId}: ${err.message}`);
        }
        throw err;
      }

      const current = await this.store.get(tokenId);
      if (!current) {
        throw new TokenNotFoundError(tokenId);
      }

      const updated = advanceStats(tokenId, current, trainer, ctx);
      const uri = buildTokenUri(tokenId, updated);

      await this.store.set(tokenId, updated);
      try {
        await this.ledger.setUri(tokenId, uri);
      } catch (err) {
        await this.undo(tokenId, "stat update", () => this.store.set(tokenId, current));
        throw err;
      }

      console.log(
        `[ChainBattles] Token #${tokenId} trained by ${trainer}` +
          (ctx.txOrigin ? ` (origin ${ctx.txOrigin})` : "") +
          ` at ${ctx.timestamp}: level ${current.level} -> ${updated.level}.`
      );
      return updated;
    });
  }

  /**
   * Reverts one write of a failed mint or train. A revert that fails is logged;
   * the caller rethrows the original error either way.
   */
  private async undo(
    tokenId: TokenId,
    step: string,
    revert: () => Promise<void>
  ): Promise<void> {
    try {
      await revert();
      console.warn(`[ChainBattles] Rolled back ${step} for token #${tokenId}.`);
    } catch (undoErr) {
      console.error(
        `[ChainBattles] Failed to roll back ${step} for token #${tokenId}:`,
        undoErr
      );
    }
  }

  /**
   * The URI stored by the last mint or train of this token. Not re-rendered on read.
   */
  async tokenURI(tokenId: TokenId): Promise<string> {
    const uri = await this.ledger.getUri(tokenId);
    if (uri === null) {
      throw new TokenNotFoundError(tokenId);
    }
    return uri;
  }

  /**
   * Re-renders and stores the URI snapshot from the stats currently stored.
   */
  async refreshTokenUri(tokenId: TokenId): Promise<string> {
    return this.mutex.runExclusive(tokenId, async () => {
      const stats = await this.store.get(tokenId);
      if (!stats || !(await this.ledger.exists(tokenId))) {
        throw new TokenNotFoundError(tokenId);
      }
      const uri = buildTokenUri(tokenId, stats);
      await this.ledger.setUri(tokenId, uri);
      return uri;
    });
  }

  async stats(tokenId: TokenId): Promise<StatRecord | null> {
    return this.store.get(tokenId);
  }

  async tokenIds(): Promise<TokenId[]> {
    return this.store.ids();
  }

  async ownerOf(tokenId: TokenId): Promise<Address | null> {
    return this.ledger.ownerOf(tokenId);
  }

  // Stat readers answer 0 for unknown tokens instead of throwing.

  async level(tokenId: TokenId): Promise<number> {
    return (await this.store.get(tokenId))?.level ?? 0;
  }

  async getLevels(tokenId: TokenId): Promise<string> {
    return (await this.level(tokenId)).toString();
  }

  async health(tokenId: TokenId): Promise<number> {
    const stats = await this.store.get(tokenId);
    return stats?.kind === "full" ? stats.health : 0;
  }

  async strength(tokenId: TokenId): Promise<number> {
    const stats = await this.store.get(tokenId);
    return stats?.kind === "full" ? stats.strength : 0;
  }

  async speed(tokenId: TokenId): Promise<number> {
    const stats = await this.store.get(tokenId);
    return stats?.kind === "full" ? stats.speed : 0;
  }
}
