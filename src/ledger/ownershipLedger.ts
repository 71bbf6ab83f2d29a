// path: src/ledger/ownershipLedger.ts
// Dev note: The narrow view of the ownership ledger the registry needs, plus an in-memory ledger for tests and local runs.

import type { Address } from "viem";
import type { TokenId } from "../stats/types";

export interface OwnershipLedger {
  exists(tokenId: TokenId): Promise<boolean>;
  /** Resolves to null when the token was never assigned. */
  ownerOf(tokenId: TokenId): Promise<Address | null>;
  assign(tokenId: TokenId, owner: Address): Promise<void>;
  /** Removes an assignment. Only used to roll back a mint that failed. */
  release(tokenId: TokenId): Promise<void>;
  setUri(tokenId: TokenId, uri: string): Promise<void>;
  getUri(tokenId: TokenId): Promise<string | null>;
}

interface LedgerEntry {
  owner: Address;
  uri: string | null;
}

export class MemoryOwnershipLedger implements OwnershipLedger {
  private readonly entries = new Map<TokenId, LedgerEntry>();

  async exists(tokenId: TokenId): Promise<boolean> {
    return this.entries.has(tokenId);
  }

  async ownerOf(tokenId: TokenId): Promise<Address | null> {
    return this.entries.get(tokenId)?.owner ?? null;
  }

  async assign(tokenId: TokenId, owner: Address): Promise<void> {
    if (this.entries.has(tokenId)) {
      throw new Error(`[MemoryOwnershipLedger] Token #${tokenId} is already assigned.`);
    }
    this.entries.set(tokenId, { owner, uri: null });
  }

  async release(tokenId: TokenId): Promise<void> {
    this.entries.delete(tokenId);
  }

  async setUri(tokenId: TokenId, uri: string): Promise<void> {
    const entry = this.entries.get(tokenId);
    if (!entry) {
      throw new Error(`[MemoryOwnershipLedger] Cannot set URI of unassigned token #${tokenId}.`);
    }
    entry.uri = uri;
  }

  async getUri(tokenId: TokenId): Promise<string | null> {
    return this.entries.get(tokenId)?.uri ?? null;
  }
}
