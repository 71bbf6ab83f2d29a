// path: src/ledger/mongoLedger.ts
// Dev note: OwnershipLedger backed by the Token collection.

import { getAddress, type Address } from "viem";
import { Token } from "../db/token.model";
import type { TokenId } from "../stats/types";
import type { OwnershipLedger } from "./ownershipLedger";

export class MongoOwnershipLedger implements OwnershipLedger {
  async exists(tokenId: TokenId): Promise<boolean> {
    const found = await Token.exists({ tokenId });
    return found !== null;
  }

  async ownerOf(tokenId: TokenId): Promise<Address | null> {
    const doc = await Token.findOne({ tokenId }, { owner: 1 }).lean();
    return doc ? getAddress(doc.owner) : null;
  }

  async assign(tokenId: TokenId, owner: Address): Promise<void> {
    await Token.create({ tokenId, owner });
  }

  async release(tokenId: TokenId): Promise<void> {
    await Token.deleteOne({ tokenId });
  }

  async setUri(tokenId: TokenId, uri: string): Promise<void> {
    const res = await Token.updateOne({ tokenId }, { uri });
    if (res.matchedCount === 0) {
      throw new Error(
        `[MongoOwnershipLedger] Cannot set URI of unassigned token #${tokenId}.`
      );
    }
  }

  async getUri(tokenId: TokenId): Promise<string | null> {
    const doc = await Token.findOne({ tokenId }, { uri: 1 }).lean();
    return doc?.uri ?? null;
  }
}
