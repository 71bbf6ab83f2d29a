// path: src/storage/issuer.ts
// Dev note: Hands out token ids 1, 2, 3, ... Ids are never reused.

import { IssuerExhaustedError } from "../errors";
import { incrementCounter } from "../db/counter.model";
import type { TokenId } from "../stats/types";

export const TOKEN_ID_COUNTER_KEY = "tokenId";

export interface IdentifierIssuer {
  nextId(): Promise<TokenId>;
}

export class MemoryIdentifierIssuer implements IdentifierIssuer {
  private lastId: TokenId;

  constructor(lastIssued: TokenId = 0) {
    this.lastId = lastIssued;
  }

  async nextId(): Promise<TokenId> {
    if (this.lastId >= Number.MAX_SAFE_INTEGER) {
      throw new IssuerExhaustedError(this.lastId);
    }
    // No await before the increment, so concurrent callers never share an id.
    this.lastId += 1;
    return this.lastId;
  }
}

export class MongoIdentifierIssuer implements IdentifierIssuer {
  async nextId(): Promise<TokenId> {
    const id = await incrementCounter(TOKEN_ID_COUNTER_KEY);
    if (!Number.isSafeInteger(id)) {
      throw new IssuerExhaustedError(id - 1);
    }
    return id;
  }
}
