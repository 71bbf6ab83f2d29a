// path: src/registry/tokenMutex.ts
// Dev note: Serializes async work per token id. Tasks on the same id run one at a time in call order; different ids don't wait on each other.

import type { TokenId } from "../stats/types";

const noop = () => undefined;

export class TokenMutex {
  private readonly tails = new Map<TokenId, Promise<void>>();

  async runExclusive<T>(tokenId: TokenId, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(tokenId) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(noop, noop);
    this.tails.set(tokenId, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(tokenId) === tail) {
        this.tails.delete(tokenId);
      }
    }
  }

  /** Number of token ids with queued or running work. */
  get activeTokens(): number {
    return this.tails.size;
  }
}
