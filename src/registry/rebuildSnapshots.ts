// path: src/registry/rebuildSnapshots.ts
// Dev note: Re-renders the stored metadata URI of every token, e.g. after the SVG template changed.
// Uses a p-limit concurrency cap and repeats full loops over the tokens that failed.

import pLimit from "p-limit";
import type { TokenId } from "../stats/types";
import type { ChainBattles } from "./chainBattles";

export interface RebuildOptions {
  concurrency: number;
  /** Full passes over the failed tokens before giving up. */
  maxLoops?: number;
}

export interface RebuildResult {
  rebuilt: number;
  failed: TokenId[];
}

async function rebuildBatch(
  registry: ChainBattles,
  tokenIds: TokenId[],
  concurrency: number
): Promise<TokenId[]> {
  const limit = pLimit(concurrency);
  const failedTokens: TokenId[] = [];

  const tasks = tokenIds.map((tokenId) =>
    limit(async () => {
      try {
        await registry.refreshTokenUri(tokenId);
      } catch (err) {
        console.error(
          `[rebuildSnapshots] Error rebuilding token #${tokenId}:`,
          err instanceof Error ? err.message : err
        );
        failedTokens.push(tokenId);
      }
    })
  );

  await Promise.all(tasks);
  return failedTokens.sort((a, b) => a - b);
}

export async function rebuildSnapshots(
  registry: ChainBattles,
  { concurrency, maxLoops = 3 }: RebuildOptions
): Promise<RebuildResult> {
  const allTokens = await registry.tokenIds();
  if (allTokens.length === 0) {
    console.log("[rebuildSnapshots] Nothing to rebuild.");
    return { rebuilt: 0, failed: [] };
  }

  let pendingTokens = allTokens;
  let loop = 0;

  while (pendingTokens.length > 0 && loop < maxLoops) {
    loop++;
    console.log(
      `[rebuildSnapshots] Loop #${loop} - rebuilding ${pendingTokens.length} tokens...`
    );
    pendingTokens = await rebuildBatch(registry, pendingTokens, concurrency);
    if (pendingTokens.length > 0) {
      console.warn(
        `[rebuildSnapshots] ${pendingTokens.length} tokens failed in loop #${loop}.`
      );
    }
  }

  if (pendingTokens.length > 0) {
    console.error(
      "[rebuildSnapshots] Some tokens could not be rebuilt after all loops:",
      pendingTokens
    );
  }

  return {
    rebuilt: allTokens.length - pendingTokens.length,
    failed: pendingTokens,
  };
}
