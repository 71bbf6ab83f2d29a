// path: src/scripts/rebuildMetadata.ts
// Dev note: Re-renders every token's metadata URI snapshot from the stats stored in MongoDB.

import { connectChainBattles } from "../bootstrap";
import { REBUILD_CONCURRENCY } from "../config";
import { disconnectMongoDB } from "../db";
import { rebuildSnapshots } from "../registry/rebuildSnapshots";

(async () => {
  try {
    const registry = await connectChainBattles();
    console.log("[rebuildMetadata] Starting metadata rebuild...");
    const { rebuilt, failed } = await rebuildSnapshots(registry, {
      concurrency: REBUILD_CONCURRENCY,
    });
    console.log(
      `[rebuildMetadata] Completed! ${rebuilt} rebuilt, ${failed.length} failed.`
    );
    await disconnectMongoDB();
    process.exit(failed.length === 0 ? 0 : 1);
  } catch (error) {
    console.error("[rebuildMetadata] Fatal error:", error);
    process.exit(1);
  }
})();
