// path: src/scripts/train.ts
// Dev note: Trains a warrior as the given caller. Usage: node dist/scripts/train.js <tokenId> <caller>

import { connectChainBattles } from "../bootstrap";
import { disconnectMongoDB } from "../db";

(async () => {
  const [tokenIdArg, caller] = process.argv.slice(2);
  const tokenId = parseInt(tokenIdArg ?? "", 10);
  if (!Number.isSafeInteger(tokenId) || tokenId < 1 || !caller) {
    console.error("[train] Usage: train <tokenId> <callerAddress>");
    process.exit(1);
  }

  try {
    const registry = await connectChainBattles();
    const stats = await registry.train(tokenId, caller);
    console.log(`[train] Token #${tokenId} stats:`, stats);
    await disconnectMongoDB();
    process.exit(0);
  } catch (error) {
    console.error("[train] Fatal error:", error);
    process.exit(1);
  }
})();
