// path: src/scripts/mint.ts
// Dev note: Mints a new warrior to the given address. Usage: node dist/scripts/mint.js <caller>

import { connectChainBattles } from "../bootstrap";
import { disconnectMongoDB } from "../db";

(async () => {
  const [caller] = process.argv.slice(2);
  if (!caller) {
    console.error("[mint] Usage: mint <callerAddress>");
    process.exit(1);
  }

  try {
    const registry = await connectChainBattles();
    const tokenId = await registry.mint(caller);
    console.log(`[mint] Token #${tokenId} minted.`);
    await disconnectMongoDB();
    process.exit(0);
  } catch (error) {
    console.error("[mint] Fatal error:", error);
    process.exit(1);
  }
})();
