// path: src/scripts/showToken.ts
// Dev note: Prints a token's stats, owner and decoded metadata snapshot. Usage: node dist/scripts/showToken.js <tokenId>

import { connectChainBattles } from "../bootstrap";
import { disconnectMongoDB } from "../db";
import { decodeImageUri, decodeTokenUri } from "../metadata/tokenUri";

(async () => {
  const tokenId = parseInt(process.argv[2] ?? "", 10);
  if (!Number.isSafeInteger(tokenId) || tokenId < 1) {
    console.error("[showToken] Usage: showToken <tokenId>");
    process.exit(1);
  }

  try {
    const registry = await connectChainBattles();
    const [stats, owner, uri] = await Promise.all([
      registry.stats(tokenId),
      registry.ownerOf(tokenId),
      registry.tokenURI(tokenId),
    ]);
    const metadata = decodeTokenUri(uri);

    console.log(`[showToken] Token #${tokenId} owner: ${owner}`);
    console.log("[showToken] Stats:", stats);
    console.log("[showToken] Metadata:", { ...metadata, image: "<svg>" });
    console.log("[showToken] Image:", decodeImageUri(metadata.image));
  } catch (error) {
    console.error("[showToken] Fatal error:", error);
    process.exitCode = 1;
  } finally {
    await disconnectMongoDB();
  }
})();
