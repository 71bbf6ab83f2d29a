// path: src/scripts/exportImage.ts
// Dev note: Writes a PNG preview of a token's current stats. Usage: node dist/scripts/exportImage.js <tokenId>

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { connectChainBattles } from "../bootstrap";
import { PNG_EXPORT_DIR } from "../config";
import { disconnectMongoDB } from "../db";
import { TokenNotFoundError } from "../errors";
import { renderWarriorPng } from "../render/png";

(async () => {
  const tokenId = parseInt(process.argv[2] ?? "", 10);
  if (!Number.isSafeInteger(tokenId) || tokenId < 1) {
    console.error("[exportImage] Usage: exportImage <tokenId>");
    process.exit(1);
  }

  try {
    const registry = await connectChainBattles();
    const stats = await registry.stats(tokenId);
    if (!stats) {
      throw new TokenNotFoundError(tokenId);
    }

    const png = await renderWarriorPng(stats);
    await mkdir(PNG_EXPORT_DIR, { recursive: true });
    const file = path.join(PNG_EXPORT_DIR, `warrior-${tokenId}.png`);
    await writeFile(file, png);
    console.log(`[exportImage] Token #${tokenId} written to ${file} (${png.length} bytes).`);
  } catch (error) {
    console.error("[exportImage] Fatal error:", error);
    process.exitCode = 1;
  } finally {
    await disconnectMongoDB();
  }
})();
