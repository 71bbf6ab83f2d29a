// path: src/db/index.ts
// Dev note: Opens and closes the registry's MongoDB connection (warriors, counters, tokens).

import mongoose from "mongoose";

/**
 * Single connection attempt; rejects on failure so `connectWithRetry` can back off.
 */
export async function connectMongoDB(uri: string) {
  const db = await mongoose.connect(uri);
  console.log("[MongoDB] Connection success!");
  return db;
}

/**
 * Connects with capped exponential backoff (2s, 4s, ... up to 30s between attempts).
 * Throws the last error once `maxRetries` attempts have failed.
 */
export async function connectWithRetry(uri: string, maxRetries: number) {
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await connectMongoDB(uri);
    } catch (error) {
      if (attempt >= maxRetries) {
        console.error(
          `[MongoDB] Maximum connection retries (${maxRetries}) reached.`
        );
        throw error;
      }
      const retryDelay = Math.min(1000 * 2 ** attempt, 30000);
      console.error(
        `[MongoDB] Connection failed (attempt ${attempt}/${maxRetries}). Retrying in ${retryDelay / 1000}s...`,
        error
      );
      await new Promise((resolve) => setTimeout(resolve, retryDelay));
    }
  }
}

export async function disconnectMongoDB(): Promise<void> {
  await mongoose.disconnect();
  console.log("[MongoDB] Disconnected.");
}
