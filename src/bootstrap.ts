// path: src/bootstrap.ts
// Dev note: Wires the registry to MongoDB (stats, id counter and ownership ledger).

import { MONGO_MAX_RETRIES, MONGO_URI, STATS_VARIANT } from "./config";
import { connectWithRetry } from "./db";
import { MongoOwnershipLedger } from "./ledger/mongoLedger";
import { ChainBattles } from "./registry/chainBattles";
import { MongoIdentifierIssuer } from "./storage/issuer";
import { MongoStatStore } from "./storage/mongoStatStore";

export function createMongoChainBattles(): ChainBattles {
  return new ChainBattles({
    store: new MongoStatStore(),
    issuer: new MongoIdentifierIssuer(),
    ledger: new MongoOwnershipLedger(),
    variant: STATS_VARIANT,
  });
}

export async function connectChainBattles(): Promise<ChainBattles> {
  await connectWithRetry(MONGO_URI, MONGO_MAX_RETRIES);
  console.log(`[bootstrap] Registry ready (stats variant: ${STATS_VARIANT}).`);
  return createMongoChainBattles();
}
