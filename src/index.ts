// path: src/index.ts
// Dev note: Public entry point of the package.

export * from "./errors";
export * from "./stats/types";
export { advanceStats, rollStat } from "./stats/advance";
export { escXml, renderLabelledSvg, renderWarriorSvg } from "./render/warriorSvg";
export { renderWarriorPng } from "./render/png";
export {
  buildImageUri,
  buildMetadata,
  buildTokenUri,
  decodeImageUri,
  decodeTokenUri,
  JSON_URI_PREFIX,
  SVG_URI_PREFIX,
} from "./metadata/tokenUri";
export type { TokenAttribute, TokenMetadata } from "./metadata/tokenUri";
export { MemoryOwnershipLedger } from "./ledger/ownershipLedger";
export type { OwnershipLedger } from "./ledger/ownershipLedger";
export { MongoOwnershipLedger } from "./ledger/mongoLedger";
export { MemoryStatStore } from "./storage/statStore";
export type { StatStore } from "./storage/statStore";
export { MongoStatStore } from "./storage/mongoStatStore";
export { MemoryIdentifierIssuer, MongoIdentifierIssuer } from "./storage/issuer";
export type { IdentifierIssuer } from "./storage/issuer";
export { authorizeMutation, normalizeCaller } from "./registry/accessGuard";
export { TokenMutex } from "./registry/tokenMutex";
export { ChainBattles, systemClock } from "./registry/chainBattles";
export { rebuildSnapshots } from "./registry/rebuildSnapshots";
export type { RebuildOptions, RebuildResult } from "./registry/rebuildSnapshots";
export type { ChainBattlesOptions, Clock } from "./registry/chainBattles";
export { connectChainBattles, createMongoChainBattles } from "./bootstrap";
