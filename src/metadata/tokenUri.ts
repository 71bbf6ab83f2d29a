// path: src/metadata/tokenUri.ts
// Dev note: Assembles the token metadata JSON around the rendered SVG and wraps both in base64 data URIs.

import { MalformedDataUriError } from "../errors";
import { renderWarriorSvg } from "../render/warriorSvg";
import type { StatRecord, TokenId } from "../stats/types";

export const SVG_URI_PREFIX = "data:image/svg+xml;base64,";
export const JSON_URI_PREFIX = "data:application/json;base64,";

export const COLLECTION_NAME = "Chain Battles";
export const COLLECTION_DESCRIPTION = "Battles on chain";

export interface TokenAttribute {
  trait_type: "health" | "strength" | "speed";
  value: string;
}

export interface TokenMetadata {
  name: string;
  description: string;
  image: string;
  attributes?: TokenAttribute[];
}

function toBase64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

function fromDataUri(uri: string, prefix: string): string {
  if (!uri.startsWith(prefix)) {
    throw new MalformedDataUriError(prefix);
  }
  return Buffer.from(uri.slice(prefix.length), "base64").toString("utf8");
}

export function buildImageUri(stats: StatRecord): string {
  return SVG_URI_PREFIX + toBase64(renderWarriorSvg(stats));
}

export function buildMetadata(tokenId: TokenId, stats: StatRecord): TokenMetadata {
  // Key order here is the serialized order.
  const metadata: TokenMetadata = {
    name: `${COLLECTION_NAME} #${tokenId.toString()}`,
    description: COLLECTION_DESCRIPTION,
    image: buildImageUri(stats),
  };

  if (stats.kind === "full") {
    metadata.attributes = [
      { trait_type: "health", value: stats.health.toString() },
      { trait_type: "strength", value: stats.strength.toString() },
      { trait_type: "speed", value: stats.speed.toString() },
    ];
  }

  return metadata;
}

export function buildTokenUri(tokenId: TokenId, stats: StatRecord): string {
  return JSON_URI_PREFIX + toBase64(JSON.stringify(buildMetadata(tokenId, stats)));
}

export function decodeImageUri(uri: string): string {
  return fromDataUri(uri, SVG_URI_PREFIX);
}

function isTokenMetadata(value: unknown): value is TokenMetadata {
  if (typeof value !== "object" || value === null) return false;
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "description" in value &&
    typeof value.description === "string" &&
    "image" in value &&
    typeof value.image === "string"
  );
}

/**
 * Reverse of `buildTokenUri`. The embedded image stays encoded; pass
 * `metadata.image` to `decodeImageUri` for the SVG text.
 */
export function decodeTokenUri(uri: string): TokenMetadata {
  const parsed: unknown = JSON.parse(fromDataUri(uri, JSON_URI_PREFIX));
  if (!isTokenMetadata(parsed)) {
    throw new MalformedDataUriError(JSON_URI_PREFIX);
  }
  return parsed;
}
