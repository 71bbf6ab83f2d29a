// path: src/db/token.model.ts
// Dev note: Ownership ledger entries: who owns each token and the last metadata URI snapshot.

import { Schema, model } from "mongoose";

export interface IToken {
  tokenId: number;
  owner: string;
  uri?: string;
}

const tokenSchema = new Schema<IToken>(
  {
    tokenId: { type: Number, required: true, unique: true, min: 1 },
    owner: { type: String, required: true, match: /^0x[0-9a-fA-F]{40}$/ },
    uri: { type: String },
  },
  { timestamps: true }
);

export const Token = model<IToken>("Token", tokenSchema);
