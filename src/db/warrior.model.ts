// path: src/db/warrior.model.ts
// Dev note: Mongoose schema/model for the stat record of each minted warrior.

import { Schema, model } from "mongoose";
import type { StatRecord, StatsVariant } from "../stats/types";

export interface IWarrior {
  tokenId: number;
  kind: StatsVariant;
  level: number;
  health?: number;
  strength?: number;
  speed?: number;
}

const statField = { type: Number, min: 0, validate: Number.isInteger };

const warriorSchema = new Schema<IWarrior>(
  {
    tokenId: { type: Number, required: true, unique: true, min: 1 },
    kind: { type: String, enum: ["full", "reduced"], required: true },
    level: { ...statField, required: true },
    health: statField,
    strength: statField,
    speed: statField,
  },
  { versionKey: false }
);

export const Warrior = model<IWarrior>("Warrior", warriorSchema);

export function toWarriorDoc(tokenId: number, stats: StatRecord): IWarrior {
  if (stats.kind === "reduced") {
    return { tokenId, kind: "reduced", level: stats.level };
  }
  return {
    tokenId,
    kind: "full",
    level: stats.level,
    health: stats.health,
    strength: stats.strength,
    speed: stats.speed,
  };
}

/**
 * Full records stored with a missing stat read it as 0, like unset storage.
 */
export function fromWarriorDoc(doc: IWarrior): StatRecord {
  if (doc.kind === "reduced") {
    return { kind: "reduced", level: doc.level };
  }
  return {
    kind: "full",
    level: doc.level,
    health: doc.health ?? 0,
    strength: doc.strength ?? 0,
    speed: doc.speed ?? 0,
  };
}
