// path: src/db/counter.model.ts
// Dev note: Single key-value counters, e.g. the last issued token id.

import { Schema, model } from "mongoose";

interface ICounter {
  key: string;
  value: number;
}

const counterSchema = new Schema<ICounter>({
  key: { type: String, required: true, unique: true },
  value: { type: Number, default: 0 },
});

export const Counter = model<ICounter>("Counter", counterSchema);

/**
 * Atomically increment a counter (creating it at 0 first) and return the new value.
 */
export async function incrementCounter(key: string): Promise<number> {
  const doc = await Counter.findOneAndUpdate(
    { key },
    { $inc: { value: 1 } },
    { upsert: true, new: true }
  );
  if (!doc) {
    throw new Error(`[Counter] Upsert of counter "${key}" returned no document.`);
  }
  return doc.value;
}

