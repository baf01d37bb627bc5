import { Schema, model } from 'mongoose';

export interface ICounter {
  _id: string; // Sequence name, e.g. 'users'
  seq: number;
}

const CounterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { versionKey: false }
);

export const CounterModel = model<ICounter>('Counter', CounterSchema);

/**
 * Atomically allocates the next numeric id for a collection.
 * Gaps are possible when an insert fails after allocation.
 */
export async function nextSequence(name: string): Promise<number> {
  const counter = await CounterModel.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true }
  ).lean();

  if (!counter) {
    throw new Error(`Sequence ${name} could not be allocated`);
  }
  return counter.seq;
}
