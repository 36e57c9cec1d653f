import mongoose, { type InferSchemaType } from "mongoose";

// Sequence source for integer ids (log ids).
const counterSchema = new mongoose.Schema({
  name: { type: String, required: true, unique: true },
  seq: { type: Number, required: true, default: 0 },
});

export type Counter = InferSchemaType<typeof counterSchema>;

export const CounterModel = mongoose.model<Counter>("Counter", counterSchema);
