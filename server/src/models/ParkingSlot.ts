import mongoose, { type InferSchemaType } from "mongoose";

export const slotStatuses = ["available", "occupied"] as const;
export type SlotStatus = (typeof slotStatuses)[number];

const parkingSlotSchema = new mongoose.Schema(
  {
    slotId: { type: Number, required: true, unique: true, index: true, min: 1 },
    status: { type: String, required: true, enum: slotStatuses, default: "available" },
    currentCardUid: { type: String, trim: true, default: null },
    entryTime: { type: Date, default: null },
    exitTime: { type: Date, default: null },
  },
  { timestamps: true }
);

export type ParkingSlotRecord = InferSchemaType<typeof parkingSlotSchema>;
export type ParkingSlotDocument = mongoose.HydratedDocument<ParkingSlotRecord>;

export const ParkingSlotModel = mongoose.model<ParkingSlotRecord>("ParkingSlot", parkingSlotSchema);
