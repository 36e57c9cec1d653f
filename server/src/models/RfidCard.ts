import mongoose, { type InferSchemaType } from "mongoose";

export const accessLevels = ["regular", "admin", "temporary"] as const;
export type AccessLevel = (typeof accessLevels)[number];

const rfidCardSchema = new mongoose.Schema(
  {
    cardUid: { type: String, required: true, unique: true, uppercase: true, trim: true },
    ownerName: { type: String, required: true, trim: true },
    ownerEmail: { type: String, trim: true, lowercase: true, default: null },
    phone: { type: String, trim: true, default: null },
    vehiclePlate: { type: String, trim: true, default: null },
    isActive: { type: Boolean, required: true, default: true, index: true },
    accessLevel: { type: String, required: true, enum: accessLevels, default: "regular" },
  },
  { timestamps: true }
);

export type RfidCardRecord = InferSchemaType<typeof rfidCardSchema>;
export type RfidCardDocument = mongoose.HydratedDocument<RfidCardRecord>;

export const RfidCardModel = mongoose.model<RfidCardRecord>("RfidCard", rfidCardSchema);
