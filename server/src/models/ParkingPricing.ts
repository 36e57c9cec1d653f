import mongoose, { type InferSchemaType } from "mongoose";

const parkingPricingSchema = new mongoose.Schema(
  {
    hourlyRate: { type: Number, required: true, min: 0 },
    dailyMaxRate: { type: Number, required: true, min: 0 },
    gracePeriodMinutes: { type: Number, required: true, min: 0 },
  },
  { timestamps: true }
);

export type ParkingPricingRecord = InferSchemaType<typeof parkingPricingSchema>;
export type ParkingPricingDocument = mongoose.HydratedDocument<ParkingPricingRecord>;

export const ParkingPricingModel = mongoose.model<ParkingPricingRecord>("ParkingPricing", parkingPricingSchema);
