import mongoose, { type InferSchemaType } from "mongoose";

export const eventSeverities = ["info", "warning", "error", "critical"] as const;
export type EventSeverity = (typeof eventSeverities)[number];

const systemEventSchema = new mongoose.Schema(
  {
    eventType: { type: String, required: true, trim: true, index: true },
    severity: { type: String, required: true, enum: eventSeverities, default: "info" },
    description: { type: String, required: true },
    timestamp: { type: Date, required: true, index: true },
    meta: { type: mongoose.Schema.Types.Mixed },
  },
  { timestamps: true }
);

export type SystemEventRecord = InferSchemaType<typeof systemEventSchema>;

export const SystemEventModel = mongoose.model<SystemEventRecord>("SystemEvent", systemEventSchema);
