import mongoose, { type InferSchemaType } from "mongoose";

export const logActions = ["entry", "exit"] as const;
export type LogAction = (typeof logActions)[number];

export const deniedStatuses = ["denied_unauthorized", "denied_full"] as const;

const entryExitLogSchema = new mongoose.Schema(
  {
    logId: { type: Number, required: true, unique: true },
    cardUid: { type: String, required: true, trim: true, index: true },
    slotId: { type: Number, default: null, index: true },
    action: { type: String, required: true, enum: logActions },
    gate: { type: String, required: true, trim: true },
    status: { type: String, required: true, trim: true },
    timestamp: { type: Date, required: true, index: true },
    durationMinutes: { type: Number, default: null },
    feeAmount: { type: Number, default: null },
  },
  { timestamps: true }
);

entryExitLogSchema.index({ cardUid: 1, timestamp: -1 });
entryExitLogSchema.index({ slotId: 1, timestamp: -1 });
entryExitLogSchema.index({ status: 1, timestamp: -1 });

export type EntryExitLogRecord = InferSchemaType<typeof entryExitLogSchema>;
export type EntryExitLogDocument = mongoose.HydratedDocument<EntryExitLogRecord>;

export const EntryExitLogModel = mongoose.model<EntryExitLogRecord>("EntryExitLog", entryExitLogSchema);
