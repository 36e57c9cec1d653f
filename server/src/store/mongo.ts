import mongoose, { type ClientSession } from "mongoose";

import { CounterModel } from "../models/Counter.js";
import {
  EntryExitLogModel,
  deniedStatuses,
  logActions,
  type EntryExitLogDocument,
  type LogAction,
} from "../models/EntryExitLog.js";
import { ParkingPricingModel } from "../models/ParkingPricing.js";
import { ParkingSlotModel, slotStatuses, type ParkingSlotDocument, type SlotStatus } from "../models/ParkingSlot.js";
import { RfidCardModel, accessLevels, type AccessLevel, type RfidCardDocument } from "../models/RfidCard.js";
import { SystemEventModel } from "../models/SystemEvent.js";
import { UserModel, userRoles, type UserDocument, type UserRole } from "../models/User.js";
import type {
  EntryExitLog,
  LogFilter,
  NewEntryExitLog,
  NewRfidCard,
  NewSystemEvent,
  NewUserAccount,
  ParkingSlot,
  ParkingStore,
  PricingPolicy,
  RfidCard,
  RfidCardPatch,
  SlotLedger,
  UnknownCardSighting,
  UserAccount,
} from "./types.js";

const LOG_SEQUENCE = "entryExitLog";

function toSlotStatus(raw: string): SlotStatus {
  return slotStatuses.find((s) => s === raw) ?? "available";
}

function toAccessLevel(raw: string): AccessLevel {
  return accessLevels.find((a) => a === raw) ?? "regular";
}

function toLogAction(raw: string): LogAction {
  return logActions.find((a) => a === raw) ?? "entry";
}

function toUserRole(raw: string): UserRole {
  return userRoles.find((r) => r === raw) ?? "viewer";
}

function toSlot(doc: ParkingSlotDocument): ParkingSlot {
  return {
    slotId: doc.slotId,
    status: toSlotStatus(doc.status),
    currentCardUid: doc.currentCardUid ?? null,
    entryTime: doc.entryTime ?? null,
    exitTime: doc.exitTime ?? null,
    updatedAt: doc.updatedAt,
  };
}

function toCard(doc: RfidCardDocument): RfidCard {
  return {
    cardUid: doc.cardUid,
    ownerName: doc.ownerName,
    ownerEmail: doc.ownerEmail ?? null,
    phone: doc.phone ?? null,
    vehiclePlate: doc.vehiclePlate ?? null,
    isActive: doc.isActive,
    accessLevel: toAccessLevel(doc.accessLevel),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toLog(doc: EntryExitLogDocument): EntryExitLog {
  return {
    logId: doc.logId,
    cardUid: doc.cardUid,
    slotId: doc.slotId ?? null,
    action: toLogAction(doc.action),
    gate: doc.gate,
    status: doc.status,
    timestamp: doc.timestamp,
    durationMinutes: doc.durationMinutes ?? null,
    feeAmount: doc.feeAmount ?? null,
  };
}

function toUser(doc: UserDocument): UserAccount {
  return {
    id: doc._id.toString(),
    username: doc.username,
    email: doc.email,
    passwordHash: doc.passwordHash,
    role: toUserRole(doc.role),
    isActive: doc.isActive,
    lastLogin: doc.lastLogin ?? null,
  };
}

class MongoSlotLedger implements SlotLedger {
  constructor(private readonly session: ClientSession) {}

  async findSlot(slotId: number): Promise<ParkingSlot | null> {
    const doc = await ParkingSlotModel.findOne({ slotId }).session(this.session).exec();
    return doc ? toSlot(doc) : null;
  }

  async saveSlot(slot: ParkingSlot): Promise<void> {
    await ParkingSlotModel.updateOne(
      { slotId: slot.slotId },
      {
        $set: {
          status: slot.status,
          currentCardUid: slot.currentCardUid,
          entryTime: slot.entryTime,
          exitTime: slot.exitTime,
        },
      },
      { session: this.session }
    ).exec();
  }

  async insertLog(log: NewEntryExitLog): Promise<EntryExitLog> {
    const counter = await CounterModel.findOneAndUpdate(
      { name: LOG_SEQUENCE },
      { $inc: { seq: 1 } },
      { upsert: true, new: true, session: this.session }
    ).exec();
    if (!counter) {
      throw new Error("Failed to allocate log id");
    }

    const [doc] = await EntryExitLogModel.create([{ ...log, logId: counter.seq }], { session: this.session });
    if (!doc) {
      throw new Error("Failed to insert log");
    }
    return toLog(doc);
  }
}

export class MongoParkingStore implements ParkingStore {
  async transaction<T>(work: (ledger: SlotLedger) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    try {
      const settled: T[] = [];
      await session.withTransaction(async () => {
        // withTransaction may retry the callback on transient errors
        settled.length = 0;
        settled.push(await work(new MongoSlotLedger(session)));
      });
      if (settled.length === 0) {
        throw new Error("Transaction did not complete");
      }
      return settled[0];
    } finally {
      await session.endSession();
    }
  }

  isConnected(): boolean {
    return mongoose.connection.readyState === 1;
  }

  async listSlots(): Promise<ParkingSlot[]> {
    const docs = await ParkingSlotModel.find({}).sort({ slotId: 1 }).exec();
    return docs.map(toSlot);
  }

  async getSlot(slotId: number): Promise<ParkingSlot | null> {
    const doc = await ParkingSlotModel.findOne({ slotId }).exec();
    return doc ? toSlot(doc) : null;
  }

  async countSlots(): Promise<number> {
    return ParkingSlotModel.countDocuments({}).exec();
  }

  async createSlots(slotIds: number[]): Promise<void> {
    await ParkingSlotModel.insertMany(slotIds.map((slotId) => ({ slotId, status: "available" })));
  }

  async listCards(filter: { isActive?: boolean; skip: number; limit: number }): Promise<RfidCard[]> {
    const query: Record<string, unknown> = {};
    if (filter.isActive !== undefined) query.isActive = filter.isActive;

    const docs = await RfidCardModel.find(query).sort({ createdAt: 1 }).skip(filter.skip).limit(filter.limit).exec();
    return docs.map(toCard);
  }

  async listActiveCards(): Promise<RfidCard[]> {
    const docs = await RfidCardModel.find({ isActive: true }).sort({ createdAt: 1 }).exec();
    return docs.map(toCard);
  }

  async getCard(cardUid: string): Promise<RfidCard | null> {
    const doc = await RfidCardModel.findOne({ cardUid }).exec();
    return doc ? toCard(doc) : null;
  }

  async createCard(card: NewRfidCard): Promise<RfidCard> {
    const doc = await RfidCardModel.create(card);
    return toCard(doc);
  }

  async updateCard(cardUid: string, patch: RfidCardPatch): Promise<RfidCard | null> {
    const doc = await RfidCardModel.findOneAndUpdate({ cardUid }, { $set: patch }, { new: true }).exec();
    return doc ? toCard(doc) : null;
  }

  async recentUnknownCards(limit: number): Promise<UnknownCardSighting[]> {
    const rows = await EntryExitLogModel.aggregate<{ _id: string; lastSeen: Date; attemptCount: number }>([
      { $match: { status: { $in: [...deniedStatuses] } } },
      { $group: { _id: "$cardUid", lastSeen: { $max: "$timestamp" }, attemptCount: { $sum: 1 } } },
      { $sort: { lastSeen: -1 } },
      { $limit: limit },
    ]).exec();

    const known = await RfidCardModel.find({ cardUid: { $in: rows.map((r) => r._id) } })
      .select({ cardUid: 1 })
      .exec();
    const knownUids = new Set(known.map((c) => c.cardUid));

    return rows
      .filter((r) => !knownUids.has(r._id))
      .map((r) => ({ cardUid: r._id, lastSeen: r.lastSeen, attemptCount: r.attemptCount }));
  }

  async queryLogs(filter: LogFilter): Promise<EntryExitLog[]> {
    const query: Record<string, unknown> = {};
    if (filter.cardUid) query.cardUid = filter.cardUid;
    if (filter.slotId !== undefined) query.slotId = filter.slotId;
    if (filter.action) query.action = filter.action;
    if (filter.status) query.status = filter.status;
    if (filter.from || filter.to) {
      const range: Record<string, Date> = {};
      if (filter.from) range.$gte = filter.from;
      if (filter.to) range.$lt = filter.to;
      query.timestamp = range;
    }

    const docs = await EntryExitLogModel.find(query)
      .sort({ timestamp: -1, logId: -1 })
      .skip(filter.skip)
      .limit(filter.limit)
      .exec();
    return docs.map(toLog);
  }

  async getPricing(): Promise<PricingPolicy | null> {
    const doc = await ParkingPricingModel.findOne({}).sort({ createdAt: 1 }).exec();
    if (!doc) return null;
    return { hourlyRate: doc.hourlyRate, dailyMaxRate: doc.dailyMaxRate, gracePeriodMinutes: doc.gracePeriodMinutes };
  }

  async savePricing(pricing: PricingPolicy): Promise<PricingPolicy> {
    const existing = await ParkingPricingModel.findOne({}).sort({ createdAt: 1 }).select({ _id: 1 }).exec();
    if (existing) {
      await ParkingPricingModel.updateOne({ _id: existing._id }, { $set: pricing }).exec();
    } else {
      await ParkingPricingModel.create(pricing);
    }
    return { ...pricing };
  }

  async findUserByUsername(username: string): Promise<UserAccount | null> {
    const doc = await UserModel.findOne({ username: username.trim() }).exec();
    return doc ? toUser(doc) : null;
  }

  async findUserById(id: string): Promise<UserAccount | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await UserModel.findById(id).exec();
    return doc ? toUser(doc) : null;
  }

  async createUser(user: NewUserAccount): Promise<UserAccount> {
    const doc = await UserModel.create(user);
    return toUser(doc);
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    await UserModel.updateOne({ _id: id }, { $set: { lastLogin: at } }).exec();
  }

  async recordSystemEvent(event: NewSystemEvent): Promise<void> {
    await SystemEventModel.create({ ...event, timestamp: new Date() });
  }
}
