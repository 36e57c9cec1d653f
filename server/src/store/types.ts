import type { LogAction } from "../models/EntryExitLog.js";
import type { AccessLevel } from "../models/RfidCard.js";
import type { SlotStatus } from "../models/ParkingSlot.js";
import type { EventSeverity } from "../models/SystemEvent.js";
import type { UserRole } from "../models/User.js";

export type ParkingSlot = {
  slotId: number;
  status: SlotStatus;
  currentCardUid: string | null;
  entryTime: Date | null;
  exitTime: Date | null;
  updatedAt: Date;
};

export type RfidCard = {
  cardUid: string;
  ownerName: string;
  ownerEmail: string | null;
  phone: string | null;
  vehiclePlate: string | null;
  isActive: boolean;
  accessLevel: AccessLevel;
  createdAt: Date;
  updatedAt: Date;
};

export type NewRfidCard = Omit<RfidCard, "createdAt" | "updatedAt">;
export type RfidCardPatch = Partial<Omit<NewRfidCard, "cardUid">>;

export type EntryExitLog = {
  logId: number;
  cardUid: string;
  slotId: number | null;
  action: LogAction;
  gate: string;
  status: string;
  timestamp: Date;
  durationMinutes: number | null;
  feeAmount: number | null;
};

export type NewEntryExitLog = Omit<EntryExitLog, "logId">;

export type LogFilter = {
  cardUid?: string;
  slotId?: number;
  action?: LogAction;
  status?: string;
  from?: Date;
  /** exclusive */
  to?: Date;
  skip: number;
  limit: number;
};

export type UnknownCardSighting = {
  cardUid: string;
  lastSeen: Date;
  attemptCount: number;
};

export type PricingPolicy = {
  hourlyRate: number;
  dailyMaxRate: number;
  gracePeriodMinutes: number;
};

export type NewSystemEvent = {
  eventType: string;
  severity: EventSeverity;
  description: string;
  meta?: Record<string, unknown>;
};

export type UserAccount = {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  isActive: boolean;
  lastLogin: Date | null;
};

export type NewUserAccount = Omit<UserAccount, "id" | "lastLogin">;

/** Writes available inside a single ingestion transaction. */
export interface SlotLedger {
  findSlot(slotId: number): Promise<ParkingSlot | null>;
  saveSlot(slot: ParkingSlot): Promise<void>;
  insertLog(log: NewEntryExitLog): Promise<EntryExitLog>;
}

export interface ParkingStore {
  /**
   * Runs `work` atomically. If it throws, every write made through the
   * ledger is discarded and the error is rethrown.
   */
  transaction<T>(work: (ledger: SlotLedger) => Promise<T>): Promise<T>;

  isConnected(): boolean;

  listSlots(): Promise<ParkingSlot[]>;
  getSlot(slotId: number): Promise<ParkingSlot | null>;
  countSlots(): Promise<number>;
  createSlots(slotIds: number[]): Promise<void>;

  listCards(filter: { isActive?: boolean; skip: number; limit: number }): Promise<RfidCard[]>;
  listActiveCards(): Promise<RfidCard[]>;
  getCard(cardUid: string): Promise<RfidCard | null>;
  createCard(card: NewRfidCard): Promise<RfidCard>;
  updateCard(cardUid: string, patch: RfidCardPatch): Promise<RfidCard | null>;
  recentUnknownCards(limit: number): Promise<UnknownCardSighting[]>;

  queryLogs(filter: LogFilter): Promise<EntryExitLog[]>;

  getPricing(): Promise<PricingPolicy | null>;
  savePricing(pricing: PricingPolicy): Promise<PricingPolicy>;

  findUserByUsername(username: string): Promise<UserAccount | null>;
  findUserById(id: string): Promise<UserAccount | null>;
  createUser(user: NewUserAccount): Promise<UserAccount>;
  recordLogin(id: string, at: Date): Promise<void>;

  recordSystemEvent(event: NewSystemEvent): Promise<void>;
}
