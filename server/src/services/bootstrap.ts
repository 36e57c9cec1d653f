import bcrypt from "bcryptjs";

import type { AppConfig } from "../config.js";
import { logger } from "../logger.js";
import type { ParkingStore } from "../store/types.js";
import type { PricingStore } from "./pricing.js";

/** Creates the admin account, the slot range and the pricing row when missing. */
export async function ensureInitialData(store: ParkingStore, pricing: PricingStore, config: AppConfig): Promise<void> {
  const admin = await store.findUserByUsername(config.admin.username);
  if (!admin) {
    await store.createUser({
      username: config.admin.username,
      email: config.admin.email.toLowerCase(),
      passwordHash: await bcrypt.hash(config.admin.password, 12),
      role: "admin",
      isActive: true,
    });
    logger.info("admin user created", { username: config.admin.username });
  }

  if ((await store.countSlots()) === 0) {
    const slotIds = Array.from({ length: config.totalParkingSlots }, (_, i) => i + 1);
    await store.createSlots(slotIds);
    logger.info("parking slots created", { count: slotIds.length });
  }

  await pricing.get();
}
