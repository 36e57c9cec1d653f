import { errorFields, logger } from "../logger.js";
import type { ParkingStore } from "../store/types.js";
import type { CommandDispatcher, WhitelistEntry } from "./commands.js";

/** Pushes every active card to the gate controller. */
export async function syncWhitelist(store: ParkingStore, commands: CommandDispatcher): Promise<boolean> {
  try {
    const cards = await store.listActiveCards();
    const entries: WhitelistEntry[] = cards.map((c) => ({
      card_uid: c.cardUid,
      owner_name: c.ownerName || "Unknown",
      access_level: c.accessLevel,
      is_active: c.isActive,
    }));

    const sent = await commands.syncWhitelist(entries);
    if (sent) {
      logger.info("whitelist synced to gate controller", { cards: entries.length });
    } else {
      logger.warn("whitelist sync command not sent");
    }
    return sent;
  } catch (err) {
    logger.error("whitelist sync failed", errorFields(err));
    return false;
  }
}
