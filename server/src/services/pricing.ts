import type { ParkingStore, PricingPolicy } from "../store/types.js";

export type PricingPatch = Partial<PricingPolicy>;

/** Single authoritative pricing row, created from defaults on first read. */
export class PricingStore {
  constructor(
    private readonly store: ParkingStore,
    private readonly defaults: PricingPolicy
  ) {}

  async get(): Promise<PricingPolicy> {
    const existing = await this.store.getPricing();
    if (existing) return existing;
    return this.store.savePricing({ ...this.defaults });
  }

  async update(patch: PricingPatch): Promise<PricingPolicy> {
    const current = await this.get();
    return this.store.savePricing({
      hourlyRate: patch.hourlyRate ?? current.hourlyRate,
      dailyMaxRate: patch.dailyMaxRate ?? current.dailyMaxRate,
      gracePeriodMinutes: patch.gracePeriodMinutes ?? current.gracePeriodMinutes,
    });
  }
}
