import type { PricingPolicy } from "../store/types.js";

/**
 * Parking fee for a stay of `durationMinutes`.
 *
 * Stays up to and including the grace period are free. Past it, every
 * started hour is charged at the hourly rate, capped at the daily maximum.
 */
export function calculateParkingFee(durationMinutes: number, pricing: PricingPolicy): number {
  if (durationMinutes <= pricing.gracePeriodMinutes) return 0;

  const hours = Math.ceil(durationMinutes / 60);
  const fee = Math.min(hours * pricing.hourlyRate, pricing.dailyMaxRate);
  return Math.round(fee * 100) / 100;
}

export function formatDuration(minutes: number): string {
  if (minutes < 60) return `${minutes}m`;

  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins === 0 ? `${hours}h` : `${hours}h ${mins}m`;
}
