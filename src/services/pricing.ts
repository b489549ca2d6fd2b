// src/services/pricing.ts
import type { User } from "../db/schema";
import { ValidationError } from "../errors";
import { parseRange } from "../utils/dates";

export type PricingTier = "registered_client" | "guest";

// Tiers missing from this table are charged the full rate.
export const TIER_MULTIPLIERS: Readonly<Record<PricingTier, number>> = {
  registered_client: 0.94,
  guest: 1.0,
};

export type PriceBreakdown = {
  startDate: string;
  endDate: string;
  days: number;
  dailyRate: number;
  tier: string;
  multiplier: number;
  discountPercent: number;
  total: number;
};

function isKnownTier(tier: string): tier is PricingTier {
  return Object.prototype.hasOwnProperty.call(TIER_MULTIPLIERS, tier);
}

export function multiplierFor(tier: string) {
  return isKnownTier(tier) ? TIER_MULTIPLIERS[tier] : 1.0;
}

/** Guests have no user record; clients get the registered tier; other roles pass through by name. */
export function tierOf(user?: Pick<User, "role">): string {
  if (!user) return "guest";
  return user.role === "client" ? "registered_client" : user.role;
}

export function priceBreakdown(startDate: string, endDate: string, dailyRate: number, tier: string): PriceBreakdown {
  const { days } = parseRange(startDate, endDate);
  if (!Number.isFinite(dailyRate) || dailyRate <= 0) {
    throw new ValidationError("bad_rate", "Daily rate must be a positive number");
  }
  const multiplier = multiplierFor(tier);
  return {
    startDate,
    endDate,
    days,
    dailyRate,
    tier,
    multiplier,
    discountPercent: Math.round((1 - multiplier) * 100),
    total: dailyRate * days * multiplier,
  };
}

/** Rental cost: dailyRate * days * tier multiplier, unrounded. */
export function computePrice(startDate: string, endDate: string, dailyRate: number, tier: string): number {
  return priceBreakdown(startDate, endDate, dailyRate, tier).total;
}
