/**
 * Tier/Permission Checker
 *
 * Pure functions of (tier, descriptor). Exported on their own so a web layer
 * can pre-filter a model list for display without running a query.
 */

import { MAX_TIER, TIERS, type ModelDescriptor, type Tier } from './types.js';

const TIER_NAMES: Record<Tier, string> = Object.fromEntries(
  Object.entries(TIERS).map(([name, value]) => [value, name]),
);

export function isValidTier(value: unknown): value is Tier {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_TIER;
}

/**
 * True iff the caller's tier is at least the model's required tier.
 * Fails closed: an invalid tier on either side denies.
 */
export function authorize(callerTier: unknown, descriptor: Pick<ModelDescriptor, 'requiredTier'>): boolean {
  if (!isValidTier(callerTier) || !isValidTier(descriptor.requiredTier)) {
    return false;
  }
  return callerTier >= descriptor.requiredTier;
}

export function filterAuthorized<T extends Pick<ModelDescriptor, 'requiredTier'>>(
  callerTier: unknown,
  descriptors: readonly T[],
): T[] {
  return descriptors.filter((descriptor) => authorize(callerTier, descriptor));
}

export function tierName(tier: unknown): string {
  return isValidTier(tier) ? (TIER_NAMES[tier] ?? 'UNKNOWN') : 'UNKNOWN';
}
