import type { Store } from '../db/store.js';
import { InvalidTransitionError, NotFoundError } from '../shared/errors.js';
import type { Ad, AdStatus } from '../shared/types.js';

// Valid status transitions — enforced here and nowhere else
const VALID_TRANSITIONS: Record<AdStatus, AdStatus[]> = {
  pending: ['approved', 'rejected'],
  approved: [],
  rejected: [],
};

export function canTransition(from: AdStatus, to: AdStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: AdStatus, to: AdStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTerminal(status: AdStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

/**
 * Transition an ad to a new status.
 * All ad status changes MUST go through this function.
 * The store update is conditional on the expected current status, so two admins
 * reviewing the same ad cannot both succeed.
 */
export async function transitionAd(
  store: Store,
  ad: Ad,
  toStatus: AdStatus,
  approvedBy?: number,
): Promise<Ad> {
  assertTransition(ad.status, toStatus);

  const updated = await store.updateAdStatus(ad.id, ad.status, toStatus, approvedBy);
  if (updated) {
    return updated;
  }

  // Lost the race: report what the ad looks like now.
  const current = await store.getAd(ad.id);
  if (!current) {
    throw new NotFoundError('ad', ad.id);
  }
  throw new InvalidTransitionError(current.status, toStatus);
}
