import type { OwnershipStatus } from '../../types/cards.js';

/**
 * Fixed priority: owned, owned with a second copy on the way, on the way, missing.
 */
export function deriveStatus(card: { hasCard: boolean; cardmarketPending: boolean }): OwnershipStatus {
  if (card.hasCard && !card.cardmarketPending) return 'have';
  if (card.hasCard && card.cardmarketPending) return 'have_pending_duplicate';
  if (card.cardmarketPending) return 'pending_delivery';
  return 'need';
}

export const STATUS_LABELS: Record<OwnershipStatus, string> = {
  have: 'Have',
  have_pending_duplicate: 'Have + Pending Purchase (Duplicate!)',
  pending_delivery: 'Pending Purchase',
  need: 'Need',
};
