import type { UnifiedCardRecord } from '../../types/cards.js';

type MetricCard = Pick<UnifiedCardRecord, 'number' | 'totalCount' | 'variantType' | 'hasCard' | 'cardmarketPending'>;

export interface CompletionCounter {
  total: number;
  owned: number;
  pending: number;
}

export interface SetCompletion {
  /** Highest number of the standard set; null means every card is standard. */
  boundary: number | null;
  allCards: CompletionCounter;
  standardSet: CompletionCounter;
  standardNormal: CompletionCounter;
  standardReverse: CompletionCounter;
  secretCards: CompletionCounter;
}

function emptyCounter(): CompletionCounter {
  return { total: 0, owned: 0, pending: 0 };
}

function count(counter: CompletionCounter, card: MetricCard): void {
  counter.total++;
  if (card.hasCard) counter.owned++;
  if (card.cardmarketPending) counter.pending++;
}

/**
 * Standard-set size from the first card that carries one.
 */
export function resolveBoundary(cards: readonly MetricCard[]): number | null {
  for (const card of cards) {
    const total = card.totalCount?.trim();
    if (!total) continue;
    return /^\d+$/.test(total) ? parseInt(total, 10) : null;
  }
  return null;
}

/**
 * Numeric value of a card number for boundary comparison. Anything that is not
 * purely digits ("TG15", missing) counts as 0 and therefore as standard.
 */
export function cardNumberValue(number: string | undefined): number {
  const trimmed = number?.trim() ?? '';
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : 0;
}

/**
 * Ownership counters for the cards of one set. Owned and pending overlap:
 * a duplicate purchase counts in both.
 */
export function computeSetCompletion(cards: readonly MetricCard[]): SetCompletion {
  const boundary = resolveBoundary(cards);
  const result: SetCompletion = {
    boundary,
    allCards: emptyCounter(),
    standardSet: emptyCounter(),
    standardNormal: emptyCounter(),
    standardReverse: emptyCounter(),
    secretCards: emptyCounter(),
  };

  for (const card of cards) {
    count(result.allCards, card);

    const isStandard = boundary === null || cardNumberValue(card.number) <= boundary;
    if (!isStandard) {
      count(result.secretCards, card);
      continue;
    }

    count(result.standardSet, card);
    if (card.variantType === 'Normal') count(result.standardNormal, card);
    else if (card.variantType === 'Reverse Holo') count(result.standardReverse, card);
  }

  return result;
}

export function completionPercent(counter: CompletionCounter): number {
  return counter.total > 0 ? (counter.owned / counter.total) * 100 : 0;
}

export function pendingPercent(counter: CompletionCounter): number {
  return counter.total > 0 ? (counter.pending / counter.total) * 100 : 0;
}
