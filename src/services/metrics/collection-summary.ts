import type { UnifiedCardRecord } from '../../types/cards.js';
import { UNKNOWN_SET_CODE } from '../reconciliation/identity.js';
import { computeSetCompletion } from './completion.js';
import type { CompletionCounter, SetCompletion } from './completion.js';

type Card = Readonly<UnifiedCardRecord>;

export interface SetSummary {
  setName: string;
  setCode: string;
  cards: Card[];
  completion: SetCompletion;
}

export interface CollectionSummary {
  totals: CompletionCounter;
  sets: SetSummary[];
}

/**
 * Group cards by set name, keeping first-seen order of sets and cards.
 */
export function groupBySet(cards: Iterable<Card>): Map<string, Card[]> {
  const groups = new Map<string, Card[]>();
  for (const card of cards) {
    const group = groups.get(card.setName);
    if (group) group.push(card);
    else groups.set(card.setName, [card]);
  }
  return groups;
}

function progressRatio(counter: CompletionCounter): number {
  return counter.total > 0 ? (counter.owned + counter.pending) / counter.total : 0;
}

/**
 * Per-set completion plus collection-wide totals. Sets are ordered by
 * (owned + pending) / total, highest first; ties keep grouping order.
 */
export function summarizeCollection(cards: Iterable<Card>): CollectionSummary {
  const all = [...cards];
  const totals = computeSetCompletion(all).allCards;

  const sets: SetSummary[] = [];
  for (const [setName, setCards] of groupBySet(all)) {
    sets.push({
      setName,
      setCode: setCards[0]?.setCode ?? UNKNOWN_SET_CODE,
      cards: setCards,
      completion: computeSetCompletion(setCards),
    });
  }

  sets.sort((a, b) => progressRatio(b.completion.allCards) - progressRatio(a.completion.allCards));
  return { totals, sets };
}

/**
 * Cards neither owned nor on the way, grouped by set name.
 */
export function selectWantList(cards: Iterable<Card>): Map<string, Card[]> {
  const wanted: Card[] = [];
  for (const card of cards) {
    if (!card.hasCard && !card.cardmarketPending) wanted.push(card);
  }
  return groupBySet(wanted);
}
