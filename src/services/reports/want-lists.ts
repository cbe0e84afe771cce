import type { UnifiedCardRecord } from '../../types/cards.js';
import { UNKNOWN_NUMBER, UNKNOWN_SET_CODE } from '../reconciliation/identity.js';

type Card = Readonly<UnifiedCardRecord>;
export type WantLists = ReadonlyMap<string, readonly Card[]>;

export type WantListFormat = 'simple' | 'cardmarket' | 'decklist';

export const WANT_LIST_FORMATS: WantListFormat[] = ['simple', 'cardmarket', 'decklist'];

/**
 * "2024-05-01 09:30:00" in UTC.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

function variantSuffix(card: Card): string {
  return card.variantType === 'Normal' ? '' : ` (${card.variantType})`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function numericNumber(card: Card): number {
  return card.number && /^\d+$/.test(card.number) ? parseInt(card.number, 10) : 999;
}

function allCards(wantLists: WantLists): Card[] {
  return [...wantLists.values()].flat();
}

/**
 * Card names by set: "001 Bulbasaur" / "002 Ivysaur (Reverse Holo)".
 */
export function renderSimpleWantList(wantLists: WantLists, generatedAt: Date): string {
  let content = '# Card Want List (Simple Format)\n';
  content += `# Generated on ${formatTimestamp(generatedAt)}\n\n`;

  const setNames = [...wantLists.keys()].sort(compareText);
  for (const setName of setNames) {
    const cards = wantLists.get(setName) ?? [];
    if (cards.length === 0) continue;

    content += `## ${setName}\n`;
    const sorted = [...cards].sort(
      (a, b) => compareText(a.number ?? '999', b.number ?? '999') || compareText(a.name, b.name),
    );
    for (const card of sorted) {
      content += `${card.number ?? '???'} ${card.name}${variantSuffix(card)}\n`;
    }
    content += '\n';
  }

  return content;
}

/**
 * "Name [SET]" lines sorted by card name, for pasting into the marketplace's want list.
 */
export function renderCardmarketWantList(wantLists: WantLists, generatedAt: Date): string {
  let content = '# Card Want List (Cardmarket Format)\n';
  content += `# Generated on ${formatTimestamp(generatedAt)}\n`;
  content += '# Format: Card Name [Set Code] (modify abilities manually if needed)\n\n';

  const sorted = allCards(wantLists).sort((a, b) => compareText(a.name, b.name));
  for (const card of sorted) {
    content += `${card.name}${variantSuffix(card)} [${card.setCode ?? UNKNOWN_SET_CODE}]\n`;
  }

  content += '\n# Note: You may need to manually add abilities in brackets like:\n';
  content += '# Exeggcute [Precocious Evolution] [SSP]\n';
  return content;
}

/**
 * "1 Name SET 001" lines sorted by set code, number and name, the input format of
 * decklist-to-marketplace converters.
 */
export function renderDecklistWantList(wantLists: WantLists, generatedAt: Date): string {
  let content = '# Card Want List (Decklist Format)\n';
  content += `# Generated on ${formatTimestamp(generatedAt)}\n`;
  content += '# Format: 1 CardName SetCode Number\n\n';

  const sorted = allCards(wantLists).sort(
    (a, b) =>
      compareText(a.setCode ?? 'ZZZ', b.setCode ?? 'ZZZ') ||
      numericNumber(a) - numericNumber(b) ||
      compareText(a.name, b.name),
  );
  for (const card of sorted) {
    content += `1 ${card.name}${variantSuffix(card)} ${card.setCode ?? UNKNOWN_SET_CODE} ${card.number ?? UNKNOWN_NUMBER}\n`;
  }

  return content;
}

export function renderWantList(format: WantListFormat, wantLists: WantLists, generatedAt: Date): string {
  switch (format) {
    case 'simple':
      return renderSimpleWantList(wantLists, generatedAt);
    case 'cardmarket':
      return renderCardmarketWantList(wantLists, generatedAt);
    case 'decklist':
      return renderDecklistWantList(wantLists, generatedAt);
  }
}
