import { z } from 'zod';
import { VARIANT_TYPES } from '../../types/cards.js';
import type { RawCardRecord } from '../../types/cards.js';

// --- Stored (snake_case) document ---

export const StoredCardSchema = z
  .object({
    name: z.string(),
    source: z.enum(['catalog', 'marketplace']),
    set_name: z.string(),
    set_code: z.string().optional(),
    number: z.string().optional(),
    total_count: z.string().optional(),
    variant_type: z.enum(VARIANT_TYPES),
    has_card: z.boolean(),
    card_id: z.string().optional(),
  })
  .strict();
export type StoredCard = z.infer<typeof StoredCardSchema>;

export const SourceFileInfoSchema = z
  .object({
    size: z.number().int().nonnegative(),
    /** Modification time, epoch milliseconds. */
    mtime: z.number().nonnegative(),
  })
  .strict();
export type SourceFileInfo = z.infer<typeof SourceFileInfoSchema>;

export const StoredSnapshotSchema = z
  .object({
    extraction_timestamp: z.string().datetime({ offset: true }),
    tcg_cards: z.array(StoredCardSchema),
    cardmarket_cards: z.array(StoredCardSchema),
    set_mapping: z.record(z.string()),
    source_files: z.record(SourceFileInfoSchema),
    stats: z
      .object({
        tcg_files_count: z.number().int().nonnegative(),
        cardmarket_files_count: z.number().int().nonnegative(),
        total_tcg_cards: z.number().int().nonnegative(),
        total_cardmarket_cards: z.number().int().nonnegative(),
      })
      .strict(),
  })
  .strict();
export type StoredSnapshot = z.infer<typeof StoredSnapshotSchema>;

// --- In-memory form ---

export interface SnapshotStats {
  catalogFiles: number;
  marketplaceFiles: number;
  catalogCards: number;
  marketplaceCards: number;
}

export interface CollectionSnapshot {
  extractionTimestamp: string;
  catalogCards: RawCardRecord[];
  marketplaceCards: RawCardRecord[];
  setMapping: Record<string, string>;
  sourceFiles: Record<string, SourceFileInfo>;
  stats: SnapshotStats;
}

// --- Transformers ---

export function toStoredCard(card: RawCardRecord): StoredCard {
  const stored: StoredCard = {
    name: card.name,
    source: card.source,
    set_name: card.setName,
    variant_type: card.variantType,
    has_card: card.hasCard,
  };
  if (card.setCode !== undefined) stored.set_code = card.setCode;
  if (card.number !== undefined) stored.number = card.number;
  if (card.totalCount !== undefined) stored.total_count = card.totalCount;
  if (card.cardId !== undefined) stored.card_id = card.cardId;
  return stored;
}

export function fromStoredCard(stored: StoredCard): RawCardRecord {
  const card: RawCardRecord = {
    name: stored.name,
    source: stored.source,
    setName: stored.set_name,
    variantType: stored.variant_type,
    hasCard: stored.has_card,
  };
  if (stored.set_code !== undefined) card.setCode = stored.set_code;
  if (stored.number !== undefined) card.number = stored.number;
  if (stored.total_count !== undefined) card.totalCount = stored.total_count;
  if (stored.card_id !== undefined) card.cardId = stored.card_id;
  return card;
}

export function toStoredSnapshot(snapshot: CollectionSnapshot): StoredSnapshot {
  return {
    extraction_timestamp: snapshot.extractionTimestamp,
    tcg_cards: snapshot.catalogCards.map(toStoredCard),
    cardmarket_cards: snapshot.marketplaceCards.map(toStoredCard),
    set_mapping: { ...snapshot.setMapping },
    source_files: { ...snapshot.sourceFiles },
    stats: {
      tcg_files_count: snapshot.stats.catalogFiles,
      cardmarket_files_count: snapshot.stats.marketplaceFiles,
      total_tcg_cards: snapshot.stats.catalogCards,
      total_cardmarket_cards: snapshot.stats.marketplaceCards,
    },
  };
}

export function fromStoredSnapshot(stored: StoredSnapshot): CollectionSnapshot {
  return {
    extractionTimestamp: stored.extraction_timestamp,
    catalogCards: stored.tcg_cards.map(fromStoredCard),
    marketplaceCards: stored.cardmarket_cards.map(fromStoredCard),
    setMapping: { ...stored.set_mapping },
    sourceFiles: { ...stored.source_files },
    stats: {
      catalogFiles: stored.stats.tcg_files_count,
      marketplaceFiles: stored.stats.cardmarket_files_count,
      catalogCards: stored.stats.total_tcg_cards,
      marketplaceCards: stored.stats.total_cardmarket_cards,
    },
  };
}
