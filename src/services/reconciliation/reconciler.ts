import type { NormalizedCardRecord, RawCardRecord, UnifiedCardRecord } from '../../types/cards.js';
import { MissingInputError } from '../../utils/errors.js';
import { createLogger } from '../logger/index.js';
import { formatIdentityKey, hasAbsentField, identityKeyId, normalizeRecords } from './identity.js';
import { buildSetMapping, setMappingFromObject } from './set-mapping.js';
import type { SetMapping } from './set-mapping.js';
import { deriveStatus } from './status.js';

const log = createLogger('reconciler');

export type UnifiedCollection = ReadonlyMap<string, Readonly<UnifiedCardRecord>>;

export interface ReconciliationStats {
  catalogRecords: number;
  marketplaceRecords: number;
  /** Catalog records that replaced an earlier catalog record with the same key. */
  collisions: number;
  /** Subset of collisions whose key is missing its set code or number. */
  placeholderCollisions: number;
  /** Marketplace records folded into an existing entry. */
  pendingOnExisting: number;
  /** Marketplace records that introduced a new entry. */
  pendingInserted: number;
  /** Entries both owned and pending. */
  duplicates: number;
}

export interface ReconciliationResult {
  cards: UnifiedCollection;
  stats: ReconciliationStats;
}

interface DraftCard {
  record: NormalizedCardRecord;
  cardmarketPending: boolean;
}

/**
 * Merge normalized catalog and marketplace records into one entry per identity key.
 *
 * 1. Every catalog record is inserted under its key; a later catalog record with
 *    the same key replaces the earlier one in place.
 * 2. A marketplace record whose key exists only flags that entry as pending; the
 *    catalog's identity fields and ownership are kept.
 * 3. A marketplace record with a new key becomes its own entry, pending and not owned.
 *
 * The returned map and its records are frozen; iteration order is insertion order,
 * so the same input always yields the same output.
 */
export function reconcile(
  catalog: readonly NormalizedCardRecord[],
  marketplace: readonly NormalizedCardRecord[],
): ReconciliationResult {
  if (catalog.length === 0) {
    throw new MissingInputError('No catalog records to reconcile against', {
      marketplaceRecords: marketplace.length,
    });
  }

  const drafts = new Map<string, DraftCard>();
  const stats: ReconciliationStats = {
    catalogRecords: catalog.length,
    marketplaceRecords: marketplace.length,
    collisions: 0,
    placeholderCollisions: 0,
    pendingOnExisting: 0,
    pendingInserted: 0,
    duplicates: 0,
  };

  for (const record of catalog) {
    const id = identityKeyId(record.key);
    const previous = drafts.get(id);
    if (previous) {
      stats.collisions++;
      if (hasAbsentField(record.key)) stats.placeholderCollisions++;
      log.warn(
        { key: formatIdentityKey(record.key), replaced: previous.record.name, name: record.name },
        'Catalog records collide on identity key, keeping the later one',
      );
    }
    drafts.set(id, { record, cardmarketPending: false });
  }

  if (marketplace.length === 0) {
    log.info('No marketplace records, reconciling catalog data alone');
  }

  for (const record of marketplace) {
    const id = identityKeyId(record.key);
    const existing = drafts.get(id);
    if (existing) {
      existing.cardmarketPending = true;
      stats.pendingOnExisting++;
      continue;
    }
    drafts.set(id, { record: { ...record, hasCard: false }, cardmarketPending: true });
    stats.pendingInserted++;
  }

  const cards = new Map<string, Readonly<UnifiedCardRecord>>();
  for (const [id, draft] of drafts) {
    const card = freezeCard(draft);
    if (card.status === 'have_pending_duplicate') stats.duplicates++;
    cards.set(id, card);
  }

  log.info(stats, 'Reconciliation complete');
  return { cards, stats };
}

function freezeCard(draft: DraftCard): Readonly<UnifiedCardRecord> {
  const { record, cardmarketPending } = draft;
  return Object.freeze({
    ...record,
    key: Object.freeze({ ...record.key }),
    cardmarketPending,
    status: deriveStatus({ hasCard: record.hasCard, cardmarketPending }),
  });
}

export interface ReconciliationInput {
  catalogCards: readonly RawCardRecord[];
  marketplaceCards: readonly RawCardRecord[];
  /** Persisted mapping; rebuilt from the catalog records when absent. */
  setMapping?: Record<string, string>;
}

/**
 * Normalize both record sequences against one SetMapping and reconcile them.
 * The catalog is fully seeded before any marketplace record is applied.
 */
export function reconcileRecords(input: ReconciliationInput): ReconciliationResult {
  const setMapping: SetMapping = input.setMapping
    ? setMappingFromObject(input.setMapping)
    : buildSetMapping(input.catalogCards);

  return reconcile(
    normalizeRecords(input.catalogCards, setMapping),
    normalizeRecords(input.marketplaceCards, setMapping),
  );
}
