import { summarizeCollection } from '../metrics/collection-summary.js';
import { completionPercent } from '../metrics/completion.js';
import { reconcileRecords } from '../reconciliation/reconciler.js';
import { readSnapshotIfPresent } from '../snapshot/snapshot-store.js';

export const NO_SNAPSHOT_MESSAGE = 'No extracted data found. Run with --extract to read the saved pages first.';

/**
 * Text summary of the persisted snapshot. A missing snapshot is not an error
 * here; an unreadable one still throws SnapshotError.
 */
export async function describeCollection(dataFile: string): Promise<string> {
  const snapshot = await readSnapshotIfPresent(dataFile);
  if (!snapshot) return NO_SNAPSHOT_MESSAGE;

  const { cards, stats } = reconcileRecords({
    catalogCards: snapshot.catalogCards,
    marketplaceCards: snapshot.marketplaceCards,
    setMapping: snapshot.setMapping,
  });
  const { totals, sets } = summarizeCollection(cards.values());

  return [
    `Snapshot: ${dataFile}`,
    `Extracted: ${snapshot.extractionTimestamp}`,
    `Catalog files: ${snapshot.stats.catalogFiles} (${snapshot.stats.catalogCards} records)`,
    `Marketplace files: ${snapshot.stats.marketplaceFiles} (${snapshot.stats.marketplaceCards} records)`,
    `Sets: ${sets.length}`,
    `Cards: ${totals.total} total, ${totals.owned} owned, ${totals.pending} pending (${completionPercent(totals).toFixed(1)}% complete)`,
    `Duplicates (owned and pending): ${stats.duplicates}`,
  ].join('\n');
}
