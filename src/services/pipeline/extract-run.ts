import { readFile, stat } from 'fs/promises';
import path from 'path';
import type { RawCardRecord } from '../../types/cards.js';
import { MissingInputError } from '../../utils/errors.js';
import { extractCatalogCards, extractMarketplaceCards } from '../extraction/index.js';
import { createLogger } from '../logger/index.js';
import { buildSetMapping, resolveSetName, setMappingToObject } from '../reconciliation/set-mapping.js';
import { classifySourceFiles, listHtmlFiles, statSourceFiles } from '../snapshot/source-files.js';
import type { SourceFileMarkers } from '../snapshot/source-files.js';
import type { CollectionSnapshot } from '../snapshot/schema.js';

const log = createLogger('extract-run');

export interface ExtractRunOptions {
  dataDir: string;
  markers: SourceFileMarkers;
  now?: Date;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

async function extractFiles(
  files: readonly string[],
  extract: (html: string) => RawCardRecord[],
  source: string,
): Promise<RawCardRecord[]> {
  const all: RawCardRecord[] = [];
  for (const file of files) {
    const html = await readFile(file, 'utf8');
    const cards = extract(html);
    log.info({ source, file: path.basename(file), cards: cards.length }, 'Extracted saved page');
    all.push(...cards);
  }
  return all;
}

/**
 * Read every saved page in the data folder and build the snapshot document.
 *
 * All catalog pages are extracted and the SetMapping built before marketplace
 * records get their set names backfilled. No marketplace pages is normal once
 * every order has arrived.
 */
export async function extractCollection(options: ExtractRunOptions): Promise<CollectionSnapshot> {
  const { dataDir, markers } = options;

  if (!(await isDirectory(dataDir))) {
    throw new MissingInputError(`Data folder not found: ${dataDir}`, { dataDir });
  }

  const { catalog, marketplace } = classifySourceFiles(await listHtmlFiles(dataDir), markers);
  if (catalog.length === 0) {
    throw new MissingInputError(`No "${markers.catalog}" HTML files found in ${dataDir}`, { dataDir });
  }
  if (marketplace.length === 0) {
    log.warn({ dataDir, marker: markers.marketplace }, 'No marketplace files found (orders delivered or removed)');
  }
  log.info({ catalogFiles: catalog.length, marketplaceFiles: marketplace.length }, 'Found saved pages');

  const catalogCards = await extractFiles(catalog, extractCatalogCards, 'catalog');
  const setMapping = buildSetMapping(catalogCards);

  const marketplaceCards = (await extractFiles(marketplace, extractMarketplaceCards, 'marketplace')).map(
    (card) => ({ ...card, setName: resolveSetName(card, setMapping) }),
  );

  const snapshot: CollectionSnapshot = {
    extractionTimestamp: (options.now ?? new Date()).toISOString(),
    catalogCards,
    marketplaceCards,
    setMapping: setMappingToObject(setMapping),
    sourceFiles: await statSourceFiles([...catalog, ...marketplace]),
    stats: {
      catalogFiles: catalog.length,
      marketplaceFiles: marketplace.length,
      catalogCards: catalogCards.length,
      marketplaceCards: marketplaceCards.length,
    },
  };

  log.info({ ...snapshot.stats, sets: setMapping.size }, 'Extraction complete');
  return snapshot;
}
