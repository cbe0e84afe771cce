import { stat } from 'fs/promises';
import path from 'path';
import { createLogger } from '../logger/index.js';
import type { CollectionSnapshot } from './schema.js';
import { listHtmlFiles } from './source-files.js';

const log = createLogger('change-detector');

export type ExtractionReason = 'no_snapshot' | 'sources_changed' | 'no_sources' | 'up_to_date';

export interface ExtractionCheck {
  needed: boolean;
  reason: ExtractionReason;
  changedFiles: string[];
}

export interface RegenerationPlan {
  /** Every set page is rewritten. */
  regenerateAll: boolean;
  /** Set names whose pages must be rewritten when regenerateAll is false. */
  sets: Set<string>;
}

async function modifiedAt(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).mtimeMs;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Extraction is needed when there is no snapshot yet or any saved page is newer
 * than it. With no saved pages at all there is nothing to extract.
 */
export async function needsReextraction(dataFile: string, dataDir: string): Promise<ExtractionCheck> {
  const snapshotTime = await modifiedAt(dataFile);
  if (snapshotTime === null) {
    return { needed: true, reason: 'no_snapshot', changedFiles: [] };
  }

  const files = await listHtmlFiles(dataDir);
  if (files.length === 0) {
    log.warn({ dataDir }, 'No HTML files found in data folder');
    return { needed: false, reason: 'no_sources', changedFiles: [] };
  }

  const changedFiles: string[] = [];
  for (const file of files) {
    const time = await modifiedAt(file);
    if (time !== null && time > snapshotTime) changedFiles.push(file);
  }

  if (changedFiles.length > 0) {
    log.info({ count: changedFiles.length, files: changedFiles.slice(0, 5) }, 'HTML files newer than extracted data');
    return { needed: true, reason: 'sources_changed', changedFiles };
  }
  return { needed: false, reason: 'up_to_date', changedFiles };
}

/**
 * "Scarlet & Violet 151 card list (International TCG) – TCG Collector.html" → "Scarlet & Violet 151"
 */
export function setNameFromFileName(fileName: string, catalogMarker: string): string | null {
  if (!fileName.includes(catalogMarker) || !fileName.includes(' card list')) return null;
  const setName = fileName.split(' card list')[0].trim();
  return setName || null;
}

/**
 * Decide which set pages to rewrite. A tracked file changed when its mtime is
 * greater than the stored one; a saved page the snapshot never saw forces a full
 * regeneration.
 */
export async function setsNeedingRegeneration(
  snapshot: Pick<CollectionSnapshot, 'sourceFiles'>,
  dataDir: string,
  catalogMarker: string,
): Promise<RegenerationPlan> {
  const sets = new Set<string>();

  for (const [filePath, info] of Object.entries(snapshot.sourceFiles)) {
    const current = await modifiedAt(filePath);
    if (current === null || current <= info.mtime) continue;

    const setName = setNameFromFileName(path.basename(filePath), catalogMarker);
    log.info({ file: path.basename(filePath), setName }, 'File changed since extraction');
    if (setName) sets.add(setName);
  }

  const tracked = new Set(Object.keys(snapshot.sourceFiles));
  const untracked = (await listHtmlFiles(dataDir)).filter((file) => !tracked.has(file));
  if (untracked.length > 0) {
    log.info({ count: untracked.length }, 'New HTML files found, regenerating all sets');
    return { regenerateAll: true, sets: new Set() };
  }

  return { regenerateAll: false, sets };
}
