import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { SnapshotError } from '../../utils/errors.js';
import { createLogger } from '../logger/index.js';
import { fromStoredSnapshot, StoredSnapshotSchema, toStoredSnapshot } from './schema.js';
import type { CollectionSnapshot } from './schema.js';

const log = createLogger('snapshot-store');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function writeSnapshot(filePath: string, snapshot: CollectionSnapshot): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(toStoredSnapshot(snapshot), null, 2)}\n`, 'utf8');
  log.info(
    { filePath, catalogCards: snapshot.stats.catalogCards, marketplaceCards: snapshot.stats.marketplaceCards },
    'Snapshot saved',
  );
}

/**
 * Load and validate a snapshot document. Throws SnapshotError when the file is
 * missing, is not JSON, or does not match the schema.
 */
export async function readSnapshot(filePath: string): Promise<CollectionSnapshot> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new SnapshotError(filePath, 'not found, run an extraction first', error);
    }
    throw new SnapshotError(filePath, 'could not be read', error);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SnapshotError(filePath, 'is not valid JSON', error);
  }

  const parsed = StoredSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SnapshotError(filePath, `does not match the expected schema (${issues})`, parsed.error);
  }

  return fromStoredSnapshot(parsed.data);
}

/**
 * Like readSnapshot, but a missing file yields null.
 */
export async function readSnapshotIfPresent(filePath: string): Promise<CollectionSnapshot | null> {
  try {
    return await readSnapshot(filePath);
  } catch (error) {
    if (error instanceof SnapshotError && isMissingFile(error.cause)) {
      return null;
    }
    throw error;
  }
}
