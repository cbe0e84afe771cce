import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import type { SourceFileInfo } from './schema.js';

export interface SourceFileMarkers {
  catalog: string;
  marketplace: string;
}

export interface ClassifiedSourceFiles {
  catalog: string[];
  marketplace: string[];
}

/**
 * Saved pages (.html) directly inside the data directory, sorted by file name.
 * A missing data directory has no saved pages.
 */
export async function listHtmlFiles(dataDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dataDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.html'))
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right, undefined, { numeric: true, sensitivity: 'base' }))
    .map((name) => path.join(dataDir, name));
}

/**
 * Split saved pages by source using the marker each site leaves in its page
 * title (and therefore in the saved file name). Unmatched files are ignored.
 */
export function classifySourceFiles(files: readonly string[], markers: SourceFileMarkers): ClassifiedSourceFiles {
  const classified: ClassifiedSourceFiles = { catalog: [], marketplace: [] };
  for (const file of files) {
    const name = path.basename(file);
    if (name.includes(markers.catalog)) classified.catalog.push(file);
    else if (name.includes(markers.marketplace)) classified.marketplace.push(file);
  }
  return classified;
}

export async function statSourceFiles(files: readonly string[]): Promise<Record<string, SourceFileInfo>> {
  const result: Record<string, SourceFileInfo> = {};
  for (const file of files) {
    const info = await stat(file);
    result[file] = { size: info.size, mtime: info.mtimeMs };
  }
  return result;
}
