import { access, mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { createLogger } from '../logger/index.js';
import { selectWantList, summarizeCollection } from '../metrics/collection-summary.js';
import type { UnifiedCollection } from '../reconciliation/reconciler.js';
import type { RegenerationPlan } from '../snapshot/change-detector.js';
import { safeFileName } from './html.js';
import { renderOverviewPage } from './overview-page.js';
import { renderSetPage } from './set-page.js';
import { renderWantList, WANT_LIST_FORMATS } from './want-lists.js';

const log = createLogger('report-writer');

export interface WriteReportsOptions {
  cards: UnifiedCollection;
  outputDir: string;
  /** Omitted: every set page is written. */
  plan?: RegenerationPlan;
  images?: ReadonlyMap<string, string>;
  now?: Date;
}

export interface WriteReportsResult {
  written: string[];
  skippedSets: string[];
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write the overview, the set pages and the want lists. The overview and want
 * lists are always rewritten; a set page is skipped only when the plan leaves
 * its set unchanged and the page already exists.
 */
export async function writeReports(options: WriteReportsOptions): Promise<WriteReportsResult> {
  const { cards, outputDir } = options;
  const plan = options.plan ?? { regenerateAll: true, sets: new Set<string>() };
  const now = options.now ?? new Date();
  const result: WriteReportsResult = { written: [], skippedSets: [] };

  await mkdir(outputDir, { recursive: true });

  const write = async (fileName: string, content: string): Promise<void> => {
    const filePath = path.join(outputDir, fileName);
    await writeFile(filePath, content, 'utf8');
    result.written.push(filePath);
  };

  const summary = summarizeCollection(cards.values());
  await write('index.html', renderOverviewPage(summary));

  for (const set of summary.sets) {
    const fileName = `${safeFileName(set.setName)}.html`;
    if (!plan.regenerateAll && !plan.sets.has(set.setName)) {
      if (await exists(path.join(outputDir, fileName))) {
        result.skippedSets.push(set.setName);
        continue;
      }
      log.info({ setName: set.setName }, 'Set page missing, generating');
    }
    await write(fileName, renderSetPage(set, options.images));
  }

  const wantLists = selectWantList(cards.values());
  for (const format of WANT_LIST_FORMATS) {
    await write(`want_list_${format}.txt`, renderWantList(format, wantLists, now));
  }

  log.info(
    { written: result.written.length, skippedSets: result.skippedSets.length, outputDir },
    'Reports written',
  );
  return result;
}
