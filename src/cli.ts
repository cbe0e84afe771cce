#!/usr/bin/env node
/**
 * Collection tracker CLI:
 *   tcg-tracker                 extract when saved pages changed, then write reports
 *   tcg-tracker --extract       force extraction, then write every report
 *   tcg-tracker --reports-only  write reports from the existing snapshot
 *   tcg-tracker --info          print a summary of the existing snapshot
 */
import path from 'path';
import type { Logger } from 'pino';
import { config } from './config/index.js';
import { resolveCardImages } from './services/imagery/image-resolver.js';
import { createLogger, createRunContext } from './services/logger/index.js';
import type { RunContext } from './services/logger/index.js';
import { describeCollection } from './services/pipeline/collection-info.js';
import { extractCollection } from './services/pipeline/extract-run.js';
import { reconcileRecords } from './services/reconciliation/index.js';
import { writeReports } from './services/reports/index.js';
import {
  needsReextraction,
  readSnapshot,
  setsNeedingRegeneration,
  writeSnapshot,
} from './services/snapshot/index.js';
import type { CollectionSnapshot, RegenerationPlan } from './services/snapshot/index.js';
import type { UnifiedCardRecord } from './types/cards.js';
import { getErrorMessage, isFatalInputError } from './utils/errors.js';

const HELP = `Usage: tcg-tracker [options]

Options:
  --extract       Force re-extraction from the saved HTML pages
  --reports-only  Generate reports from the existing snapshot
  --info          Show a summary of the existing snapshot
  --help          Show this message
`;

interface CliArgs {
  extract: boolean;
  reportsOnly: boolean;
  info: boolean;
  help: boolean;
  unknown: string[];
}

function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { extract: false, reportsOnly: false, info: false, help: false, unknown: [] };
  for (const arg of argv) {
    switch (arg) {
      case '--extract':
        args.extract = true;
        break;
      case '--reports-only':
        args.reportsOnly = true;
        break;
      case '--info':
        args.info = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        args.unknown.push(arg);
    }
  }
  return args;
}

const dataDir = path.resolve(config.DATA_DIR);
const dataFile = path.resolve(config.DATA_FILE);
const outputDir = path.resolve(config.OUTPUT_DIR);
const markers = { catalog: config.CATALOG_FILE_MARKER, marketplace: config.MARKETPLACE_FILE_MARKER };

async function runExtraction(log: Logger): Promise<CollectionSnapshot> {
  const snapshot = await extractCollection({ dataDir, markers });
  await writeSnapshot(dataFile, snapshot);
  log.info({ dataFile }, 'Snapshot saved');
  return snapshot;
}

/**
 * Ctrl+C during the lookup stops it; reports are then written without the
 * images that had not resolved yet.
 */
async function lookupImages(cards: Iterable<Pick<UnifiedCardRecord, 'cardId'>>, urlTemplate: string): Promise<Map<string, string>> {
  const controller = new AbortController();
  const cancel = (): void => controller.abort();
  process.once('SIGINT', cancel);
  try {
    return await resolveCardImages(cards, {
      urlTemplate,
      timeoutMs: config.IMAGE_LOOKUP_TIMEOUT_MS,
      concurrency: config.IMAGE_LOOKUP_CONCURRENCY,
      deadlineMs: config.IMAGE_LOOKUP_DEADLINE_MS,
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', cancel);
  }
}

async function generateReports(
  snapshot: CollectionSnapshot,
  plan: RegenerationPlan,
  log: Logger,
): Promise<void> {
  const { cards, stats } = reconcileRecords({
    catalogCards: snapshot.catalogCards,
    marketplaceCards: snapshot.marketplaceCards,
    setMapping: snapshot.setMapping,
  });
  if (stats.collisions > 0) {
    log.warn({ collisions: stats.collisions, placeholderCollisions: stats.placeholderCollisions }, 'Identity collisions during reconciliation');
  }

  const images = config.IMAGE_LOOKUP_URL ? await lookupImages(cards.values(), config.IMAGE_LOOKUP_URL) : undefined;

  const result = await writeReports({ cards, outputDir, plan, images });
  log.info({ files: result.written.length, unchangedSets: result.skippedSets.length }, 'Reports generated');
}

async function run(args: CliArgs, command: RunContext['command'], log: Logger): Promise<void> {
  if (command === 'info') {
    console.log(`\n${await describeCollection(dataFile)}\n`);
    return;
  }

  if (command === 'reports') {
    const snapshot = await readSnapshot(dataFile);
    const plan = await setsNeedingRegeneration(snapshot, dataDir, markers.catalog);
    await generateReports(snapshot, plan, log);
    return;
  }

  const check = args.extract
    ? { needed: true, reason: 'forced' }
    : await needsReextraction(dataFile, dataDir);
  log.info({ reason: check.reason }, check.needed ? 'Extracting collection data' : 'Extraction not needed');

  if (check.needed) {
    const snapshot = await runExtraction(log);
    await generateReports(snapshot, { regenerateAll: true, sets: new Set() }, log);
    return;
  }

  const snapshot = await readSnapshot(dataFile);
  const plan = await setsNeedingRegeneration(snapshot, dataDir, markers.catalog);
  await generateReports(snapshot, plan, log);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP);
    return;
  }
  if (args.unknown.length > 0) {
    console.error(`Unknown option: ${args.unknown.join(' ')}\n\n${HELP}`);
    process.exitCode = 1;
    return;
  }

  const command: RunContext['command'] = args.info ? 'info' : args.reportsOnly ? 'reports' : 'extract';
  const context = createRunContext(command);
  const log = createLogger('cli').child({ ...context });

  try {
    await run(args, command, log);
  } catch (error) {
    if (isFatalInputError(error)) {
      log.error({ code: error.code, context: error.context }, error.message);
    } else {
      log.error({ err: error }, `Run failed: ${getErrorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}

void main();
