export { readSnapshot, readSnapshotIfPresent, writeSnapshot } from './snapshot-store.js';
export {
  StoredSnapshotSchema,
  StoredCardSchema,
  toStoredSnapshot,
  fromStoredSnapshot,
  toStoredCard,
  fromStoredCard,
} from './schema.js';
export type { CollectionSnapshot, SnapshotStats, SourceFileInfo, StoredSnapshot, StoredCard } from './schema.js';
export { listHtmlFiles, classifySourceFiles, statSourceFiles } from './source-files.js';
export type { ClassifiedSourceFiles, SourceFileMarkers } from './source-files.js';
export { needsReextraction, setsNeedingRegeneration, setNameFromFileName } from './change-detector.js';
export type { ExtractionCheck, ExtractionReason, RegenerationPlan } from './change-detector.js';
