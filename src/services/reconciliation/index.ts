export { reconcile, reconcileRecords } from './reconciler.js';
export type {
  ReconciliationInput,
  ReconciliationResult,
  ReconciliationStats,
  UnifiedCollection,
} from './reconciler.js';
export {
  deriveIdentityKey,
  formatIdentityKey,
  hasAbsentField,
  identityKeyId,
  normalizeRecord,
  normalizeRecords,
  UNKNOWN_NUMBER,
  UNKNOWN_SET_CODE,
} from './identity.js';
export {
  buildSetMapping,
  resolveSetName,
  setMappingFromObject,
  setMappingToObject,
} from './set-mapping.js';
export type { SetMapping } from './set-mapping.js';
export { deriveStatus, STATUS_LABELS } from './status.js';
