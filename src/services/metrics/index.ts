export {
  computeSetCompletion,
  completionPercent,
  pendingPercent,
  resolveBoundary,
  cardNumberValue,
} from './completion.js';
export type { CompletionCounter, SetCompletion } from './completion.js';
export { groupBySet, summarizeCollection, selectWantList } from './collection-summary.js';
export type { CollectionSummary, SetSummary } from './collection-summary.js';
