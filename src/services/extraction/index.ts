import type { CardSource, RawCardRecord } from '../../types/cards.js';
import { extractCatalogCards } from './catalog-extractor.js';
import { extractMarketplaceCards } from './marketplace-extractor.js';

/**
 * Extract raw card records from one saved page of a known source type.
 */
export function extractCards(source: CardSource, html: string): RawCardRecord[] {
  return source === 'catalog' ? extractCatalogCards(html) : extractMarketplaceCards(html);
}

export { extractCatalogCards } from './catalog-extractor.js';
export { extractMarketplaceCards, unknownSetName } from './marketplace-extractor.js';
export { extractCatalogSetInfo, mostCommonExpansionCode } from './set-info.js';
export type { CatalogSetInfo } from './set-info.js';
export { extractTitleNumber, parseMarketplaceLabel, padCardNumber } from './number-extractor.js';
export type { TitleNumber, MarketplaceLabel } from './number-extractor.js';
export {
  parseIndicatorClasses,
  evaluateIndicators,
  selectExistingVariants,
  detectMarketplaceVariant,
} from './variant-detector.js';
export type { IndicatorKind, VariantIndicator, VariantSignal } from './variant-detector.js';
