import type { Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import type { RawCardRecord } from '../../types/cards.js';
import { createLogger } from '../logger/index.js';
import { cleanText, loadHtml } from './html.js';
import type { CheerioAPI } from './html.js';
import { extractTitleNumber } from './number-extractor.js';
import { extractCatalogSetInfo, mostCommonExpansionCode } from './set-info.js';
import type { CatalogSetInfo } from './set-info.js';
import {
  evaluateIndicators,
  parseIndicatorClasses,
  selectExistingVariants,
} from './variant-detector.js';
import type { VariantIndicator } from './variant-detector.js';

const log = createLogger('catalog-extractor');

const ENTRY_SELECTOR = 'a.card-list-item-entry-text';
const INDICATOR_SELECTOR =
  '.card-collection-card-controls-indicators .card-collection-card-indicator';

interface EntryContext {
  cardId: string | null;
  indicators: VariantIndicator[];
}

/**
 * Extract every card entry of a saved catalog "card list" page.
 *
 * Each entry expands into one record per variant that exists for the card in this
 * set (Normal and/or Reverse Holo). Entries without a usable name are skipped.
 */
export function extractCatalogCards(html: string): RawCardRecord[] {
  const $ = loadHtml(html);
  const setInfo = extractCatalogSetInfo($);
  const pageCode = setInfo.setCode ? null : mostCommonExpansionCode($);

  const records: RawCardRecord[] = [];
  let skipped = 0;

  $(ENTRY_SELECTOR).each((_, el) => {
    const entry = extractEntry($, $(el), setInfo, pageCode);
    if (entry.length === 0) {
      skipped++;
      return;
    }
    records.push(...entry);
  });

  log.debug(
    { setName: setInfo.setName, setCode: setInfo.setCode, records: records.length, skipped },
    'Catalog page extracted',
  );
  return records;
}

function extractEntry(
  $: CheerioAPI,
  anchor: Cheerio<Element>,
  setInfo: CatalogSetInfo,
  pageCode: string | null,
): RawCardRecord[] {
  const name = cleanText(anchor.text());
  if (!name) return [];

  const title = anchor.attr('title') ?? '';
  const titleNumber = extractTitleNumber(title);

  const base: RawCardRecord = {
    name,
    source: 'catalog',
    setName: setInfo.setName ?? titleNumber?.setName ?? 'Unknown Set',
    variantType: 'Normal',
    hasCard: false,
  };

  if (titleNumber) {
    base.number = titleNumber.number;
    if (titleNumber.totalCount) base.totalCount = titleNumber.totalCount;
  }

  const setCode = setInfo.setCode ?? entryExpansionCode(anchor) ?? pageCode;
  if (setCode) base.setCode = setCode;

  const context = readEntryContext($, anchor, name, base.number);
  if (context.cardId) base.cardId = context.cardId;

  const variants = selectExistingVariants(evaluateIndicators(context.indicators));

  return variants.map((variant) => ({
    ...base,
    variantType: variant.variantType,
    hasCard: variant.owned,
  }));
}

function entryExpansionCode(anchor: Cheerio<Element>): string | null {
  const code = cleanText(
    anchor.closest('.card-list-item').find('.card-list-item-expansion-code').first().text(),
  );
  return code || null;
}

/**
 * Locate the element carrying this entry's data-card-id and read its indicators.
 * Prefer the entry's own container; otherwise look for a card element whose title
 * names this card.
 */
function readEntryContext(
  $: CheerioAPI,
  anchor: Cheerio<Element>,
  name: string,
  number: string | undefined,
): EntryContext {
  const container = anchor.closest('[data-card-id]');
  if (container.length > 0) {
    return {
      cardId: container.attr('data-card-id') ?? null,
      indicators: readIndicators($, container),
    };
  }

  const match = $('[data-card-id][title]')
    .filter((_, el) => {
      const candidateTitle = $(el).attr('title') ?? '';
      return candidateTitle.includes(name) && (!number || candidateTitle.includes(number));
    })
    .first();

  if (match.length === 0) {
    return { cardId: null, indicators: [] };
  }
  return {
    cardId: match.attr('data-card-id') ?? null,
    indicators: readIndicators($, match),
  };
}

function readIndicators<T extends AnyNode>($: CheerioAPI, element: Cheerio<T>): VariantIndicator[] {
  const indicators: VariantIndicator[] = [];
  element.find(INDICATOR_SELECTOR).each((_, el) => {
    const indicator = parseIndicatorClasses($(el).attr('class') ?? '');
    if (indicator) indicators.push(indicator);
  });
  return indicators;
}
