import type { RawCardRecord } from '../../types/cards.js';
import { createLogger } from '../logger/index.js';
import { cleanText, loadHtml } from './html.js';
import { parseMarketplaceLabel } from './number-extractor.js';
import { detectMarketplaceVariant } from './variant-detector.js';

const log = createLogger('marketplace-extractor');

// Product cell: class "info" or any class starting with "name"
const PRODUCT_LINK_SELECTOR = 'td.info a, td[class^="name"] a';

export function unknownSetName(setCode: string): string {
  return `Unknown Set (${setCode})`;
}

/**
 * Extract the purchased-but-undelivered cards from a saved marketplace order page.
 * One record per order row; rows without a "Name (SET 123)" product link are skipped.
 */
export function extractMarketplaceCards(html: string): RawCardRecord[] {
  const $ = loadHtml(html);
  const records: RawCardRecord[] = [];
  let skipped = 0;

  $('tr').each((_, row) => {
    const links = $(row).find(PRODUCT_LINK_SELECTOR).toArray();
    if (links.length === 0) return;

    const label = links
      .map((link) => parseMarketplaceLabel(cleanText($(link).text())))
      .find((parsed) => parsed !== null);
    if (!label) {
      skipped++;
      return;
    }

    records.push({
      name: label.name,
      source: 'marketplace',
      setName: unknownSetName(label.setCode),
      setCode: label.setCode,
      number: label.number,
      variantType: detectMarketplaceVariant($.html(row)),
      hasCard: false,
    });
  });

  log.debug({ records: records.length, skipped }, 'Marketplace page extracted');
  return records;
}
