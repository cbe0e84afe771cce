import { cleanText, parseText } from './html.js';
import type { CheerioAPI } from './html.js';

export interface CatalogSetInfo {
  setName: string | null;
  setCode: string | null;
}

const PAGE_TITLE_REGEX = /^(.+?) card list \(International TCG\)/i;

/**
 * Read the set name and code from a catalog page header, falling back to the
 * page <title> for the name. The code has no fallback at page level here;
 * see mostCommonExpansionCode.
 */
export function extractCatalogSetInfo($: CheerioAPI): CatalogSetInfo {
  let setName = parseText($, '#card-search-result-title-set-like-name');
  const setCode = parseText($, '#card-search-result-title-set-code');

  if (!setName) {
    const title = parseText($, 'title');
    const match = title?.match(PAGE_TITLE_REGEX);
    if (match) {
      setName = match[1].trim();
    }
  }

  return { setName, setCode };
}

/**
 * Most frequent per-entry expansion code on the page. Ties resolve to the code
 * seen first.
 */
export function mostCommonExpansionCode($: CheerioAPI): string | null {
  const counts = new Map<string, number>();
  $('.card-list-item-expansion-code').each((_, el) => {
    const code = cleanText($(el).text());
    if (code) counts.set(code, (counts.get(code) ?? 0) + 1);
  });

  let best: string | null = null;
  let bestCount = 0;
  for (const [code, count] of counts) {
    if (count > bestCount) {
      best = code;
      bestCount = count;
    }
  }
  return best;
}
