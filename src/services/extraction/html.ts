/**
 * Thin wrapper over cheerio so extractors share one loading and text-cleaning path.
 */
import * as cheerio from 'cheerio';

export type CheerioAPI = cheerio.CheerioAPI;

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Collapse runs of whitespace (including newlines from pretty-printed markup) and trim.
 */
export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Extract cleaned text content from a CSS selector. Returns null if not found or empty.
 */
export function parseText($: CheerioAPI, selector: string): string | null {
  const text = cleanText($(selector).first().text());
  return text.length > 0 ? text : null;
}
