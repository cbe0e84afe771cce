export interface TitleNumber {
  /** Set name as printed in the entry title, e.g. "Scarlet & Violet 151". */
  setName: string;
  number: string;
  totalCount: string | null;
}

export interface MarketplaceLabel {
  name: string;
  setCode: string;
  number: string;
}

// "Bulbasaur (Scarlet & Violet 151 001/165)" or "Basic Grass Energy (Scarlet & Violet Energies 001)"
const TITLE_NUMBER_REGEX = /\(([^)]+)\s+(\d+)(?:\/(\d+))?\)/;

// "Mew ex (MEW 151)"
const MARKETPLACE_LABEL_REGEX = /^(.*?)\s*\(([A-Z][A-Z0-9]*)\s+(\d+)\)$/;

/**
 * Pull the set name, card number and standard-set size out of a catalog entry title.
 */
export function extractTitleNumber(title: string): TitleNumber | null {
  const match = title.match(TITLE_NUMBER_REGEX);
  if (!match) return null;

  return {
    setName: match[1].trim(),
    number: match[2],
    totalCount: match[3] ?? null,
  };
}

/**
 * Parse a marketplace product label of the form "Name (SET 123)".
 */
export function parseMarketplaceLabel(label: string): MarketplaceLabel | null {
  const match = label.trim().match(MARKETPLACE_LABEL_REGEX);
  if (!match) return null;

  const name = match[1].trim();
  if (!name) return null;

  return { name, setCode: match[2], number: padCardNumber(match[3]) };
}

/**
 * Zero-pad purely numeric card numbers to at least three digits ("7" → "007"),
 * leave alphanumeric numbers (e.g. "TG15") as-is.
 */
export function padCardNumber(num: string): string {
  const trimmed = num.trim();
  if (/^\d+$/.test(trimmed)) {
    return trimmed.padStart(3, '0');
  }
  return trimmed;
}
