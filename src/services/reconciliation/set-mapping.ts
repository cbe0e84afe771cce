import type { RawCardRecord } from '../../types/cards.js';

export type SetMapping = ReadonlyMap<string, string>;

/**
 * set code → canonical set name, from every catalog record that carries both.
 * A later record wins when a code maps to more than one name.
 */
export function buildSetMapping(catalogRecords: readonly RawCardRecord[]): SetMapping {
  const mapping = new Map<string, string>();
  for (const record of catalogRecords) {
    if (record.setCode && record.setName) {
      mapping.set(record.setCode, record.setName);
    }
  }
  return mapping;
}

export function setMappingFromObject(entries: Record<string, string>): SetMapping {
  return new Map(Object.entries(entries));
}

export function setMappingToObject(mapping: SetMapping): Record<string, string> {
  return Object.fromEntries(mapping);
}

/**
 * Mapped canonical name, or the record's own (possibly "Unknown Set (...)") name.
 */
export function resolveSetName(record: Pick<RawCardRecord, 'setCode' | 'setName'>, mapping: SetMapping): string {
  if (record.setCode) {
    const mapped = mapping.get(record.setCode);
    if (mapped !== undefined) return mapped;
  }
  return record.setName;
}
