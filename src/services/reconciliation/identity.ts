import type { IdentityKey, NormalizedCardRecord, RawCardRecord } from '../../types/cards.js';
import { padCardNumber } from '../extraction/number-extractor.js';
import { resolveSetName } from './set-mapping.js';
import type { SetMapping } from './set-mapping.js';

/** Label used for a missing set code. */
export const UNKNOWN_SET_CODE = 'UNK';
/** Label used for a missing card number. */
export const UNKNOWN_NUMBER = 'XXX';

function present(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Canonical identity of a record: set code verbatim, number zero-padded,
 * variant verbatim. Missing fields stay null rather than becoming sentinels.
 */
export function deriveIdentityKey(record: Pick<RawCardRecord, 'setCode' | 'number' | 'variantType'>): IdentityKey {
  const number = present(record.number);
  return {
    setCode: present(record.setCode),
    number: number === null ? null : padCardNumber(number),
    variantType: record.variantType,
  };
}

/**
 * Map key for an identity. A missing field and a literal "UNK"/"XXX" value encode
 * differently, so only records that are missing the same field collide.
 */
export function identityKeyId(key: IdentityKey): string {
  return JSON.stringify([key.setCode, key.number, key.variantType]);
}

/**
 * Human-readable label, e.g. "MEW_001_Normal" or "UNK_XXX_Reverse Holo".
 */
export function formatIdentityKey(key: IdentityKey): string {
  return `${key.setCode ?? UNKNOWN_SET_CODE}_${key.number ?? UNKNOWN_NUMBER}_${key.variantType}`;
}

export function hasAbsentField(key: IdentityKey): boolean {
  return key.setCode === null || key.number === null;
}

/**
 * Attach the identity key and replace the set name with the canonical one when
 * the set code is known to the catalog.
 */
export function normalizeRecord(record: RawCardRecord, setMapping: SetMapping): NormalizedCardRecord {
  return {
    ...record,
    setName: resolveSetName(record, setMapping),
    key: deriveIdentityKey(record),
  };
}

export function normalizeRecords(records: readonly RawCardRecord[], setMapping: SetMapping): NormalizedCardRecord[] {
  return records.map((record) => normalizeRecord(record, setMapping));
}
