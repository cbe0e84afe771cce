import { describe, it, expect } from 'vitest';
import {
  deriveIdentityKey,
  formatIdentityKey,
  identityKeyId,
  normalizeRecord,
} from '../../services/reconciliation/identity.js';
import { buildSetMapping, resolveSetName } from '../../services/reconciliation/set-mapping.js';
import type { RawCardRecord } from '../../types/cards.js';

describe('deriveIdentityKey', () => {
  it('pads numeric card numbers and keeps the set code verbatim', () => {
    expect(deriveIdentityKey({ setCode: 'MEW', number: '1', variantType: 'Normal' })).toEqual({
      setCode: 'MEW',
      number: '001',
      variantType: 'Normal',
    });
  });

  it('gives catalog and marketplace spellings of one card the same key', () => {
    const catalog = deriveIdentityKey({ setCode: 'SVP', number: '027', variantType: 'Holo' });
    const marketplace = deriveIdentityKey({ setCode: 'SVP', number: '27', variantType: 'Holo' });
    expect(identityKeyId(catalog)).toBe(identityKeyId(marketplace));
  });

  it('keeps missing fields as null', () => {
    expect(deriveIdentityKey({ variantType: 'Reverse Holo' })).toEqual({
      setCode: null,
      number: null,
      variantType: 'Reverse Holo',
    });
    expect(deriveIdentityKey({ setCode: '  ', number: '', variantType: 'Normal' }).setCode).toBeNull();
  });

  it('does not confuse a missing code with a literal placeholder value', () => {
    const missing = deriveIdentityKey({ number: '001', variantType: 'Normal' });
    const literal = deriveIdentityKey({ setCode: 'UNK', number: '001', variantType: 'Normal' });
    expect(identityKeyId(missing)).not.toBe(identityKeyId(literal));
    expect(formatIdentityKey(missing)).toBe('UNK_001_Normal');
    expect(formatIdentityKey(literal)).toBe('UNK_001_Normal');
  });
});

describe('set mapping', () => {
  const catalog: RawCardRecord[] = [
    { name: 'Bulbasaur', source: 'catalog', setName: 'Scarlet & Violet 151', setCode: 'MEW', variantType: 'Normal', hasCard: true },
    { name: 'Sprigatito', source: 'catalog', setName: 'Paldea Evolved', setCode: 'PAL', variantType: 'Normal', hasCard: false },
    { name: 'Energy', source: 'catalog', setName: 'Energies', variantType: 'Normal', hasCard: false },
  ];

  it('maps every catalog set code to its set name', () => {
    expect(Object.fromEntries(buildSetMapping(catalog))).toEqual({
      MEW: 'Scarlet & Violet 151',
      PAL: 'Paldea Evolved',
    });
  });

  it('lets a later record win for the same code', () => {
    const mapping = buildSetMapping([...catalog, { ...catalog[0], setName: '151' }]);
    expect(mapping.get('MEW')).toBe('151');
  });

  it('resolves marketplace placeholder names through the mapping', () => {
    const mapping = buildSetMapping(catalog);
    expect(resolveSetName({ setCode: 'MEW', setName: 'Unknown Set (MEW)' }, mapping)).toBe('Scarlet & Violet 151');
    expect(resolveSetName({ setCode: 'ABC', setName: 'Unknown Set (ABC)' }, mapping)).toBe('Unknown Set (ABC)');
  });

  it('normalizeRecord attaches the key and canonical set name', () => {
    const record: RawCardRecord = {
      name: 'Mew ex',
      source: 'marketplace',
      setName: 'Unknown Set (MEW)',
      setCode: 'MEW',
      number: '151',
      variantType: 'Normal',
      hasCard: false,
    };
    expect(normalizeRecord(record, buildSetMapping(catalog))).toEqual({
      ...record,
      setName: 'Scarlet & Violet 151',
      key: { setCode: 'MEW', number: '151', variantType: 'Normal' },
    });
  });
});
