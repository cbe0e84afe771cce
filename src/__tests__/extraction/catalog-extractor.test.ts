import { describe, it, expect } from 'vitest';
import { extractCatalogCards } from '../../services/extraction/catalog-extractor.js';

const IND = 'card-collection-card-indicator';

function entry(options: {
  cardId?: string;
  name: string;
  title: string;
  indicators?: string[];
  code?: string;
}): string {
  const indicators = (options.indicators ?? []).map((cls) => `<span class="${IND} ${cls}"></span>`).join('');
  const attrs = options.cardId ? ` data-card-id="${options.cardId}"` : '';
  return `
    <div class="card-list-item"${attrs}>
      <a class="card-list-item-entry-text" title="${options.title}">${options.name}</a>
      ${options.code ? `<span class="card-list-item-expansion-code">${options.code}</span>` : ''}
      <div class="card-collection-card-controls-indicators">${indicators}</div>
    </div>`;
}

const SV151_PAGE = `<!DOCTYPE html>
<html>
<head><title>Scarlet &amp; Violet 151 card list (International TCG) – TCG Collector</title></head>
<body>
  <h1>
    <span id="card-search-result-title-set-like-name">Scarlet &amp; Violet 151</span>
    <span id="card-search-result-title-set-code">MEW</span>
  </h1>
  ${entry({
    cardId: '101',
    name: 'Bulbasaur',
    title: 'Bulbasaur (Scarlet &amp; Violet 151 001/165)',
    indicators: [`${IND}-standard-set ${IND}-with-dot active`, `${IND}-parallel-set`],
  })}
  ${entry({
    cardId: '150',
    name: 'Mew ex',
    title: 'Mew ex (Scarlet &amp; Violet 151 151/165)',
    indicators: [`${IND}-standard-set ${IND}-with-dot`],
  })}
  ${entry({
    cardId: '205',
    name: 'Mew ex',
    title: 'Mew ex (Scarlet &amp; Violet 151 205/165)',
  })}
  ${entry({ cardId: '999', name: '  ', title: 'Nothing (Scarlet &amp; Violet 151 999/165)' })}
</body>
</html>`;

describe('extractCatalogCards', () => {
  const records = extractCatalogCards(SV151_PAGE);

  it('expands each entry into its existing variants', () => {
    expect(records.map((r) => `${r.name}|${r.number}|${r.variantType}|${r.hasCard}`)).toEqual([
      'Bulbasaur|001|Normal|true',
      'Bulbasaur|001|Reverse Holo|false',
      'Mew ex|151|Normal|false',
      'Mew ex|205|Normal|false',
    ]);
  });

  it('fills identity and context fields from the page header and entry', () => {
    expect(records[0]).toEqual({
      name: 'Bulbasaur',
      source: 'catalog',
      setName: 'Scarlet & Violet 151',
      setCode: 'MEW',
      number: '001',
      totalCount: '165',
      variantType: 'Normal',
      hasCard: true,
      cardId: '101',
    });
  });

  it('emits a single unowned Normal record for an entry without indicators', () => {
    const secret = records.filter((r) => r.number === '205');
    expect(secret).toHaveLength(1);
    expect(secret[0].variantType).toBe('Normal');
    expect(secret[0].hasCard).toBe(false);
    expect(secret[0].cardId).toBe('205');
  });

  it('skips entries with an empty name', () => {
    expect(records.some((r) => r.number === '999')).toBe(false);
  });

  it('falls back to the page title and per-entry expansion codes', () => {
    const html = `<html>
      <head><title>Paldea Evolved card list (International TCG) – TCG Collector</title></head>
      <body>
        ${entry({
          cardId: '13',
          name: 'Sprigatito',
          title: 'Sprigatito (Paldea Evolved 013/193)',
          code: 'PAL',
          indicators: [`${IND}-standard-set active`],
        })}
      </body></html>`;

    expect(extractCatalogCards(html)).toEqual([
      {
        name: 'Sprigatito',
        source: 'catalog',
        setName: 'Paldea Evolved',
        setCode: 'PAL',
        number: '013',
        totalCount: '193',
        variantType: 'Normal',
        hasCard: true,
        cardId: '13',
      },
    ]);
  });

  it('finds the card element by title when the entry has no container id', () => {
    const html = `<html><body>
      <span id="card-search-result-title-set-like-name">Obsidian Flames</span>
      <span id="card-search-result-title-set-code">OBF</span>
      <div class="card-list-item">
        <a class="card-list-item-entry-text" title="Charmander (Obsidian Flames 026/197)">Charmander</a>
      </div>
      <div data-card-id="c-26" title="Charmander 026/197">
        <div class="card-collection-card-controls-indicators">
          <span class="${IND} ${IND}-standard-set ${IND}-with-dot"></span>
          <span class="${IND} ${IND}-parallel-set active"></span>
        </div>
      </div>
    </body></html>`;

    const result = extractCatalogCards(html);
    expect(result.map((r) => [r.variantType, r.hasCard, r.cardId])).toEqual([
      ['Normal', false, 'c-26'],
      ['Reverse Holo', true, 'c-26'],
    ]);
  });

  it('uses the most common expansion code when the header has none', () => {
    const html = `<html><body>
      <span id="card-search-result-title-set-like-name">Promos</span>
      <a class="card-list-item-entry-text" title="Pikachu (Promos 027)">Pikachu</a>
      <span class="card-list-item-expansion-code">SVP</span>
      <span class="card-list-item-expansion-code">SVP</span>
      <span class="card-list-item-expansion-code">SVE</span>
    </body></html>`;

    const [record] = extractCatalogCards(html);
    expect(record.setCode).toBe('SVP');
    expect(record.number).toBe('027');
    expect(record.totalCount).toBeUndefined();
  });

  it('returns nothing for a page without entries', () => {
    expect(extractCatalogCards('<html><body><p>Empty</p></body></html>')).toEqual([]);
  });
});
