import { describe, it, expect } from 'vitest';
import { extractMarketplaceCards } from '../../services/extraction/marketplace-extractor.js';
import { extractCards } from '../../services/extraction/index.js';

const ORDER_PAGE = `<html><body>
  <table>
    <tr><th>Product</th><th>Info</th></tr>
    <tr>
      <td class="info"><a href="/product/1">Mew ex (MEW 151)</a></td>
      <td><span class="badge">Reverse Holo</span></td>
    </tr>
    <tr>
      <td class="name-cell"><a href="/product/2">Pikachu (SVP 27)</a></td>
      <td><span title="Holo">H</span></td>
    </tr>
    <tr>
      <td class="info"><a href="/product/3">Bulbasaur (MEW 1)</a></td>
      <td>NM</td>
    </tr>
    <tr><td class="info"><a href="/shipping">Shipping costs</a></td></tr>
    <tr><td>Order total</td></tr>
  </table>
</body></html>`;

describe('extractMarketplaceCards', () => {
  const records = extractMarketplaceCards(ORDER_PAGE);

  it('extracts one record per order row with a product label', () => {
    expect(records).toEqual([
      {
        name: 'Mew ex',
        source: 'marketplace',
        setName: 'Unknown Set (MEW)',
        setCode: 'MEW',
        number: '151',
        variantType: 'Reverse Holo',
        hasCard: false,
      },
      {
        name: 'Pikachu',
        source: 'marketplace',
        setName: 'Unknown Set (SVP)',
        setCode: 'SVP',
        number: '027',
        variantType: 'Holo',
        hasCard: false,
      },
      {
        name: 'Bulbasaur',
        source: 'marketplace',
        setName: 'Unknown Set (MEW)',
        setCode: 'MEW',
        number: '001',
        variantType: 'Normal',
        hasCard: false,
      },
    ]);
  });

  it('detects a Reverse Holo label written with a non-breaking space', () => {
    const html = `<table><tr>
      <td class="info"><a>Mew ex (MEW 151)</a></td>
      <td><span class="badge">Reverse&nbsp;Holo</span></td>
    </tr></table>`;
    expect(extractMarketplaceCards(html).map((card) => card.variantType)).toEqual(['Reverse Holo']);
  });

  it('returns nothing for a page without order rows', () => {
    expect(extractMarketplaceCards('<html><body></body></html>')).toEqual([]);
  });

  it('is reachable through the source dispatcher', () => {
    expect(extractCards('marketplace', ORDER_PAGE)).toHaveLength(3);
  });
});
