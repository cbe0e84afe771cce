import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { writeReports } from '../../services/reports/report-writer.js';
import { summarizeCollection } from '../../services/metrics/collection-summary.js';
import { renderSetPage } from '../../services/reports/set-page.js';
import { reconcileRecords } from '../../services/reconciliation/reconciler.js';
import type { RawCardRecord } from '../../types/cards.js';

function record(name: string, setName: string, setCode: string, number: string, hasCard: boolean, cardId?: string): RawCardRecord {
  const card: RawCardRecord = { name, source: 'catalog', setName, setCode, number, totalCount: '165', variantType: 'Normal', hasCard };
  if (cardId) card.cardId = cardId;
  return card;
}

const { cards } = reconcileRecords({
  catalogCards: [
    record('Bulbasaur', 'Scarlet & Violet 151', 'MEW', '001', true, '101'),
    record('Mew ex', 'Scarlet & Violet 151', 'MEW', '205', false),
    record('Sprigatito', 'Paldea Evolved', 'PAL', '013', false),
  ],
  marketplaceCards: [
    { name: 'Bulbasaur', source: 'marketplace', setName: 'Unknown Set (MEW)', setCode: 'MEW', number: '001', variantType: 'Normal', hasCard: false },
    { name: '<Mystery>', source: 'marketplace', setName: 'Unknown Set (ABC)', setCode: 'ABC', number: '010', variantType: 'Holo', hasCard: false },
  ],
});

const now = new Date('2024-05-01T09:30:00Z');
let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(path.join(os.tmpdir(), 'reports-'));
});

afterEach(async () => {
  await rm(outputDir, { recursive: true, force: true });
});

describe('writeReports', () => {
  it('writes the overview, one page per set and the want lists', async () => {
    const result = await writeReports({ cards, outputDir, now });

    expect((await readdir(outputDir)).sort()).toEqual([
      'Paldea_Evolved.html',
      'Scarlet_and_Violet_151.html',
      'Unknown_Set_(ABC).html',
      'index.html',
      'want_list_cardmarket.txt',
      'want_list_decklist.txt',
      'want_list_simple.txt',
    ]);
    expect(result.written).toHaveLength(7);
    expect(result.skippedSets).toEqual([]);
  });

  it('links every set page from the overview', async () => {
    await writeReports({ cards, outputDir, now });
    const index = await readFile(path.join(outputDir, 'index.html'), 'utf8');
    expect(index).toContain('<a href="Scarlet_and_Violet_151.html" class="set-link">');
    expect(index).toContain('<a href="Unknown_Set_(ABC).html" class="set-link">');
    expect(index).toContain('<div class="set-title">Scarlet &amp; Violet 151</div>');
  });

  it('skips unchanged set pages that already exist', async () => {
    await writeFile(path.join(outputDir, 'Paldea_Evolved.html'), 'previous', 'utf8');

    const result = await writeReports({
      cards,
      outputDir,
      now,
      plan: { regenerateAll: false, sets: new Set(['Scarlet & Violet 151']) },
    });

    expect(result.skippedSets).toEqual(['Paldea Evolved']);
    expect(await readFile(path.join(outputDir, 'Paldea_Evolved.html'), 'utf8')).toBe('previous');
    expect(result.written.map((file) => path.basename(file))).toContain('Unknown_Set_(ABC).html');
  });

  it('writes the want lists with the generation time', async () => {
    await writeReports({ cards, outputDir, now });
    const simple = await readFile(path.join(outputDir, 'want_list_simple.txt'), 'utf8');
    expect(simple.split('\n').slice(0, 6)).toEqual([
      '# Card Want List (Simple Format)',
      '# Generated on 2024-05-01 09:30:00',
      '',
      '## Paldea Evolved',
      '013 Sprigatito',
      '',
    ]);
  });
});

describe('renderSetPage', () => {
  const summary = summarizeCollection(cards.values());
  const sv151 = summary.sets.find((set) => set.setName === 'Scarlet & Violet 151');

  it('shows status labels and the standard/secret split', () => {
    expect(sv151).toBeDefined();
    if (!sv151) return;
    const html = renderSetPage(sv151);
    expect(html).toContain('<td>Have + Pending Purchase (Duplicate!)</td>');
    expect(html).toContain('<td>Need</td>');
    expect(html).toContain('Completion (standard set: 1–165)');
    expect(html).toMatch(/<td>Secret cards<\/td>\s*<td>1<\/td>\s*<td>0<\/td>\s*<td>0<\/td>\s*<td>0\.0%<\/td>/);
  });

  it('links a preview only for cards with a resolved image', () => {
    if (!sv151) return;
    const html = renderSetPage(sv151, new Map([['101', 'https://images.example.test/cards/101.jpg']]));
    expect(html.match(/camera-icon/g)).toHaveLength(1);
    expect(html).toContain('href="https://images.example.test/cards/101.jpg"');
  });

  it('escapes card names', () => {
    const unknown = summary.sets.find((set) => set.setCode === 'ABC');
    if (!unknown) return;
    expect(renderSetPage(unknown)).toContain('<td>&lt;Mystery&gt;</td>');
  });
});
