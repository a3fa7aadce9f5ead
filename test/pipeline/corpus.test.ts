import { describe, it, expect } from 'vitest';
import { buildCorpus } from '../../src/pipeline/corpus.js';
import type { SheetGrid } from '../../src/types/workbook.js';
import { loadSheetFixture } from '../helpers/fixture-loader.js';

describe('buildCorpus', () => {
  const nyy = loadSheetFixture('nyy');
  const bos = loadSheetFixture('bos');
  const grids = new Map<string, SheetGrid>([
    ['NYY', nyy],
    ['Indy Ball', nyy],
    ['Summary', nyy],
    ['BOS', bos],
  ]);
  const corpus = buildCorpus(grids);

  it('should keep only known team sheets, in workbook order', () => {
    expect([...corpus.teams.keys()]).toEqual(['NYY', 'BOS']);
  });

  it('should collect every team transaction once', () => {
    expect(corpus.transactions).toHaveLength(17);
    expect(new Set(corpus.transactions).size).toBe(17);
  });

  it('should sort the flat list oldest first', () => {
    const nyyOrder = corpus.transactions.filter((t) => t.teamCode === 'NYY').map((t) => t.text);
    expect(nyyOrder).toEqual([
      'Bravo Baker*',
      '_SS India Irwin (TOR, AA)_',
      'Golf Green',
      'RF Echo Evans',
      '1B Juliet Jones',
      '~~LHRP Charlie Cole (SEA, AAA)~~',
      'C Delta Dunn (SEA)',
      'RHSP Alpha Able (LAD)',
      '2B Foxtrot Ford',
      'LF Kilo King',
      'Hotel Hill',
      'Lima Long',
    ]);
  });

  it('should put both teams re-signings ahead of dated moves', () => {
    expect(corpus.transactions.slice(0, 2).map((t) => t.raw)).toEqual(['Bravo Baker*', 'Papa Price*']);
  });

  it('should keep per-category buckets in sheet order', () => {
    const signings = corpus.teams.get('NYY')?.get('MLB Signings') ?? [];
    expect(signings.map((t) => t.date)).toEqual(['12/5', null, '2/3']);
  });

  it('should view the same transactions from both sides', () => {
    const bucketed = [...corpus.teams.values()].flatMap((b) => [...b.values()].flat());
    expect(bucketed).toHaveLength(corpus.transactions.length);
    for (const t of corpus.transactions) {
      expect(corpus.teams.get(t.teamCode)?.get(t.category)).toContain(t);
    }
  });

  it('should return an empty corpus for a workbook with no team sheets', () => {
    const empty = buildCorpus(new Map([['Indy Ball', nyy]]));
    expect(empty.transactions).toEqual([]);
    expect(empty.teams.size).toBe(0);
  });
});
