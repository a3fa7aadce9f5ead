import fs from 'node:fs/promises';
import path from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { buildCorpus } from '../../src/pipeline/corpus.js';
import { buildSite, renderSite, type BuildOptions } from '../../src/site/builder.js';
import type { SheetGrid } from '../../src/types/workbook.js';
import { WorkbookReadError } from '../../src/workbook/errors.js';
import { loadSheetFixture } from '../helpers/fixture-loader.js';
import { makeTempDir, writeWorkbook } from '../helpers/workbook.js';

const renderOptions = {
  siteName: 'Offseason Tracker',
  feed: false,
  feedLimit: 25,
  seasonStartYear: 2025,
};

describe('renderSite', () => {
  const corpus = buildCorpus(
    new Map<string, SheetGrid>([
      ['NYY', loadSheetFixture('nyy')],
      ['BOS', loadSheetFixture('bos')],
    ]),
  );
  const assets = { stylesheet: 'body {}', searchClient: '// search' };

  it('should emit assets, homepage, then one page per team sheet', () => {
    const files = renderSite(corpus, assets, renderOptions);
    expect(files.map((f) => f.path)).toEqual(['styles.css', 'search.js', 'index.html', 'nyy.html', 'bos.html']);
  });

  it('should pass the stylesheet through unchanged', () => {
    const files = renderSite(corpus, assets, renderOptions);
    expect(files[0]?.contents).toBe('body {}');
  });

  it('should put every transaction in the search data', () => {
    const search = renderSite(corpus, assets, renderOptions).find((f) => f.path === 'search.js');
    const json = search?.contents.split('\n')[0]?.replace(/^const searchData = /, '').replace(/;$/, '') ?? '';
    const records: unknown = JSON.parse(json);
    expect(Array.isArray(records) && records.length).toBe(17);
  });
});

describe('buildSite', () => {
  let dir: string;
  let options: BuildOptions;

  beforeAll(async () => {
    dir = await makeTempDir();
    const workbookPath = path.join(dir, 'offseason.xlsx');
    await writeWorkbook(workbookPath, [
      ['Summary', [[], ['Total'], ['17']]],
      ['NYY', loadSheetFixture('nyy')],
      ['Indy Ball', loadSheetFixture('nyy')],
      ['BOS', loadSheetFixture('bos')],
    ]);
    options = { ...renderOptions, workbookPath, outputDir: path.join(dir, 'docs') };
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write the site and report what it built', async () => {
    const summary = await buildSite(options);

    expect(summary).toEqual({
      transactionCount: 17,
      teamCount: 2,
      files: ['styles.css', 'search.js', 'index.html', 'nyy.html', 'bos.html'],
    });
    const written = (await fs.readdir(options.outputDir)).sort();
    expect(written).toEqual(['bos.html', 'index.html', 'nyy.html', 'search.js', 'styles.css']);
  });

  it('should produce byte-identical output on a second run', async () => {
    const first = { ...options, outputDir: path.join(dir, 'run-1') };
    const second = { ...options, outputDir: path.join(dir, 'run-2') };
    await buildSite(first);
    await buildSite(second);

    for (const file of ['styles.css', 'search.js', 'index.html', 'nyy.html', 'bos.html']) {
      const a = await fs.readFile(path.join(first.outputDir, file), 'utf-8');
      const b = await fs.readFile(path.join(second.outputDir, file), 'utf-8');
      expect(b).toBe(a);
    }
  });

  it('should fail without writing anything when the workbook is missing', async () => {
    const outputDir = path.join(dir, 'never');
    await expect(
      buildSite({ ...options, workbookPath: path.join(dir, 'missing.xlsx'), outputDir }),
    ).rejects.toBeInstanceOf(WorkbookReadError);
    await expect(fs.access(outputDir)).rejects.toThrow();
  });
});
