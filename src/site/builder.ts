import fs from 'node:fs/promises';
import path from 'node:path';
import { teamPagePath } from '../catalog/teams.js';
import { buildCorpus } from '../pipeline/corpus.js';
import { unsectionedCategories } from '../render/fragments.js';
import { loadSiteAssets, renderSearchScript } from '../render/assets.js';
import {
  renderHomepage,
  renderTeamPage,
  SEARCH_SCRIPT_PATH,
  STYLESHEET_PATH,
} from '../render/pages.js';
import type { Corpus } from '../types/transaction.js';
import type { RenderOptions, SiteAssets, SiteFile } from '../types/site.js';
import { readWorkbook } from '../workbook/reader.js';
import { logger } from '../utils/logger.js';

export interface BuildOptions extends RenderOptions {
  workbookPath: string;
  outputDir: string;
  /** Directory holding styles.css and search-client.js */
  assetsDir?: string;
}

export interface BuildSummary {
  transactionCount: number;
  teamCount: number;
  files: string[];
}

/** Every output file for a corpus, in write order. */
export function renderSite(corpus: Corpus, assets: SiteAssets, options: RenderOptions): SiteFile[] {
  const files: SiteFile[] = [
    { path: STYLESHEET_PATH, contents: assets.stylesheet },
    { path: SEARCH_SCRIPT_PATH, contents: renderSearchScript(corpus.transactions, assets.searchClient) },
    { path: 'index.html', contents: renderHomepage(corpus, options) },
  ];

  for (const [code, buckets] of corpus.teams) {
    const hidden = unsectionedCategories(buckets);
    if (hidden.length > 0) {
      logger.debug({ team: code, categories: hidden }, 'Categories without a section are not shown');
    }
    files.push({ path: teamPagePath(code), contents: renderTeamPage(code, buckets, options) });
  }

  return files;
}

/** Read the workbook, render the site and write it to `outputDir`. */
export async function buildSite(options: BuildOptions): Promise<BuildSummary> {
  const grids = await readWorkbook(options.workbookPath);
  const corpus = buildCorpus(grids, options.seasonStartYear);
  logger.info(
    { transactions: corpus.transactions.length, teams: corpus.teams.size },
    'Corpus built',
  );

  const assets = await loadSiteAssets(options.assetsDir);
  const files = renderSite(corpus, assets, options);

  await fs.mkdir(options.outputDir, { recursive: true });
  for (const file of files) {
    await fs.writeFile(path.join(options.outputDir, file.path), file.contents, 'utf-8');
    logger.debug({ file: file.path }, 'Wrote file');
  }

  logger.info({ outputDir: options.outputDir, files: files.length }, 'Site build complete');
  return {
    transactionCount: corpus.transactions.length,
    teamCount: corpus.teams.size,
    files: files.map((f) => f.path),
  };
}
