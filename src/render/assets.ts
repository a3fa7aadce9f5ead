import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { teamPagePath } from '../catalog/teams.js';
import type { Transaction } from '../types/transaction.js';
import type { SearchRecord, SiteAssets } from '../types/site.js';

export const ASSETS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'assets',
);

export async function loadSiteAssets(dir = ASSETS_DIR): Promise<SiteAssets> {
  const [stylesheet, searchClient] = await Promise.all([
    fs.readFile(path.join(dir, 'styles.css'), 'utf-8'),
    fs.readFile(path.join(dir, 'search-client.js'), 'utf-8'),
  ]);
  return { stylesheet, searchClient };
}

export function toSearchRecords(transactions: readonly Transaction[]): SearchRecord[] {
  return transactions.map((t) => ({
    entry: t.text,
    team: t.teamCode,
    category: t.category,
    date: t.date,
    team_page: teamPagePath(t.teamCode),
  }));
}

/** search.js: the serialized records followed by the client search code. */
export function renderSearchScript(transactions: readonly Transaction[], searchClient: string): string {
  return `const searchData = ${JSON.stringify(toSearchRecords(transactions))};

${searchClient}`;
}
