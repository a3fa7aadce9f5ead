/**
 * Pull the latest published workbook, then rebuild the site.
 * Usage: SHEET_URL=... npx tsx src/scripts/update.ts
 */
import { config } from '../config.js';
import { buildSite } from '../site/builder.js';
import { buildOptionsFromConfig } from '../site/options.js';
import { downloadWorkbook } from '../workbook/downloader.js';
import { logger } from '../utils/logger.js';

async function main(): Promise<void> {
  if (!config.SHEET_URL) {
    throw new Error('SHEET_URL is not set; nothing to download');
  }

  const options = buildOptionsFromConfig(config);

  logger.info('[1/2] Downloading latest workbook...');
  await downloadWorkbook(config.SHEET_URL, options.workbookPath);

  logger.info('[2/2] Building site...');
  const summary = await buildSite(options);
  logger.info({ files: summary.files.length }, 'Update complete');
}

main().catch((err) => {
  logger.fatal(err, 'Update failed');
  process.exit(1);
});
