#!/usr/bin/env node
import { config } from './config.js';
import { buildSite } from './site/builder.js';
import { buildOptionsFromConfig } from './site/options.js';
import { logger } from './utils/logger.js';

/**
 * Build the static site.
 * Usage: npx tsx src/index.ts [workbook.xlsx] [outputDir]
 */
async function main(): Promise<void> {
  const [workbookPath, outputDir] = process.argv.slice(2);
  const options = buildOptionsFromConfig(config, { workbookPath, outputDir });

  logger.info({ workbook: options.workbookPath }, 'Starting site build...');
  const summary = await buildSite(options);
  logger.info(
    { transactions: summary.transactionCount, teams: summary.teamCount },
    `Build complete, open ${options.outputDir}/index.html to view the site`,
  );
}

main().catch((err) => {
  logger.fatal(err, 'Site build failed');
  process.exit(1);
});
