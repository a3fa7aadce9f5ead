import type { Config } from '../config.js';
import type { BuildOptions } from './builder.js';

/** Build options from the environment; positional CLI paths win over config. */
export function buildOptionsFromConfig(
  cfg: Config,
  overrides: { workbookPath?: string; outputDir?: string } = {},
): BuildOptions {
  return {
    workbookPath: overrides.workbookPath ?? cfg.WORKBOOK_PATH,
    outputDir: overrides.outputDir ?? cfg.OUTPUT_DIR,
    siteName: cfg.SITE_NAME,
    feed: cfg.HOMEPAGE_FEED,
    feedLimit: cfg.FEED_LIMIT,
    seasonStartYear: cfg.SEASON_START_YEAR,
  };
}
