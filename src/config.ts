import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  WORKBOOK_PATH: z.string().default('data/offseason.xlsx'),
  OUTPUT_DIR: z.string().default('docs'),
  SHEET_URL: z.preprocess((v) => (v === '' ? undefined : v), z.string().url().optional()),
  SITE_NAME: z.string().default('Offseason Tracker'),
  SEASON_START_YEAR: z.coerce.number().int().default(2025),
  HOMEPAGE_FEED: flag,
  FEED_LIMIT: z.coerce.number().int().positive().default(25),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
