import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { SiteConfig } from './types.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');
const priority = z.string().regex(/^(?:0(?:\.\d+)?|1(?:\.0+)?)$/, 'priority must be between 0.0 and 1.0');

const seriesSlugSchema = z
  .string()
  .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'slug must be lowercase alphanumeric with dashes');

const configSchema = z.object({
  siteUrl: z.string().url().transform((url) => url.replace(/\/+$/, '')),
  dataDir: z.string().default('data'),
  outputDir: z.string().default('public'),
  series: z.array(seriesSlugSchema).min(1),
  published: isoDate,
  modified: isoDate.optional(),
  analytics: z.object({
    gtmId: z.string().regex(/^GTM-[A-Z0-9]+$/, 'gtmId must look like GTM-XXXXXXX'),
  }).optional(),
  siteVerification: z.string().min(1).optional(),
  sitemap: z.object({
    lastmod: isoDate.optional(),
    changefreq: z.enum(['always', 'hourly', 'daily', 'weekly', 'monthly', 'yearly', 'never']).default('monthly'),
    priority: z.object({
      primary: priority.default('1.0'),
      alternate: priority.default('0.9'),
    }).default({}),
  }).default({}),
});

export type SiteConfigInput = z.input<typeof configSchema>;

/**
 * Validate a raw config object. Relative `dataDir` and `outputDir` resolve
 * against `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): SiteConfig {
  const parsed = configSchema.parse(raw);
  const modified = parsed.modified ?? parsed.published;

  return {
    ...parsed,
    dataDir: path.resolve(baseDir, parsed.dataDir),
    outputDir: path.resolve(baseDir, parsed.outputDir),
    modified,
    sitemap: {
      ...parsed.sitemap,
      lastmod: parsed.sitemap.lastmod ?? modified,
    },
  };
}

export function resolveConfigPath(relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return relativePath;
  }
  return path.join(process.cwd(), relativePath);
}

export async function loadConfig(configPath: string): Promise<SiteConfig> {
  const absolutePath = resolveConfigPath(configPath);
  const data = await fs.readFile(absolutePath, 'utf-8');
  return parseConfig(JSON.parse(data), path.dirname(absolutePath));
}
