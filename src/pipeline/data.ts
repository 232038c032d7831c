import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { SeriesDocument, SeriesGuide, SiteConfig } from './types.js';
import { pathExists } from './utils.js';
import { log } from '../utils/logger.js';

export class DataFileNotFoundError extends Error {
  readonly path: string;

  constructor(filePath: string) {
    super(`Data file not found: ${filePath}`);
    this.name = 'DataFileNotFoundError';
    this.path = filePath;
  }
}

const scalar = z.union([z.string(), z.number()]);

// `type` and `verdict` stay free strings: unknown values degrade at render time.
const timelineEntrySchema = z.object({
  num: scalar,
  title: z.string(),
  subtitle: z.string(),
  type: z.string(),
  episodes: scalar,
  when: z.string(),
  path: z.string(),
  verdict: z.string(),
  recommended: z.boolean().optional(),
  watch_url: z.string().optional(),
  notes: z.string().optional(),
});

const filmEntrySchema = z.object({
  title: z.string(),
  year: scalar,
  canon: z.boolean(),
  placement: z.string(),
  verdict: z.string(),
});

const fillerEntrySchema = z.object({
  arc: z.string(),
  episodes: scalar,
  verdict: z.string(),
  notes: z.string(),
});

const watchPathSchema = z.object({
  icon: z.string(),
  name: z.string(),
  subtitle: z.string(),
  description: z.string(),
  hours: scalar,
  includes: z.string(),
  recommended: z.boolean().optional(),
});

const comparisonSchema = z.object({
  heading: z.string(),
  intro: z.string(),
  cards: z.array(z.object({
    title: z.string(),
    subtitle: z.string(),
    color_class: z.string().optional(),
    recommended: z.boolean().optional(),
    stats: z.array(z.object({ label: z.string(), value: scalar })),
  })),
  verdict: z.string(),
});

const localizedGuideSchema = z.object({
  title: z.string(),
  meta_title: z.string(),
  meta_description: z.string(),
  category_tag: z.string(),
  emoji: z.string().optional(),
  hero: z.object({
    series: scalar,
    films: scalar,
    hours: scalar,
    updated: z.string(),
  }),
  intro: z.string(),
  quick_answer: z.string(),
  ui: z.record(z.string()).default({}),
  timeline: z.array(timelineEntrySchema),
  films: z.array(filmEntrySchema).default([]),
  fillers: z.array(fillerEntrySchema).default([]),
  paths: z.array(watchPathSchema),
  faq: z.array(z.object({ question: z.string(), answer: z.string() })),
  why_confusing: z.object({ content: z.string() }),
  dbz_vs_kai: comparisonSchema,
  streaming: z.array(z.object({
    platform: z.string(),
    icon: z.string(),
    url: z.string(),
    cta: z.string(),
    available: z.array(z.string()),
  })),
  manga: z.object({
    title: z.string(),
    description: z.string(),
    link_url: z.string(),
    link_text: z.string(),
  }),
});

const seriesDocumentSchema = z.object({
  en: localizedGuideSchema,
  fr: localizedGuideSchema,
});

export function dataFilePath(config: Pick<SiteConfig, 'dataDir'>, slug: string): string {
  return path.join(config.dataDir, `${slug}.json`);
}

export function parseSeriesDocument(raw: unknown): SeriesDocument {
  return seriesDocumentSchema.parse(raw);
}

export async function loadSeries(config: Pick<SiteConfig, 'dataDir'>, slug: string): Promise<SeriesGuide> {
  const filePath = dataFilePath(config, slug);
  if (!(await pathExists(filePath))) {
    throw new DataFileNotFoundError(filePath);
  }
  const content = await fs.readFile(filePath, 'utf-8');
  return {
    slug,
    guides: parseSeriesDocument(JSON.parse(content)),
  };
}

/**
 * Load every configured series in order. Stops at the first missing file, so a
 * failed load never reaches the rendering stage.
 */
export async function loadAllSeries(config: Pick<SiteConfig, 'dataDir' | 'series'>): Promise<SeriesGuide[]> {
  const series: SeriesGuide[] = [];
  for (const slug of config.series) {
    log(`\n[1/4] Loading data: ${slug}`);
    series.push(await loadSeries(config, slug));
  }
  return series;
}
