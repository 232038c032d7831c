import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseConfig, SiteConfigInput } from '../src/pipeline/config.js';
import { parseSeriesDocument } from '../src/pipeline/data.js';
import type { SeriesGuide, SiteConfig } from '../src/pipeline/types.js';

export const fixtureDataDir = fileURLToPath(new URL('./fixtures/data', import.meta.url));

export function loadFixture(slug: string): SeriesGuide {
  const raw = fs.readFileSync(path.join(fixtureDataDir, `${slug}.json`), 'utf-8');
  return { slug, guides: parseSeriesDocument(JSON.parse(raw)) };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'watch-order-'));
}

export function testConfig(overrides: Partial<SiteConfigInput> = {}): SiteConfig {
  return parseConfig({
    siteUrl: 'https://example.com/',
    dataDir: fixtureDataDir,
    outputDir: 'public',
    series: ['dragon-ball', 'naruto'],
    published: '2026-02-12',
    analytics: { gtmId: 'GTM-TEST123' },
    siteVerification: 'test-verification',
    ...overrides,
  });
}
