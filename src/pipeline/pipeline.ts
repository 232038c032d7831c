import { languages } from '../i18n/ui.js';
import { renderHomepage, renderSeriesPage } from '../render/page.js';
import { renderSitemap } from '../sitemap/buildSitemap.js';
import { writeOutput } from '../store/fs.js';
import { log } from '../utils/logger.js';
import { loadAllSeries } from './data.js';
import { BuildSummary, SiteConfig } from './types.js';
import { outputFileFor } from './utils.js';

const RULE = '='.repeat(60);

/**
 * Load every series, then write series pages, homepages and the sitemap, in
 * that order. Any failure aborts the remaining steps.
 */
export async function runPipeline(config: SiteConfig): Promise<BuildSummary> {
  log(RULE);
  log('AnimeWatchOrder.com: Static Site Generator');
  log(RULE);

  const series = await loadAllSeries(config);
  const files: string[] = [];
  let seriesPages = 0;

  log('\n[2/4] Generating series pages...');
  for (const item of series) {
    for (const lang of languages) {
      const html = renderSeriesPage(item, lang, config);
      files.push(await writeOutput(config.outputDir, outputFileFor(lang, item.slug), html));
      seriesPages += 1;
    }
  }

  log('\n[3/4] Generating homepages...');
  for (const lang of languages) {
    const html = renderHomepage(lang, series, config);
    files.push(await writeOutput(config.outputDir, outputFileFor(lang), html));
  }

  log('\n[4/4] Generating sitemap...');
  const sitemap = renderSitemap(series.map((item) => item.slug), config);
  files.push(await writeOutput(config.outputDir, 'sitemap.xml', sitemap));

  const homepages = languages.length;
  log(`\n${RULE}`);
  log(`Build complete! Generated ${seriesPages} series pages + ${homepages} homepages.`);
  log(RULE);

  return { seriesPages, homepages, files };
}
