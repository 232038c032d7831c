#!/usr/bin/env node
import { Command } from 'commander';
import { error } from '../utils/logger.js';
import { loadConfig } from './config.js';
import { DataFileNotFoundError } from './data.js';
import { runPipeline } from './pipeline.js';

const program = new Command();

program
  .name('watch-order-build')
  .description('Generate the bilingual watch order pages, homepages and sitemap.')
  .option('-c, --config <path>', 'Path to site config', 'site.config.json')
  .action(async (options: { config: string }) => {
    const config = await loadConfig(options.config);
    await runPipeline(config);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof DataFileNotFoundError) {
    error(`  [ERROR] ${err.message}`);
  } else {
    error(err);
  }
  process.exitCode = 1;
});
