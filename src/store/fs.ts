import fs from 'node:fs/promises';
import path from 'node:path';
import { ensureDir } from '../pipeline/utils.js';
import { log } from '../utils/logger.js';

/**
 * Write one generated artifact under `outputDir`, creating parent directories
 * and replacing any previous file. Returns the absolute path written.
 */
export async function writeOutput(outputDir: string, relativePath: string, content: string): Promise<string> {
  const destination = path.join(outputDir, relativePath);
  await ensureDir(path.dirname(destination));
  await fs.writeFile(destination, content, 'utf-8');
  log(`  [OK] ${relativePath}`);
  return destination;
}
