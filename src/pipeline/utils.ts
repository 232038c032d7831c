import fs from 'node:fs/promises';
import path from 'node:path';
import fsExtra from 'fs-extra';
import { defaultLang, Lang } from '../i18n/ui.js';

export async function ensureDir(dirPath: string): Promise<void> {
  await fsExtra.ensureDir(dirPath);
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

const attrEntities: Record<string, string> = {
  '&': '&amp;',
  '"': '&quot;',
  '<': '&lt;',
  '>': '&gt;',
};

/**
 * Escape a value for a double-quoted attribute. Element content is written
 * verbatim since guide text carries inline markup.
 */
export function escapeAttr(value: string): string {
  return value.replace(/[&"<>]/g, (char) => attrEntities[char] ?? char);
}

/**
 * Site-relative path of a page. The default language has no prefix; `slug`
 * omitted means the homepage.
 */
export function localizedPath(lang: Lang, slug?: string): string {
  const prefix = lang === defaultLang ? '' : `/${lang}`;
  return slug ? `${prefix}/${slug}/` : `${prefix}/`;
}

export function absoluteUrl(siteUrl: string, sitePath: string): string {
  return `${siteUrl}${sitePath}`;
}

/**
 * Output file of a page, relative to the output directory, with posix
 * separators (`fr/naruto/index.html`).
 */
export function outputFileFor(lang: Lang, slug?: string): string {
  return path.posix.join(localizedPath(lang, slug).slice(1), 'index.html');
}
