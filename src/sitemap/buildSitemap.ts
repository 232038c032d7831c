import { defaultLang, Lang, languages } from '../i18n/ui.js';
import type { SiteConfig } from '../pipeline/types.js';
import { absoluteUrl, localizedPath } from '../pipeline/utils.js';

type SitemapConfig = Pick<SiteConfig, 'siteUrl' | 'sitemap'>;

function renderEntry(loc: string, alternates: Record<Lang, string>, priority: string, config: SitemapConfig): string {
  const links = [
    ...languages.map((lang) => `    <xhtml:link rel="alternate" hreflang="${lang}" href="${alternates[lang]}"/>`),
    `    <xhtml:link rel="alternate" hreflang="x-default" href="${alternates[defaultLang]}"/>`,
  ];

  return `  <url>
    <loc>${loc}</loc>
${links.join('\n')}
    <lastmod>${config.sitemap.lastmod}</lastmod>
    <changefreq>${config.sitemap.changefreq}</changefreq>
    <priority>${priority}</priority>
  </url>`;
}

/**
 * Sitemap with hreflang alternates: the homepage and every series, one `<url>`
 * per language. The default-language entry gets the primary priority.
 */
export function renderSitemap(slugs: string[], config: SitemapConfig): string {
  const pages: Array<string | undefined> = [undefined, ...slugs];

  const entries = pages.flatMap((slug) => {
    const alternates = {
      en: absoluteUrl(config.siteUrl, localizedPath('en', slug)),
      fr: absoluteUrl(config.siteUrl, localizedPath('fr', slug)),
    } satisfies Record<Lang, string>;

    return languages.map((lang) =>
      renderEntry(
        alternates[lang],
        alternates,
        lang === defaultLang ? config.sitemap.priority.primary : config.sitemap.priority.alternate,
        config,
      ),
    );
  });

  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9"
        xmlns:xhtml="http://www.w3.org/1999/xhtml">
${entries.join('\n')}
</urlset>`;
}
