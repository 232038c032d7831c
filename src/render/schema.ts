import { format, Lang, UiLabels } from '../i18n/ui.js';
import type { LocalizedGuide, SiteConfig } from '../pipeline/types.js';
import { absoluteUrl, localizedPath } from '../pipeline/utils.js';

export interface HowToSchema {
  '@context': 'https://schema.org';
  '@type': 'HowTo';
  name: string;
  description: string;
  url: string;
  datePublished: string;
  dateModified: string;
  step: Array<{
    '@type': 'HowToStep';
    name: string;
    text: string;
  }>;
}

export interface FaqSchema {
  '@context': 'https://schema.org';
  '@type': 'FAQPage';
  mainEntity: Array<{
    '@type': 'Question';
    name: string;
    acceptedAnswer: {
      '@type': 'Answer';
      text: string;
    };
  }>;
}

export function buildHowToSchema(
  guide: LocalizedGuide,
  slug: string,
  lang: Lang,
  config: Pick<SiteConfig, 'siteUrl' | 'published' | 'modified'>,
  labels: UiLabels,
): HowToSchema {
  return {
    '@context': 'https://schema.org',
    '@type': 'HowTo',
    name: format(labels.howto_name, { title: guide.title }),
    description: guide.meta_description,
    url: absoluteUrl(config.siteUrl, localizedPath(lang, slug)),
    datePublished: config.published,
    dateModified: config.modified,
    step: guide.timeline.map((item) => ({
      '@type': 'HowToStep',
      name: item.title,
      text: item.notes ?? '',
    })),
  };
}

export function buildFaqSchema(guide: LocalizedGuide): FaqSchema {
  return {
    '@context': 'https://schema.org',
    '@type': 'FAQPage',
    mainEntity: guide.faq.map((faq) => ({
      '@type': 'Question',
      name: faq.question,
      acceptedAnswer: {
        '@type': 'Answer',
        text: faq.answer,
      },
    })),
  };
}

/**
 * Serialize for a `<script type="application/ld+json">` body. `<` is escaped
 * so markup inside answers cannot end the script element.
 */
export function serializeJsonLd(schema: HowToSchema | FaqSchema): string {
  return JSON.stringify(schema, null, 2).replace(/</g, '\\u003c');
}
