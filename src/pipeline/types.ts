import type { Lang } from '../i18n/ui.js';

export type ChangeFrequency = 'always' | 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly' | 'never';

export interface SiteConfig {
  /** Absolute site origin without a trailing slash. */
  siteUrl: string;
  dataDir: string;
  outputDir: string;
  series: string[];
  published: string;
  modified: string;
  analytics?: {
    gtmId: string;
  };
  siteVerification?: string;
  sitemap: {
    lastmod: string;
    changefreq: ChangeFrequency;
    priority: {
      primary: string;
      alternate: string;
    };
  };
}

export type Scalar = string | number;

export interface TimelineEntry {
  num: Scalar;
  title: string;
  subtitle: string;
  type: string;
  episodes: Scalar;
  when: string;
  path: string;
  verdict: string;
  recommended?: boolean;
  watch_url?: string;
  notes?: string;
}

export interface FilmEntry {
  title: string;
  year: Scalar;
  canon: boolean;
  placement: string;
  verdict: string;
}

export interface FillerEntry {
  arc: string;
  episodes: Scalar;
  verdict: string;
  notes: string;
}

export interface WatchPath {
  icon: string;
  name: string;
  subtitle: string;
  description: string;
  hours: Scalar;
  includes: string;
  recommended?: boolean;
}

export interface FaqEntry {
  question: string;
  answer: string;
}

export interface ComparisonCard {
  title: string;
  subtitle: string;
  color_class?: string;
  recommended?: boolean;
  stats: Array<{ label: string; value: Scalar }>;
}

export interface Comparison {
  heading: string;
  intro: string;
  cards: ComparisonCard[];
  verdict: string;
}

export interface StreamingPlatform {
  platform: string;
  icon: string;
  url: string;
  cta: string;
  available: string[];
}

export interface MangaPointer {
  title: string;
  description: string;
  link_url: string;
  link_text: string;
}

export interface HeroStats {
  series: Scalar;
  films: Scalar;
  hours: Scalar;
  updated: string;
}

export interface LocalizedGuide {
  title: string;
  meta_title: string;
  meta_description: string;
  category_tag: string;
  emoji?: string;
  hero: HeroStats;
  intro: string;
  quick_answer: string;
  ui: Record<string, string>;
  timeline: TimelineEntry[];
  films: FilmEntry[];
  fillers: FillerEntry[];
  paths: WatchPath[];
  faq: FaqEntry[];
  why_confusing: { content: string };
  dbz_vs_kai: Comparison;
  streaming: StreamingPlatform[];
  manga: MangaPointer;
}

export type SeriesDocument = Record<Lang, LocalizedGuide>;

export interface SeriesGuide {
  slug: string;
  guides: SeriesDocument;
}

export interface BuildSummary {
  seriesPages: number;
  homepages: number;
  files: string[];
}
