import { alternateLang, defaultLang, Lang, languages, resolveLabels, UiLabels } from '../i18n/ui.js';
import type { LocalizedGuide, SeriesGuide, SiteConfig } from '../pipeline/types.js';
import { absoluteUrl, escapeAttr, localizedPath } from '../pipeline/utils.js';
import {
  renderComparison,
  renderFaqItems,
  renderFillerRows,
  renderFilmRows,
  renderPathCards,
  renderStreamingCards,
  renderTimelineRows,
  renderWhyConfusing,
} from './fragments.js';
import { buildFaqSchema, buildHowToSchema, serializeJsonLd } from './schema.js';

const DEFAULT_EMOJI = '🎬';

type HeadConfig = Pick<SiteConfig, 'siteUrl' | 'analytics' | 'siteVerification'>;

interface HeadOptions {
  lang: Lang;
  title: string;
  description: string;
  /** Series slug; omitted for the homepage. */
  slug?: string;
  jsonLd?: string[];
}

function gtmSnippet(gtmId: string): string {
  return `<!-- Google Tag Manager -->
<script>(function(w,d,s,l,i){w[l]=w[l]||[];w[l].push({'gtm.start':
new Date().getTime(),event:'gtm.js'});var f=d.getElementsByTagName(s)[0],
j=d.createElement(s),dl=l!='dataLayer'?'&l='+l:'';j.async=true;j.src=
'https://www.googletagmanager.com/gtm.js?id='+i+dl;f.parentNode.insertBefore(j,f);
})(window,document,'script','dataLayer','${gtmId}');</script>
<!-- End Google Tag Manager -->`;
}

function renderHead(config: HeadConfig, options: HeadOptions): string {
  const urlFor = (lang: Lang) => absoluteUrl(config.siteUrl, localizedPath(lang, options.slug));
  const lines = [
    '  <meta charset="UTF-8">',
    config.analytics ? `  ${gtmSnippet(config.analytics.gtmId)}` : undefined,
    config.siteVerification
      ? `  <meta name="google-site-verification" content="${escapeAttr(config.siteVerification)}" />`
      : undefined,
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `  <title>${options.title}</title>`,
    `  <meta name="description" content="${escapeAttr(options.description)}">`,
    `  <link rel="canonical" href="${urlFor(options.lang)}">`,
    ...languages.map((lang) => `  <link rel="alternate" hreflang="${lang}" href="${urlFor(lang)}">`),
    `  <link rel="alternate" hreflang="x-default" href="${urlFor(defaultLang)}">`,
    '  <link rel="preconnect" href="https://fonts.googleapis.com">',
    '  <link rel="preconnect" href="https://fonts.gstatic.com" crossorigin>',
    '  <link href="https://fonts.googleapis.com/css2?family=Bebas+Neue&family=Outfit:wght@400;500;600;700&display=swap" rel="stylesheet">',
    '  <link rel="stylesheet" href="/assets/css/style.css">',
    ...(options.jsonLd ?? []).map((json) => `  <script type="application/ld+json">
${json}
  </script>`),
  ];

  return `<head>
${lines.filter((line): line is string => line !== undefined).join('\n')}
</head>`;
}

function renderNav(homeUrl: string, homeLabel: string, switchUrl: string, switchLabel: string): string {
  return `  <!-- Navigation -->
  <nav class="nav" aria-label="Main navigation">
    <div class="container nav__inner">
      <a href="${homeUrl}" class="nav__logo">Anime<span>Watch</span>Order</a>
      <ul class="nav__links">
        <li><a href="${homeUrl}">${homeLabel}</a></li>
        <li><a href="${switchUrl}" class="nav__lang">${switchLabel}</a></li>
      </ul>
    </div>
  </nav>`;
}

function renderFilmsTable(guide: LocalizedGuide, labels: UiLabels): string {
  if (guide.films.length === 0) return '';
  return `
      <h3>${labels.films_heading}</h3>
      <div class="table-wrapper">
        <table class="films-table">
          <thead>
            <tr>
              <th>${labels.col_film}</th>
              <th>${labels.col_year}</th>
              <th>${labels.col_canon}</th>
              <th>${labels.col_placement}</th>
              <th>${labels.col_verdict}</th>
            </tr>
          </thead>
          <tbody>
${renderFilmRows(guide, labels)}
          </tbody>
        </table>
      </div>`;
}

function renderFillersTable(guide: LocalizedGuide, labels: UiLabels): string {
  if (guide.fillers.length === 0) return '';
  return `
      <h3>${labels.fillers_heading}</h3>
      <div class="table-wrapper">
        <table class="fillers-table">
          <thead>
            <tr>
              <th>${labels.col_arc}</th>
              <th>${labels.col_episodes}</th>
              <th>${labels.col_verdict}</th>
              <th>${labels.col_notes}</th>
            </tr>
          </thead>
          <tbody>
${renderFillerRows(guide, labels)}
          </tbody>
        </table>
      </div>`;
}

/**
 * Full HTML document for one series in one language.
 */
export function renderSeriesPage(series: SeriesGuide, lang: Lang, config: SiteConfig): string {
  const { slug } = series;
  const guide = series.guides[lang];
  const labels = resolveLabels(lang, guide.ui);

  const howTo = serializeJsonLd(buildHowToSchema(guide, slug, lang, config, labels));
  const faq = serializeJsonLd(buildFaqSchema(guide));
  const head = renderHead(config, {
    lang,
    slug,
    title: guide.meta_title,
    description: guide.meta_description,
    jsonLd: [howTo, faq],
  });
  const nav = renderNav(
    localizedPath(lang),
    labels.nav_home,
    localizedPath(alternateLang(lang), slug),
    labels.lang_switch,
  );

  return `<!DOCTYPE html>
<html lang="${lang}">
${head}
<body>
${nav}

  <main class="container">
    <!-- 1. Hero Section -->
    <section class="hero" id="hero">
      <span class="hero__tag">${guide.category_tag}</span>
      <h1>${guide.title} ${labels.watch_order}</h1>
      <div class="hero__meta">
        <div class="hero__meta-item">
          <span class="hero__meta-value">${guide.hero.series}</span>
          <span class="hero__meta-label">${labels.hero_series}</span>
        </div>
        <div class="hero__meta-item">
          <span class="hero__meta-value">${guide.hero.films}</span>
          <span class="hero__meta-label">${labels.hero_films}</span>
        </div>
        <div class="hero__meta-item">
          <span class="hero__meta-value">${guide.hero.hours}+</span>
          <span class="hero__meta-label">${labels.hero_hours}</span>
        </div>
        <div class="hero__meta-item">
          <span class="hero__meta-value">${guide.hero.updated}</span>
          <span class="hero__meta-label">${labels.hero_updated}</span>
        </div>
      </div>
      <p class="hero__intro">${guide.intro}</p>
    </section>

    <!-- 2. Quick Answer Box -->
    <section class="section" id="quick-answer">
      <div class="quick-answer">
        <div class="quick-answer__label">${labels.quick_answer_label}</div>
        <p class="quick-answer__text">${guide.quick_answer}</p>
      </div>
    </section>

    <!-- 3. Why It Is Confusing -->
    <section class="section" id="why-confusing">
${renderWhyConfusing(guide, labels)}
    </section>

    <!-- 4. Watch Paths -->
    <section class="section" id="paths">
      <h2>${labels.paths_heading}</h2>
      <div class="paths-grid">
${renderPathCards(guide, labels)}
      </div>
    </section>

    <!-- 5. Comparison -->
    <section class="section" id="compare">
      <h2>${guide.dbz_vs_kai.heading}</h2>
      <p class="section__intro">${guide.dbz_vs_kai.intro}</p>
${renderComparison(guide, labels)}
    </section>

    <!-- 6. Complete Timeline -->
    <section class="section" id="timeline">
      <h2>${labels.timeline_heading}</h2>
      <div class="table-wrapper">
        <table class="timeline-table">
          <thead>
            <tr>
              <th>${labels.col_num}</th>
              <th>${labels.col_title}</th>
              <th>${labels.col_type}</th>
              <th>${labels.col_episodes}</th>
              <th>${labels.col_when}</th>
              <th>${labels.col_path}</th>
              <th>${labels.col_verdict}</th>
              <th>${labels.col_watch}</th>
            </tr>
          </thead>
          <tbody>
${renderTimelineRows(guide, labels)}
          </tbody>
        </table>
      </div>${renderFilmsTable(guide, labels)}${renderFillersTable(guide, labels)}
    </section>

    <!-- 7. FAQ Section -->
    <section class="section" id="faq">
      <h2>${labels.faq_heading}</h2>
${renderFaqItems(guide, labels)}
    </section>

    <!-- 8. Streaming Platforms -->
    <section class="section" id="streaming">
      <h2>${labels.streaming_heading}</h2>
      <div class="streaming-grid">
${renderStreamingCards(guide, labels)}
      </div>
    </section>

    <!-- 9. Manga Continuation Box -->
    <section class="section" id="manga">
      <div class="manga-box">
        <span class="manga-box__icon">📚</span>
        <div class="manga-box__title">${guide.manga.title}</div>
        <p class="manga-box__desc">${guide.manga.description}</p>
        <a href="${escapeAttr(guide.manga.link_url)}" class="manga-box__link" target="_blank" rel="noopener noreferrer nofollow">→ ${guide.manga.link_text}</a>
      </div>
    </section>
  </main>

  <!-- Footer -->
  <footer class="footer">
    <div class="container">
      <p class="footer__text">${labels.footer_text}</p>
      <p class="footer__affiliate">${labels.footer_affiliate}</p>
    </div>
  </footer>
</body>
</html>`;
}

/**
 * Landing page of one language: a card per series, in configured order.
 */
export function renderHomepage(lang: Lang, series: SeriesGuide[], config: SiteConfig): string {
  const labels = resolveLabels(lang);
  const other = alternateLang(lang);
  const head = renderHead(config, {
    lang,
    title: labels.home_title,
    description: labels.home_description,
  });
  const nav = renderNav(localizedPath(lang), labels.nav_home, localizedPath(other), other.toUpperCase());

  const cards = series
    .map(({ slug, guides }) => {
      const guide = guides[lang];
      return `      <a href="${localizedPath(lang, slug)}" class="series-card">
        <span class="series-card__emoji">${guide.emoji ?? DEFAULT_EMOJI}</span>
        <div class="series-card__title">${guide.title}</div>
        <div class="series-card__meta">${guide.category_tag}</div>
        <span class="series-card__cta">${labels.home_cta} →</span>
      </a>`;
    })
    .join('\n');

  return `<!DOCTYPE html>
<html lang="${lang}">
${head}
<body>
${nav}

  <main class="container">
    <section class="home-hero">
      <h1>${labels.home_heading}</h1>
      <p class="home-hero__subtitle">${labels.home_subtitle}</p>
      <div class="series-grid">
${cards}
      </div>
    </section>
  </main>

  <footer class="footer">
    <div class="container">
      <p class="footer__text">${labels.home_footer}</p>
    </div>
  </footer>
</body>
</html>`;
}
