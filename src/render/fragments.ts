import type { UiLabels } from '../i18n/ui.js';
import type { LocalizedGuide } from '../pipeline/types.js';
import { escapeAttr } from '../pipeline/utils.js';
import {
  badgeClass,
  canonClass,
  canonLabel,
  typeLabel,
  verdictClass,
  verdictLabel,
} from './format.js';

type Fragment = (guide: LocalizedGuide, labels: UiLabels) => string;

function verdictSpan(verdict: string, labels: UiLabels): string {
  return `<span class="verdict ${verdictClass(verdict)}">${verdictLabel(verdict, labels)}</span>`;
}

export const renderTimelineRows: Fragment = (guide, labels) =>
  guide.timeline
    .map((item) => {
      const recTag = item.recommended ? ` <span class="tag-recommended">${labels.recommended_label}</span>` : '';
      const recClass = item.recommended ? ' class="row--recommended"' : '';
      const watchUrl = item.watch_url ?? '#';

      return `        <tr${recClass}>
          <td class="col-num">${item.num}</td>
          <td class="col-title">${item.title}${recTag}<small>${item.subtitle}</small></td>
          <td><span class="badge ${badgeClass(item.type)}">${typeLabel(item.type, labels)}</span></td>
          <td>${item.episodes}</td>
          <td>${item.when}</td>
          <td>${item.path}</td>
          <td>${verdictSpan(item.verdict, labels)}</td>
          <td><a href="${escapeAttr(watchUrl)}" class="stream-link" rel="nofollow noopener" target="_blank">${labels.watch_link}</a></td>
        </tr>`;
    })
    .join('\n');

export const renderFilmRows: Fragment = (guide, labels) =>
  guide.films
    .map((film) => `        <tr>
          <td class="film-title">${film.title}</td>
          <td>${film.year}</td>
          <td class="${canonClass(film.canon)}">${canonLabel(film.canon, labels)}</td>
          <td>${film.placement}</td>
          <td>${verdictSpan(film.verdict, labels)}</td>
        </tr>`)
    .join('\n');

export const renderFillerRows: Fragment = (guide, labels) =>
  guide.fillers
    .map((filler) => `        <tr>
          <td>${filler.arc}</td>
          <td>${filler.episodes}</td>
          <td>${verdictSpan(filler.verdict, labels)}</td>
          <td>${filler.notes}</td>
        </tr>`)
    .join('\n');

export const renderPathCards: Fragment = (guide, labels) =>
  guide.paths
    .map((watchPath) => {
      const recBadge = watchPath.recommended
        ? `<span class="path-card__badge">${labels.recommended_label}</span>`
        : '';
      const recClass = watchPath.recommended ? ' path-card--recommended' : '';

      return `      <div class="path-card${recClass}">
        ${recBadge}
        <span class="path-card__icon">${watchPath.icon}</span>
        <div class="path-card__name">${watchPath.name}</div>
        <div class="path-card__subtitle">${watchPath.subtitle}</div>
        <p class="path-card__desc">${watchPath.description}</p>
        <div class="path-card__meta">
          <span class="path-card__hours">${watchPath.hours}</span>
          ${watchPath.includes}
        </div>
      </div>`;
    })
    .join('\n');

export const renderFaqItems: Fragment = (guide) =>
  guide.faq
    .map((faq) => `      <div class="faq-item">
        <h3>${faq.question}</h3>
        <p>${faq.answer}</p>
      </div>`)
    .join('\n');

export const renderWhyConfusing: Fragment = (guide, labels) => `      <div class="info-box">
        <div class="info-box__label">${labels.why_confusing_label}</div>
        <div class="info-box__text">${guide.why_confusing.content}</div>
      </div>`;

/**
 * Comparison grid followed by the verdict box.
 */
export const renderComparison: Fragment = (guide, labels) => {
  const compare = guide.dbz_vs_kai;
  const cards = compare.cards.map((card) => {
    const recBadge = card.recommended ? `<span class="winner-tag">${labels.recommended_label}</span>` : '';
    const cardClass = card.color_class ? `compare-card ${escapeAttr(card.color_class)}` : 'compare-card';
    const stats = card.stats
      .map((stat) => `          <div class="compare-card__stat">
            <span class="compare-card__label">${stat.label}</span>
            <span class="compare-card__value">${stat.value}</span>
          </div>\n`)
      .join('');

    return `      <div class="${cardClass}">
        ${recBadge}
        <div class="compare-card__title">${card.title}</div>
        <div class="compare-card__subtitle">${card.subtitle}</div>
${stats}      </div>`;
  });

  const grid = `      <div class="compare-grid">
${cards.join('\n')}
      </div>`;

  const verdict = `      <div class="verdict-box">
        <div class="verdict-box__label">${labels.compare_verdict_label}</div>
        <p class="verdict-box__text">${compare.verdict}</p>
      </div>`;

  return `${grid}\n${verdict}`;
};

export const renderStreamingCards: Fragment = (guide) =>
  guide.streaming
    .map((platform, index) => {
      const available = platform.available.map((item) => `            <li>${item}</li>`).join('\n');
      const ctaClass = index === 0 ? 'streaming-card__cta streaming-card__cta--primary' : 'streaming-card__cta';

      return `      <div class="streaming-card">
        <span class="streaming-card__icon">${platform.icon}</span>
        <div class="streaming-card__name">${platform.platform}</div>
        <ul class="streaming-card__list">
${available}
        </ul>
        <a href="${escapeAttr(platform.url)}" class="${ctaClass}" target="_blank" rel="noopener noreferrer nofollow">${platform.cta}</a>
      </div>`;
    })
    .join('\n');
