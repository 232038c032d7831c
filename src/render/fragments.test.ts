import { load } from 'cheerio';
import { describe, expect, it } from 'vitest';
import { loadFixture } from '../../test/fixtures.js';
import { resolveLabels } from '../i18n/ui.js';
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

const dragonBall = loadFixture('dragon-ball');
const naruto = loadFixture('naruto');

function table(rows: string) {
  return load(`<table><tbody>${rows}</tbody></table>`);
}

describe('renderTimelineRows', () => {
  it('renders a recommended entry with its badge and verdict', () => {
    const guide = dragonBall.guides.en;
    const $ = table(renderTimelineRows(guide, resolveLabels('en', guide.ui)));

    const rows = $('tbody tr');
    expect(rows).toHaveLength(1);
    expect(rows.attr('class')).toBe('row--recommended');
    expect($('.tag-recommended').text()).toBe('Recommended');
    expect($('.col-num').text()).toBe('1');
    expect($('.col-title small').text()).toBe('Ep 1-153');
    expect($('.badge').attr('class')).toBe('badge badge--canon');
    expect($('.badge').text()).toBe('Canon');
    expect($('.verdict').attr('class')).toBe('verdict verdict--must-watch');
    expect($('.verdict').text()).toBe(guide.ui.must_watch);
    expect($('.stream-link').attr('href')).toBe('#');
    expect($('.stream-link').text()).toBe('CR');
  });

  it('degrades unknown categories and keeps source order', () => {
    const guide = naruto.guides.en;
    const $ = table(renderTimelineRows(guide, resolveLabels('en', guide.ui)));

    const rows = $('tbody tr');
    expect(rows).toHaveLength(2);
    expect(rows.eq(0).find('.col-title').text()).toBe('NarutoEp 1-135');
    expect(rows.eq(0).find('.stream-link').attr('href')).toBe('https://example.com/naruto');

    const ova = rows.eq(1);
    expect(ova.attr('class')).toBeUndefined();
    expect(ova.find('.badge').attr('class')).toBe('badge badge--canon');
    expect(ova.find('.badge').text()).toBe('ova');
    expect(ova.find('.verdict').attr('class')).toBe('verdict verdict--watchable');
    expect(ova.find('.verdict').text()).toBe('maybe');
  });

  it('uses the French labels', () => {
    const guide = dragonBall.guides.fr;
    const $ = table(renderTimelineRows(guide, resolveLabels('fr', guide.ui)));

    expect($('.tag-recommended').text()).toBe('Recommandé');
    expect($('.verdict').text()).toBe('Indispensable');
  });
});

describe('renderFilmRows / renderFillerRows', () => {
  const guide = naruto.guides.en;
  const labels = resolveLabels('en', guide.ui);

  it('renders canon status and verdict per film', () => {
    const $ = table(renderFilmRows(guide, labels));
    expect($('tr')).toHaveLength(1);
    expect($('.film-title').text()).toBe('The Last');
    expect($('.film-canon-yes').text()).toBe('Yes');
    expect($('.verdict').attr('class')).toBe('verdict verdict--must-watch');
    expect($('.verdict').text()).toBe('Must Watch');
  });

  it('renders one row per filler arc', () => {
    const $ = table(renderFillerRows(guide, labels));
    const cells = $('tr td');
    expect(cells.eq(0).text()).toBe('Land of Tea');
    expect(cells.eq(1).text()).toBe('102-106');
    expect(cells.eq(2).find('.verdict--skip').text()).toBe('Skip');
    expect(cells.eq(3).text()).toBe('Drop it.');
  });

  it('renders nothing for empty lists', () => {
    expect(renderFilmRows(naruto.guides.fr, labels)).toBe('');
    expect(renderFillerRows(naruto.guides.fr, labels)).toBe('');
  });
});

describe('renderPathCards', () => {
  it('flags the recommended path', () => {
    const guide = dragonBall.guides.en;
    const $ = load(renderPathCards(guide, resolveLabels('en', guide.ui)));

    expect($('.path-card')).toHaveLength(1);
    expect($('.path-card').attr('class')).toBe('path-card path-card--recommended');
    expect($('.path-card__badge').text()).toBe('Recommended');
    expect($('.path-card__hours').text()).toBe('50 h');
  });

  it('leaves other paths plain', () => {
    const guide = naruto.guides.en;
    const $ = load(renderPathCards(guide, resolveLabels('en', guide.ui)));

    expect($('.path-card').attr('class')).toBe('path-card');
    expect($('.path-card__badge')).toHaveLength(0);
    expect($('.path-card__hours').text()).toBe('150');
  });
});

describe('renderComparison', () => {
  it('renders cards, stats and the verdict box', () => {
    const guide = naruto.guides.en;
    const $ = load(renderComparison(guide, resolveLabels('en', guide.ui)));

    const cards = $('.compare-grid > div');
    expect(cards).toHaveLength(2);
    expect(cards.eq(0).attr('class')).toBe('compare-card compare-card--part1');
    expect(cards.eq(0).find('.compare-card__stat')).toHaveLength(2);
    expect(cards.eq(0).find('.compare-card__value').last().text()).toBe('41%');
    expect(cards.eq(1).attr('class')).toBe('compare-card');
    expect(cards.eq(1).find('.compare-card__stat')).toHaveLength(0);
    expect($('.winner-tag')).toHaveLength(0);
    expect($('.verdict-box__label').text()).toBe('Our Verdict');
    expect($('.verdict-box__text').text()).toBe('Watch both.');
  });

  it('tags the recommended card', () => {
    const guide = dragonBall.guides.fr;
    const $ = load(renderComparison(guide, resolveLabels('fr', guide.ui)));

    expect($('.winner-tag').text()).toBe('Recommandé');
    expect($('.verdict-box__label').text()).toBe('Notre Verdict');
  });
});

describe('renderStreamingCards', () => {
  const guide = dragonBall.guides.en;
  const html = renderStreamingCards(guide, resolveLabels('en', guide.ui));
  const $ = load(html);

  it('marks only the first call to action as primary', () => {
    const ctas = $('.streaming-card__cta');
    expect(ctas).toHaveLength(2);
    expect(ctas.eq(0).attr('class')).toBe('streaming-card__cta streaming-card__cta--primary');
    expect(ctas.eq(1).attr('class')).toBe('streaming-card__cta');
  });

  it('lists available titles per platform', () => {
    expect($('.streaming-card').eq(1).find('li').map((_, li) => $(li).text()).get()).toEqual(['Dragon Ball', 'Kai']);
  });

  it('escapes link targets', () => {
    expect(html).toContain('href="https://example.com/cr?a=1&amp;b=2"');
    expect($('.streaming-card__cta').first().attr('href')).toBe('https://example.com/cr?a=1&b=2');
  });
});

describe('renderFaqItems / renderWhyConfusing', () => {
  it('keeps inline markup in answers', () => {
    const guide = dragonBall.guides.en;
    const $ = load(renderFaqItems(guide, resolveLabels('en', guide.ui)));

    expect($('.faq-item')).toHaveLength(2);
    expect($('.faq-item h3').first().text()).toBe('Where do I start?');
    expect($('.faq-item p').first().html()).toBe('With <em>Dragon Ball</em>.');
  });

  it('renders the info box', () => {
    const guide = dragonBall.guides.fr;
    const $ = load(renderWhyConfusing(guide, resolveLabels('fr', guide.ui)));

    expect($('.info-box__label').text()).toBe('Pourquoi est-ce si compliqué ?');
    expect($('.info-box__text').text()).toBe('Deux montages de la même série.');
  });
});
