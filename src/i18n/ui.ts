import { warn } from '../utils/logger.js';

export const languages = ['en', 'fr'] as const;

export type Lang = (typeof languages)[number];

export const defaultLang: Lang = 'en';

/**
 * Every display string of the page chrome. A guide's `ui` map may override any
 * of these keys; keys it leaves out fall back to the built-in text below.
 */
export interface UiLabels {
  // === Navigation ===
  nav_home: string;
  lang_switch: string;

  // === Hero ===
  watch_order: string;
  hero_series: string;
  hero_films: string;
  hero_hours: string;
  hero_updated: string;

  // === Sections ===
  quick_answer_label: string;
  why_confusing_label: string;
  paths_heading: string;
  compare_verdict_label: string;
  timeline_heading: string;
  films_heading: string;
  fillers_heading: string;
  faq_heading: string;
  streaming_heading: string;

  // === Timeline table ===
  col_num: string;
  col_title: string;
  col_type: string;
  col_episodes: string;
  col_when: string;
  col_path: string;
  col_verdict: string;
  col_watch: string;
  watch_link: string;

  // === Films & fillers tables ===
  col_film: string;
  col_year: string;
  col_canon: string;
  col_placement: string;
  col_arc: string;
  col_notes: string;

  // === Categories ===
  recommended_label: string;
  must_watch: string;
  watchable: string;
  skip: string;
  canon: string;
  mixed: string;
  film_canon: string;
  non_canon: string;
  filler: string;
  yes: string;
  no: string;

  // === Structured data ===
  /** `{title}` is replaced with the guide title. */
  howto_name: string;

  // === Footer ===
  footer_text: string;
  footer_affiliate: string;

  // === Homepage ===
  home_title: string;
  home_description: string;
  home_heading: string;
  home_subtitle: string;
  home_cta: string;
  home_footer: string;
}

export const ui: Record<Lang, UiLabels> = {
  en: {
    nav_home: 'Home',
    lang_switch: 'Français',

    watch_order: 'Watch Order',
    hero_series: 'Series',
    hero_films: 'Films',
    hero_hours: 'Hours',
    hero_updated: 'Updated',

    quick_answer_label: 'Quick Answer',
    why_confusing_label: 'Why Is It Confusing?',
    paths_heading: 'Choose Your Watch Path',
    compare_verdict_label: 'Our Verdict',
    timeline_heading: 'Complete Timeline',
    films_heading: 'Films',
    fillers_heading: 'Filler Arcs',
    faq_heading: 'Frequently Asked Questions',
    streaming_heading: 'Where to Watch',

    col_num: '#',
    col_title: 'Title',
    col_type: 'Type',
    col_episodes: 'Episodes',
    col_when: 'When',
    col_path: 'Path',
    col_verdict: 'Verdict',
    col_watch: 'Watch',
    watch_link: 'CR',

    col_film: 'Film',
    col_year: 'Year',
    col_canon: 'Canon',
    col_placement: 'Where It Fits',
    col_arc: 'Arc',
    col_notes: 'Notes',

    recommended_label: 'Recommended',
    must_watch: 'Must Watch',
    watchable: 'Watchable',
    skip: 'Skip',
    canon: 'Canon',
    mixed: 'Mixed',
    film_canon: 'Film (Canon)',
    non_canon: 'Non-Canon',
    filler: 'Filler',
    yes: 'Yes',
    no: 'No',

    howto_name: '{title} Watch Order Guide',

    footer_text: 'AnimeWatchOrder.com',
    footer_affiliate: '',

    home_title: 'AnimeWatchOrder.com — Complete Anime Watch Order Guides',
    home_description:
      'Clear, structured watch order guides for the most complex anime franchises. Dragon Ball, Naruto, One Piece, and more.',
    home_heading: 'Anime Watch Order Guides',
    home_subtitle: 'Clear, structured watch order guides for the most complex anime franchises.',
    home_cta: 'View Guide',
    home_footer: 'AnimeWatchOrder.com',
  },

  fr: {
    nav_home: 'Accueil',
    lang_switch: 'English',

    watch_order: 'Ordre de Visionnage',
    hero_series: 'Séries',
    hero_films: 'Films',
    hero_hours: 'Heures',
    hero_updated: 'Mis à jour',

    quick_answer_label: 'Réponse Rapide',
    why_confusing_label: 'Pourquoi est-ce si compliqué ?',
    paths_heading: 'Choisissez Votre Parcours',
    compare_verdict_label: 'Notre Verdict',
    timeline_heading: 'Chronologie Complète',
    films_heading: 'Films',
    fillers_heading: 'Arcs Fillers',
    faq_heading: 'Questions Fréquentes',
    streaming_heading: 'Où Regarder',

    col_num: '#',
    col_title: 'Titre',
    col_type: 'Type',
    col_episodes: 'Épisodes',
    col_when: 'Quand',
    col_path: 'Parcours',
    col_verdict: 'Verdict',
    col_watch: 'Regarder',
    watch_link: 'CR',

    col_film: 'Film',
    col_year: 'Année',
    col_canon: 'Canon',
    col_placement: 'Placement',
    col_arc: 'Arc',
    col_notes: 'Notes',

    recommended_label: 'Recommandé',
    must_watch: 'Incontournable',
    watchable: 'Regardable',
    skip: 'À passer',
    canon: 'Canon',
    mixed: 'Mixte',
    film_canon: 'Film (Canon)',
    non_canon: 'Non-Canon',
    filler: 'Filler',
    yes: 'Oui',
    no: 'Non',

    howto_name: "{title} Guide d'Ordre de Visionnage",

    footer_text: 'AnimeWatchOrder.com',
    footer_affiliate: '',

    home_title: "AnimeWatchOrder.com — Guides d'Ordre de Visionnage Anime",
    home_description:
      'Des guides clairs et structurés pour les franchises anime les plus complexes. Dragon Ball, Naruto, One Piece et plus.',
    home_heading: "Guides d'Ordre de Visionnage Anime",
    home_subtitle: 'Des guides clairs et structurés pour les franchises anime les plus complexes.',
    home_cta: 'Voir le Guide',
    home_footer: 'AnimeWatchOrder.com',
  },
};

function isLabelKey(key: string): key is keyof UiLabels {
  return Object.hasOwn(ui[defaultLang], key);
}

/**
 * Merge a guide's `ui` overrides onto the built-in labels of a language.
 * Keys the dictionary does not know are ignored.
 */
export function resolveLabels(lang: Lang, overrides: Record<string, string> = {}): UiLabels {
  const labels: UiLabels = { ...ui[lang] };
  for (const [key, value] of Object.entries(overrides)) {
    if (isLabelKey(key)) {
      labels[key] = value;
    } else {
      warn(`  [WARN] Unknown ui label "${key}" ignored`);
    }
  }
  return labels;
}

/**
 * Replace `{name}` placeholders in a label.
 */
export function format(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.hasOwn(values, name) ? values[name] : match,
  );
}

/**
 * The language the switch link points to.
 */
export function alternateLang(lang: Lang): Lang {
  return languages.find((candidate) => candidate !== lang) ?? defaultLang;
}
