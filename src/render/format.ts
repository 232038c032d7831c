import type { UiLabels } from '../i18n/ui.js';

export const contentTypes = ['canon', 'mixed', 'film_canon', 'non_canon', 'filler'] as const;
export type ContentType = (typeof contentTypes)[number];

export const verdicts = ['must_watch', 'watchable', 'skip'] as const;
export type Verdict = (typeof verdicts)[number];

const badgeClasses: Record<ContentType, string> = {
  canon: 'badge--canon',
  mixed: 'badge--mixed',
  film_canon: 'badge--film-canon',
  non_canon: 'badge--non-canon',
  filler: 'badge--filler',
};

const verdictClasses: Record<Verdict, string> = {
  must_watch: 'verdict--must-watch',
  watchable: 'verdict--watchable',
  skip: 'verdict--skip',
};

export function isContentType(value: string): value is ContentType {
  return Object.hasOwn(badgeClasses, value);
}

export function isVerdict(value: string): value is Verdict {
  return Object.hasOwn(verdictClasses, value);
}

export function badgeClass(type: string): string {
  return isContentType(type) ? badgeClasses[type] : badgeClasses.canon;
}

export function verdictClass(verdict: string): string {
  return isVerdict(verdict) ? verdictClasses[verdict] : verdictClasses.watchable;
}

// Content type and verdict keys double as label keys.
export function typeLabel(type: string, labels: UiLabels): string {
  return isContentType(type) ? labels[type] : type;
}

export function verdictLabel(verdict: string, labels: UiLabels): string {
  return isVerdict(verdict) ? labels[verdict] : verdict;
}

export function canonClass(canon: boolean): string {
  return canon ? 'film-canon-yes' : 'film-canon-no';
}

export function canonLabel(canon: boolean, labels: UiLabels): string {
  return canon ? labels.yes : labels.no;
}
