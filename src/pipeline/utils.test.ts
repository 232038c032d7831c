import { describe, expect, it } from 'vitest';
import { absoluteUrl, escapeAttr, localizedPath, outputFileFor } from './utils.js';

describe('escapeAttr', () => {
  it('escapes attribute metacharacters', () => {
    expect(escapeAttr('a "b" & <c>')).toBe('a &quot;b&quot; &amp; &lt;c&gt;');
  });

  it('leaves apostrophes and accents alone', () => {
    expect(escapeAttr("L'ordre à suivre")).toBe("L'ordre à suivre");
  });
});

describe('localizedPath', () => {
  it('has no prefix for the default language', () => {
    expect(localizedPath('en')).toBe('/');
    expect(localizedPath('en', 'naruto')).toBe('/naruto/');
  });

  it('prefixes other languages', () => {
    expect(localizedPath('fr')).toBe('/fr/');
    expect(localizedPath('fr', 'naruto')).toBe('/fr/naruto/');
  });
});

describe('outputFileFor', () => {
  it('maps pages to index.html files', () => {
    expect(outputFileFor('en')).toBe('index.html');
    expect(outputFileFor('fr')).toBe('fr/index.html');
    expect(outputFileFor('en', 'dragon-ball')).toBe('dragon-ball/index.html');
    expect(outputFileFor('fr', 'dragon-ball')).toBe('fr/dragon-ball/index.html');
  });
});

describe('absoluteUrl', () => {
  it('joins the site origin and path', () => {
    expect(absoluteUrl('https://example.com', '/fr/naruto/')).toBe('https://example.com/fr/naruto/');
  });
});
