/**
 * Homoglyph classification for domain labels
 *
 * Two sources: a cross-script look-alike table (Cyrillic, Greek, Armenian and
 * Latin-diacritic variants of ASCII letters) and NFKD folding for anything the
 * table does not list (fullwidth forms, mathematical letters, other accents).
 */

import confusableTable from './data/confusables.json';

export interface ConfusableChar {
  char: string;
  /** ASCII character it imitates */
  lookalike: string;
  source: 'table' | 'normalized';
}

export interface HomoglyphAnalysis {
  /** Distinct flagged characters in order of first appearance */
  flagged: ConfusableChar[];
  /** Input with every flagged character replaced by its look-alike */
  skeleton: string;
}

const REVERSE_TABLE: ReadonlyMap<string, string> = (() => {
  const map = new Map<string, string>();
  for (const [ascii, variants] of Object.entries(confusableTable)) {
    for (const variant of variants) {
      map.set(variant, ascii);
    }
  }
  return map;
})();

const COMBINING_MARKS = /[\u0300-\u036f]/g;

function foldToAscii(char: string): string | null {
  const folded = char.normalize('NFKD').replace(COMBINING_MARKS, '').toLowerCase();
  return /^[a-z0-9]$/.test(folded) ? folded : null;
}

export function lookalikeOf(char: string): ConfusableChar | null {
  if (char.charCodeAt(0) < 0x80) return null;

  const tabled = REVERSE_TABLE.get(char);
  if (tabled) return { char, lookalike: tabled, source: 'table' };

  const folded = foldToAscii(char);
  return folded ? { char, lookalike: folded, source: 'normalized' } : null;
}

export function analyzeHomoglyphs(text: string): HomoglyphAnalysis {
  const flagged: ConfusableChar[] = [];
  const seen = new Set<string>();
  let skeleton = '';

  // for..of walks code points, so astral-plane letters stay whole
  for (const char of text) {
    const confusable = lookalikeOf(char);
    if (!confusable) {
      skeleton += char;
      continue;
    }
    skeleton += confusable.lookalike;
    if (!seen.has(char)) {
      seen.add(char);
      flagged.push(confusable);
    }
  }

  return { flagged, skeleton };
}

export function hasNonAscii(text: string): boolean {
  return /[^\x00-\x7f]/.test(text);
}
