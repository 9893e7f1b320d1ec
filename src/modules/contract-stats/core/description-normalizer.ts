import type { AcronymEntry, DescriptionNormalizer } from './types.js';

const ABBREVIATION_FIXES: readonly (readonly [RegExp, string])[] = [
  [/(?<![A-Za-z0-9])u\.s\./gi, 'U.S.'],
  [/\bii\b/gi, 'II'],
  [/\biii\b/gi, 'III'],
  [/\bfy(\d{2})\b/gi, 'FY$1'],
];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Lower-cases the text, capitalises its first character and restores a few
 * abbreviations that must stay upper case.
 */
export const toSentenceCase = (text: string): string => {
  const trimmed = text.trim();
  if (trimmed === '') {
    return trimmed;
  }

  const lower = trimmed.toLowerCase();
  let result = lower.charAt(0).toUpperCase() + lower.slice(1);

  for (const [pattern, replacement] of ABBREVIATION_FIXES) {
    result = result.replace(pattern, replacement);
  }

  return result;
};

/**
 * Builds a normalizer that sentence-cases a description and then restores the
 * reference casing of known acronyms (upper case) and definitions (as written).
 * Longer phrases win over shorter ones that they contain.
 */
export const createDescriptionNormalizer = (
  entries: readonly AcronymEntry[]
): DescriptionNormalizer => {
  const mapping = new Map<string, string>();

  for (const entry of entries) {
    const acronym = entry.acronym.trim();
    const definition = entry.definition.trim();
    if (acronym !== '') {
      mapping.set(acronym.toLowerCase(), acronym.toUpperCase());
    }
    if (definition !== '') {
      mapping.set(definition.toLowerCase(), definition);
    }
  }

  if (mapping.size === 0) {
    return toSentenceCase;
  }

  const keys = [...mapping.keys()].sort((a, b) => b.length - a.length);
  const pattern = new RegExp(
    `(?<![A-Za-z0-9])(${keys.map(escapeRegExp).join('|')})(?![A-Za-z0-9])`,
    'gi'
  );

  return (text: string): string =>
    toSentenceCase(text).replace(pattern, (match) => mapping.get(match.toLowerCase()) ?? match);
};
