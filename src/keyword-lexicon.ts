/**
 * Keyword Lexicon - Change-group keywords and their known misspellings
 *
 * Loaded once from data/keyword-lexicon.json and never mutated.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface KeywordLexicon {
  keywords: readonly string[];
  /** Correct keyword, keyed by each misspelling */
  misspellings: ReadonlyMap<string, string>;
  forbiddenMarkers: readonly string[];
}

interface LexiconFile {
  keywords: string[];
  misspellings: Record<string, string[]>;
  forbiddenMarkers: string[];
}

const LEXICON_PATH = path.join(__dirname, '..', 'data', 'keyword-lexicon.json');

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isLexiconFile(value: unknown): value is LexiconFile {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('keywords' in value) || !('misspellings' in value) || !('forbiddenMarkers' in value)) {
    return false;
  }
  const misspellings = value.misspellings;
  return isStringArray(value.keywords) &&
    isStringArray(value.forbiddenMarkers) &&
    typeof misspellings === 'object' &&
    misspellings !== null &&
    Object.values(misspellings).every(isStringArray);
}

/**
 * Parse lexicon JSON content. Throws if the content has the wrong shape.
 */
export function parseLexicon(content: string): KeywordLexicon {
  const data: unknown = JSON.parse(content);
  if (!isLexiconFile(data)) {
    throw new Error('Keyword lexicon has an invalid shape');
  }

  const misspellings = new Map<string, string>();
  for (const [keyword, variants] of Object.entries(data.misspellings)) {
    for (const variant of variants) {
      misspellings.set(variant, keyword);
    }
  }

  return Object.freeze({
    keywords: Object.freeze([...data.keywords]),
    misspellings,
    forbiddenMarkers: Object.freeze([...data.forbiddenMarkers])
  });
}

export function loadLexicon(filePath: string = LEXICON_PATH): KeywordLexicon {
  return parseLexicon(fs.readFileSync(filePath, 'utf-8'));
}

export const KEYWORD_LEXICON: KeywordLexicon = loadLexicon();
