/**
 * Optional pre-screen of the user's question for modification intent.
 * Runs before any oracle call; the validator stays the authoritative gate.
 */

import { wordPattern } from './keywords.js';

const WRITE_INTENT_WORDS = [
  'delete',
  'remove',
  'drop',
  'erase',
  'update',
  'modify',
  'alter',
  'insert',
  'create',
  'truncate',
  'wipe',
];

const WRITE_INTENT_PATTERNS = WRITE_INTENT_WORDS.map((word) => ({ word, re: wordPattern(word) }));

/** Returns the first modification verb found in the question, or null */
export function screenQuestion(question: string): string | null {
  return WRITE_INTENT_PATTERNS.find(({ re }) => re.test(question))?.word ?? null;
}
