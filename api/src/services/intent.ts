/**
 * Intent Reader
 *
 * Cheap lexical reading of a user message: does it ask for quotations, how
 * many, and what emotional state does it describe. The results steer the
 * retrieval depth and add notes to the system prompt.
 */

import type { EmotionalState, Intent } from '@/types/chat';
import lexicon from '../../data/intent-lexicon.json';

const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
};

const COUNT_PATTERN = /\b(one|two|three|four|five|[1-5])\b/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordPattern(phrase: string): RegExp {
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(phrase)}(?=$|[^\\p{L}\\p{N}])`, 'iu');
}

const QUOTE_TRIGGERS = lexicon.quoteTriggers.map((trigger) => trigger.toLowerCase());

const EMOTION_CUES = Object.entries(lexicon.emotions).flatMap(([name, cues]) =>
  cues.map((cue) => ({ name, cue, pattern: wordPattern(cue) })),
);

/**
 * First count word or digit (one..five, 1..5) in the text; 1 when absent.
 */
export function extractQuoteCount(text: string): number {
  const match = COUNT_PATTERN.exec(text);
  if (!match) return 1;
  const token = match[1].toLowerCase();
  return NUMBER_WORDS[token] ?? Number(token);
}

export function isQuoteRequest(text: string): boolean {
  const lower = text.toLowerCase();
  return QUOTE_TRIGGERS.some((trigger) => lower.includes(trigger));
}

/**
 * The emotional state whose cue matches most specifically (longest cue).
 * Equal lengths resolve in lexicon order, so "not loved" reads as sadness
 * while "loved" alone reads as love.
 */
export function detectEmotionalState(text: string): EmotionalState | null {
  let best: EmotionalState | null = null;
  for (const { name, cue, pattern } of EMOTION_CUES) {
    if (!pattern.test(text)) continue;
    if (!best || cue.length > best.cue.length) {
      best = { name, cue };
    }
  }
  return best;
}

export function readIntent(text: string): Intent {
  return {
    quoteRequest: isQuoteRequest(text),
    quoteCount: extractQuoteCount(text),
    emotion: detectEmotionalState(text),
  };
}
