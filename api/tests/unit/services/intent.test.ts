import { describe, it, expect } from 'vitest';
import {
  detectEmotionalState,
  extractQuoteCount,
  isQuoteRequest,
  readIntent,
} from '@/services/intent';

describe('extractQuoteCount', () => {
  it('should read number words and digits', () => {
    expect(extractQuoteCount('Share three quotes with me')).toBe(3);
    expect(extractQuoteCount('give me 2 quotations')).toBe(2);
    expect(extractQuoteCount('FIVE please')).toBe(5);
  });

  it('should take the first count in the text', () => {
    expect(extractQuoteCount('two or three quotes')).toBe(2);
  });

  it('should default to one', () => {
    expect(extractQuoteCount('share a quote')).toBe(1);
  });

  it('should ignore counts outside 1-5 and partial words', () => {
    expect(extractQuoteCount('give me 7 quotes')).toBe(1);
    expect(extractQuoteCount('someone asked for a quote')).toBe(1);
    expect(extractQuoteCount('quote 15')).toBe(1);
  });
});

describe('isQuoteRequest', () => {
  it('should match quote triggers case-insensitively', () => {
    expect(isQuoteRequest('Can you share a Quote?')).toBe(true);
    expect(isQuoteRequest('What do the Hidden Words say about patience?')).toBe(true);
    expect(isQuoteRequest('I need some spiritual guidance')).toBe(true);
  });

  it('should not match ordinary conversation', () => {
    expect(isQuoteRequest('How are you today?')).toBe(false);
  });
});

describe('detectEmotionalState', () => {
  it('should detect a state from its cue', () => {
    expect(detectEmotionalState('I feel so anxious about tomorrow')).toEqual({
      name: 'anxiety',
      cue: 'anxious',
    });
  });

  it('should prefer the more specific cue', () => {
    expect(detectEmotionalState('I feel not loved')?.name).toBe('sadness');
    expect(detectEmotionalState('I feel loved')?.name).toBe('love');
  });

  it('should match whole words only', () => {
    // "sad" inside "crusade", "mad" inside "made"
    expect(detectEmotionalState('They made a crusade')).toBeNull();
  });

  it('should return null when nothing matches', () => {
    expect(detectEmotionalState('What time is it?')).toBeNull();
  });
});

describe('readIntent', () => {
  it('should combine all three readings', () => {
    expect(readIntent('I am grateful, share two quotes')).toEqual({
      quoteRequest: true,
      quoteCount: 2,
      emotion: { name: 'gratitude', cue: 'grateful' },
    });
  });
});
