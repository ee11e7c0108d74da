/**
 * Response Parser - turns a model's free-text answer into a verdict kind
 *
 * Matching is liberal (case-insensitive, anywhere in the text) but never
 * guesses: no canonical phrase, or both of them, is unparseable.
 */

import type { VerdictKind } from './types.js';

export const HIGH_QUALITY_PHRASE = 'high quality';
export const LOW_QUALITY_PHRASE = 'low quality';

export interface ParsedResponse {
  kind: VerdictKind;
  ambiguity?: 'no_phrase' | 'both_phrases';
}

export function classifyResponse(rawText: string): ParsedResponse {
  const text = rawText.toLowerCase();
  const high = text.includes(HIGH_QUALITY_PHRASE);
  const low = text.includes(LOW_QUALITY_PHRASE);

  if (high && low) {
    return { kind: 'unparseable', ambiguity: 'both_phrases' };
  }
  if (high) {
    return { kind: 'high_quality' };
  }
  if (low) {
    return { kind: 'low_quality' };
  }
  return { kind: 'unparseable', ambiguity: 'no_phrase' };
}

export function parseVerdict(rawText: string): VerdictKind {
  return classifyResponse(rawText).kind;
}
