import { describe, it, expect } from 'vitest';
import { classifyResponse, parseVerdict } from '../ResponseParser.js';
import { createVerdict, unparseableVerdict, isParseable } from '../verdict.js';

describe('ResponseParser', () => {
  it('should recognise a high quality answer regardless of case', () => {
    expect(parseVerdict('HIGH QUALITY')).toBe('high_quality');
    expect(parseVerdict('After review, this is High Quality.')).toBe('high_quality');
  });

  it('should recognise a low quality answer anywhere in the text', () => {
    expect(parseVerdict('The scan is garbled, so: low quality')).toBe('low_quality');
  });

  it('should treat an answer with neither phrase as unparseable', () => {
    expect(classifyResponse('This document is fine.')).toEqual({
      kind: 'unparseable',
      ambiguity: 'no_phrase',
    });
    expect(parseVerdict('')).toBe('unparseable');
  });

  it('should treat an answer with both phrases as unparseable', () => {
    expect(classifyResponse('Not low quality, actually high quality')).toEqual({
      kind: 'unparseable',
      ambiguity: 'both_phrases',
    });
  });

  it('should not match the phrase split across a line break', () => {
    expect(parseVerdict('high\nquality')).toBe('unparseable');
  });
});

describe('verdict helpers', () => {
  it('should create frozen verdicts without an empty failure field', () => {
    const verdict = createVerdict({
      kind: 'high_quality',
      sourceProviderId: 'model-a',
      rawText: 'high quality',
      latencyMs: 12,
    });

    expect(Object.isFrozen(verdict)).toBe(true);
    expect('failure' in verdict).toBe(false);
    expect(isParseable(verdict)).toBe(true);
  });

  it('should build unparseable verdicts carrying the failure reason', () => {
    const verdict = unparseableVerdict('model-b', 'transient_error', 40);

    expect(verdict).toEqual({
      kind: 'unparseable',
      sourceProviderId: 'model-b',
      rawText: '',
      latencyMs: 40,
      failure: 'transient_error',
    });
    expect(isParseable(verdict)).toBe(false);
  });
});
