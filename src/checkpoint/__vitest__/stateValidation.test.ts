import { describe, it, expect } from 'vitest';
import { createEmptyState, recoverCheckpointState, validateCheckpointState } from '../stateValidation.js';

const NOW = new Date('2024-05-01T10:00:00.000Z');

const validRecord = {
  documentId: '12',
  verdict: 'high_quality',
  consensusReached: true,
  newTitle: 'Lease Agreement',
  processingTimeSeconds: 3.2,
  processedAt: '2024-04-30T09:00:00.000Z',
};

describe('validateCheckpointState', () => {
  it('should accept a well formed state', () => {
    const outcome = validateCheckpointState({
      createdAt: '2024-04-30T08:00:00.000Z',
      lastUpdated: '2024-04-30T09:00:00.000Z',
      documents: { '12': validRecord },
    });

    expect(outcome).toEqual({
      valid: true,
      state: {
        createdAt: '2024-04-30T08:00:00.000Z',
        lastUpdated: '2024-04-30T09:00:00.000Z',
        documents: { '12': validRecord },
      },
    });
  });

  it('should drop null optional fields', () => {
    const outcome = validateCheckpointState({
      createdAt: 'a',
      lastUpdated: 'b',
      documents: { '3': { ...validRecord, documentId: '3', newTitle: null, error: null } },
    });

    expect(outcome.valid).toBe(true);
    if (outcome.valid) {
      expect(outcome.state.documents['3']).not.toHaveProperty('newTitle');
      expect(outcome.state.documents['3']).not.toHaveProperty('error');
    }
  });

  it('should name the missing top-level field', () => {
    expect(validateCheckpointState({ createdAt: 'a', lastUpdated: 'b' })).toEqual({
      valid: false,
      problem: 'missing required field: documents',
    });
  });

  it('should reject non-object roots and documents', () => {
    expect(validateCheckpointState([])).toEqual({ valid: false, problem: 'root is not an object' });
    expect(validateCheckpointState({ createdAt: 'a', lastUpdated: 'b', documents: [] })).toEqual({
      valid: false,
      problem: 'documents is not a keyed collection',
    });
  });

  it('should reject a record filed under the wrong key', () => {
    expect(validateCheckpointState({ createdAt: 'a', lastUpdated: 'b', documents: { '99': validRecord } })).toEqual({
      valid: false,
      problem: 'documents.99.documentId does not match its key',
    });
  });

  it('should reject an unknown verdict kind', () => {
    const outcome = validateCheckpointState({
      createdAt: 'a',
      lastUpdated: 'b',
      documents: { '12': { ...validRecord, verdict: 'medium_quality' } },
    });
    expect(outcome).toEqual({ valid: false, problem: 'documents.12.verdict is not a verdict kind' });
  });
});

describe('recoverCheckpointState', () => {
  it('should start fresh when there is no file', () => {
    expect(recoverCheckpointState(null, NOW)).toEqual({
      status: 'absent',
      state: { createdAt: NOW.toISOString(), lastUpdated: NOW.toISOString(), documents: {} },
    });
  });

  it('should treat undecodable text as corrupt', () => {
    const result = recoverCheckpointState('{invalid json', NOW);

    expect(result.status).toBe('corrupt');
    expect(result.state).toEqual(createEmptyState(NOW));
    expect(result.problem?.startsWith('invalid JSON: ')).toBe(true);
  });

  it('should treat an empty file as corrupt', () => {
    expect(recoverCheckpointState('', NOW).status).toBe('corrupt');
  });

  it('should treat a schema violation as corrupt', () => {
    expect(recoverCheckpointState('{"createdAt":"a","lastUpdated":"b"}', NOW)).toEqual({
      status: 'corrupt',
      state: createEmptyState(NOW),
      problem: 'missing required field: documents',
    });
  });

  it('should keep a valid state untouched', () => {
    const text = JSON.stringify({ createdAt: 'a', lastUpdated: 'b', documents: { '12': validRecord } });
    const result = recoverCheckpointState(text, NOW);

    expect(result.status).toBe('valid');
    expect(result.state.createdAt).toBe('a');
    expect(Object.keys(result.state.documents)).toEqual(['12']);
  });
});
