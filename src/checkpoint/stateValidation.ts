/**
 * Checkpoint validation and recovery
 *
 * Pure functions, no file I/O: the store reads the file and hands the text
 * here on every load, so the recovery rules can be tested on strings.
 */

import type { VerdictKind } from '../llm/types.js';
import type { CheckpointLoadStatus, CheckpointState, DocumentRecord } from './types.js';
import { isRecord } from '../utils/guards.js';

export type ValidationOutcome =
  | { valid: true; state: CheckpointState }
  | { valid: false; problem: string };

export interface RecoveryResult {
  status: CheckpointLoadStatus;
  state: CheckpointState;
  /** What made the content corrupt */
  problem?: string;
}

const VERDICT_KINDS: readonly VerdictKind[] = ['high_quality', 'low_quality', 'unparseable'];

function isVerdictKind(value: unknown): value is VerdictKind {
  return VERDICT_KINDS.some(kind => kind === value);
}

export function createEmptyState(now: Date = new Date()): CheckpointState {
  const timestamp = now.toISOString();
  return { createdAt: timestamp, lastUpdated: timestamp, documents: {} };
}

/**
 * Check one record filed under `key`; returns the problem when it does not fit
 */
export function validateRecord(key: string, value: unknown): DocumentRecord | string {
  if (!isRecord(value)) {
    return `documents.${key} is not an object`;
  }

  const { documentId, verdict, consensusReached, newTitle, error, processingTimeSeconds, processedAt } = value;

  if (documentId !== key) {
    return `documents.${key}.documentId does not match its key`;
  }
  if (!isVerdictKind(verdict)) {
    return `documents.${key}.verdict is not a verdict kind`;
  }
  if (typeof consensusReached !== 'boolean') {
    return `documents.${key}.consensusReached is not a boolean`;
  }
  if (typeof processingTimeSeconds !== 'number' || !Number.isFinite(processingTimeSeconds) || processingTimeSeconds < 0) {
    return `documents.${key}.processingTimeSeconds is not a non-negative number`;
  }
  if (typeof processedAt !== 'string') {
    return `documents.${key}.processedAt is not a string`;
  }
  if (newTitle !== undefined && newTitle !== null && typeof newTitle !== 'string') {
    return `documents.${key}.newTitle is not a string`;
  }
  if (error !== undefined && error !== null && typeof error !== 'string') {
    return `documents.${key}.error is not a string`;
  }

  const record: DocumentRecord = {
    documentId: key,
    verdict,
    consensusReached,
    processingTimeSeconds,
    processedAt,
  };
  if (typeof newTitle === 'string') record.newTitle = newTitle;
  if (typeof error === 'string') record.error = error;
  return record;
}

/**
 * Check a decoded value against the checkpoint schema
 */
export function validateCheckpointState(value: unknown): ValidationOutcome {
  if (!isRecord(value)) {
    return { valid: false, problem: 'root is not an object' };
  }

  for (const field of ['createdAt', 'lastUpdated', 'documents'] as const) {
    if (!(field in value)) {
      return { valid: false, problem: `missing required field: ${field}` };
    }
  }

  const { createdAt, lastUpdated, documents } = value;
  if (typeof createdAt !== 'string' || typeof lastUpdated !== 'string') {
    return { valid: false, problem: 'createdAt and lastUpdated must be strings' };
  }
  if (!isRecord(documents)) {
    return { valid: false, problem: 'documents is not a keyed collection' };
  }

  const entries: [string, DocumentRecord][] = [];
  for (const [key, entry] of Object.entries(documents)) {
    const record = validateRecord(key, entry);
    if (typeof record === 'string') {
      return { valid: false, problem: record };
    }
    entries.push([key, record]);
  }
  // fromEntries defines own keys, so an id like "__proto__" stays a record
  const records: Record<string, DocumentRecord> = Object.fromEntries(entries);

  return { valid: true, state: { createdAt, lastUpdated, documents: records } };
}

/**
 * Decide what a run starts from, given the checkpoint file's text
 * (`null` when there is no file). Never throws.
 */
export function recoverCheckpointState(rawText: string | null, now: Date = new Date()): RecoveryResult {
  if (rawText === null) {
    return { status: 'absent', state: createEmptyState(now) };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(rawText);
  } catch (error) {
    return {
      status: 'corrupt',
      state: createEmptyState(now),
      problem: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const outcome = validateCheckpointState(decoded);
  if (!outcome.valid) {
    return { status: 'corrupt', state: createEmptyState(now), problem: outcome.problem };
  }
  return { status: 'valid', state: outcome.state };
}
