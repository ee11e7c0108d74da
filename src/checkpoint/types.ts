/**
 * Checkpoint Types
 *
 * The persisted shape is the durable contract between runs: a checkpoint
 * written by one run must load field for field in the next.
 */

import type { VerdictKind } from '../llm/types.js';

export interface DocumentRecord {
  documentId: string;
  /** Consensus kind, or `unparseable` when no consensus was reached */
  verdict: VerdictKind;
  consensusReached: boolean;
  newTitle?: string;
  error?: string;
  processingTimeSeconds: number;
  processedAt: string;
}

export interface CheckpointState {
  createdAt: string;
  lastUpdated: string;
  documents: Record<string, DocumentRecord>;
}

export interface CheckpointSummary {
  totalProcessed: number;
  highQuality: number;
  lowQuality: number;
  unparseable: number;
  consensusCount: number;
  errorCount: number;
  totalProcessingTimeSeconds: number;
  createdAt: string;
  lastUpdated: string;
}

export type CheckpointLoadStatus = 'absent' | 'valid' | 'corrupt';
