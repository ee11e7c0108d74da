/**
 * Processing Pipeline Types
 */

import type { DocumentRecord } from '../checkpoint/types.js';
import type { EnsembleResult } from '../consensus/EnsembleEvaluator.js';

export type OutcomeStatus =
  | 'skipped'
  | 'high_quality_tagged'
  | 'low_quality_tagged'
  | 'no_consensus'
  | 'error';

export type SkipReason = 'checkpoint' | 'already_tagged';

interface EvaluatedOutcome {
  documentId: string;
  record: DocumentRecord;
  ensemble: EnsembleResult;
}

/**
 * Terminal state of one document
 */
export type DocumentOutcome =
  | { status: 'skipped'; documentId: string; reason: SkipReason }
  | (EvaluatedOutcome & { status: 'high_quality_tagged'; newTitle?: string; titleError?: string })
  | (EvaluatedOutcome & { status: 'low_quality_tagged' })
  | (EvaluatedOutcome & { status: 'no_consensus' })
  | { status: 'error'; documentId: string; record: DocumentRecord; error: string; ensemble?: EnsembleResult };

export interface PipelineStats {
  total: number;
  /** Documents that reached a tagging decision */
  processed: number;
  skipped: number;
  highQuality: number;
  lowQuality: number;
  noConsensus: number;
  errors: number;
  /** Outcomes that could not be written to the checkpoint */
  checkpointFailures: number;
  durationMs: number;
}

export interface PipelineRunResult {
  stats: PipelineStats;
  outcomes: DocumentOutcome[];
}

export interface PipelineOptions {
  lowQualityTagId: number;
  highQualityTagId: number;
  /** Generate and apply a title for high quality documents */
  renameDocuments: boolean;
  /** Skip documents the checkpoint already has a record for */
  skipProcessed: boolean;
  /** Skip documents that already carry any tag */
  ignoreAlreadyTagged: boolean;
  /** Pause between documents, sparing locally hosted model backends */
  delayBetweenDocumentsMs: number;
  onProgress?: (outcome: DocumentOutcome, index: number, total: number) => void;
}
