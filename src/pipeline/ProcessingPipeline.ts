/**
 * Processing Pipeline
 *
 * Drives documents one at a time through evaluation, tagging and renaming.
 * Whatever goes wrong with one document is caught and recorded in the
 * checkpoint as that document's outcome before the loop moves on.
 */

import type { CheckpointStore } from '../checkpoint/CheckpointStore.js';
import type { DocumentRecord } from '../checkpoint/types.js';
import type { EnsembleEvaluator, EnsembleResult } from '../consensus/EnsembleEvaluator.js';
import type { DocumentStore, StoredDocument } from '../documents/types.js';
import type { QualityProvider, VerdictKind } from '../llm/types.js';
import type { DocumentOutcome, PipelineOptions, PipelineRunResult, PipelineStats } from './types.js';
import { finalizeTitle } from './titles.js';
import { sleep } from '../utils/http.js';
import { logger } from '../utils/logger.js';

export interface PipelineDependencies {
  evaluator: Pick<EnsembleEvaluator, 'evaluate'>;
  documentStore: DocumentStore;
  checkpoint: CheckpointStore;
  /** Model asked for titles of high quality documents */
  titleProvider: Pick<QualityProvider, 'generateTitle'>;
}

const DEFAULT_OPTIONS: Omit<PipelineOptions, 'lowQualityTagId' | 'highQualityTagId'> = {
  renameDocuments: true,
  skipProcessed: true,
  ignoreAlreadyTagged: false,
  delayBetweenDocumentsMs: 0,
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function elapsedSeconds(startTime: number): number {
  // performance.now() is monotonic
  return Math.max(0, Math.round(performance.now() - startTime)) / 1000;
}

export class ProcessingPipeline {
  private options: PipelineOptions;

  constructor(
    private deps: PipelineDependencies,
    options: Partial<PipelineOptions> & Pick<PipelineOptions, 'lowQualityTagId' | 'highQualityTagId'>
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Process documents in order; resolves once every document has a terminal outcome
   */
  async run(documents: StoredDocument[], overrides: Partial<PipelineOptions> = {}): Promise<PipelineRunResult> {
    const options: PipelineOptions = { ...this.options, ...overrides };
    const startTime = Date.now();
    const outcomes: DocumentOutcome[] = [];
    const stats: PipelineStats = {
      total: documents.length,
      processed: 0,
      skipped: 0,
      highQuality: 0,
      lowQuality: 0,
      noConsensus: 0,
      errors: 0,
      checkpointFailures: 0,
      durationMs: 0,
    };

    logger.info(`Starting processing of ${documents.length} documents`);

    for (const [index, document] of documents.entries()) {
      logger.info(`Processing document ${index + 1}/${documents.length} (ID: ${document.id})`);

      const outcome = await this.processDocument(document, options);
      outcomes.push(outcome);

      if (outcome.status !== 'skipped' && !this.saveRecord(outcome.record)) {
        stats.checkpointFailures++;
      }
      this.count(stats, outcome);
      options.onProgress?.(outcome, index, documents.length);

      if (outcome.status !== 'skipped' && index < documents.length - 1) {
        await sleep(options.delayBetweenDocumentsMs);
      }
    }

    stats.durationMs = Date.now() - startTime;
    logger.info('Processing completed', stats);
    return { stats, outcomes };
  }

  /**
   * Resolve one document to a terminal outcome. Never rejects.
   */
  async processDocument(document: StoredDocument, options: PipelineOptions = this.options): Promise<DocumentOutcome> {
    const documentId = document.id;

    if (options.skipProcessed && this.deps.checkpoint.isProcessed(documentId)) {
      logger.info(`Skipping document ${documentId}: already in checkpoint`);
      return { status: 'skipped', documentId, reason: 'checkpoint' };
    }
    if (options.ignoreAlreadyTagged && document.tags.length > 0) {
      logger.info(`Skipping document ${documentId}: already tagged`);
      return { status: 'skipped', documentId, reason: 'already_tagged' };
    }

    const startTime = performance.now();
    let ensemble: EnsembleResult | undefined;

    try {
      logger.info(`Processing document ID: ${documentId}, title: '${document.title}', content_length: ${document.content.length}`);
      ensemble = await this.deps.evaluator.evaluate(document.content, documentId);

      if (!ensemble.reached || !ensemble.consensus) {
        logger.info(`No consensus for document ${documentId}, leaving it untouched`);
        return {
          status: 'no_consensus',
          documentId,
          ensemble,
          record: this.buildRecord(documentId, 'unparseable', false, startTime),
        };
      }

      if (ensemble.consensus.kind === 'low_quality') {
        await this.deps.documentStore.tagDocument(documentId, options.lowQualityTagId);
        logger.info(`Document ${documentId} tagged as low quality`);
        return {
          status: 'low_quality_tagged',
          documentId,
          ensemble,
          record: this.buildRecord(documentId, 'low_quality', true, startTime),
        };
      }

      await this.deps.documentStore.tagDocument(documentId, options.highQualityTagId);
      logger.info(`Document ${documentId} tagged as high quality`);

      let newTitle: string | undefined;
      let titleError: string | undefined;
      if (options.renameDocuments) {
        try {
          newTitle = await this.applyTitle(document);
        } catch (error) {
          titleError = errorMessage(error);
          logger.error(`Error retitling document ${documentId}`, error);
        }
      }

      return {
        status: 'high_quality_tagged',
        documentId,
        ensemble,
        newTitle,
        titleError,
        record: this.buildRecord(documentId, 'high_quality', true, startTime, {
          newTitle,
          error: titleError,
        }),
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Error processing document ${documentId}`, error);

      const consensus = ensemble?.reached ? ensemble.consensus : undefined;
      return {
        status: 'error',
        documentId,
        ensemble,
        error: message,
        record: this.buildRecord(documentId, consensus?.kind ?? 'unparseable', consensus !== undefined, startTime, {
          error: message,
        }),
      };
    }
  }

  /**
   * Generate, finalize and apply a title. Failures are labelled by the step that failed.
   */
  private async applyTitle(document: StoredDocument): Promise<string> {
    logger.info(`Starting rename process for document ${document.id}`);
    let generated: string;
    try {
      generated = await this.deps.titleProvider.generateTitle(document.content);
    } catch (error) {
      throw new Error(`Title generation failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!generated) {
      logger.warn('LLM returned no title, using fallback');
    }

    const title = finalizeTitle(generated, document.content);
    logger.info(`Renaming document ${document.id} from '${document.title}' to '${title}'`);
    try {
      await this.deps.documentStore.renameDocument(document.id, title);
    } catch (error) {
      throw new Error(`Rename failed: ${errorMessage(error)}`, { cause: error });
    }
    return title;
  }

  private buildRecord(
    documentId: string,
    verdict: VerdictKind,
    consensusReached: boolean,
    startTime: number,
    extra: { newTitle?: string; error?: string } = {}
  ): DocumentRecord {
    const record: DocumentRecord = {
      documentId,
      verdict,
      consensusReached,
      processingTimeSeconds: elapsedSeconds(startTime),
      processedAt: new Date().toISOString(),
    };
    if (extra.newTitle !== undefined) record.newTitle = extra.newTitle;
    if (extra.error !== undefined) record.error = extra.error;
    return record;
  }

  private saveRecord(record: DocumentRecord): boolean {
    try {
      this.deps.checkpoint.append(record);
      return true;
    } catch (error) {
      logger.error(`Failed to write checkpoint for document ${record.documentId}`, error);
      return false;
    }
  }

  private count(stats: PipelineStats, outcome: DocumentOutcome): void {
    switch (outcome.status) {
      case 'skipped':
        stats.skipped++;
        break;
      case 'high_quality_tagged':
        stats.highQuality++;
        stats.processed++;
        break;
      case 'low_quality_tagged':
        stats.lowQuality++;
        stats.processed++;
        break;
      case 'no_consensus':
        stats.noConsensus++;
        break;
      case 'error':
        stats.errors++;
        break;
    }
  }
}
