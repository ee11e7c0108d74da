/**
 * Checkpoint Store
 *
 * Records the final outcome of every processed document in one JSON file so
 * an interrupted batch resumes where it stopped. Every write replaces the file
 * atomically (temp file, fsync, rename): a crash loses at most the record in
 * flight. A damaged file is never fatal; the store starts fresh instead.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CheckpointLoadStatus, CheckpointState, CheckpointSummary, DocumentRecord } from './types.js';
import { createEmptyState, recoverCheckpointState, validateRecord } from './stateValidation.js';
import { logger } from '../utils/logger.js';

/**
 * A record that would not load back; written, it would make the whole file corrupt
 */
export class CheckpointRecordError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly problem: string
  ) {
    super(`Refusing to write checkpoint record for document ${documentId}: ${problem}`);
    this.name = 'CheckpointRecordError';
  }
}

export class CheckpointStore {
  private state: CheckpointState | null = null;
  private lastLoadStatus: CheckpointLoadStatus | null = null;
  private readonly tempPath: string;

  constructor(private readonly filePath: string) {
    this.tempPath = `${filePath}.tmp`;
  }

  /**
   * Load the checkpoint, creating or resetting the file when needed
   */
  load(): CheckpointState {
    const rawText = this.readFile();
    const { status, state, problem } = recoverCheckpointState(rawText);

    switch (status) {
      case 'absent':
        logger.info(`No checkpoint found at ${this.filePath}, starting a new one`);
        this.persist(state);
        break;
      case 'corrupt':
        logger.error(`Checkpoint ${this.filePath} is corrupt, discarding it and starting fresh`, { problem });
        this.persist(state);
        break;
      case 'valid':
        logger.info(`Loaded checkpoint with ${Object.keys(state.documents).length} processed documents`, {
          file: this.filePath,
          lastUpdated: state.lastUpdated,
        });
        break;
    }

    this.state = state;
    this.lastLoadStatus = status;
    return structuredClone(state);
  }

  /**
   * Record one document outcome; returns once the file is on disk
   */
  append(record: DocumentRecord): void {
    const checked = validateRecord(record.documentId, record);
    if (typeof checked === 'string') {
      throw new CheckpointRecordError(record.documentId, checked);
    }

    const current = this.current();
    if (Object.hasOwn(current.documents, record.documentId)) {
      logger.warn(`Document ${record.documentId} already has a checkpoint record, replacing it`);
    }

    const next: CheckpointState = {
      createdAt: current.createdAt,
      lastUpdated: new Date().toISOString(),
      documents: { ...current.documents, [record.documentId]: checked },
    };
    this.persist(next);
    this.state = next;
    logger.debug(`Checkpoint saved for document ${record.documentId}`);
  }

  isProcessed(documentId: string): boolean {
    return Object.hasOwn(this.current().documents, documentId);
  }

  getRecord(documentId: string): DocumentRecord | undefined {
    const documents = this.current().documents;
    return Object.hasOwn(documents, documentId) ? { ...documents[documentId] } : undefined;
  }

  summary(): CheckpointSummary {
    const state = this.current();
    const summary: CheckpointSummary = {
      totalProcessed: 0,
      highQuality: 0,
      lowQuality: 0,
      unparseable: 0,
      consensusCount: 0,
      errorCount: 0,
      totalProcessingTimeSeconds: 0,
      createdAt: state.createdAt,
      lastUpdated: state.lastUpdated,
    };

    for (const record of Object.values(state.documents)) {
      summary.totalProcessed++;
      summary.totalProcessingTimeSeconds += record.processingTimeSeconds;
      if (record.consensusReached) summary.consensusCount++;
      if (record.error) summary.errorCount++;

      switch (record.verdict) {
        case 'high_quality':
          summary.highQuality++;
          break;
        case 'low_quality':
          summary.lowQuality++;
          break;
        case 'unparseable':
          summary.unparseable++;
          break;
      }
    }

    return summary;
  }

  /**
   * Reset to an empty checkpoint. Safe to call repeatedly.
   */
  clear(): void {
    const fresh = createEmptyState();
    this.persist(fresh);
    this.state = fresh;
    logger.info(`Checkpoint ${this.filePath} cleared`);
  }

  getFilePath(): string {
    return this.filePath;
  }

  getLastLoadStatus(): CheckpointLoadStatus | null {
    return this.lastLoadStatus;
  }

  private current(): CheckpointState {
    if (this.state) {
      return this.state;
    }
    this.load();
    return this.state ?? createEmptyState();
  }

  private readFile(): string | null {
    try {
      return fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      logger.error(`Failed to read checkpoint ${this.filePath}`, error);
      // Unreadable counts as corrupt: recovery replaces it
      return '';
    }
  }

  private persist(state: CheckpointState): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

    const fd = fs.openSync(this.tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(state, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    this.moveAsideIfNotFile();
    fs.renameSync(this.tempPath, this.filePath);
  }

  /**
   * A directory or other non-file at the checkpoint path cannot be replaced
   * by rename; it is moved to `<path>.corrupt-<timestamp>` first
   */
  private moveAsideIfNotFile(): void {
    let stats: fs.Stats;
    try {
      stats = fs.lstatSync(this.filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }
    if (stats.isFile()) {
      return;
    }

    const asidePath = `${this.filePath}.corrupt-${Date.now()}`;
    fs.renameSync(this.filePath, asidePath);
    logger.error(`Checkpoint path ${this.filePath} was not a file, moved it to ${asidePath}`);
  }
}
