/**
 * Paperless-ngx REST client
 *
 * Fetches documents with their OCR content, adds tags and renames documents.
 * Every call is retried on transient failures with a fixed delay.
 */

import type { DocumentStore, FetchCriteria, StoredDocument } from './types.js';
import { DocumentStoreError } from './types.js';
import { createHttpClient, describeHttpFailure, sleep, trimTrailingSlashes, type HttpClient } from '../utils/http.js';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';

export interface PaperlessClientConfig {
  /** Base API URL, e.g. http://localhost:8000/api */
  apiUrl: string;
  apiToken: string;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
}

const DEFAULT_PAGE_SIZE = 100;

export class PaperlessClient implements DocumentStore {
  private apiUrl: string;
  private apiToken: string;
  private http: HttpClient;
  private timeoutMs: number;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(config: PaperlessClientConfig, http?: HttpClient) {
    this.apiUrl = trimTrailingSlashes(config.apiUrl);
    this.apiToken = config.apiToken;
    this.http = http ?? createHttpClient();
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? 3);
    this.retryDelayMs = config.retryDelayMs ?? 2000;
    logger.info(`PaperlessClient initialized with API URL: ${this.apiUrl}`);
  }

  /**
   * Fetch documents page by page until `maxDocuments` have been seen.
   * Documents with blank content are left out.
   */
  async fetchDocuments(criteria: FetchCriteria): Promise<StoredDocument[]> {
    const pageSize = criteria.pageSize ?? DEFAULT_PAGE_SIZE;
    const documents: StoredDocument[] = [];
    let seen = 0;
    let page: string | null = null;

    logger.info(`Fetching documents (max: ${criteria.maxDocuments})...`);

    do {
      const params: Record<string, string | number> = { page_size: pageSize };
      if (page !== null) params.page = page;

      const data = await this.withRetry('fetch documents', undefined, async () => {
        const response = await this.http.get<unknown>(`${this.apiUrl}/documents/`, {
          headers: this.headers(),
          params,
          timeout: this.timeoutMs,
        });
        return response.data;
      });

      if (!isRecord(data) || !Array.isArray(data.results)) {
        throw new DocumentStoreError('Unexpected document list response: no "results" array');
      }

      for (const entry of data.results) {
        const document = this.toStoredDocument(entry);
        if (document && document.content.trim()) {
          documents.push(document);
        }
      }
      seen += data.results.length;
      page = typeof data.next === 'string' ? new URL(data.next, this.apiUrl).searchParams.get('page') : null;
    } while (seen < criteria.maxDocuments && page !== null);

    const limited = documents.slice(0, criteria.maxDocuments);
    logger.info(`Fetched ${limited.length} documents with content`);
    return limited;
  }

  /**
   * Add a tag, keeping the tags the document already has
   */
  async tagDocument(documentId: string, tagId: number): Promise<void> {
    const existing = await this.getDocument(documentId);

    if (existing.tags.includes(tagId)) {
      logger.info(`Document ${documentId} already has tag ID ${tagId}`);
      return;
    }

    await this.withRetry('tag document', documentId, () =>
      this.http.patch(
        this.documentUrl(documentId),
        { tags: [...existing.tags, tagId] },
        { headers: this.headers(), timeout: this.timeoutMs }
      )
    );
    logger.info(`Successfully tagged document ${documentId} with tag ID ${tagId}`);
  }

  /**
   * Set a new title and read it back to confirm the store took it
   */
  async renameDocument(documentId: string, newTitle: string): Promise<void> {
    logger.info(`Updating title for document ${documentId} to: ${newTitle}`);

    await this.withRetry('rename document', documentId, () =>
      this.http.patch(
        this.documentUrl(documentId),
        { title: newTitle },
        { headers: this.headers(), timeout: this.timeoutMs }
      )
    );

    const current = await this.getDocument(documentId);
    if (current.title !== newTitle) {
      throw new DocumentStoreError(
        `Title update verification failed for document ${documentId}. Expected: '${newTitle}', Got: '${current.title}'`,
        documentId
      );
    }
    logger.info(`Successfully updated title for document ${documentId}`);
  }

  async getDocument(documentId: string): Promise<StoredDocument> {
    const data = await this.withRetry('get document', documentId, async () => {
      const response = await this.http.get<unknown>(this.documentUrl(documentId), {
        headers: this.headers(),
        timeout: this.timeoutMs,
      });
      return response.data;
    });

    const document = this.toStoredDocument(data);
    if (!document) {
      throw new DocumentStoreError(`Unexpected response for document ${documentId}`, documentId);
    }
    return document;
  }

  private toStoredDocument(entry: unknown): StoredDocument | null {
    if (!isRecord(entry)) {
      return null;
    }
    const { id, title, content, tags } = entry;
    if (typeof id !== 'number' && typeof id !== 'string') {
      return null;
    }

    return {
      id: String(id),
      title: typeof title === 'string' ? title : '',
      content: typeof content === 'string' ? content : '',
      tags: Array.isArray(tags) ? tags.filter((tag): tag is number => typeof tag === 'number') : [],
    };
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Token ${this.apiToken}`,
      'Content-Type': 'application/json',
    };
  }

  private documentUrl(documentId: string): string {
    return `${this.apiUrl}/documents/${encodeURIComponent(documentId)}/`;
  }

  private async withRetry<T>(operation: string, documentId: string | undefined, send: () => Promise<T>): Promise<T> {
    let lastError: DocumentStoreError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await send();
      } catch (error) {
        const failure = describeHttpFailure(error);
        lastError = new DocumentStoreError(
          `Failed to ${operation}${documentId ? ` ${documentId}` : ''}: ${failure.message}`,
          documentId,
          failure.statusCode,
          failure.retryable
        );
        if (!failure.retryable) {
          break;
        }
        if (attempt < this.maxAttempts) {
          logger.warn(`${lastError.message} (attempt ${attempt}/${this.maxAttempts}), retrying in ${this.retryDelayMs}ms`);
          await sleep(this.retryDelayMs);
        }
      }
    }

    logger.error(lastError?.message ?? `Failed to ${operation}`);
    throw lastError ?? new DocumentStoreError(`Failed to ${operation}`, documentId);
  }
}
