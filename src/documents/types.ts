/**
 * Document store boundary
 */

export interface StoredDocument {
  id: string;
  title: string;
  content: string;
  /** Tag ids already on the document */
  tags: number[];
}

export interface FetchCriteria {
  maxDocuments: number;
  pageSize?: number;
}

export interface DocumentStore {
  fetchDocuments(criteria: FetchCriteria): Promise<StoredDocument[]>;
  tagDocument(documentId: string, tagId: number): Promise<void>;
  renameDocument(documentId: string, newTitle: string): Promise<void>;
}

export class DocumentStoreError extends Error {
  constructor(
    message: string,
    public readonly documentId?: string,
    public readonly statusCode: number = 0,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'DocumentStoreError';
  }
}
