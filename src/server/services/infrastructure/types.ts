/**
 * A document discovered on a listing page.
 *
 * `id` is the absolute URL for direct links, or the identifier query parameter
 * for download-endpoint links (in which case `url` is the synthesized download URL).
 */
export interface DocumentRef {
  readonly id: string;
  readonly url: string;
  readonly title?: string;
}

/**
 * Outcome of a cache fill
 * - ok: text extracted
 * - no-text: parsed, but no page carried a text layer (e.g. scanned)
 * - unreadable: payload is not a parseable document
 * - fetch-failed: transport error while downloading
 */
export type CacheEntryStatus = 'ok' | 'no-text' | 'unreadable' | 'fetch-failed';

export interface CacheEntry {
  readonly key: string;
  readonly rawBytes?: Buffer;
  readonly extractedText: string;
  readonly fetchedAt: number;
  readonly status: CacheEntryStatus;
  readonly pageCount: number;
}

export type FailureReason = Exclude<CacheEntryStatus, 'ok'>;

export interface FailedDocument {
  readonly document: DocumentRef;
  readonly reason: FailureReason;
}

export interface SearchResult {
  readonly document: DocumentRef;
  readonly occurrenceCount: number;
  readonly snippets: readonly string[];
}

export interface SearchProgress {
  /** 1-based count of documents processed so far */
  index: number;
  total: number;
  document: DocumentRef;
}

export interface SearchReport {
  keyword: string;
  /** Ranked and filtered by the minimum occurrence threshold */
  results: SearchResult[];
  /** Number of matching documents before the threshold was applied */
  matchedDocuments: number;
  documentsSearched: number;
  failedDocuments: FailedDocument[];
  cancelled: boolean;
}

export interface DiscoveryWarning {
  url: string;
  reason: 'fetch-failed';
}

export interface DiscoveryResult {
  documents: DocumentRef[];
  warnings: DiscoveryWarning[];
}
