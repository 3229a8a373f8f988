/**
 * Document Cache
 *
 * Memoizes "fetch bytes, then extract text" per document id for a validity
 * window. Failed fetches are cached too (as empty text with status
 * `fetch-failed`), so a broken document is retried only after its entry expires.
 * At most one fill per key is in flight; concurrent callers share it.
 */

import type { Logger } from 'pino';
import type { TextExtractor } from '../../extraction/pdf/PdfExtractor.js';
import { TransportError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { DocumentFetcher } from '../document-discovery/DocumentFetcher.js';
import { Cache, type CacheStats } from './cache.js';
import type { RequestPacer } from './rateLimiter.js';
import type { CacheEntry, CacheEntryStatus, DocumentRef } from './types.js';

export interface DocumentCacheOptions {
    fetcher: DocumentFetcher;
    extractor: TextExtractor;
    /** Validity window in milliseconds (default 24h) */
    ttlMs?: number;
    /** Timeout passed to the fetcher for document downloads */
    timeoutMs?: number;
    pacer?: RequestPacer;
    /** Keep downloaded bytes on the entry; off by default to bound memory */
    retainRawBytes?: boolean;
    maxEntries?: number;
    now?: () => number;
}

export interface DocumentCacheStats extends CacheStats {
    fills: number;
    inFlight: number;
}

export class DocumentCache {
    private readonly entries: Cache<CacheEntry>;
    private readonly inFlight = new Map<string, Promise<CacheEntry>>();
    private readonly fetcher: DocumentFetcher;
    private readonly extractor: TextExtractor;
    private readonly timeoutMs?: number;
    private readonly pacer?: RequestPacer;
    private readonly retainRawBytes: boolean;
    private readonly now: () => number;
    private fills = 0;

    constructor(options: DocumentCacheOptions) {
        this.fetcher = options.fetcher;
        this.extractor = options.extractor;
        this.timeoutMs = options.timeoutMs;
        this.pacer = options.pacer;
        this.retainRawBytes = options.retainRawBytes ?? false;
        this.now = options.now ?? Date.now;
        this.entries = new Cache<CacheEntry>({
            ttl: options.ttlMs ?? 24 * 60 * 60 * 1000,
            maxSize: options.maxEntries ?? 5000,
            now: this.now,
        });
    }

    async getText(ref: DocumentRef): Promise<string> {
        const entry = await this.getEntry(ref);
        return entry.extractedText;
    }

    /**
     * Return the valid entry for `ref.id`, filling it when missing or expired
     */
    async getEntry(ref: DocumentRef): Promise<CacheEntry> {
        const cached = this.entries.get(ref.id);
        if (cached) {
            return cached;
        }

        const pending = this.inFlight.get(ref.id);
        if (pending) {
            return pending;
        }

        const fill = this.fill(ref).finally(() => {
            this.inFlight.delete(ref.id);
        });
        this.inFlight.set(ref.id, fill);
        return fill;
    }

    peek(id: string): CacheEntry | undefined {
        return this.entries.peek(id);
    }

    invalidate(id: string): boolean {
        return this.entries.delete(id);
    }

    clear(): void {
        this.entries.clear();
        this.fills = 0;
    }

    stats(): DocumentCacheStats {
        return {
            ...this.entries.getStats(),
            fills: this.fills,
            inFlight: this.inFlight.size,
        };
    }

    private async fill(ref: DocumentRef): Promise<CacheEntry> {
        this.fills++;
        const log = createChildLogger({ component: 'DocumentCache' });

        let bytes: Buffer;
        try {
            await this.pacer?.acquire();
            bytes = await this.fetcher.fetch(ref.url, this.timeoutMs);
        } catch (error) {
            if (!(error instanceof TransportError)) {
                throw error;
            }
            log.warn({ id: ref.id, url: ref.url, statusCode: error.statusCode, error: error.message }, 'Document download failed');
            return this.store(ref, { extractedText: '', status: 'fetch-failed', pageCount: 0 }, log);
        }

        const extraction = await this.extractor.extractDetailed(bytes);
        let status: CacheEntryStatus = 'ok';
        if (!extraction.readable) {
            status = 'unreadable';
        } else if (extraction.text.length === 0) {
            status = 'no-text';
        }

        return this.store(ref, {
            extractedText: extraction.text,
            status,
            pageCount: extraction.pageCount,
            rawBytes: this.retainRawBytes ? bytes : undefined,
        }, log);
    }

    private store(ref: DocumentRef, data: Omit<CacheEntry, 'key' | 'fetchedAt'>, log: Logger): CacheEntry {
        const fetchedAt = this.now();
        const entry: CacheEntry = { key: ref.id, fetchedAt, ...data };
        this.entries.set(ref.id, entry, fetchedAt);
        log.debug({ id: ref.id, status: entry.status, textLength: entry.extractedText.length }, 'Cached document');
        return entry;
    }
}
