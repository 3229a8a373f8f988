/**
 * Keyword Search Service
 *
 * Scans a list of documents for a keyword: text comes from the DocumentCache,
 * matching is case-insensitive, and each matching document yields its total
 * occurrence count plus up to five context snippets.
 *
 * Results are ranked by descending count, ties in input order. With
 * `concurrency > 1` downloads overlap, but results are collected by input
 * index and ranked afterwards, so the output equals the sequential output.
 * Cancellation is cooperative and takes effect between documents.
 */

import type { Logger } from 'pino';
import { SearchCancelledError } from '../../types/errors.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { createChildLogger } from '../../utils/logger.js';
import type { DocumentCache } from '../infrastructure/DocumentCache.js';
import type {
    DocumentRef,
    FailedDocument,
    SearchProgress,
    SearchReport,
    SearchResult,
} from '../infrastructure/types.js';
import { applyMinimumOccurrences, matchDocument, rankResults } from './keywordMatcher.js';
import { parseSearchInput } from './searchOptions.js';

export interface KeywordSearchOptions {
    /** Results below this count are dropped after ranking (default 1) */
    minOccurrences?: number;
    onProgress?: (progress: SearchProgress) => void;
    signal?: AbortSignal;
    /** On cancellation, resolve with what was processed instead of rejecting */
    partialOnCancel?: boolean;
}

export interface KeywordSearchServiceOptions {
    /** Documents fetched/extracted at the same time (default 1) */
    concurrency?: number;
}

type DocumentOutcome =
    | { kind: 'match'; result: SearchResult }
    | { kind: 'no-match' }
    | { kind: 'failed'; failure: FailedDocument }
    | { kind: 'skipped' };

export class KeywordSearchService {
    private readonly concurrency: number;

    constructor(
        private readonly cache: DocumentCache,
        options: KeywordSearchServiceOptions = {}
    ) {
        this.concurrency = options.concurrency ?? 1;
    }

    async search(
        documents: readonly DocumentRef[],
        keyword: string,
        options: KeywordSearchOptions = {}
    ): Promise<SearchReport> {
        // Created per call so that the caller's search context is attached
        const log = createChildLogger({ component: 'KeywordSearchService' });
        const input = parseSearchInput({ keyword, minOccurrences: options.minOccurrences });
        const total = documents.length;
        let processed = 0;

        log.info({ keyword: input.keyword, documents: total, concurrency: this.concurrency }, 'Starting keyword search');

        const outcomes = await mapWithConcurrency(documents, this.concurrency, async (document): Promise<DocumentOutcome> => {
            if (options.signal?.aborted) {
                return { kind: 'skipped' };
            }

            const outcome = await this.searchDocument(document, input.keyword, log);
            processed++;
            options.onProgress?.({ index: processed, total, document });
            return outcome;
        });

        const cancelled = options.signal?.aborted === true && processed < total;
        if (cancelled && !options.partialOnCancel) {
            log.info({ processed, total }, 'Keyword search cancelled');
            throw new SearchCancelledError(processed, total);
        }

        const matches: SearchResult[] = [];
        const failedDocuments: FailedDocument[] = [];
        for (const outcome of outcomes) {
            if (outcome.kind === 'match') {
                matches.push(outcome.result);
            } else if (outcome.kind === 'failed') {
                failedDocuments.push(outcome.failure);
            }
        }

        const ranked = rankResults(matches);
        const results = applyMinimumOccurrences(ranked, input.minOccurrences);

        log.info(
            {
                keyword: input.keyword,
                searched: processed,
                matched: ranked.length,
                returned: results.length,
                failed: failedDocuments.length,
                cancelled,
            },
            'Keyword search completed'
        );

        return {
            keyword: input.keyword,
            results,
            matchedDocuments: ranked.length,
            documentsSearched: processed,
            failedDocuments,
            cancelled,
        };
    }

    private async searchDocument(document: DocumentRef, keyword: string, log: Logger): Promise<DocumentOutcome> {
        try {
            const entry = await this.cache.getEntry(document);
            if (entry.status !== 'ok') {
                return { kind: 'failed', failure: { document, reason: entry.status } };
            }

            const match = matchDocument(document, entry.extractedText, keyword);
            return match ? { kind: 'match', result: match } : { kind: 'no-match' };
        } catch (error) {
            // One bad document never aborts the batch
            log.warn(
                { id: document.id, url: document.url, error: error instanceof Error ? error.message : String(error) },
                'Document search failed'
            );
            return { kind: 'failed', failure: { document, reason: 'unreadable' } };
        }
    }
}
