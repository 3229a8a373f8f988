/**
 * Document Search Pipeline
 *
 * Wires discovery, the document cache and keyword search for one configured
 * site. The pipeline object is meant to live for the whole process: its caches
 * carry discovered documents and extracted text across searches for the
 * validity window.
 */

import { loadSearchConfig, type SearchConfig } from '../../config/scraperConfig.js';
import { PdfExtractor, type TextExtractor } from '../../extraction/pdf/PdfExtractor.js';
import { createChildLogger, searchContext } from '../../utils/logger.js';
import { HttpDocumentFetcher, type DocumentFetcher } from '../document-discovery/DocumentFetcher.js';
import { LinkDiscoveryService } from '../document-discovery/LinkDiscoveryService.js';
import { Cache } from '../infrastructure/cache.js';
import { DocumentCache } from '../infrastructure/DocumentCache.js';
import { RequestPacer } from '../infrastructure/rateLimiter.js';
import type { DiscoveryResult, DiscoveryWarning, SearchReport } from '../infrastructure/types.js';
import { KeywordSearchService, type KeywordSearchOptions } from './KeywordSearchService.js';

export interface DocumentSearchPipelineDeps {
    fetcher?: DocumentFetcher;
    extractor?: TextExtractor;
    pacer?: RequestPacer;
    now?: () => number;
}

export interface PipelineSearchReport extends SearchReport {
    /** Documents found on the listing pages, before searching */
    documentsDiscovered: number;
    discoveryWarnings: DiscoveryWarning[];
}

export interface PipelineSearchOptions extends KeywordSearchOptions {
    /** Re-read listing pages even when a discovery result is cached */
    refreshDiscovery?: boolean;
}

export class DocumentSearchPipeline {
    readonly documentCache: DocumentCache;
    private readonly discovery: LinkDiscoveryService;
    private readonly searchService: KeywordSearchService;
    private readonly discoveryCache: Cache<DiscoveryResult>;

    constructor(
        readonly config: SearchConfig = loadSearchConfig(),
        deps: DocumentSearchPipelineDeps = {}
    ) {
        const fetcher = deps.fetcher ?? new HttpDocumentFetcher({
            userAgent: config.userAgent,
            timeoutMs: config.timeouts.pageMs,
        });
        const pacer = deps.pacer ?? new RequestPacer({ minIntervalMs: config.site.requestDelayMs });

        this.discovery = new LinkDiscoveryService(
            fetcher,
            {
                linkPolicy: config.site.linkPolicy,
                pagination: config.site.pagination,
                timeoutMs: config.timeouts.pageMs,
            },
            pacer
        );
        this.documentCache = new DocumentCache({
            fetcher,
            extractor: deps.extractor ?? new PdfExtractor(),
            ttlMs: config.cacheTtlMs,
            timeoutMs: config.timeouts.documentMs,
            pacer,
            now: deps.now,
        });
        this.discoveryCache = new Cache<DiscoveryResult>({ maxSize: 16, ttl: config.cacheTtlMs, now: deps.now });
        this.searchService = new KeywordSearchService(this.documentCache, { concurrency: config.concurrency });
    }

    /**
     * Discover documents on the configured listing pages. Results are memoized
     * for the validity window; runs that produced warnings are not memoized.
     */
    async discoverDocuments(refresh: boolean = false): Promise<DiscoveryResult> {
        const key = this.config.site.listingUrls.join('\n');
        if (!refresh) {
            const cached = this.discoveryCache.get(key);
            if (cached) {
                return cached;
            }
        }

        const result = await this.discovery.discover(this.config.site.listingUrls);
        if (result.warnings.length === 0) {
            this.discoveryCache.set(key, result);
        }
        return result;
    }

    /**
     * Discover, then search every discovered document for `keyword`
     */
    async search(keyword: string, options: PipelineSearchOptions = {}): Promise<PipelineSearchReport> {
        return searchContext.run({ site: this.config.site.name, keyword }, async () => {
            const log = createChildLogger({ component: 'DocumentSearchPipeline' });
            const discovered = await this.discoverDocuments(options.refreshDiscovery ?? false);
            log.info({ documents: discovered.documents.length, warnings: discovered.warnings.length }, 'Documents discovered');

            const report = await this.searchService.search(discovered.documents, keyword, options);
            return {
                ...report,
                documentsDiscovered: discovered.documents.length,
                discoveryWarnings: discovered.warnings,
            };
        });
    }
}
