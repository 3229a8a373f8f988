/**
 * Link Discovery Service
 *
 * Collects document references from one or more listing pages.
 *
 * - Each listing page is fetched and every `a[href]` is classified by the site's link policy
 * - When pagination is enabled, links inside the pagination container are followed
 *   exactly one level deep: pagination found on a paginated page is followed only when
 *   that page is also one of the listing URLs
 * - A page that cannot be fetched is skipped with a warning
 * - Results are deduplicated by id, first occurrence wins
 */

import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import type { LinkPolicy } from '../../config/scraperConfig.js';
import { ConfigurationError, TransportError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { RequestPacer } from '../infrastructure/rateLimiter.js';
import type { DiscoveryResult, DiscoveryWarning, DocumentRef } from '../infrastructure/types.js';
import type { DocumentFetcher } from './DocumentFetcher.js';
import { classifyLink, deduplicateDocuments, toAbsoluteUrl } from './linkClassifier.js';

// Type alias for CheerioAPI (return type of cheerio.load)
type CheerioAPI = ReturnType<typeof cheerio.load>;

export interface LinkDiscoveryOptions {
    linkPolicy: LinkPolicy;
    pagination?: {
        enabled: boolean;
        selector: string;
    };
    /** Timeout for listing page requests */
    timeoutMs?: number;
}

interface ParsedPage {
    documents: DocumentRef[];
    paginationUrls: string[];
}

export class LinkDiscoveryService {
    constructor(
        private readonly fetcher: DocumentFetcher,
        private readonly options: LinkDiscoveryOptions,
        private readonly pacer?: RequestPacer
    ) {}

    async discover(listingUrls: readonly string[]): Promise<DiscoveryResult> {
        if (listingUrls.length === 0) {
            throw new ConfigurationError('No listing URLs supplied for discovery');
        }

        const log = createChildLogger({ component: 'LinkDiscoveryService', policy: this.options.linkPolicy.kind });
        const followPagination = this.options.pagination?.enabled ?? false;
        const documents: DocumentRef[] = [];
        const warnings: DiscoveryWarning[] = [];
        // Every page is fetched at most once, whether it was reached as a listing or via pagination
        const pages = new Map<string, ParsedPage | null>();
        const listingsDone = new Set<string>();

        const load = async (pageUrl: string): Promise<ParsedPage | null> => {
            const known = pages.get(pageUrl);
            if (known !== undefined) {
                return known;
            }
            const page = await this.scanPage(pageUrl, followPagination, warnings, log);
            pages.set(pageUrl, page);
            if (page) {
                documents.push(...page.documents);
            }
            return page;
        };

        for (const listingUrl of listingUrls) {
            const pageKey = toAbsoluteUrl(listingUrl, listingUrl) ?? listingUrl;
            if (listingsDone.has(pageKey)) {
                continue;
            }
            listingsDone.add(pageKey);

            const page = await load(pageKey);
            if (!page) {
                continue;
            }

            // Depth 1: pagination links of paginated pages are only followed when
            // that page is itself a listing URL
            for (const pageUrl of page.paginationUrls) {
                if (!pages.has(pageUrl)) {
                    await load(pageUrl);
                }
            }
        }

        const unique = deduplicateDocuments(documents);
        log.info(
            { listingPages: listingUrls.length, pagesVisited: pages.size, documents: unique.length, warnings: warnings.length },
            'Document discovery completed'
        );
        return { documents: unique, warnings };
    }

    /**
     * Parse listing page markup. Exposed for callers that already hold the HTML.
     */
    parseListingPage(html: string, pageUrl: string, includePagination: boolean): ParsedPage {
        const $ = cheerio.load(html);
        const documents = this.extractDocuments($, pageUrl);
        const paginationUrls = includePagination ? this.extractPaginationUrls($, pageUrl) : [];
        return { documents, paginationUrls };
    }

    private async scanPage(
        pageUrl: string,
        includePagination: boolean,
        warnings: DiscoveryWarning[],
        log: Logger
    ): Promise<ParsedPage | null> {
        let html: string;
        try {
            await this.pacer?.acquire();
            const body = await this.fetcher.fetch(pageUrl, this.options.timeoutMs);
            html = body.toString('utf-8');
        } catch (error) {
            if (!(error instanceof TransportError)) {
                throw error;
            }
            log.warn({ url: pageUrl, statusCode: error.statusCode, error: error.message }, 'Skipping listing page');
            warnings.push({ url: pageUrl, reason: 'fetch-failed' });
            return null;
        }

        const page = this.parseListingPage(html, pageUrl, includePagination);
        log.debug(
            { url: pageUrl, documents: page.documents.length, paginationLinks: page.paginationUrls.length },
            'Scanned listing page'
        );
        return page;
    }

    private extractDocuments($: CheerioAPI, pageUrl: string): DocumentRef[] {
        const documents: DocumentRef[] = [];
        $('a[href]').each((_, element) => {
            const link = $(element);
            const href = link.attr('href');
            if (!href) {
                return;
            }
            const doc = classifyLink(href, link.text(), pageUrl, this.options.linkPolicy);
            if (doc) {
                documents.push(doc);
            }
        });
        return documents;
    }

    private extractPaginationUrls($: CheerioAPI, pageUrl: string): string[] {
        const selector = this.options.pagination?.selector;
        if (!selector) {
            return [];
        }

        const urls = new Set<string>();
        $(selector).find('a[href]').each((_, element) => {
            const href = $(element).attr('href');
            const url = href ? toAbsoluteUrl(href, pageUrl) : null;
            if (url && url !== pageUrl) {
                urls.add(url);
            }
        });
        return [...urls];
    }
}
