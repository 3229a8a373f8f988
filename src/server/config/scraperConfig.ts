/**
 * Scraper Configuration
 *
 * Site presets and the resolved configuration for the discovery/search pipeline.
 * A site is described by its listing pages, a link classification policy and
 * whether pagination is followed.
 */

import { z } from 'zod';
import { validateEnv, type Env } from './env.js';
import { HTTP_TIMEOUTS } from './httpClient.js';
import { ConfigurationError } from '../types/errors.js';

const DirectLinkPolicySchema = z.object({
    kind: z.literal('direct'),
    // File extension including the dot, matched case-insensitively against the URL path
    extension: z.string().regex(/^\.[A-Za-z0-9]+$/, 'Extension must look like ".pdf"').default('.pdf'),
});

const IndirectLinkPolicySchema = z.object({
    kind: z.literal('indirect'),
    // Substring that marks an href as pointing at the download endpoint
    endpointMarker: z.string().min(1),
    idParam: z.string().min(1),
    downloadEndpoint: z.string().url(),
});

export const LinkPolicySchema = z.discriminatedUnion('kind', [
    DirectLinkPolicySchema,
    IndirectLinkPolicySchema,
]);

export const SiteConfigSchema = z.object({
    name: z.string().min(1),
    listingUrls: z.array(z.string().url()).min(1, 'At least one listing URL is required'),
    linkPolicy: LinkPolicySchema,
    pagination: z.object({
        enabled: z.boolean(),
        // Container holding the "page N" links
        selector: z.string().min(1).default('ul.pagination'),
    }),
    requestDelayMs: z.number().int().min(0).default(500),
});

export type DirectLinkPolicy = z.infer<typeof DirectLinkPolicySchema>;
export type IndirectLinkPolicy = z.infer<typeof IndirectLinkPolicySchema>;
export type LinkPolicy = z.infer<typeof LinkPolicySchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type SiteConfigInput = z.input<typeof SiteConfigSchema>;

export const scraperConfig = {
    // Request timeouts
    timeouts: {
        page: HTTP_TIMEOUTS.PAGE,
        document: HTTP_TIMEOUTS.DOCUMENT,
    },

    // Validity window for cached documents and discovery results
    cache: {
        documentTTL: 24 * 60 * 60 * 1000, // 24 hours
    },

    userAgent: 'Mozilla/5.0 (compatible; DocSearch-Bot/1.0)',

    // Built-in deployments
    sites: {
        'sec-notifications': {
            name: 'sec-notifications',
            listingUrls: ['https://cdsco.gov.in/opencms/opencms/en/Notifications/SEC/'],
            linkPolicy: { kind: 'direct', extension: '.pdf' },
            pagination: { enabled: false },
            requestDelayMs: 100,
        },
        'sec-committees': {
            name: 'sec-committees',
            listingUrls: ['https://cdsco.gov.in/opencms/opencms/en/Committees/SEC/'],
            linkPolicy: {
                kind: 'indirect',
                endpointMarker: 'common_download.jsp',
                idParam: 'num_id_pk',
                downloadEndpoint: 'https://cdsco.gov.in/opencms/opencms/system/modules/CDSCO.WEB/elements/common_download.jsp',
            },
            pagination: { enabled: false },
            requestDelayMs: 1000,
        },
        'safety-notices': {
            name: 'safety-notices',
            listingUrls: ['https://cdsco.gov.in/opencms/opencms/en/Notifications/Safety-Notices/'],
            linkPolicy: { kind: 'direct', extension: '.pdf' },
            pagination: { enabled: true, selector: 'ul.pagination' },
            requestDelayMs: 500,
        },
    } satisfies Record<string, SiteConfigInput>,
};

export type SiteName = keyof typeof scraperConfig.sites;

export interface SearchConfig {
    site: SiteConfig;
    userAgent: string;
    timeouts: { pageMs: number; documentMs: number };
    cacheTtlMs: number;
    concurrency: number;
}

function isSiteName(name: string): name is SiteName {
    return Object.prototype.hasOwnProperty.call(scraperConfig.sites, name);
}

/**
 * Validate a site description, turning schema issues into a ConfigurationError
 */
export function parseSiteConfig(input: SiteConfigInput): SiteConfig {
    const result = SiteConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        }));
        throw new ConfigurationError(`Invalid site configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`, {
            issues,
        });
    }
    return result.data;
}

/**
 * Resolve the configuration for a run: preset selected by SEARCH_SITE, with
 * listing URLs, delay and limits overridable from the environment.
 */
export function loadSearchConfig(env: Env = validateEnv()): SearchConfig {
    if (!isSiteName(env.SEARCH_SITE)) {
        throw new ConfigurationError(`Unknown site preset "${env.SEARCH_SITE}"`, {
            available: Object.keys(scraperConfig.sites),
        });
    }

    const preset: SiteConfigInput = scraperConfig.sites[env.SEARCH_SITE];
    const site = parseSiteConfig({
        ...preset,
        listingUrls: env.SEARCH_LISTING_URLS.length > 0 ? env.SEARCH_LISTING_URLS : preset.listingUrls,
        requestDelayMs: env.SEARCH_REQUEST_DELAY_MS ?? preset.requestDelayMs,
    });

    if (env.SEARCH_CONCURRENCY < 1) {
        throw new ConfigurationError('SEARCH_CONCURRENCY must be at least 1', { concurrency: env.SEARCH_CONCURRENCY });
    }

    return {
        site,
        userAgent: env.SCRAPER_USER_AGENT ?? scraperConfig.userAgent,
        timeouts: {
            pageMs: env.SEARCH_PAGE_TIMEOUT_MS ?? scraperConfig.timeouts.page,
            documentMs: env.SEARCH_DOCUMENT_TIMEOUT_MS ?? scraperConfig.timeouts.document,
        },
        cacheTtlMs: env.SEARCH_CACHE_TTL_MS ?? scraperConfig.cache.documentTTL,
        concurrency: env.SEARCH_CONCURRENCY,
    };
}
