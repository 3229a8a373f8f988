import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../types/errors.js';
import { validateEnv } from './env.js';
import { loadSearchConfig, parseSiteConfig, scraperConfig } from './scraperConfig.js';

describe('scraperConfig', () => {
    describe('loadSearchConfig', () => {
        it('uses the default preset and defaults when nothing is set', () => {
            const config = loadSearchConfig(validateEnv({}));

            expect(config.site.name).toBe('sec-notifications');
            expect(config.site.linkPolicy).toEqual({ kind: 'direct', extension: '.pdf' });
            expect(config.site.requestDelayMs).toBe(100);
            expect(config.concurrency).toBe(1);
            expect(config.timeouts).toEqual({ pageMs: 10000, documentMs: 30000 });
            expect(config.cacheTtlMs).toBe(24 * 60 * 60 * 1000);
            expect(config.userAgent).toBe(scraperConfig.userAgent);
        });

        it('selects a preset and applies environment overrides', () => {
            const config = loadSearchConfig(
                validateEnv({
                    SEARCH_SITE: 'sec-committees',
                    SEARCH_LISTING_URLS: 'https://example.gov/a/, https://example.gov/b/',
                    SEARCH_REQUEST_DELAY_MS: '250',
                    SEARCH_CONCURRENCY: '4',
                    SEARCH_CACHE_TTL_MS: '60000',
                    SEARCH_PAGE_TIMEOUT_MS: '2000',
                    SCRAPER_USER_AGENT: 'TestAgent/1.0',
                })
            );

            expect(config.site.linkPolicy.kind).toBe('indirect');
            expect(config.site.listingUrls).toEqual(['https://example.gov/a/', 'https://example.gov/b/']);
            expect(config.site.requestDelayMs).toBe(250);
            expect(config.concurrency).toBe(4);
            expect(config.cacheTtlMs).toBe(60000);
            expect(config.timeouts).toEqual({ pageMs: 2000, documentMs: 30000 });
            expect(config.userAgent).toBe('TestAgent/1.0');
        });

        it('enables pagination for the safety notices preset', () => {
            const config = loadSearchConfig(validateEnv({ SEARCH_SITE: 'safety-notices' }));

            expect(config.site.pagination).toEqual({ enabled: true, selector: 'ul.pagination' });
        });

        it('rejects an unknown preset', () => {
            expect(() => loadSearchConfig(validateEnv({ SEARCH_SITE: 'nowhere' }))).toThrow(ConfigurationError);
        });

        it('rejects a concurrency below 1', () => {
            expect(() => loadSearchConfig(validateEnv({ SEARCH_CONCURRENCY: '0' }))).toThrow(ConfigurationError);
        });

        it('rejects listing URLs that are not URLs', () => {
            expect(() => loadSearchConfig(validateEnv({ SEARCH_LISTING_URLS: 'not a url' }))).toThrow(ConfigurationError);
        });
    });

    describe('parseSiteConfig', () => {
        it('fills in defaults', () => {
            const site = parseSiteConfig({
                name: 'custom',
                listingUrls: ['https://example.gov/'],
                linkPolicy: { kind: 'direct' },
                pagination: { enabled: true },
            });

            expect(site).toEqual({
                name: 'custom',
                listingUrls: ['https://example.gov/'],
                linkPolicy: { kind: 'direct', extension: '.pdf' },
                pagination: { enabled: true, selector: 'ul.pagination' },
                requestDelayMs: 500,
            });
        });

        it('requires at least one listing URL', () => {
            expect(() =>
                parseSiteConfig({
                    name: 'empty',
                    listingUrls: [],
                    linkPolicy: { kind: 'direct' },
                    pagination: { enabled: false },
                })
            ).toThrow(/listingUrls: At least one listing URL is required/);
        });
    });
});
