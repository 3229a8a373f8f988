/**
 * Environment Variable Parsing
 *
 * Centralized, typed access to the environment variables the search pipeline reads.
 * Unset or unparsable values fall back to defaults; structural validation of the
 * resulting site configuration happens in scraperConfig.ts.
 */

// Load dotenv early so values are available before the first validateEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseOptionalNumericEnv(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function parseListEnv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';

  // Site selection
  SEARCH_SITE: string;
  SEARCH_LISTING_URLS: string[];

  // Politeness and throughput
  SEARCH_REQUEST_DELAY_MS?: number;
  SEARCH_CONCURRENCY: number;

  // Timeouts and caching
  SEARCH_PAGE_TIMEOUT_MS?: number;
  SEARCH_DOCUMENT_TIMEOUT_MS?: number;
  SEARCH_CACHE_TTL_MS?: number;

  SCRAPER_USER_AGENT?: string;
}

function parseNodeEnv(value: string | undefined): Env['NODE_ENV'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

/**
 * Read the environment. Reads process.env on every call so tests can adjust it.
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    NODE_ENV: parseNodeEnv(source.NODE_ENV),
    SEARCH_SITE: source.SEARCH_SITE || 'sec-notifications',
    SEARCH_LISTING_URLS: parseListEnv(source.SEARCH_LISTING_URLS),
    SEARCH_REQUEST_DELAY_MS: parseOptionalNumericEnv(source.SEARCH_REQUEST_DELAY_MS),
    SEARCH_CONCURRENCY: parseNumericEnv(source.SEARCH_CONCURRENCY, 1),
    SEARCH_PAGE_TIMEOUT_MS: parseOptionalNumericEnv(source.SEARCH_PAGE_TIMEOUT_MS),
    SEARCH_DOCUMENT_TIMEOUT_MS: parseOptionalNumericEnv(source.SEARCH_DOCUMENT_TIMEOUT_MS),
    SEARCH_CACHE_TTL_MS: parseOptionalNumericEnv(source.SEARCH_CACHE_TTL_MS),
    SCRAPER_USER_AGENT: source.SCRAPER_USER_AGENT || undefined,
  };
}
