/**
 * Public API of the document search pipeline
 */

export * from './services/search/index.js';
export { LinkDiscoveryService, type LinkDiscoveryOptions } from './services/document-discovery/LinkDiscoveryService.js';
export { HttpDocumentFetcher, type DocumentFetcher, type HttpDocumentFetcherOptions } from './services/document-discovery/DocumentFetcher.js';
export { classifyLink, buildDownloadUrl, toAbsoluteUrl } from './services/document-discovery/linkClassifier.js';
export { DocumentCache, type DocumentCacheOptions, type DocumentCacheStats } from './services/infrastructure/DocumentCache.js';
export { RequestPacer } from './services/infrastructure/rateLimiter.js';
export type * from './services/infrastructure/types.js';
export { PdfExtractor, type PdfExtractionResult, type TextExtractor } from './extraction/pdf/PdfExtractor.js';
export {
  loadSearchConfig,
  parseSiteConfig,
  scraperConfig,
  type LinkPolicy,
  type SearchConfig,
  type SiteConfig,
  type SiteConfigInput,
} from './config/scraperConfig.js';
export * from './types/errors.js';
