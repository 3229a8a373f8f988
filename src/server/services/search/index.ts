/**
 * Search Services
 *
 * Centralized exports for keyword search over discovered documents.
 */

export * from './DocumentSearchPipeline.js';
export * from './KeywordSearchService.js';
export * from './keywordMatcher.js';
export * from './searchOptions.js';
