/**
 * Keyword matching primitives: counting, context snippets, ranking.
 */

import type { SearchResult } from '../infrastructure/types.js';

export const SNIPPET_CONTEXT_CHARS = 30;
export const MAX_SNIPPETS = 5;

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Number of non-overlapping, case-insensitive occurrences of `keyword` in `text`
 */
export function countOccurrences(text: string, keyword: string): number {
    const needle = keyword.toLowerCase();
    if (needle.length === 0) {
        return 0;
    }
    const haystack = text.toLowerCase();

    let count = 0;
    let position = haystack.indexOf(needle);
    while (position !== -1) {
        count++;
        position = haystack.indexOf(needle, position + needle.length);
    }
    return count;
}

/**
 * Context around each case-insensitive match, in text order: up to
 * `contextChars` characters either side (clipped at the text boundaries),
 * trimmed of surrounding whitespace.
 */
export function extractSnippets(
    text: string,
    keyword: string,
    limit: number = MAX_SNIPPETS,
    contextChars: number = SNIPPET_CONTEXT_CHARS
): string[] {
    if (keyword.length === 0 || limit <= 0) {
        return [];
    }

    const pattern = new RegExp(escapeRegExp(keyword), 'giu');
    const snippets: string[] = [];
    for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        snippets.push(text.slice(Math.max(0, start - contextChars), Math.min(text.length, end + contextChars)).trim());
        if (snippets.length >= limit) {
            break;
        }
    }
    return snippets;
}

/**
 * Build a result for one document, or null when the keyword does not occur
 */
export function matchDocument<D>(document: D, text: string, keyword: string): { document: D; occurrenceCount: number; snippets: string[] } | null {
    if (text.length === 0) {
        return null;
    }
    if (!text.toLowerCase().includes(keyword.toLowerCase())) {
        return null;
    }
    const occurrenceCount = countOccurrences(text, keyword);
    if (occurrenceCount === 0) {
        return null;
    }
    return { document, occurrenceCount, snippets: extractSnippets(text, keyword) };
}

/**
 * Sort by descending occurrence count. Array.prototype.sort is stable, so
 * documents with equal counts keep their input order.
 */
export function rankResults<T extends Pick<SearchResult, 'occurrenceCount'>>(results: readonly T[]): T[] {
    return [...results].sort((a, b) => b.occurrenceCount - a.occurrenceCount);
}

/**
 * Drop results below the threshold. Applied after ranking; counts are untouched.
 */
export function applyMinimumOccurrences<T extends Pick<SearchResult, 'occurrenceCount'>>(results: readonly T[], minOccurrences: number): T[] {
    return results.filter((result) => result.occurrenceCount >= minOccurrences);
}

/**
 * Wrap each case-insensitive occurrence of the keyword in `**`, for plain-text display
 */
export function highlightKeyword(snippet: string, keyword: string): string {
    if (keyword.length === 0) {
        return snippet;
    }
    return snippet.replace(new RegExp(escapeRegExp(keyword), 'giu'), (match) => `**${match}**`);
}
