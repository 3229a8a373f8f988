import { describe, expect, it } from 'vitest';
import {
    applyMinimumOccurrences,
    countOccurrences,
    extractSnippets,
    highlightKeyword,
    matchDocument,
    rankResults,
} from './keywordMatcher.js';

describe('keywordMatcher', () => {
    describe('countOccurrences', () => {
        it('counts case-insensitively', () => {
            expect(countOccurrences('Aspirin, aspirin and ASPIRIN', 'aspirin')).toBe(3);
        });

        it('does not depend on the case of the keyword', () => {
            const text = 'Clinical trial; clinical TRIAL; CLINICAL trial';
            const counts = ['clinical trial', 'CLINICAL TRIAL', 'cLiNiCaL tRiAl'].map((k) => countOccurrences(text, k));
            expect(counts).toEqual([3, 3, 3]);
        });

        it('counts non-overlapping occurrences', () => {
            expect(countOccurrences('aaaa', 'aa')).toBe(2);
            expect(countOccurrences('aaa', 'aa')).toBe(1);
        });

        it('returns 0 when the keyword is absent or empty', () => {
            expect(countOccurrences('nothing here', 'drug')).toBe(0);
            expect(countOccurrences('nothing here', '')).toBe(0);
        });
    });

    describe('extractSnippets', () => {
        it('keeps the whole sentence when it fits in the window', () => {
            expect(extractSnippets('the drug Paracetamol was administered', 'paracetamol')).toEqual([
                'the drug Paracetamol was administered',
            ]);
        });

        it('takes 30 characters either side of the match', () => {
            const text = 'x'.repeat(50) + 'KEY' + 'y'.repeat(50);
            expect(extractSnippets(text, 'key')).toEqual(['x'.repeat(30) + 'KEY' + 'y'.repeat(30)]);
        });

        it('clips the window at the text boundaries', () => {
            const text = 'KEY' + 'y'.repeat(40);
            expect(extractSnippets(text, 'key')).toEqual(['KEY' + 'y'.repeat(30)]);
        });

        it('trims surrounding whitespace', () => {
            expect(extractSnippets('   hello keyword   world  ', 'keyword')).toEqual(['hello keyword   world']);
        });

        it('keeps context across line breaks', () => {
            expect(extractSnippets('first line\nsecond line with dose', 'dose')).toEqual(['first line\nsecond line with dose']);
        });

        it('returns at most five snippets, in text order', () => {
            const text = Array.from({ length: 7 }, (_, i) => `${'-'.repeat(40)} item${i} KEY`).join('');
            const snippets = extractSnippets(text, 'key');
            expect(snippets).toHaveLength(5);
            expect(snippets[0]).toBe(`${'-'.repeat(23)} item0 KEY${'-'.repeat(30)}`);
            expect(snippets[4]).toContain('item4 KEY');
        });

        it('treats regular expression characters in the keyword literally', () => {
            expect(extractSnippets('dose (mg) and dose mg', '(mg)')).toEqual(['dose (mg) and dose mg']);
        });
    });

    describe('matchDocument', () => {
        it('reports count and snippets for a matching text', () => {
            expect(matchDocument('doc', 'Dose given. dose repeated.', 'DOSE')).toEqual({
                document: 'doc',
                occurrenceCount: 2,
                snippets: ['Dose given. dose repeated.', 'Dose given. dose repeated.'],
            });
        });

        it('returns null for empty or non-matching text', () => {
            expect(matchDocument('doc', '', 'dose')).toBeNull();
            expect(matchDocument('doc', 'nothing relevant', 'dose')).toBeNull();
        });
    });

    describe('rankResults', () => {
        it('sorts by descending count and keeps input order for ties', () => {
            const ranked = rankResults([
                { id: 'a', occurrenceCount: 2 },
                { id: 'b', occurrenceCount: 5 },
                { id: 'c', occurrenceCount: 2 },
                { id: 'd', occurrenceCount: 5 },
            ]);
            expect(ranked.map((r) => r.id)).toEqual(['b', 'd', 'a', 'c']);
        });
    });

    describe('applyMinimumOccurrences', () => {
        it('filters without changing the reported counts', () => {
            const ranked = [
                { id: 'doc5', occurrenceCount: 5 },
                { id: 'doc2', occurrenceCount: 2 },
            ];
            expect(applyMinimumOccurrences(ranked, 3)).toEqual([{ id: 'doc5', occurrenceCount: 5 }]);
        });
    });

    describe('highlightKeyword', () => {
        it('emphasises every occurrence, preserving its case', () => {
            expect(highlightKeyword('Paracetamol and paracetamol', 'PARACETAMOL')).toBe('**Paracetamol** and **paracetamol**');
        });
    });
});
