/**
 * Document Keyword Search
 *
 * Discovers the PDF documents of the configured site, searches them for a keyword
 * and prints the ranked matches.
 *
 * Usage: tsx src/server/scripts/search-documents.ts <keyword> [minOccurrences]
 * The site is chosen with SEARCH_SITE (sec-notifications, sec-committees, safety-notices).
 */

import { DocumentSearchPipeline } from '../services/search/DocumentSearchPipeline.js';
import { highlightKeyword } from '../services/search/keywordMatcher.js';
import type { FailureReason } from '../services/infrastructure/types.js';
import { isAppError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const FAILURE_LABELS: Record<FailureReason, string> = {
    'fetch-failed': 'could not be downloaded',
    unreadable: 'is not a readable PDF',
    'no-text': 'has no extractable text (scanned?)',
};

function documentLabel(title: string | undefined, url: string): string {
    if (title) return title;
    const name = url.split('/').pop() || url;
    try {
        return decodeURIComponent(name);
    } catch {
        return name;
    }
}

async function main(): Promise<void> {
    const [keyword, minArg] = process.argv.slice(2);
    if (!keyword) {
        console.error('Usage: search-documents <keyword> [minOccurrences]');
        process.exitCode = 1;
        return;
    }
    const minOccurrences = minArg ? Number(minArg) : 1;

    const pipeline = new DocumentSearchPipeline();
    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\n⏹️  Stopping after the current document...');
        controller.abort();
    });

    console.log(`🔍 Searching ${pipeline.config.site.name} for "${keyword}"`);

    const report = await pipeline.search(keyword, {
        minOccurrences,
        signal: controller.signal,
        partialOnCancel: true,
        onProgress: ({ index, total, document }) => {
            process.stdout.write(`\r📄 ${index}/${total} ${documentLabel(document.title, document.url).slice(0, 60).padEnd(60)}`);
        },
    });
    process.stdout.write('\n');

    for (const warning of report.discoveryWarnings) {
        console.warn(`⚠️  Listing page skipped: ${warning.url}`);
    }
    if (report.documentsDiscovered === 0) {
        console.error('❌ No documents found on the listing pages.');
        process.exitCode = 1;
        return;
    }
    if (report.cancelled) {
        console.log(`⏹️  Cancelled after ${report.documentsSearched}/${report.documentsDiscovered} documents`);
    }

    if (report.matchedDocuments === 0) {
        console.log(`No documents found containing "${report.keyword}".`);
    } else {
        console.log(`✅ Found ${report.matchedDocuments} documents containing "${report.keyword}"`);
    }

    for (const result of report.results) {
        const { document } = result;
        console.log(`\n📄 ${documentLabel(document.title, document.url)} (${result.occurrenceCount} matches)`);
        console.log(`   Download: ${document.url}`);
        for (const snippet of result.snippets) {
            console.log(`   - ${highlightKeyword(snippet, report.keyword)}`);
        }
    }

    if (report.failedDocuments.length > 0) {
        console.log(`\n⚠️  ${report.failedDocuments.length} documents were skipped:`);
        for (const failure of report.failedDocuments) {
            console.log(`   - ${documentLabel(failure.document.title, failure.document.url)} ${FAILURE_LABELS[failure.reason]}`);
        }
    }
}

main().catch((error: unknown) => {
    if (isAppError(error)) {
        console.error(`❌ ${error.message}`);
    } else {
        logger.error({ error }, 'Document search failed');
    }
    process.exitCode = 1;
});
