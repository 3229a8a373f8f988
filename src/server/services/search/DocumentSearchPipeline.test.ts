import { describe, expect, it } from 'vitest';
import type { SearchConfig } from '../../config/scraperConfig.js';
import { FakeExtractor, FakeFetcher } from '../../test-utils/fakes.js';
import { RequestPacer } from '../infrastructure/rateLimiter.js';
import { DocumentSearchPipeline } from './DocumentSearchPipeline.js';

const LISTING = 'https://example.gov/notices/';

const config: SearchConfig = {
    site: {
        name: 'test-site',
        listingUrls: [LISTING],
        linkPolicy: { kind: 'direct', extension: '.pdf' },
        pagination: { enabled: false, selector: 'ul.pagination' },
        requestDelayMs: 0,
    },
    userAgent: 'TestAgent/1.0',
    timeouts: { pageMs: 1000, documentMs: 2000 },
    cacheTtlMs: 60_000,
    concurrency: 2,
};

const listingHtml = `
<ul>
  <li><a href="a.pdf">Circular A</a></li>
  <li><a href="b.pdf">Circular B</a></li>
  <li><a href="c.pdf">Circular C</a></li>
</ul>`;

function setup() {
    let clock = 0;
    const fetcher = new FakeFetcher({
        [LISTING]: listingHtml,
        [`${LISTING}a.pdf`]: 'Ibuprofen dosage. Ibuprofen warnings.',
        [`${LISTING}b.pdf`]: 'Nothing relevant',
        [`${LISTING}c.pdf`]: 'ibuprofen once',
    });
    const pipeline = new DocumentSearchPipeline(config, {
        fetcher,
        extractor: new FakeExtractor(),
        pacer: new RequestPacer({ minIntervalMs: 0 }),
        now: () => clock,
    });
    return {
        fetcher,
        pipeline,
        advance: (ms: number) => {
            clock += ms;
        },
    };
}

describe('DocumentSearchPipeline', () => {
    it('discovers, downloads and ranks matching documents', async () => {
        const { pipeline, fetcher } = setup();

        const report = await pipeline.search('ibuprofen');

        expect(report.documentsDiscovered).toBe(3);
        expect(report.discoveryWarnings).toEqual([]);
        expect(report.results.map((r) => [r.document.title, r.occurrenceCount])).toEqual([
            ['Circular A', 2],
            ['Circular C', 1],
        ]);
        expect(fetcher.timeouts[0]).toBe(1000);
        expect(fetcher.timeouts.slice(1)).toEqual([2000, 2000, 2000]);
    });

    it('reuses discovery and extracted text on the next search', async () => {
        const { pipeline, fetcher } = setup();

        await pipeline.search('ibuprofen');
        const second = await pipeline.search('warnings');

        expect(fetcher.calls).toHaveLength(4);
        expect(second.results.map((r) => r.document.title)).toEqual(['Circular A']);
    });

    it('re-reads everything once the validity window has passed', async () => {
        const { pipeline, fetcher, advance } = setup();

        await pipeline.search('ibuprofen');
        advance(60_001);
        await pipeline.search('ibuprofen');

        expect(fetcher.calls).toHaveLength(8);
    });

    it('re-reads listing pages on request', async () => {
        const { pipeline, fetcher } = setup();

        await pipeline.search('ibuprofen');
        await pipeline.search('ibuprofen', { refreshDiscovery: true });

        expect(fetcher.calls.filter((url) => url === LISTING)).toHaveLength(2);
    });

    it('reports listing pages that could not be read and does not memoize them', async () => {
        const { pipeline, fetcher } = setup();
        fetcher.fail(LISTING, 500);

        const report = await pipeline.search('ibuprofen');
        await pipeline.search('ibuprofen');

        expect(report.documentsDiscovered).toBe(0);
        expect(report.discoveryWarnings).toEqual([{ url: LISTING, reason: 'fetch-failed' }]);
        expect(report.results).toEqual([]);
        expect(fetcher.calls).toEqual([LISTING, LISTING]);
    });
});
