import type { PdfExtractionResult, TextExtractor } from '../extraction/pdf/PdfExtractor.js';
import type { DocumentFetcher } from '../services/document-discovery/DocumentFetcher.js';
import { TransportError } from '../types/errors.js';

/**
 * In-memory fetcher. Unknown URLs fail with a 404 TransportError.
 */
export class FakeFetcher implements DocumentFetcher {
    readonly calls: string[] = [];
    readonly timeouts: Array<number | undefined> = [];
    private readonly responses = new Map<string, Buffer | TransportError>();

    constructor(pages: Record<string, string> = {}) {
        for (const [url, body] of Object.entries(pages)) {
            this.respond(url, body);
        }
    }

    respond(url: string, body: string | Buffer): this {
        this.responses.set(url, typeof body === 'string' ? Buffer.from(body, 'utf-8') : body);
        return this;
    }

    fail(url: string, statusCode?: number): this {
        this.responses.set(url, new TransportError(url, new Error('connection refused'), statusCode));
        return this;
    }

    async fetch(url: string, timeoutMs?: number): Promise<Buffer> {
        this.calls.push(url);
        this.timeouts.push(timeoutMs);
        const response = this.responses.get(url);
        if (response === undefined) {
            throw new TransportError(url, new Error('not found'), 404);
        }
        if (response instanceof TransportError) {
            throw response;
        }
        return response;
    }
}

export const UNREADABLE_PAYLOAD = '%UNREADABLE%';

/**
 * Treats the payload as UTF-8 text. A payload equal to UNREADABLE_PAYLOAD
 * is reported as unparseable.
 */
export class FakeExtractor implements TextExtractor {
    calls = 0;

    async extract(data: Buffer): Promise<string> {
        const result = await this.extractDetailed(data);
        return result.text;
    }

    async extractDetailed(data: Buffer): Promise<PdfExtractionResult> {
        this.calls++;
        const text = data.toString('utf-8');
        if (text === UNREADABLE_PAYLOAD) {
            return { text: '', pageCount: 0, readable: false };
        }
        return { text, pageCount: 1, readable: true };
    }
}
