import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { createHttpClient } from '../../config/httpClient.js';
import { TransportError } from '../../types/errors.js';
import { HttpDocumentFetcher } from './DocumentFetcher.js';

const URL = 'https://example.gov/files/a.pdf';

function stubAdapter(status: number, body: string, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
    return async (config) => {
        seen.push(config);
        return { data: Buffer.from(body, 'utf-8'), status, statusText: String(status), headers: {}, config };
    };
}

describe('HttpDocumentFetcher', () => {
    it('returns the response body as a buffer', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const fetcher = new HttpDocumentFetcher({
            userAgent: 'TestAgent/1.0',
            timeoutMs: 1234,
            client: createHttpClient({ adapter: stubAdapter(200, '%PDF-1.4 body', seen) }),
        });

        const body = await fetcher.fetch(URL);

        expect(body.toString('utf-8')).toBe('%PDF-1.4 body');
        expect(seen).toHaveLength(1);
        expect(seen[0].url).toBe(URL);
        expect(seen[0].timeout).toBe(1234);
        expect(seen[0].responseType).toBe('arraybuffer');
        expect(seen[0].headers.get('User-Agent')).toBe('TestAgent/1.0');
    });

    it('applies a per-request timeout', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const fetcher = new HttpDocumentFetcher({ client: createHttpClient({ adapter: stubAdapter(200, 'ok', seen) }) });

        await fetcher.fetch(URL, 30000);

        expect(seen[0].timeout).toBe(30000);
    });

    it('fails with a TransportError on a non-2xx status', async () => {
        const fetcher = new HttpDocumentFetcher({ client: createHttpClient({ adapter: stubAdapter(404, 'missing') }) });

        const error = await fetcher.fetch(URL).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ url: URL, statusCode: 404, message: `Failed to fetch ${URL}: HTTP 404` });
    });

    it('gives up once the whole transfer outlasts the timeout', async () => {
        const adapter: AxiosAdapter = (config) =>
            new Promise((_, reject) => {
                // A slow server: the response never completes on its own
                config.signal?.addEventListener?.('abort', () => reject(new Error('canceled')));
            });
        const fetcher = new HttpDocumentFetcher({ client: createHttpClient({ adapter }) });

        const error = await fetcher.fetch(URL, 50).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ url: URL, statusCode: undefined, message: `Failed to fetch ${URL}: timeout of 50ms exceeded` });
    });

    it('passes an abort signal with every request', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const fetcher = new HttpDocumentFetcher({ client: createHttpClient({ adapter: stubAdapter(200, 'ok', seen) }) });

        await fetcher.fetch(URL, 1000);

        expect(seen[0].signal?.aborted).toBe(false);
    });

    it('fails with a TransportError when the connection fails', async () => {
        const adapter: AxiosAdapter = async () => {
            throw new Error('socket hang up');
        };
        const fetcher = new HttpDocumentFetcher({ client: createHttpClient({ adapter }) });

        const error = await fetcher.fetch(URL).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ statusCode: undefined, message: `Failed to fetch ${URL}: socket hang up` });
    });
});
