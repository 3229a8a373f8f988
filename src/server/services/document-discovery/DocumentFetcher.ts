/**
 * Document Fetcher
 *
 * Single HTTP GET with timeout and an identifying User-Agent. No retries:
 * a failure is surfaced as a TransportError and the caller decides whether
 * to skip or abort.
 */

import { isAxiosError, type AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { scraperConfig } from '../../config/scraperConfig.js';
import { TransportError } from '../../types/errors.js';

export interface DocumentFetcher {
    /**
     * @param timeoutMs - Overrides the fetcher's default timeout for this request
     * @throws TransportError on connection failure, non-2xx status or timeout
     */
    fetch(url: string, timeoutMs?: number): Promise<Buffer>;
}

export interface HttpDocumentFetcherOptions {
    userAgent?: string;
    timeoutMs?: number;
    client?: AxiosInstance;
}

export class HttpDocumentFetcher implements DocumentFetcher {
    private readonly client: AxiosInstance;
    private readonly userAgent: string;
    private readonly timeoutMs: number;

    constructor(options: HttpDocumentFetcherOptions = {}) {
        this.userAgent = options.userAgent ?? scraperConfig.userAgent;
        this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUTS.PAGE;
        this.client = options.client ?? createHttpClient({ timeout: this.timeoutMs });
    }

    async fetch(url: string, timeoutMs: number = this.timeoutMs): Promise<Buffer> {
        let status: number;
        let data: unknown;
        // axios' timeout only covers idle sockets; the signal bounds the whole transfer
        const deadline = AbortSignal.timeout(timeoutMs);
        try {
            const response = await this.client.get<ArrayBuffer>(url, {
                timeout: timeoutMs,
                signal: deadline,
                responseType: 'arraybuffer',
                headers: {
                    'User-Agent': this.userAgent,
                },
            });
            status = response.status;
            data = response.data;
        } catch (error: unknown) {
            if (deadline.aborted) {
                throw new TransportError(url, new Error(`timeout of ${timeoutMs}ms exceeded`, { cause: error }));
            }
            const statusCode = isAxiosError(error) ? error.response?.status : undefined;
            throw new TransportError(url, error, statusCode);
        }

        // Custom adapters do not necessarily apply validateStatus
        if (status < 200 || status >= 300) {
            throw new TransportError(url, new Error(`Unexpected status ${status}`), status);
        }

        return toBuffer(data);
    }
}

function toBuffer(data: unknown): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (typeof data === 'string') return Buffer.from(data, 'utf-8');
    return Buffer.alloc(0);
}
