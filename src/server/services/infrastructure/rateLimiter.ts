/**
 * Rate Limiter Service
 *
 * Spaces outbound requests so that consecutive requests start at least
 * `minIntervalMs` apart, process-wide. Shared by discovery and document
 * downloads, it keeps the polite crawling delay in force when downloads
 * run in parallel.
 */

export interface RequestPacerOptions {
    minIntervalMs: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RequestPacer {
    private readonly minIntervalMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private nextSlot: number = 0;

    constructor(options: RequestPacerOptions) {
        if (!Number.isFinite(options.minIntervalMs) || options.minIntervalMs < 0) {
            throw new TypeError('Expected `minIntervalMs` to be a non-negative number');
        }
        this.minIntervalMs = options.minIntervalMs;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
    }

    get intervalMs(): number {
        return this.minIntervalMs;
    }

    /**
     * Resolve when the caller may start its request. Slots are reserved
     * synchronously, so concurrent callers are queued in call order.
     */
    async acquire(): Promise<void> {
        const now = this.now();
        const slot = Math.max(now, this.nextSlot);
        this.nextSlot = slot + this.minIntervalMs;

        const wait = slot - now;
        if (wait > 0) {
            await this.sleep(wait);
        }
    }
}
