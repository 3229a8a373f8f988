import { describe, expect, it } from 'vitest';
import { RequestPacer } from './rateLimiter.js';

function fakeClock(start: number = 0) {
    let now = start;
    const waits: number[] = [];
    return {
        waits,
        now: () => now,
        advance: (ms: number) => {
            now += ms;
        },
        sleep: async (ms: number) => {
            waits.push(ms);
        },
    };
}

describe('RequestPacer', () => {
    it('lets the first request through and spaces the following ones', async () => {
        const clock = fakeClock();
        const pacer = new RequestPacer({ minIntervalMs: 500, now: clock.now, sleep: clock.sleep });

        await Promise.all([pacer.acquire(), pacer.acquire(), pacer.acquire()]);

        expect(clock.waits).toEqual([500, 1000]);
    });

    it('does not wait once the interval has already passed', async () => {
        const clock = fakeClock();
        const pacer = new RequestPacer({ minIntervalMs: 500, now: clock.now, sleep: clock.sleep });

        await pacer.acquire();
        clock.advance(700);
        await pacer.acquire();
        clock.advance(200);
        await pacer.acquire();

        expect(clock.waits).toEqual([300]);
    });

    it('never waits with a zero interval', async () => {
        const clock = fakeClock();
        const pacer = new RequestPacer({ minIntervalMs: 0, now: clock.now, sleep: clock.sleep });

        await pacer.acquire();
        await pacer.acquire();

        expect(clock.waits).toEqual([]);
        expect(pacer.intervalMs).toBe(0);
    });

    it('rejects a negative interval', () => {
        expect(() => new RequestPacer({ minIntervalMs: -1 })).toThrow(TypeError);
    });
});
