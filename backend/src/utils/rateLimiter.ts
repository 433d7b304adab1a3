import PQueue from "p-queue";
import { logger } from "./logger";
import { sleep as defaultSleep, Sleep } from "./async";

export interface RateLimiterOptions {
    maxRequests: number;
    windowMs: number;
    now?: () => number;
    sleep?: Sleep;
}

/**
 * Sliding-window limiter shared by every caller of one slskd client.
 *
 * Admission is serialized through a single-slot queue, so the read-prune-push
 * sequence is atomic. The caller runs its request after `acquire()` resolves,
 * outside the lock.
 */
export class SlidingWindowRateLimiter {
    private timestamps: number[] = [];
    private readonly lock = new PQueue({ concurrency: 1 });
    private readonly maxRequests: number;
    private readonly windowMs: number;
    private readonly now: () => number;
    private readonly sleep: Sleep;

    constructor(options: RateLimiterOptions) {
        if (options.maxRequests <= 0) {
            throw new Error("Rate limit must allow at least one request per window");
        }
        this.maxRequests = options.maxRequests;
        this.windowMs = options.windowMs;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
    }

    async acquire(): Promise<void> {
        await this.lock.add(async () => {
            let now = this.now();
            this.prune(now);

            while (this.timestamps.length >= this.maxRequests) {
                const oldest = this.timestamps[0];
                const waitMs = Math.max(oldest + this.windowMs - now, 1);
                logger.info(
                    `[SLSKD] Rate limit reached (${this.timestamps.length}/${this.maxRequests}), waiting ${(waitMs / 1000).toFixed(1)}s`
                );
                await this.sleep(waitMs);
                now = this.now();
                this.prune(now);
            }

            this.timestamps.push(now);
        });
    }

    private prune(now: number): void {
        const windowStart = now - this.windowMs;
        this.timestamps = this.timestamps.filter((ts) => ts > windowStart);
    }
}
