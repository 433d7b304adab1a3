import PQueue from "p-queue";
import { logger } from "../utils/logger";
import { errorMessage, isRetryableError } from "../utils/errors";
import { chunkArray, sleep as defaultSleep, Sleep, withRetry } from "../utils/async";
import { downloadSubmissionsTotal } from "../utils/metrics";
import type { DownloadBackend } from "./backends";
import type { DownloadRequestFile, DownloadResponse, DownloadSelection } from "../types/slskd";

export interface TransferBatcherOptions {
    backend: DownloadBackend;
    batchSize?: number;
    batchDelayMs?: number;
    maxRetries?: number;
    baseDelayMs?: number;
    /** Peers submitted to concurrently */
    peerConcurrency?: number;
    sleep?: Sleep;
}

/**
 * Submits download selections to the backend in small per-peer batches.
 *
 * slskd queues a whole batch against one peer connection; large batches
 * tend to be rejected or half-acknowledged, so each peer gets a few files at
 * a time with a pause in between. Batches for one peer are sequential,
 * different peers run in parallel.
 */
export class TransferBatcher {
    private readonly backend: DownloadBackend;
    private readonly batchSize: number;
    private readonly batchDelayMs: number;
    private readonly maxRetries: number;
    private readonly baseDelayMs: number;
    private readonly peerConcurrency: number;
    private readonly sleep: Sleep;

    constructor(options: TransferBatcherOptions) {
        this.backend = options.backend;
        this.batchSize = options.batchSize ?? 3;
        this.batchDelayMs = options.batchDelayMs ?? 3000;
        this.maxRetries = options.maxRetries ?? 3;
        this.baseDelayMs = options.baseDelayMs ?? 1000;
        this.peerConcurrency = options.peerConcurrency ?? 4;
        this.sleep = options.sleep ?? defaultSleep;
        if (this.batchSize <= 0) throw new Error("Batch size must be positive");
    }

    /**
     * Returns one result per distinct (peer, filename), grouped by peer in
     * first-seen order. Files that could not be queued carry `error`.
     */
    async download(
        selections: DownloadSelection[],
        signal?: AbortSignal
    ): Promise<DownloadResponse[]> {
        const byPeer = new Map<string, DownloadRequestFile[]>();
        for (const selection of selections) {
            const files = byPeer.get(selection.username) ?? [];
            if (!files.some((file) => file.filename === selection.filename)) {
                files.push({ filename: selection.filename, size: selection.size });
            }
            byPeer.set(selection.username, files);
        }

        logger.info(
            `[DOWNLOAD] Attempting to download ${selections.length} files from ${byPeer.size} peers`
        );

        const queue = new PQueue({ concurrency: this.peerConcurrency });
        const perPeer = await Promise.all(
            [...byPeer].map(([username, files]) =>
                queue.add(() => this.submitForPeer(username, files, signal))
            )
        );

        const results = perPeer.flat();
        for (const result of results) {
            downloadSubmissionsTotal.inc({ status: result.error === undefined ? "queued" : "failed" });
        }
        return results;
    }

    private async submitForPeer(
        username: string,
        files: DownloadRequestFile[],
        signal?: AbortSignal
    ): Promise<DownloadResponse[]> {
        const batches = chunkArray(files, this.batchSize);
        const results: DownloadResponse[] = [];

        for (let index = 0; index < batches.length; index++) {
            results.push(...(await this.submitBatch(username, batches[index], signal)));
            if (index < batches.length - 1) {
                await this.sleep(this.batchDelayMs, signal);
            }
        }
        return results;
    }

    /** At most `maxRetries + 1` backend calls per batch */
    private async submitBatch(
        username: string,
        files: DownloadRequestFile[],
        signal?: AbortSignal
    ): Promise<DownloadResponse[]> {
        let attempts = 0;
        try {
            return await withRetry(
                () => {
                    attempts++;
                    return this.backend.submitDownloads(username, files);
                },
                {
                    retries: this.maxRetries,
                    baseDelayMs: this.baseDelayMs,
                    isRetryable: (error) => !signal?.aborted && isRetryableError(error),
                    sleep: (ms) => this.sleep(ms, signal),
                    operation: `[DOWNLOAD] Batch of ${files.length} for ${username}`,
                }
            );
        } catch (error) {
            const message = `Failed after ${attempts} attempt(s): ${errorMessage(error)}`;
            logger.error(`[DOWNLOAD] Batch for ${username} failed: ${message}`);
            return files.map((file) => ({ username, ...file, error: message }));
        }
    }
}
