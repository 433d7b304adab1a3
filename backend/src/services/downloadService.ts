import { randomUUID } from "crypto";
import path from "path";
import { mkdir } from "fs/promises";
import { logger } from "../utils/logger";
import { errorMessage, InvalidTargetError } from "../utils/errors";
import { erroredEntry, queuedEntry } from "../utils/fileEntries";
import { DownloadMonitor, MonitorResult } from "./downloadMonitor";
import { ImportOrchestrator } from "./importOrchestrator";
import { EventBus, publisherFor } from "./eventBus";
import type { TransferBatcher } from "./transferBatcher";
import type { DownloadBackend, MusicImporter } from "./backends";
import type { DownloadResponse, DownloadSelection } from "../types/slskd";

export interface DownloadServiceOptions {
    backend: DownloadBackend;
    importer: MusicImporter;
    batcher: TransferBatcher;
    bus: EventBus;
    downloadRoot: string;
    /** Import targets are resolved against this folder and may not leave it */
    libraryRoot: string;
    albumMode: boolean;
    /** Overrides for the monitors this service starts (tests shorten the intervals) */
    monitorDefaults?: Partial<
        Pick<
            ConstructorParameters<typeof DownloadMonitor>[0],
            "now" | "sleep" | "pollIntervalMs" | "maxConsecutiveEmpty" | "trackTimeoutMs"
        >
    >;
}

/**
 * Resolve a client-supplied target folder under `libraryRoot`. Relative
 * folders are taken from the root; absolute ones must already lie inside it.
 */
export function resolveLibraryTarget(libraryRoot: string, targetFolder: string): string {
    const root = path.resolve(libraryRoot);
    const target = path.resolve(root, targetFolder);
    const relative = path.relative(root, target);
    if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        throw new InvalidTargetError(`Target folder must be inside the library: ${targetFolder}`);
    }
    return target;
}

interface ActiveMonitor {
    userId: string;
    controller: AbortController;
    done: Promise<MonitorResult | undefined>;
}

/**
 * Entry point for queuing downloads: submits the selection, publishes the
 * initial per-file records and starts one monitor per submission.
 */
export class DownloadService {
    private readonly monitors = new Map<string, ActiveMonitor>();

    constructor(private readonly options: DownloadServiceOptions) {}

    async queueDownloads(
        userId: string,
        selections: DownloadSelection[],
        targetFolder: string
    ): Promise<{ batchId?: string; results: DownloadResponse[] }> {
        const targetPath = resolveLibraryTarget(this.options.libraryRoot, targetFolder);
        await mkdir(targetPath, { recursive: true });

        const results = await this.options.batcher.download(selections);
        const publish = publisherFor(this.options.bus, userId);

        const failed = results.filter((result) => result.error !== undefined);
        const queued = results.filter((result) => result.error === undefined);

        publish(failed.map(erroredEntry));
        if (queued.length === 0) {
            logger.warn(`[DOWNLOAD] Nothing was queued for user ${userId}`);
            return { results };
        }
        // Shown right away; slskd may take a few seconds to list the transfers
        publish(queued.map(queuedEntry));

        const batchId = randomUUID();
        const controller = new AbortController();
        const monitor = new DownloadMonitor({
            ...this.options.monitorDefaults,
            filenames: queued.map((result) => result.filename),
            targetPath,
            albumMode: this.options.albumMode,
            backend: this.options.backend,
            orchestrator: new ImportOrchestrator({
                importer: this.options.importer,
                downloadRoot: this.options.downloadRoot,
                publish,
            }),
            publish,
            signal: controller.signal,
        });

        const done = monitor
            .run()
            .then((result) => {
                this.options.bus.emit({
                    type: "downloads:finished",
                    userId,
                    payload: { batchId, outcome: result.outcome },
                });
                return result;
            })
            .catch((error: unknown) => {
                logger.error(`[DOWNLOAD] Monitor for batch ${batchId} crashed: ${errorMessage(error)}`);
                return undefined;
            })
            .finally(() => {
                this.monitors.delete(batchId);
            });

        this.monitors.set(batchId, { userId, controller, done });
        logger.info(`[DOWNLOAD] Monitoring batch ${batchId} with ${queued.length} file(s)`);
        return { batchId, results };
    }

    activeMonitorCount(): number {
        return this.monitors.size;
    }

    /** Wait for a batch's monitor to finish; undefined for unknown batches */
    async waitFor(batchId: string): Promise<MonitorResult | undefined> {
        return this.monitors.get(batchId)?.done;
    }

    /** Only the user who queued a batch may cancel it */
    cancel(batchId: string, userId: string): boolean {
        const active = this.monitors.get(batchId);
        if (!active || active.userId !== userId) return false;
        active.controller.abort();
        return true;
    }

    /** Cancel every monitor and wait for them to stop */
    async shutdown(): Promise<void> {
        const active = [...this.monitors.values()];
        for (const monitor of active) monitor.controller.abort();
        await Promise.all(active.map((monitor) => monitor.done));
    }
}
