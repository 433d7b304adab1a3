/**
 * Tracks one submitted batch of downloads until every file reaches a final
 * state, then hands completed files to the import orchestrator.
 *
 * Per tracked filename: unseen -> seen (first-seen time recorded) ->
 * processed. The per-track timeout is measured from first sight, not from
 * submission, because peers can keep a file queued for a long time.
 */

import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { sleep as defaultSleep, Sleep } from "../utils/async";
import { filenamesMatch } from "../utils/fuzzyMatch";
import { asTimeout, isCompletedState, isTerminalState } from "../utils/fileEntries";
import { downloadOutcomesTotal } from "../utils/metrics";
import type { DownloadBackend } from "./backends";
import type { ImportOrchestrator } from "./importOrchestrator";
import type { Publish } from "./eventBus";
import type { FileEntry } from "../types/slskd";

export const POLL_INTERVAL_MS = 2000;
export const MAX_CONSECUTIVE_EMPTY = 15;
export const PER_TRACK_TIMEOUT_MS = 60 * 60 * 1000;

interface TrackState {
    firstSeen?: number;
    processed: boolean;
    /** Set once the synthetic timeout record has been published */
    timedOut?: boolean;
}

export type MonitorOutcome = "completed" | "lost" | "cancelled";

export interface MonitorResult {
    outcome: MonitorOutcome;
    polls: number;
    processed: number;
    timedOut: number;
}

export interface DownloadMonitorOptions {
    filenames: string[];
    targetPath: string;
    albumMode: boolean;
    backend: DownloadBackend;
    orchestrator: Pick<ImportOrchestrator, "processCompleted">;
    publish: Publish;
    signal?: AbortSignal;
    now?: () => number;
    sleep?: Sleep;
    pollIntervalMs?: number;
    maxConsecutiveEmpty?: number;
    trackTimeoutMs?: number;
}

export class DownloadMonitor {
    private readonly filenames: string[];
    private readonly tracks = new Map<string, TrackState>();
    private readonly targetPath: string;
    private readonly albumMode: boolean;
    private readonly backend: DownloadBackend;
    private readonly orchestrator: Pick<ImportOrchestrator, "processCompleted">;
    private readonly publish: Publish;
    private readonly signal?: AbortSignal;
    private readonly now: () => number;
    private readonly sleep: Sleep;
    private readonly pollIntervalMs: number;
    private readonly maxConsecutiveEmpty: number;
    private readonly trackTimeoutMs: number;
    private readonly pendingImports = new Set<Promise<void>>();
    private timedOutCount = 0;

    constructor(options: DownloadMonitorOptions) {
        this.filenames = [...new Set(options.filenames)];
        for (const filename of this.filenames) {
            this.tracks.set(filename, { processed: false });
        }
        this.targetPath = options.targetPath;
        this.albumMode = options.albumMode;
        this.backend = options.backend;
        this.orchestrator = options.orchestrator;
        this.publish = options.publish;
        this.signal = options.signal;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
        this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
        this.maxConsecutiveEmpty = options.maxConsecutiveEmpty ?? MAX_CONSECUTIVE_EMPTY;
        this.trackTimeoutMs = options.trackTimeoutMs ?? PER_TRACK_TIMEOUT_MS;
    }

    async run(): Promise<MonitorResult> {
        let consecutiveEmpty = 0;
        let polls = 0;
        let outcome: MonitorOutcome | undefined;

        logger.info(`[MONITOR] Started monitoring ${this.filenames.length} download(s)`);

        while (outcome === undefined) {
            if (this.signal?.aborted) {
                outcome = "cancelled";
                break;
            }
            polls++;

            let transfers: FileEntry[] | undefined;
            try {
                transfers = await this.backend.listAllTransfers();
            } catch (error) {
                // slskd restarts and brief outages are common; keep polling
                logger.warn(`[MONITOR] Error fetching download status: ${errorMessage(error)}`);
            }

            if (transfers) {
                const matched = this.findMatching(transfers);
                if (polls <= 3 || matched.length !== this.filenames.length) {
                    logger.debug(
                        `[MONITOR] Matched ${matched.length} of ${this.filenames.length} downloads (poll ${polls})`
                    );
                }

                if (matched.length === 0) {
                    consecutiveEmpty++;
                    if (consecutiveEmpty >= this.maxConsecutiveEmpty) {
                        logger.warn(
                            `[MONITOR] No downloads found after ${consecutiveEmpty} polls, assuming completed or lost`
                        );
                        outcome = "lost";
                        break;
                    }
                } else {
                    consecutiveEmpty = 0;
                    const visible = this.withoutTimedOut(matched);
                    if (visible.length > 0) this.publish(visible);
                    this.processTracks(matched);
                    if (await this.checkCompletion(matched)) {
                        outcome = "completed";
                        break;
                    }
                }
            }

            await this.sleep(this.pollIntervalMs, this.signal);
            if (this.signal?.aborted) {
                outcome = "cancelled";
            }
        }

        await this.waitForImports();

        const processed = [...this.tracks.values()].filter((track) => track.processed).length;
        logger.info(`[MONITOR] Monitoring finished: ${outcome} after ${polls} poll(s)`);
        return { outcome, polls, processed, timedOut: this.timedOutCount };
    }

    private trackFor(filename: string): string | undefined {
        return this.filenames.find((tracked) => filenamesMatch(tracked, filename));
    }

    private findMatching(transfers: FileEntry[]): FileEntry[] {
        return transfers.filter((transfer) => this.trackFor(transfer.filename) !== undefined);
    }

    /** A timeout stays the last word on a track, whatever slskd reports later */
    private withoutTimedOut(matched: FileEntry[]): FileEntry[] {
        return matched.filter((entry) => {
            const key = this.trackFor(entry.filename);
            return key === undefined || this.tracks.get(key)?.timedOut !== true;
        });
    }

    private processTracks(matched: FileEntry[]): void {
        const now = this.now();
        for (const entry of matched) {
            const key = this.trackFor(entry.filename);
            if (key === undefined) continue;
            const track = this.tracks.get(key);
            if (!track) continue;

            if (track.firstSeen === undefined) track.firstSeen = now;
            if (track.processed) continue;

            if (now - track.firstSeen > this.trackTimeoutMs && !isTerminalState(entry.state)) {
                logger.warn(
                    `[MONITOR] Track timed out after ${Math.round((now - track.firstSeen) / 60000)} minutes: ${entry.filename}`
                );
                this.publish([asTimeout(entry, this.trackTimeoutMs)]);
                track.processed = true;
                track.timedOut = true;
                this.timedOutCount++;
                downloadOutcomesTotal.inc({ outcome: "timedOut" });
                continue;
            }

            if (isCompletedState(entry.state)) {
                if (!this.albumMode) {
                    logger.info(`[MONITOR] Track completed, importing now: ${entry.filename}`);
                    track.processed = true;
                    downloadOutcomesTotal.inc({ outcome: "completed" });
                    this.startImport([entry]);
                }
                continue;
            }

            if (isTerminalState(entry.state)) {
                track.processed = true;
                downloadOutcomesTotal.inc({ outcome: "failed" });
            }
        }
    }

    /** Stop once every track is processed or every tracked file is in a final state */
    private async checkCompletion(matched: FileEntry[]): Promise<boolean> {
        const allProcessed = [...this.tracks.values()].every((track) => track.processed);
        const allTerminal = this.filenames.every((filename) => {
            const entry = matched.find((transfer) => filenamesMatch(transfer.filename, filename));
            return entry !== undefined && isTerminalState(entry.state);
        });
        if (!allProcessed && !allTerminal) return false;

        if (this.albumMode) {
            const completed = matched.filter((entry) => {
                const key = this.trackFor(entry.filename);
                const track = key === undefined ? undefined : this.tracks.get(key);
                return track !== undefined && !track.processed && isCompletedState(entry.state);
            });
            if (completed.length > 0) {
                logger.info(`[MONITOR] Album mode: importing ${completed.length} download(s) together`);
                downloadOutcomesTotal.inc({ outcome: "completed" }, completed.length);
                await this.runImport(completed);
                for (const entry of completed) {
                    const key = this.trackFor(entry.filename);
                    const track = key === undefined ? undefined : this.tracks.get(key);
                    if (track) track.processed = true;
                }
            } else {
                logger.info("[MONITOR] Album mode: no successful downloads to import");
            }
        }

        logger.info("[MONITOR] All downloads finished");
        return true;
    }

    private async runImport(entries: FileEntry[]): Promise<void> {
        try {
            await this.orchestrator.processCompleted(entries, this.targetPath, this.albumMode);
        } catch (error) {
            logger.error(`[MONITOR] Import of ${entries.length} file(s) failed: ${errorMessage(error)}`);
        }
    }

    /** Singleton imports run beside the poll loop; run() waits for them at the end */
    private startImport(entries: FileEntry[]): void {
        const pending = this.runImport(entries).finally(() => {
            this.pendingImports.delete(pending);
        });
        this.pendingImports.add(pending);
    }

    private async waitForImports(): Promise<void> {
        while (this.pendingImports.size > 0) {
            await Promise.all([...this.pendingImports]);
        }
    }
}
