import { randomUUID } from "crypto";
import type {
    DownloadResponse,
    DownloadState,
    DownloadStatus,
    FileEntry,
} from "../types/slskd";

const FAILURE_TAGS: ReadonlySet<string> = new Set([
    "Errored",
    "TimedOut",
    "Rejected",
    "ImportFailed",
]);
const CANCEL_TAGS: ReadonlySet<string> = new Set(["Cancelled", "Aborted"]);

/**
 * slskd reports state as a comma-separated string ("Completed, Succeeded").
 * Some versions send an array instead.
 */
export function parseStateTags(raw: string | string[]): DownloadState[] {
    const parts = Array.isArray(raw) ? raw : raw.split(",");
    return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

export function hasTag(state: DownloadState[], tag: DownloadState): boolean {
    return state.includes(tag);
}

export function isFailedState(state: DownloadState[]): boolean {
    return state.some((tag) => FAILURE_TAGS.has(tag) || CANCEL_TAGS.has(tag));
}

/** Transfer finished and the bytes are on disk */
export function isCompletedState(state: DownloadState[]): boolean {
    return hasTag(state, "Completed") && !isFailedState(state);
}

export function isTerminalState(state: DownloadState[]): boolean {
    return (
        hasTag(state, "Completed") ||
        hasTag(state, "Imported") ||
        hasTag(state, "ImportSkipped") ||
        isFailedState(state)
    );
}

/**
 * Collapse the tag list into one display status. Error tags outrank
 * everything else, so a file that is both downloaded and import-failed
 * shows as import-failed.
 */
export function classifyState(state: DownloadState[]): DownloadStatus {
    if (hasTag(state, "ImportFailed")) return "importFailed";
    if (state.some((tag) => FAILURE_TAGS.has(tag))) return "failed";
    if (state.some((tag) => CANCEL_TAGS.has(tag))) return "cancelled";
    if (hasTag(state, "ImportSkipped")) return "importSkipped";
    if (hasTag(state, "Imported")) return "imported";
    if (hasTag(state, "Importing")) return "importing";
    if (hasTag(state, "Completed")) return "downloaded";
    if (hasTag(state, "InProgress") || hasTag(state, "Initializing")) return "inProgress";
    if (hasTag(state, "Queued") || hasTag(state, "Requested")) return "queued";
    return "unknown";
}

/** A transfer record with its display status, as listed to users */
export type StatusEntry = FileEntry & { status: DownloadStatus };

export function withStatus(entry: FileEntry): StatusEntry {
    return { ...entry, status: classifyState(entry.state) };
}

function fromDownloadResponse(
    response: DownloadResponse,
    state: DownloadState,
    stateDescription: string
): FileEntry {
    return {
        id: randomUUID(),
        username: response.username,
        direction: "Download",
        filename: response.filename,
        size: response.size,
        startOffset: 0,
        state: [state],
        stateDescription,
        requestedAt: new Date().toISOString(),
        bytesTransferred: 0,
        averageSpeed: 0,
        bytesRemaining: response.size,
        percentComplete: 0,
        exception: response.error,
    };
}

/** Placeholder shown until slskd reports the transfer */
export function queuedEntry(response: DownloadResponse): FileEntry {
    return {
        ...fromDownloadResponse(response, "Queued", "Queued for download"),
        enqueuedAt: new Date().toISOString(),
    };
}

export function erroredEntry(response: DownloadResponse): FileEntry {
    return fromDownloadResponse(
        response,
        "Errored",
        response.error ?? "Download request failed"
    );
}

export function withState(
    entry: FileEntry,
    state: DownloadState,
    stateDescription?: string
): FileEntry {
    return {
        ...entry,
        state: [state],
        stateDescription: stateDescription ?? entry.stateDescription,
    };
}

function formatDuration(ms: number): string {
    const plural = (n: number, unit: string) => `${n} ${unit}${n === 1 ? "" : "s"}`;
    if (ms >= 3600000 && ms % 3600000 === 0) return plural(ms / 3600000, "hour");
    if (ms >= 60000 && ms % 60000 === 0) return plural(ms / 60000, "minute");
    return plural(Math.round(ms / 1000), "second");
}

export function asTimeout(entry: FileEntry, timeoutMs: number): FileEntry {
    return {
        ...entry,
        state: ["Errored", "TimedOut"],
        stateDescription: `Download timed out after ${formatDuration(timeoutMs)}`,
        endedAt: new Date().toISOString(),
        remainingTime: undefined,
        exception: "Per-track timeout",
    };
}
