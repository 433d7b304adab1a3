import PQueue from "p-queue";
import { logger } from "../utils/logger";
import { SlskdApiError, errorMessage } from "../utils/errors";
import { sleep as defaultSleep, Sleep } from "../utils/async";
import { slskdSearchDuration, slskdSearchesTotal } from "../utils/metrics";
import { MIN_SCORE_THRESHOLD, processSearchResponses } from "./searchResults";
import type { DownloadBackend } from "./backends";
import type { PeerSearchResponse, SearchPollResult, SearchState } from "../types/slskd";

export const DEFAULT_SEARCH_TIMEOUT_MS = 60000;
const LONG_POLL_MS = 10000;
const POLL_INTERVAL_MS = 1000;
const MAX_SEARCH_RESULTS = 50;

interface SearchSession {
    artist: string;
    album?: string;
    tracks: string[];
    createdAt: number;
    timeoutMs: number;
    seenResponseCount: number;
    returnedResults: boolean;
}

export interface SearchCoordinatorOptions {
    backend: DownloadBackend;
    now?: () => number;
    sleep?: Sleep;
    longPollMs?: number;
    pollIntervalMs?: number;
    maxResults?: number;
    minScore?: number;
}

/**
 * Query sent to the network. A single wanted track is searched by title,
 * anything else by album (or by artist alone when there is no album).
 */
export function buildSearchQuery(
    artist: string,
    album: string | undefined,
    tracks: readonly string[]
): string {
    const parts = [artist.trim()];
    if (tracks.length === 1) {
        parts.push(tracks[0].trim());
    } else if (album !== undefined && album.trim() !== "") {
        parts.push(album.trim());
    }
    return parts.filter((part) => part.length > 0).join(" ");
}

/**
 * Owns search sessions: starts them on the backend, long-polls for peer
 * responses and turns them into ranked album candidates.
 */
export class SearchCoordinator {
    private readonly sessions = new Map<string, SearchSession>();
    // Guards `sessions`; held only for read-then-update, never across I/O
    private readonly lock = new PQueue({ concurrency: 1 });
    private readonly backend: DownloadBackend;
    private readonly now: () => number;
    private readonly sleep: Sleep;
    private readonly longPollMs: number;
    private readonly pollIntervalMs: number;
    private readonly maxResults: number;
    private readonly minScore: number;

    constructor(options: SearchCoordinatorOptions) {
        this.backend = options.backend;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
        this.longPollMs = options.longPollMs ?? LONG_POLL_MS;
        this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
        this.maxResults = options.maxResults ?? MAX_SEARCH_RESULTS;
        this.minScore = options.minScore ?? MIN_SCORE_THRESHOLD;
    }

    private withLock<T>(fn: () => T): Promise<T> {
        return this.lock.add(fn);
    }

    async startSearch(
        artist: string,
        album: string | undefined,
        trackTitles: string[],
        timeoutMs: number = DEFAULT_SEARCH_TIMEOUT_MS
    ): Promise<string> {
        const tracks = trackTitles.map((title) => title.trim()).filter((title) => title.length > 0);
        const query = buildSearchQuery(artist, album, tracks);
        if (query === "") {
            throw new Error("Search needs at least an artist");
        }

        const searchId = await this.backend.submitSearch(query, timeoutMs);

        const session: SearchSession = {
            artist: artist.trim(),
            album: album?.trim() || undefined,
            tracks,
            createdAt: this.now(),
            timeoutMs,
            seenResponseCount: 0,
            returnedResults: false,
        };
        await this.withLock(() => this.sessions.set(searchId, session));
        return searchId;
    }

    /**
     * Wait up to the long-poll window for new peer responses. Each time the
     * response count grows, everything received so far is re-scored and
     * re-grouped from scratch.
     */
    async pollSearch(searchId: string): Promise<SearchPollResult> {
        const pollStart = this.now();

        for (;;) {
            const session = await this.withLock(() => {
                const current = this.sessions.get(searchId);
                return current ? { ...current } : undefined;
            });
            if (!session) {
                return { results: [], hasMore: false, state: "NotFound" };
            }

            if (this.now() - session.createdAt >= session.timeoutMs) {
                logger.info(`[SEARCH] Search ${searchId} reached its timeout`);
                const state: SearchState = session.returnedResults ? "Completed" : "TimedOut";
                await this.finish(searchId, session, state);
                return { results: [], hasMore: false, state };
            }

            let responses: PeerSearchResponse[];
            try {
                responses = await this.backend.pollSearchResponses(searchId);
            } catch (error) {
                if (error instanceof SlskdApiError && error.isNotFound) {
                    logger.info(`[SEARCH] Search ${searchId} no longer exists on slskd`);
                    await this.withLock(() => this.sessions.delete(searchId));
                    slskdSearchesTotal.inc({ state: "NotFound" });
                    return { results: [], hasMore: false, state: "NotFound" };
                }
                throw error;
            }

            if (responses.length > session.seenResponseCount) {
                const albums = processSearchResponses(
                    responses,
                    { artist: session.artist, album: session.album, tracks: session.tracks },
                    this.minScore
                );

                if (albums.length > this.maxResults) {
                    await this.finish(searchId, session, "Completed");
                    return {
                        results: albums.slice(0, this.maxResults),
                        hasMore: false,
                        state: "Completed",
                    };
                }

                await this.withLock(() => {
                    const current = this.sessions.get(searchId);
                    if (!current) return;
                    current.seenResponseCount = Math.max(current.seenResponseCount, responses.length);
                    if (albums.length > 0) current.returnedResults = true;
                });
                return { results: albums, hasMore: true, state: "InProgress" };
            }

            if (this.now() - pollStart >= this.longPollMs) {
                return { results: [], hasMore: true, state: "InProgress" };
            }
            await this.sleep(this.pollIntervalMs);
        }
    }

    /** Explicit cancellation by the caller */
    async deleteSearch(searchId: string): Promise<void> {
        await this.withLock(() => this.sessions.delete(searchId));
        await this.backend.deleteSearch(searchId);
    }

    activeSessionCount(): number {
        return this.sessions.size;
    }

    private async finish(searchId: string, session: SearchSession, state: SearchState): Promise<void> {
        await this.withLock(() => this.sessions.delete(searchId));
        slskdSearchesTotal.inc({ state });
        slskdSearchDuration.observe((this.now() - session.createdAt) / 1000);
        try {
            await this.backend.deleteSearch(searchId);
        } catch (error) {
            logger.warn(`[SEARCH] Failed to delete search ${searchId}: ${errorMessage(error)}`);
        }
    }
}
