/**
 * Domain types for searches, candidates and transfers exchanged with slskd.
 */

/** One file offered by a peer in a search response */
export interface SearchResult {
    username: string;
    filename: string;
    size: number;
    bitrate?: number;
    duration?: number;
    hasFreeUploadSlot: boolean;
    uploadSpeed: number;
    queueLength: number;
}

export interface MatchResult {
    guessedArtist: string;
    guessedAlbum: string;
    matchedTrack: string;
    artistScore: number;
    albumScore: number;
    trackScore: number;
    totalScore: number;
}

/** A candidate chosen for one expected track, with its match data */
export interface TrackResult extends SearchResult {
    artist: string;
    title: string;
    album: string;
    matchScore: number;
}

/** Candidates from one peer that look like the same release */
export interface AlbumResult {
    username: string;
    albumPath: string;
    albumTitle: string;
    artist: string;
    trackCount: number;
    totalSize: number;
    tracks: TrackResult[];
    dominantQuality: string;
    hasFreeUploadSlot: boolean;
    uploadSpeed: number;
    queueLength: number;
    score: number;
}

export type SearchState = "InProgress" | "Completed" | "NotFound" | "TimedOut";

export interface SearchPollResult {
    results: AlbumResult[];
    hasMore: boolean;
    state: SearchState;
}

/** Raw peer response from GET /searches/{id}/responses */
export interface PeerSearchResponse {
    username: string;
    files: Array<{
        filename: string;
        size: number;
        bitRate?: number;
        length?: number;
    }>;
    hasFreeUploadSlot: boolean;
    uploadSpeed: number;
    queueLength: number;
}

export interface DownloadRequestFile {
    filename: string;
    size: number;
}

/** A file the caller picked for download */
export interface DownloadSelection extends DownloadRequestFile {
    username: string;
}

/** Per-file submission outcome; `error` is set when the file was not queued */
export interface DownloadResponse extends DownloadSelection {
    error?: string;
}

export const KNOWN_DOWNLOAD_STATES = [
    "Requested",
    "Queued",
    "Locally",
    "Remotely",
    "Initializing",
    "InProgress",
    "Completed",
    "Succeeded",
    "Cancelled",
    "Aborted",
    "Errored",
    "TimedOut",
    "Rejected",
    "Importing",
    "Imported",
    "ImportSkipped",
    "ImportFailed",
] as const;

export type KnownDownloadState = (typeof KNOWN_DOWNLOAD_STATES)[number];

/** Unknown gateway tags are kept verbatim */
export type DownloadState = KnownDownloadState | (string & {});

/** A transfer as reported by slskd, or synthesized by the monitor */
export interface FileEntry {
    id: string;
    username: string;
    direction: string;
    filename: string;
    size: number;
    startOffset: number;
    state: DownloadState[];
    stateDescription: string;
    requestedAt: string;
    enqueuedAt?: string;
    startedAt?: string;
    endedAt?: string;
    bytesTransferred: number;
    averageSpeed: number;
    bytesRemaining: number;
    elapsedTime?: string;
    percentComplete: number;
    remainingTime?: string;
    exception?: string;
}

/** Display classification derived from the tag list */
export type DownloadStatus =
    | "importFailed"
    | "failed"
    | "cancelled"
    | "importSkipped"
    | "imported"
    | "importing"
    | "downloaded"
    | "inProgress"
    | "queued"
    | "unknown";
