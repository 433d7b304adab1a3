import { rankMatch } from "../utils/fuzzyMatch";
import { isAudioFile, qualityLabel, qualityScore } from "../utils/audioQuality";
import type {
    AlbumResult,
    MatchResult,
    PeerSearchResponse,
    SearchResult,
    TrackResult,
} from "../types/slskd";

export const MIN_SCORE_THRESHOLD = 0.6;

export interface ScoredFile {
    match: MatchResult;
    file: SearchResult;
}

export interface SearchCriteria {
    artist: string;
    album?: string;
    tracks: readonly string[];
}

export function flattenSearchResponses(responses: PeerSearchResponse[]): SearchResult[] {
    return responses.flatMap((response) =>
        response.files.map((file) => ({
            username: response.username,
            filename: file.filename,
            size: file.size,
            bitrate: file.bitRate,
            duration: file.length,
            hasFreeUploadSlot: response.hasFreeUploadSlot,
            uploadSpeed: response.uploadSpeed,
            queueLength: response.queueLength,
        }))
    );
}

/**
 * Score every audio file in the responses and keep those at or above
 * `minScore`, in response order.
 */
export function scoreSearchResults(
    files: SearchResult[],
    criteria: SearchCriteria,
    minScore: number = MIN_SCORE_THRESHOLD
): ScoredFile[] {
    const scored: ScoredFile[] = [];
    for (const file of files) {
        if (!isAudioFile(file.filename)) continue;
        const match = rankMatch(file.filename, criteria.artist, criteria.album, criteria.tracks);
        if (match.totalScore < minScore) continue;
        scored.push({ match, file });
    }
    return scored;
}

function toTrackResult({ match, file }: ScoredFile): TrackResult {
    return {
        ...file,
        artist: match.guessedArtist,
        title: match.matchedTrack,
        album: match.guessedAlbum,
        matchScore: match.totalScore,
    };
}

function isBetter(candidate: ScoredFile, current: ScoredFile): boolean {
    if (candidate.match.totalScore !== current.match.totalScore) {
        return candidate.match.totalScore > current.match.totalScore;
    }
    return qualityScore(candidate.file) > qualityScore(current.file);
}

function dominantQuality(tracks: TrackResult[]): string {
    const counts = new Map<string, number>();
    for (const track of tracks) {
        const label = qualityLabel(track.filename);
        counts.set(label, (counts.get(label) ?? 0) + 1);
    }
    let winner = "";
    let winnerCount = 0;
    for (const [label, count] of counts) {
        if (count > winnerCount) {
            winner = label;
            winnerCount = count;
        }
    }
    return winner;
}

/** Folder part of a peer path, in the peer's own separator style */
function parentFolder(filename: string): string {
    const cut = Math.max(filename.lastIndexOf("/"), filename.lastIndexOf("\\"));
    return cut >= 0 ? filename.slice(0, cut) : "";
}

const mean = (values: number[]) =>
    values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Group scored files by (peer, guessed artist, guessed album) and keep the best
 * file per expected track. Groups come out in first-seen order, tracks in
 * expected-track order.
 *
 * score = 0.3 * mean match + 0.3 * completeness + 0.4 * mean quality
 */
export function findBestAlbums(
    scoredFiles: ScoredFile[],
    expectedTracks: readonly string[]
): AlbumResult[] {
    if (expectedTracks.length === 0) return [];

    const groups = new Map<string, ScoredFile[]>();
    for (const scored of scoredFiles) {
        const key = JSON.stringify([
            scored.file.username,
            scored.match.guessedArtist,
            scored.match.guessedAlbum,
        ]);
        const group = groups.get(key);
        if (group) group.push(scored);
        else groups.set(key, [scored]);
    }

    const albums: AlbumResult[] = [];
    for (const files of groups.values()) {
        const bestPerTrack = new Map<string, ScoredFile>();
        for (const scored of files) {
            const title = scored.match.matchedTrack;
            const current = bestPerTrack.get(title);
            if (!current || isBetter(scored, current)) {
                bestPerTrack.set(title, scored);
            }
        }

        const tracks: TrackResult[] = [];
        for (const title of new Set(expectedTracks)) {
            const best = bestPerTrack.get(title);
            if (best) tracks.push(toTrackResult(best));
        }
        if (tracks.length === 0) continue;

        const first = tracks[0];
        const completeness = tracks.length / new Set(expectedTracks).size;
        const score =
            mean(tracks.map((track) => track.matchScore)) * 0.3 +
            completeness * 0.3 +
            mean(tracks.map(qualityScore)) * 0.4;

        albums.push({
            username: first.username,
            albumPath: parentFolder(first.filename),
            albumTitle: first.album,
            artist: first.artist,
            trackCount: tracks.length,
            totalSize: tracks.reduce((sum, track) => sum + track.size, 0),
            tracks,
            dominantQuality: dominantQuality(tracks),
            hasFreeUploadSlot: first.hasFreeUploadSlot,
            uploadSpeed: first.uploadSpeed,
            queueLength: first.queueLength,
            score: Math.min(1, Math.max(0, score)),
        });
    }
    return albums;
}

/** Score, filter and group peer responses; sorted by score, best first */
export function processSearchResponses(
    responses: PeerSearchResponse[],
    criteria: SearchCriteria,
    minScore: number = MIN_SCORE_THRESHOLD
): AlbumResult[] {
    const scored = scoreSearchResults(flattenSearchResponses(responses), criteria, minScore);
    // Array.prototype.sort is stable, so equal scores keep first-seen order
    return findBestAlbums(scored, criteria.tracks).sort((a, b) => b.score - a.score);
}
