/**
 * Fuzzy matching of peer file paths against the release the user asked for.
 *
 * Peer paths carry no identifiers, so every decision is made on word sets:
 * the ancestor folders usually hold artist/album, the file stem holds the
 * track title (often prefixed with a track number and "Artist - ").
 *
 * Everything here is pure and deterministic; search grouping and the download
 * monitor both rely on getting the same answer for the same input.
 */

import path from "path";
import type { MatchResult } from "../types/slskd";

const ARTIST_WEIGHT = 0.2;
const TRACK_WEIGHT = 0.4;
const ALBUM_WEIGHT = 0.4;
// Album scores at or below this mean the folders carry no album info
const ALBUM_INFO_THRESHOLD = 0.25;

const RE_NON_WORD = /[^\p{L}\p{M}\p{N}\p{Pc}\s]/gu;
const RE_LEAD_TRACK = /^\s*(\d{1,3}|[A-D]\d{1,2})\s*[.-]\s*/;
const RE_TRAIL_BRACKET = /\s*\[\s*[^\]]*\]\s*$/;
const RE_TRAIL_YEAR = /\s*[-([]?\d{4}[-)\]]?\s*$/;
const SEPARATOR = " - ";

interface CleanedText {
    original: string;
    words: ReadonlySet<string>;
}

const EMPTY: CleanedText = { original: "", words: new Set() };

export function tokenize(text: string): Set<string> {
    const words = text
        .replace(/_/g, " ")
        .replace(RE_NON_WORD, " ")
        .toLowerCase()
        .split(/\s+/)
        .filter((word) => word.length > 0);
    return new Set(words);
}

function cleaned(text: string): CleanedText {
    return { original: text, words: tokenize(text) };
}

/**
 * Strip decorations that never help matching: a leading track number
 * ("01.", "A2 -"), a trailing bracketed tag ("[FLAC]") and a trailing year.
 */
export function cleanName(name: string): string {
    return name
        .replace(/_/g, " ")
        .replace(RE_LEAD_TRACK, "")
        .replace(RE_TRAIL_BRACKET, "")
        .replace(RE_TRAIL_YEAR, "")
        .trim();
}

/** Title portion of a stem: whatever follows the last " - " */
export function extractTrackTitle(stem: string): string {
    const stemClean = cleanName(stem);
    const pos = stemClean.lastIndexOf(SEPARATOR);
    return pos >= 0 ? stemClean.slice(pos + SEPARATOR.length).trim() : stemClean;
}

function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    let count = 0;
    for (const word of a) {
        if (b.has(word)) count++;
    }
    return count;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    const inter = intersectionSize(a, b);
    const union = a.size + b.size - inter;
    return union === 0 ? 0 : inter / union;
}

/**
 * Share of the target's words found in the candidate. Asymmetric: extra
 * words in the candidate cost nothing.
 */
export function containment(
    candidate: ReadonlySet<string>,
    target: ReadonlySet<string>
): number {
    if (target.size === 0) return 0;
    return intersectionSize(candidate, target) / target.size;
}

export function dice(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    const total = a.size + b.size;
    if (total === 0) return 1;
    return (2 * intersectionSize(a, b)) / total;
}

interface PathInfo {
    /** Top-down, e.g. ["@@peer", "Music", "Artist - Album"] */
    folders: string[];
    stem: string;
}

export function parsePeerPath(filename: string): PathInfo {
    const normalized = filename.replace(/\\/g, "/");
    const segments = normalized
        .split("/")
        .filter((segment) => segment.length > 0 && segment !== "." && segment !== "..");
    const base = segments.pop() ?? "";
    return { folders: segments, stem: path.posix.parse(base).name };
}

type Scored = [number, CleanedText];

/** Highest score wins; on ties the later candidate wins */
function best(candidates: Scored[]): Scored {
    let winner: Scored = [0, EMPTY];
    let found = false;
    for (const candidate of candidates) {
        if (!found || candidate[0] >= winner[0]) {
            winner = candidate;
            found = true;
        }
    }
    return winner;
}

function scoreArtist(
    folders: CleanedText[],
    stem: CleanedText,
    target: CleanedText
): Scored {
    const [folderScore, folderGuess] = best(
        folders.map((folder): Scored => [containment(folder.words, target.words), folder])
    );

    const pos = stem.original.lastIndexOf(SEPARATOR);
    const stemArtist = cleaned(
        cleanName(pos >= 0 ? stem.original.slice(0, pos) : stem.original)
    );
    const stemScore = containment(stemArtist.words, target.words);

    if (stemScore > folderScore) return [stemScore, stemArtist];
    if (folderScore > stemScore) return [folderScore, folderGuess];
    // Equal and confident: the longer text is the more specific guess
    if (stemScore > 0.9 && stemArtist.original.length > folderGuess.original.length) {
        return [stemScore, stemArtist];
    }
    return [folderScore, folderGuess];
}

function scoreAlbum(folders: CleanedText[], target: CleanedText): Scored {
    return best(
        folders.map((folder): Scored => [
            (jaccard(folder.words, target.words) + containment(folder.words, target.words)) / 2,
            folder,
        ])
    );
}

function scoreTrack(stem: CleanedText, expected: CleanedText[]): Scored {
    const title = cleaned(extractTrackTitle(stem.original));
    if (expected.length === 0) {
        return [1, title];
    }
    return best(
        expected.map((track): Scored => [
            dice(title.words, track.words) * 0.6 + containment(title.words, track.words) * 0.4,
            track,
        ])
    );
}

const clamp = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Score one peer path against the wanted artist/album/tracks.
 *
 * Only the components that were asked for contribute to `totalScore`. When
 * the album score is at or below the information threshold its weight is
 * left out of the denominator while the term itself still counts, so a
 * generic folder name ("Music", "Downloads") cannot sink an otherwise
 * confident artist + track match.
 */
export function rankMatch(
    filename: string,
    expectedArtist: string | undefined,
    expectedAlbum: string | undefined,
    expectedTracks: readonly string[]
): MatchResult {
    const info = parsePeerPath(filename);
    const folders = info.folders.map((folder) => cleaned(cleanName(folder)));
    const stem = cleaned(info.stem);

    const [artistScore, artistGuess]: Scored =
        expectedArtist !== undefined
            ? scoreArtist(folders, stem, cleaned(expectedArtist))
            : [0, EMPTY];

    const [albumScore, albumGuess]: Scored =
        expectedAlbum !== undefined ? scoreAlbum(folders, cleaned(expectedAlbum)) : [0, EMPTY];

    const [trackScore, trackGuess] = scoreTrack(stem, expectedTracks.map(cleaned));

    let weightedSum = 0;
    let totalWeight = 0;

    if (expectedArtist !== undefined) {
        weightedSum += artistScore * ARTIST_WEIGHT;
        totalWeight += ARTIST_WEIGHT;
    }
    if (expectedTracks.length > 0) {
        weightedSum += trackScore * TRACK_WEIGHT;
        totalWeight += TRACK_WEIGHT;
    }
    if (expectedAlbum !== undefined) {
        weightedSum += albumScore * ALBUM_WEIGHT;
        if (albumScore > ALBUM_INFO_THRESHOLD) totalWeight += ALBUM_WEIGHT;
    }

    return {
        guessedArtist: artistGuess.original,
        guessedAlbum: albumGuess.original,
        matchedTrack: trackGuess.original,
        artistScore: clamp(artistScore),
        albumScore: clamp(albumScore),
        trackScore: clamp(trackScore),
        totalScore: totalWeight > 0 ? clamp(weightedSum / totalWeight) : 0,
    };
}

function normalizeFilename(filename: string): string {
    return filename.replace(/\\/g, "/").toLowerCase().trim();
}

/**
 * Whether two transfer paths refer to the same file. slskd may report a
 * different prefix or case than the one requested, so after normalization
 * this accepts an exact match, a suffix match either way, or equal bare
 * file names.
 */
export function filenamesMatch(a: string, b: string): boolean {
    const normA = normalizeFilename(a);
    const normB = normalizeFilename(b);

    if (normA === normB) return true;
    if (normA.length === 0 || normB.length === 0) return false;
    if (normA.endsWith(normB) || normB.endsWith(normA)) return true;

    const fileA = normA.slice(normA.lastIndexOf("/") + 1);
    const fileB = normB.slice(normB.lastIndexOf("/") + 1);
    return fileA === fileB;
}
