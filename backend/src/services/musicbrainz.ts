import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { withRetry, Sleep } from "../utils/async";
import type { MetadataProvider } from "./backends";
import type { AlbumMetadata, AlbumWithTracks, TrackMetadata } from "../types/metadata";

const USER_AGENT = "soulfetch/0.1.0 (https://musicbrainz.org/doc/MusicBrainz_API)";
const ALBUM_TYPES = new Set(["album", "ep"]);

const artistCreditSchema = z
    .array(z.object({ name: z.string(), joinphrase: z.string().optional() }))
    .optional();

const releaseRefSchema = z.object({
    id: z.string(),
    title: z.string(),
    status: z.string().optional(),
    date: z.string().optional(),
});

const releaseGroupSearchSchema = z.object({
    "release-groups": z
        .array(
            z.object({
                id: z.string(),
                title: z.string(),
                "primary-type": z.string().nullish(),
                "first-release-date": z.string().optional(),
                "artist-credit": artistCreditSchema,
                releases: z.array(releaseRefSchema).optional(),
            })
        )
        .default([]),
});

const recordingSchema = z.object({
    id: z.string(),
    title: z.string(),
    length: z.number().nullish(),
    "artist-credit": artistCreditSchema,
    releases: z.array(releaseRefSchema).optional(),
});

const recordingSearchSchema = z.object({
    recordings: z.array(recordingSchema).default([]),
});

const releaseSchema = z.object({
    id: z.string(),
    title: z.string(),
    date: z.string().optional(),
    "artist-credit": artistCreditSchema,
    media: z
        .array(
            z.object({
                tracks: z
                    .array(
                        z.object({
                            id: z.string(),
                            title: z.string().optional(),
                            length: z.number().nullish(),
                            recording: recordingSchema.optional(),
                        })
                    )
                    .default([]),
            })
        )
        .default([]),
});

type ArtistCredit = z.infer<typeof artistCreditSchema>;

function creditName(credit: ArtistCredit, fallback = "Unknown Artist"): string {
    if (!credit || credit.length === 0) return fallback;
    return credit.map((part) => `${part.name}${part.joinphrase ?? ""}`).join("").trim();
}

/** Milliseconds to m:ss */
export function formatDuration(lengthMs: number | null | undefined): string | undefined {
    if (lengthMs === null || lengthMs === undefined || lengthMs <= 0) return undefined;
    const totalSeconds = Math.round(lengthMs / 1000);
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;
    return `${minutes}:${seconds.toString().padStart(2, "0")}`;
}

function escapeLucene(value: string): string {
    return value.replace(/(["\\])/g, "\\$1");
}

/** Build a Lucene query: `field:"query" AND artist:"artist"` */
export function buildLuceneQuery(field: string, query: string, artist?: string): string {
    const parts = [`${field}:"${escapeLucene(query.trim())}"`];
    if (artist && artist.trim()) {
        parts.push(`artist:"${escapeLucene(artist.trim())}"`);
    }
    return parts.join(" AND ");
}

/** 429, 5xx and requests that never got a response */
export function isRetryableHttpError(error: unknown): boolean {
    if (!isAxiosError(error)) return false;
    const status = error.response?.status;
    if (status === undefined) return true;
    return status === 429 || status >= 500;
}

/** Earliest dated release, official ones first */
function earliestRelease<T extends { status?: string; date?: string }>(releases: T[]): T | undefined {
    const official = releases.filter((release) => release.status === undefined || release.status === "Official");
    const pool = official.length > 0 ? official : releases;
    return [...pool].sort((a, b) => (a.date || "9999").localeCompare(b.date || "9999"))[0];
}

export interface MusicBrainzProviderOptions {
    baseUrl: string;
    retries?: number;
    adapter?: AxiosAdapter;
    sleep?: Sleep;
}

export class MusicBrainzProvider implements MetadataProvider {
    readonly id = "musicbrainz";
    readonly name = "MusicBrainz";
    private readonly client: AxiosInstance;
    private readonly retries: number;
    private readonly sleep?: Sleep;

    constructor(options: MusicBrainzProviderOptions) {
        this.client = axios.create({
            baseURL: options.baseUrl.replace(/\/+$/, ""),
            timeout: 15000,
            headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
            adapter: options.adapter,
        });
        this.retries = options.retries ?? 3;
        this.sleep = options.sleep;
    }

    private async get(path: string, params: Record<string, string | number>): Promise<unknown> {
        return withRetry(
            async () => {
                const response = await this.client.get<unknown>(path, { params: { ...params, fmt: "json" } });
                return response.data;
            },
            {
                retries: this.retries,
                isRetryable: isRetryableHttpError,
                sleep: this.sleep,
                operation: `MusicBrainz GET ${path}`,
            }
        );
    }

    async searchAlbums(artist: string | undefined, query: string, limit: number): Promise<AlbumMetadata[]> {
        const data = releaseGroupSearchSchema.parse(
            await this.get("/release-group", { query: buildLuceneQuery("releasegroup", query, artist), limit })
        );

        const albums: AlbumMetadata[] = [];
        for (const group of data["release-groups"]) {
            if (!ALBUM_TYPES.has((group["primary-type"] ?? "").toLowerCase())) continue;
            const release = earliestRelease(group.releases ?? []);
            if (!release) continue;
            albums.push({
                id: release.id,
                title: group.title,
                artist: creditName(group["artist-credit"]),
                releaseDate: release.date || group["first-release-date"] || undefined,
            });
        }
        logger.debug(`[MUSICBRAINZ] Album search "${query}" returned ${albums.length} result(s)`);
        return albums;
    }

    async searchTracks(artist: string | undefined, query: string, limit: number): Promise<TrackMetadata[]> {
        const data = recordingSearchSchema.parse(
            await this.get("/recording", { query: buildLuceneQuery("recording", query, artist), limit })
        );

        const seen = new Set<string>();
        const tracks: TrackMetadata[] = [];
        for (const recording of data.recordings) {
            const release = earliestRelease(recording.releases ?? []);
            const track: TrackMetadata = {
                id: recording.id,
                title: recording.title,
                artist: creditName(recording["artist-credit"]),
                albumId: release?.id,
                albumTitle: release?.title,
                releaseDate: release?.date || undefined,
                duration: formatDuration(recording.length),
            };
            const key = [track.title, track.artist, track.albumTitle ?? ""]
                .map((part) => part.toLowerCase())
                .join("\u0000");
            if (seen.has(key)) continue;
            seen.add(key);
            tracks.push(track);
        }
        return tracks;
    }

    async getAlbum(id: string): Promise<AlbumWithTracks> {
        const release = releaseSchema.parse(
            await this.get(`/release/${encodeURIComponent(id)}`, { inc: "recordings+artist-credits" })
        );
        const artist = creditName(release["artist-credit"]);
        const album: AlbumMetadata = {
            id: release.id,
            title: release.title,
            artist,
            releaseDate: release.date || undefined,
        };
        const tracks: TrackMetadata[] = release.media.flatMap((medium) =>
            medium.tracks.map((track) => ({
                id: track.recording?.id ?? track.id,
                title: track.title ?? track.recording?.title ?? "",
                artist: creditName(track.recording?.["artist-credit"], artist),
                albumId: release.id,
                albumTitle: release.title,
                releaseDate: album.releaseDate,
                duration: formatDuration(track.length ?? track.recording?.length),
            }))
        );
        return { album, tracks };
    }
}

/**
 * Asks each provider in turn. A provider that throws or finds nothing is
 * skipped; the last error is rethrown only when every provider failed.
 */
export class FallbackMetadataProvider implements MetadataProvider {
    readonly id = "fallback";
    readonly name = "Fallback";

    constructor(private readonly providers: MetadataProvider[]) {}

    private async firstNonEmpty<T>(label: string, call: (provider: MetadataProvider) => Promise<T[]>): Promise<T[]> {
        let lastError: unknown;
        let anySucceeded = false;
        for (const provider of this.providers) {
            try {
                const results = await call(provider);
                anySucceeded = true;
                if (results.length > 0) return results;
                logger.debug(`[METADATA] ${provider.name} returned no ${label}`);
            } catch (error) {
                lastError = error;
                logger.warn(`[METADATA] ${provider.name} ${label} lookup failed: ${errorMessage(error)}`);
            }
        }
        if (!anySucceeded && lastError !== undefined) throw lastError;
        return [];
    }

    searchAlbums(artist: string | undefined, query: string, limit: number): Promise<AlbumMetadata[]> {
        return this.firstNonEmpty("albums", (provider) => provider.searchAlbums(artist, query, limit));
    }

    searchTracks(artist: string | undefined, query: string, limit: number): Promise<TrackMetadata[]> {
        return this.firstNonEmpty("tracks", (provider) => provider.searchTracks(artist, query, limit));
    }

    async getAlbum(id: string): Promise<AlbumWithTracks> {
        let lastError: unknown = new Error(`No metadata provider could load album ${id}`);
        for (const provider of this.providers) {
            try {
                return await provider.getAlbum(id);
            } catch (error) {
                lastError = error;
                logger.warn(`[METADATA] ${provider.name} album lookup failed: ${errorMessage(error)}`);
            }
        }
        throw lastError;
    }
}
