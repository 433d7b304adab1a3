import { AxiosAdapter, AxiosError, AxiosHeaders, InternalAxiosRequestConfig } from "axios";
import {
    FallbackMetadataProvider,
    MusicBrainzProvider,
    buildLuceneQuery,
    formatDuration,
    isRetryableHttpError,
} from "../musicbrainz";
import type { MetadataProvider } from "../backends";
import type { AlbumMetadata } from "../../types/metadata";

type Reply = { status: number; data?: unknown } | "network";

function fakeMusicBrainz(...replies: Reply[]) {
    const requests: Array<{ url?: string; params: unknown; userAgent: unknown }> = [];
    const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
        requests.push({ url: config.url, params: config.params, userAgent: config.headers.get("User-Agent") });
        const reply = replies.shift() ?? { status: 200, data: {} };
        if (reply === "network") {
            throw new AxiosError("socket hang up", "ECONNRESET", config);
        }
        const response = { data: reply.data ?? "", status: reply.status, statusText: "", headers: {}, config };
        if (reply.status >= 400) {
            throw new AxiosError(`Request failed with status code ${reply.status}`, "ERR_BAD_RESPONSE", config, undefined, response);
        }
        return response;
    };
    const provider = new MusicBrainzProvider({
        baseUrl: "https://mb.test/ws/2/",
        adapter,
        sleep: async () => undefined,
    });
    return { provider, requests };
}

const boc = [{ name: "Boards of Canada" }];

describe("MusicBrainzProvider", () => {
    it("searches release groups and keeps the earliest official album or EP release", async () => {
        const { provider, requests } = fakeMusicBrainz({
            status: 200,
            data: {
                "release-groups": [
                    {
                        id: "rg1",
                        title: "Geogaddi",
                        "primary-type": "Album",
                        "artist-credit": boc,
                        releases: [
                            { id: "r2", title: "Geogaddi", status: "Official", date: "2002-02-18" },
                            { id: "r1", title: "Geogaddi", status: "Official", date: "2002-02-11" },
                            { id: "r0", title: "Geogaddi", status: "Bootleg", date: "2001-01-01" },
                        ],
                    },
                    { id: "rg2", title: "Live", "primary-type": "Single", releases: [{ id: "x", title: "x" }] },
                    { id: "rg3", title: "Trans Canada Highway", "primary-type": "EP", "artist-credit": boc, releases: [] },
                ],
            },
        });

        const albums = await provider.searchAlbums("Boards of Canada", "Geogaddi", 5);

        expect(albums).toEqual([{ id: "r1", title: "Geogaddi", artist: "Boards of Canada", releaseDate: "2002-02-11" }]);
        expect(requests).toEqual([
            {
                url: "/release-group",
                params: { query: 'releasegroup:"Geogaddi" AND artist:"Boards of Canada"', limit: 5, fmt: "json" },
                userAgent: expect.stringMatching(/^soulfetch\//),
            },
        ]);
    });

    it("dedupes recordings by title, artist and album", async () => {
        const { provider } = fakeMusicBrainz({
            status: 200,
            data: {
                recordings: [
                    {
                        id: "rec1",
                        title: "Roygbiv",
                        length: 151000,
                        "artist-credit": boc,
                        releases: [{ id: "r1", title: "MHTRTC", date: "1998-04-20" }],
                    },
                    {
                        id: "rec2",
                        title: "ROYGBIV",
                        length: 150000,
                        "artist-credit": boc,
                        releases: [{ id: "r9", title: "mhtrtc", date: "2004" }],
                    },
                    {
                        id: "rec3",
                        title: "Roygbiv",
                        "artist-credit": [{ name: "Boards of Canada", joinphrase: " & " }, { name: "Someone" }],
                    },
                ],
            },
        });

        const tracks = await provider.searchTracks(undefined, "Roygbiv", 10);

        expect(tracks).toEqual([
            {
                id: "rec1",
                title: "Roygbiv",
                artist: "Boards of Canada",
                albumId: "r1",
                albumTitle: "MHTRTC",
                releaseDate: "1998-04-20",
                duration: "2:31",
            },
            { id: "rec3", title: "Roygbiv", artist: "Boards of Canada & Someone" },
        ]);
    });

    it("loads a release with its tracks", async () => {
        const { provider, requests } = fakeMusicBrainz({
            status: 200,
            data: {
                id: "r1",
                title: "MHTRTC",
                date: "1998-04-20",
                "artist-credit": boc,
                media: [
                    {
                        tracks: [
                            {
                                id: "t1",
                                title: "Wildlife Analysis",
                                length: 77000,
                                recording: { id: "rec0", title: "Wildlife Analysis" },
                            },
                            {
                                id: "t2",
                                length: null,
                                recording: { id: "rec1", title: "Roygbiv", length: 151000, "artist-credit": [{ name: "BoC" }] },
                            },
                        ],
                    },
                ],
            },
        });

        const { album, tracks } = await provider.getAlbum("r1");

        expect(album).toEqual({ id: "r1", title: "MHTRTC", artist: "Boards of Canada", releaseDate: "1998-04-20" });
        expect(tracks.map((track) => [track.id, track.title, track.artist, track.duration])).toEqual([
            ["rec0", "Wildlife Analysis", "Boards of Canada", "1:17"],
            ["rec1", "Roygbiv", "BoC", "2:31"],
        ]);
        expect(requests[0]).toMatchObject({
            url: "/release/r1",
            params: { inc: "recordings+artist-credits", fmt: "json" },
        });
    });

    it("retries server errors and dropped connections", async () => {
        const { provider, requests } = fakeMusicBrainz({ status: 503 }, "network", {
            status: 200,
            data: { recordings: [] },
        });

        await expect(provider.searchTracks("a", "b", 1)).resolves.toEqual([]);
        expect(requests).toHaveLength(3);
    });

    it("does not retry client errors", async () => {
        const { provider, requests } = fakeMusicBrainz({ status: 400 });

        await expect(provider.getAlbum("bad")).rejects.toThrow("Request failed with status code 400");
        expect(requests).toHaveLength(1);
    });
});

describe("MusicBrainz helpers", () => {
    it("formats lengths as m:ss", () => {
        expect(formatDuration(59999)).toBe("1:00");
        expect(formatDuration(605000)).toBe("10:05");
        expect(formatDuration(0)).toBeUndefined();
        expect(formatDuration(null)).toBeUndefined();
    });

    it("escapes quotes in queries", () => {
        expect(buildLuceneQuery("recording", ' Say "Hi" ', "  ")).toBe('recording:"Say \\"Hi\\""');
    });

    it("only retries rate limits, server errors and network failures", () => {
        const withStatus = (status: number) =>
            new AxiosError("x", "ERR", undefined, undefined, {
                data: "",
                status,
                statusText: "",
                headers: {},
                config: { headers: new AxiosHeaders() },
            });
        expect(isRetryableHttpError(withStatus(429))).toBe(true);
        expect(isRetryableHttpError(withStatus(500))).toBe(true);
        expect(isRetryableHttpError(withStatus(404))).toBe(false);
        expect(isRetryableHttpError(new AxiosError("timeout", "ECONNABORTED"))).toBe(true);
        expect(isRetryableHttpError(new Error("plain"))).toBe(false);
    });
});

function stubProvider(id: string, albums: AlbumMetadata[] | Error): MetadataProvider {
    const answer = async () => {
        if (albums instanceof Error) throw albums;
        return albums;
    };
    return {
        id,
        name: id,
        searchAlbums: answer,
        searchTracks: async () => [],
        getAlbum: async () => {
            if (albums instanceof Error) throw albums;
            return { album: albums[0], tracks: [] };
        },
    };
}

describe("FallbackMetadataProvider", () => {
    const geogaddi: AlbumMetadata = { id: "r1", title: "Geogaddi", artist: "Boards of Canada" };

    it("uses the first provider with results", async () => {
        const fallback = new FallbackMetadataProvider([
            stubProvider("broken", new Error("down")),
            stubProvider("empty", []),
            stubProvider("good", [geogaddi]),
        ]);
        await expect(fallback.searchAlbums(undefined, "Geogaddi", 5)).resolves.toEqual([geogaddi]);
    });

    it("returns nothing when every provider comes back empty", async () => {
        const fallback = new FallbackMetadataProvider([stubProvider("a", []), stubProvider("b", new Error("down"))]);
        await expect(fallback.searchAlbums(undefined, "x", 5)).resolves.toEqual([]);
    });

    it("rethrows when every provider fails", async () => {
        const fallback = new FallbackMetadataProvider([
            stubProvider("a", new Error("first")),
            stubProvider("b", new Error("second")),
        ]);
        await expect(fallback.searchAlbums(undefined, "x", 5)).rejects.toThrow("second");
        await expect(fallback.getAlbum("r1")).rejects.toThrow("second");
    });

    it("loads albums from the next provider after a failure", async () => {
        const fallback = new FallbackMetadataProvider([
            stubProvider("a", new Error("first")),
            stubProvider("b", [geogaddi]),
        ]);
        await expect(fallback.getAlbum("r1")).resolves.toEqual({ album: geogaddi, tracks: [] });
    });
});
