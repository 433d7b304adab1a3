import {
    cleanName,
    containment,
    dice,
    extractTrackTitle,
    filenamesMatch,
    jaccard,
    parsePeerPath,
    rankMatch,
    tokenize,
} from "../fuzzyMatch";

describe("fuzzyMatch", () => {
    describe("text helpers", () => {
        it("tokenizes into lowercase words, dropping punctuation and underscores", () => {
            expect([...tokenize("Boards_of Canada!")]).toEqual(["boards", "of", "canada"]);
        });

        it("strips track numbers, bracketed tags and trailing years", () => {
            expect(cleanName("01. Roygbiv [FLAC]")).toBe("Roygbiv");
            expect(cleanName("Geogaddi (2002)")).toBe("Geogaddi");
            expect(cleanName("A2 - Aquarius")).toBe("Aquarius");
        });

        it("takes the title after the last separator", () => {
            expect(extractTrackTitle("03 - Boards of Canada - Roygbiv")).toBe("Roygbiv");
            expect(extractTrackTitle("07 - Aquarius")).toBe("Aquarius");
        });

        it("computes set similarities", () => {
            const a = new Set(["a", "b"]);
            const b = new Set(["b", "c"]);
            expect(jaccard(a, b)).toBeCloseTo(1 / 3);
            expect(containment(new Set(["a"]), a)).toBe(0.5);
            expect(containment(a, new Set())).toBe(0);
            expect(dice(a, b)).toBe(0.5);
            expect(dice(new Set(), new Set())).toBe(1);
        });

        it("splits peer paths on either separator", () => {
            expect(parsePeerPath("@@bob\\Music\\Album/01 - Song.flac")).toEqual({
                folders: ["@@bob", "Music", "Album"],
                stem: "01 - Song",
            });
        });
    });

    describe("rankMatch", () => {
        const tracks = ["Roygbiv", "Telephasic Workshop"];

        it("scores a well-named album folder highly", () => {
            const match = rankMatch(
                "@@bob\\Music\\Boards Of Canada - Music Has The Right To Children (1998)\\02 - Telephasic Workshop.flac",
                "Boards of Canada",
                "Music Has the Right to Children",
                tracks
            );

            expect(match.artistScore).toBe(1);
            expect(match.albumScore).toBeCloseTo(5 / 6);
            expect(match.trackScore).toBe(1);
            expect(match.totalScore).toBeCloseTo(0.2 + 0.4 + 0.4 * (5 / 6));
            expect(match.matchedTrack).toBe("Telephasic Workshop");
            expect(match.guessedAlbum).toBe("Boards Of Canada - Music Has The Right To Children");
        });

        it("leaves a weak album weight out of the denominator but keeps its term", () => {
            const match = rankMatch(
                "Boards of Canada/Music/Boards of Canada - Roygbiv.flac",
                "Boards of Canada",
                "Music Has the Right to Children",
                ["Roygbiv Remix Edit Version"]
            );

            expect(match.artistScore).toBe(1);
            expect(match.albumScore).toBeCloseTo(1 / 6, 6);
            expect(match.trackScore).toBeCloseTo(0.34, 6);
            // (0.2 * 1 + 0.4 * 0.34 + 0.4 / 6) / (0.2 + 0.4)
            expect(match.totalScore).toBeCloseTo(0.671111, 5);
            expect(match.totalScore).toBeGreaterThan(0.6);
        });

        it("clamps the total when the weak album term pushes it past one", () => {
            const match = rankMatch(
                "Boards of Canada/Music/Boards of Canada - Roygbiv.flac",
                "Boards of Canada",
                "Music Has the Right to Children",
                ["Roygbiv"]
            );

            expect(match.albumScore).toBeCloseTo(1 / 6, 6);
            expect(match.totalScore).toBe(1);
        });

        it("ignores the album weight when folders carry no album info", () => {
            const match = rankMatch(
                "@@bob\\Downloads\\Boards of Canada - Roygbiv.mp3",
                "Boards of Canada",
                "Music Has the Right to Children",
                tracks
            );

            expect(match.albumScore).toBe(0);
            expect(match.artistScore).toBe(1);
            expect(match.guessedArtist).toBe("Boards of Canada");
            expect(match.totalScore).toBe(1);
        });

        it("scores zero when nothing was asked for", () => {
            expect(rankMatch("x/y.mp3", undefined, undefined, []).totalScore).toBe(0);
        });

        it("keeps every score inside [0, 1]", () => {
            const inputs = [
                "",
                "song.mp3",
                "@@a\\b\\c\\d\\e.flac",
                "Artist - Album (1999) [FLAC]/01 - Artist - Title.flac",
                "!!!/???.wav",
            ];
            for (const input of inputs) {
                const match = rankMatch(input, "Artist", "Album", ["Title", "Other"]);
                for (const score of [
                    match.artistScore,
                    match.albumScore,
                    match.trackScore,
                    match.totalScore,
                ]) {
                    expect(score).toBeGreaterThanOrEqual(0);
                    expect(score).toBeLessThanOrEqual(1);
                }
            }
        });
    });

    describe("filenamesMatch", () => {
        it("is reflexive and symmetric", () => {
            const pairs: Array<[string, string]> = [
                ["@@bob\\Music\\A\\01.flac", "Music/A/01.flac"],
                ["x/song.flac", "y/song.flac"],
                ["a/one.flac", "a/two.flac"],
            ];
            for (const [a, b] of pairs) {
                expect(filenamesMatch(a, a)).toBe(true);
                expect(filenamesMatch(a, b)).toBe(filenamesMatch(b, a));
            }
        });

        it("matches on suffix after normalizing separators and case", () => {
            expect(filenamesMatch("@@bob\\Music\\A\\01.FLAC", "music/a/01.flac")).toBe(true);
        });

        it("matches equal file names in different folders", () => {
            expect(filenamesMatch("x/song.flac", "y/song.flac")).toBe(true);
        });

        it("rejects different files and empty names", () => {
            expect(filenamesMatch("a/one.flac", "a/two.flac")).toBe(false);
            expect(filenamesMatch("", "a/one.flac")).toBe(false);
        });
    });
});
