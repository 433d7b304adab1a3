import os from "os";
import path from "path";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { BeetsImporter, CommandResult, IMPORT_TIMEOUT_MS, RunCommand } from "../beets";
import { InvalidSourceError } from "../../utils/errors";

let dir: string;
let track: string;

beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "soulfetch-beets-"));
    track = path.join(dir, "01.flac");
    await writeFile(track, "audio");
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

function importer(result: Partial<CommandResult> | Error) {
    const calls: Array<{ command: string; args: string[]; timeoutMs: number }> = [];
    const run: RunCommand = async (command, args, timeoutMs) => {
        calls.push({ command, args, timeoutMs });
        if (result instanceof Error) throw result;
        return { code: 0, stdout: "", stderr: "", timedOut: false, ...result };
    };
    return { calls, beets: new BeetsImporter({ configPath: "/config/beets.yaml", run }) };
}

describe("BeetsImporter", () => {
    it("imports singletons quietly into a per-target library", async () => {
        const { beets, calls } = importer({ code: 0, stdout: "imported 1 item" });

        await expect(beets.import([track], "/music", false)).resolves.toEqual({ status: "success" });
        expect(calls).toEqual([
            {
                command: "beet",
                args: [
                    "-c",
                    "/config/beets.yaml",
                    "-l",
                    path.join("/music", ".beets_library.db"),
                    "-d",
                    "/music",
                    "import",
                    "-q",
                    "-s",
                    track,
                ],
                timeoutMs: IMPORT_TIMEOUT_MS,
            },
        ]);
    });

    it("imports folders as albums without the singleton flag", () => {
        const { beets } = importer({});
        expect(beets.buildImportArgs([dir], "/music", true)).not.toContain("-s");
    });

    it("treats skip messages as skipped", async () => {
        const { beets } = importer({ code: 0, stderr: "Skipping: already in library" });
        await expect(beets.import([track], "/music", false)).resolves.toEqual({ status: "skipped" });
    });

    it.each<[Partial<CommandResult>, string]>([
        [{ code: 1, stderr: " No matching release \n", stdout: "ignored" }, "No matching release"],
        [{ code: 1, stdout: "config error" }, "config error"],
        [{ code: 2 }, "Beet import failed with exit code: 2"],
        [{ code: null }, "Beet import failed with exit code: unknown"],
    ])("reports failures from %p", async (result, reason) => {
        const { beets } = importer(result);
        await expect(beets.import([track], "/music", false)).resolves.toEqual({ status: "failed", reason });
    });

    it("reports a killed import as timed out", async () => {
        const { beets } = importer({ code: null, timedOut: true });
        await expect(beets.import([track], "/music", true)).resolves.toEqual({
            status: "timedOut",
            timeoutMs: IMPORT_TIMEOUT_MS,
        });
    });

    it("refuses missing sources before running anything", async () => {
        const { beets, calls } = importer({});

        await expect(beets.import([path.join(dir, "missing.flac")], "/music", false)).rejects.toThrow(
            InvalidSourceError
        );
        await expect(beets.import([], "/music", false)).rejects.toThrow("No source paths given");
        expect(calls).toEqual([]);
    });

    it("checks health with beet version", async () => {
        const healthy = importer({ code: 0 });
        await expect(healthy.beets.healthCheck()).resolves.toBe(true);
        expect(healthy.calls[0].args).toEqual(["version"]);

        await expect(importer(new Error("spawn beet ENOENT")).beets.healthCheck()).resolves.toBe(false);
        await expect(importer({ code: 127 }).beets.healthCheck()).resolves.toBe(false);
    });
});
