import os from "os";
import path from "path";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { DownloadService, resolveLibraryTarget } from "../../src/services/downloadService";
import { TransferBatcher } from "../../src/services/transferBatcher";
import { EventBus, SSEEvent } from "../../src/services/eventBus";
import { InvalidTargetError } from "../../src/utils/errors";
import { FakeBackend, FakeImporter, transfer } from "../helpers/fakeBackend";

const A = "@@alice\\Music\\Album\\01 - One.flac";
const B = "@@alice\\Music\\Album\\02 - Two.flac";
const C = "@@alice\\Music\\Album\\03 - Three.flac";

let downloadRoot: string;
let library: string;

beforeEach(async () => {
    downloadRoot = await mkdtemp(path.join(os.tmpdir(), "soulfetch-downloads-"));
    library = path.join(await mkdtemp(path.join(os.tmpdir(), "soulfetch-library-")), "Alice");
});

afterEach(async () => {
    await rm(downloadRoot, { recursive: true, force: true });
    await rm(path.dirname(library), { recursive: true, force: true });
});

/** Yields to the event loop so polling loops interleave with the test */
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup() {
    const backend = new FakeBackend();
    const importer = new FakeImporter();
    const bus = new EventBus();
    const events: SSEEvent[] = [];
    bus.subscribe((event) => events.push(event));
    const finished = new Promise<SSEEvent>((resolve) => {
        bus.subscribe((event) => {
            if (event.type === "downloads:finished") resolve(event);
        });
    });
    const service = new DownloadService({
        backend,
        importer,
        batcher: new TransferBatcher({ backend, sleep: tick }),
        bus,
        downloadRoot,
        libraryRoot: path.dirname(library),
        albumMode: false,
        monitorDefaults: { sleep: tick },
    });
    return { backend, importer, bus, events, finished, service };
}

const selection = (filename: string) => ({ username: "alice", filename, size: 1000 });

describe("download pipeline", () => {
    it("queues, tracks and imports a selection end to end", async () => {
        const { backend, importer, events, finished, service } = setup();
        await mkdir(path.join(downloadRoot, "Music", "Album"), { recursive: true });
        await writeFile(path.join(downloadRoot, "Music", "Album", "01 - One.flac"), "audio");
        await writeFile(path.join(downloadRoot, "Music", "Album", "02 - Two.flac"), "audio");

        backend.onSubmit = (username, files) =>
            files.map((file) => ({ username, ...file, error: file.filename === C ? "File not shared" : undefined }));
        backend.onListTransfers = (poll) =>
            poll === 1
                ? [transfer(A, ["InProgress"]), transfer(B, ["Completed", "Succeeded"])]
                : [transfer(A, ["Completed", "Succeeded"]), transfer(B, ["Completed", "Succeeded"])];

        const { batchId, results } = await service.queueDownloads("u1", [selection(A), selection(B), selection(C)], library);

        expect(batchId).toBeDefined();
        expect(results.map((result) => result.error)).toEqual([undefined, undefined, "File not shared"]);
        expect(await finished).toEqual({ type: "downloads:finished", userId: "u1", payload: { batchId, outcome: "completed" } });

        expect(importer.calls.map((call) => call.sources).sort()).toEqual([
            [path.join(downloadRoot, "Music", "Album", "01 - One.flac")],
            [path.join(downloadRoot, "Music", "Album", "02 - Two.flac")],
        ]);
        expect(importer.calls.every((call) => call.target === library && !call.asAlbum)).toBe(true);

        const updates = events.filter((event) => event.type === "downloads:update");
        expect(updates[0].payload).toEqual([expect.objectContaining({ filename: C, state: ["Errored"], stateDescription: "File not shared" })]);
        expect(updates[1].payload).toEqual([
            expect.objectContaining({ filename: A, state: ["Queued"] }),
            expect.objectContaining({ filename: B, state: ["Queued"] }),
        ]);
        const imported = events.flatMap((event) =>
            event.type === "downloads:update" ? event.payload.filter((entry) => entry.state.includes("Imported")) : []
        );
        expect(imported.map((entry) => entry.filename).sort()).toEqual([A, B].sort());
        expect(service.activeMonitorCount()).toBe(0);
    });

    it("refuses target folders outside the library root", async () => {
        const { backend, events, service } = setup();

        await expect(service.queueDownloads("u1", [selection(A)], "../elsewhere")).rejects.toThrow(InvalidTargetError);
        await expect(service.queueDownloads("u1", [selection(A)], "/etc")).rejects.toThrow(
            "Target folder must be inside the library: /etc"
        );

        expect(backend.submissions).toEqual([]);
        expect(events).toEqual([]);
    });

    it("resolves relative target folders under the library root", async () => {
        const { importer, backend, finished, service } = setup();
        await writeFile(path.join(downloadRoot, "solo.flac"), "audio");
        backend.onListTransfers = () => [transfer("solo.flac", ["Completed", "Succeeded"])];

        await service.queueDownloads("u1", [selection("solo.flac")], "Alice");
        await finished;

        expect(importer.calls.map((call) => call.target)).toEqual([library]);
    });

    it("starts no monitor when nothing was queued", async () => {
        const { backend, events, service } = setup();
        backend.onSubmit = (username, files) => files.map((file) => ({ username, ...file, error: "Peer offline" }));

        const { batchId, results } = await service.queueDownloads("u1", [selection(A)], library);

        expect(batchId).toBeUndefined();
        expect(results[0].error).toBe("Peer offline");
        expect(service.activeMonitorCount()).toBe(0);
        expect(events).toHaveLength(1);
        expect(backend.transferPolls).toBe(0);
    });

    it("lets only the owner cancel a batch", async () => {
        const { backend, finished, service } = setup();
        backend.onListTransfers = () => [transfer(A, ["InProgress"])];

        const { batchId } = await service.queueDownloads("u1", [selection(A)], library);
        if (batchId === undefined) throw new Error("expected a batch");
        const done = service.waitFor(batchId);

        expect(service.cancel(batchId, "someone-else")).toBe(false);
        expect(service.cancel(batchId, "u1")).toBe(true);

        await expect(done).resolves.toMatchObject({ outcome: "cancelled" });
        expect(await finished).toMatchObject({ payload: { batchId, outcome: "cancelled" } });
        await expect(service.waitFor(batchId)).resolves.toBeUndefined();
        expect(service.cancel("unknown", "u1")).toBe(false);
    });

    it("stops every monitor on shutdown", async () => {
        const { backend, service } = setup();
        backend.onListTransfers = () => [transfer(A, ["InProgress"])];

        await service.queueDownloads("u1", [selection(A)], library);
        await service.queueDownloads("u2", [selection(B)], library);
        expect(service.activeMonitorCount()).toBe(2);

        await service.shutdown();

        expect(service.activeMonitorCount()).toBe(0);
    });
});

describe("resolveLibraryTarget", () => {
    it("keeps targets inside the root", () => {
        expect(resolveLibraryTarget("/music", "Alice/Singles")).toBe(path.resolve("/music/Alice/Singles"));
        expect(resolveLibraryTarget("/music", "/music/Alice")).toBe(path.resolve("/music/Alice"));
        expect(resolveLibraryTarget("/music", "..notes")).toBe(path.resolve("/music/..notes"));
    });

    it("rejects targets that escape the root", () => {
        expect(() => resolveLibraryTarget("/music", "../etc")).toThrow(InvalidTargetError);
        expect(() => resolveLibraryTarget("/music", "Alice/../../etc")).toThrow(InvalidTargetError);
        expect(() => resolveLibraryTarget("/music", "/musicians")).toThrow(InvalidTargetError);
    });
});
