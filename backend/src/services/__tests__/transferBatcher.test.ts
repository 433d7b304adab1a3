import { TransferBatcher } from "../transferBatcher";
import { SlskdApiError } from "../../utils/errors";
import { FakeBackend, fakeClock } from "../../../tests/helpers/fakeBackend";

function selection(username: string, name: string, size = 100) {
    return { username, filename: `@@${username}\\Album\\${name}.flac`, size };
}

function setup() {
    const backend = new FakeBackend();
    const clock = fakeClock();
    const batcher = new TransferBatcher({ backend, sleep: clock.sleep });
    return { backend, clock, batcher };
}

describe("TransferBatcher", () => {
    it("groups selections by peer and drops duplicate files", async () => {
        const { backend, batcher } = setup();

        const results = await batcher.download([
            selection("alice", "01"),
            selection("bob", "01"),
            selection("alice", "02"),
            selection("alice", "01"),
        ]);

        expect(backend.submissions.map((s) => [s.username, s.files.length])).toEqual([
            ["alice", 2],
            ["bob", 1],
        ]);
        expect(results.map((r) => `${r.username}:${r.filename}`)).toEqual([
            "alice:@@alice\\Album\\01.flac",
            "alice:@@alice\\Album\\02.flac",
            "bob:@@bob\\Album\\01.flac",
        ]);
        expect(results.every((r) => r.error === undefined)).toBe(true);
    });

    it("submits a peer's files in batches with a pause between them", async () => {
        const { backend, batcher, clock } = setup();

        await batcher.download(["01", "02", "03", "04", "05", "06", "07"].map((n) => selection("alice", n)));

        expect(backend.submissions.map((s) => s.files.length)).toEqual([3, 3, 1]);
        expect(clock.state.sleeps).toEqual([3000, 3000]);
    });

    it("fails every file of a batch after the retries run out", async () => {
        const { backend, batcher, clock } = setup();
        backend.onSubmit = () => {
            throw new SlskdApiError(503, "busy");
        };

        const results = await batcher.download([selection("alice", "01"), selection("alice", "02")]);

        expect(backend.submissions).toHaveLength(4);
        expect(clock.state.sleeps).toEqual([1000, 2000, 4000]);
        expect(results.map((r) => r.error)).toEqual([
            "Failed after 4 attempt(s): busy",
            "Failed after 4 attempt(s): busy",
        ]);
    });

    it("does not retry client errors", async () => {
        const { backend, batcher } = setup();
        backend.onSubmit = () => {
            throw new SlskdApiError(400, "bad filename");
        };

        const results = await batcher.download([selection("alice", "01")]);

        expect(backend.submissions).toHaveLength(1);
        expect(results[0].error).toBe("Failed after 1 attempt(s): bad filename");
    });

    it("stops retrying once cancelled", async () => {
        const { backend, batcher } = setup();
        backend.onSubmit = () => {
            throw new SlskdApiError(500, "down");
        };
        const controller = new AbortController();
        controller.abort();

        const results = await batcher.download([selection("alice", "01")], controller.signal);

        expect(backend.submissions).toHaveLength(1);
        expect(results[0].error).toBe("Failed after 1 attempt(s): down");
    });

    it("passes per-file errors from the gateway through", async () => {
        const { backend, batcher } = setup();
        backend.onSubmit = (username, files) =>
            files.map((file, index) => ({ username, ...file, error: index === 1 ? "Peer offline" : undefined }));

        const results = await batcher.download([selection("alice", "01"), selection("alice", "02")]);

        expect(results.map((r) => r.error)).toEqual([undefined, "Peer offline"]);
    });

    it("rejects a batch size below one", () => {
        expect(() => new TransferBatcher({ backend: new FakeBackend(), batchSize: 0 })).toThrow(
            "Batch size must be positive"
        );
    });
});
