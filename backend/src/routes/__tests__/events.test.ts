import { EventEmitter } from "events";
import jwt from "jsonwebtoken";
import type { Request, Response } from "express";
import { createEventsRouter } from "../events";
import { EventBus } from "../../services/eventBus";

const SECRET = "test-secret";

class FakeStream {
    statusCode?: number;
    headers?: Record<string, string>;
    body?: unknown;
    chunks: string[] = [];
    ended = false;

    writeHead(code: number, headers: Record<string, string>) {
        this.statusCode = code;
        this.headers = headers;
        return this;
    }
    status(code: number) {
        this.statusCode = code;
        return this;
    }
    json(body: unknown) {
        this.body = body;
        return this;
    }
    write(chunk: string) {
        this.chunks.push(chunk);
        return true;
    }
    end() {
        this.ended = true;
        return this;
    }
}

function connect(events: ReturnType<typeof createEventsRouter>, token?: string) {
    const req = Object.assign(new EventEmitter(), {
        method: "GET",
        url: token === undefined ? "/" : `/?token=${token}`,
        headers: {},
        query: token === undefined ? {} : { token },
    });
    const res = new FakeStream();
    events.router(req as unknown as Request, res as unknown as Response, jest.fn());
    return { req, res };
}

describe("events router", () => {
    let bus: EventBus;
    let events: ReturnType<typeof createEventsRouter>;

    beforeEach(() => {
        jest.useFakeTimers();
        bus = new EventBus();
        events = createEventsRouter(bus, SECRET);
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it("refuses connections without a valid token", () => {
        expect(connect(events).res).toMatchObject({ statusCode: 401, body: { error: "Unauthorized" } });
        expect(connect(events, "garbage").res).toMatchObject({ statusCode: 401, body: { error: "Invalid token" } });
        expect(events.connectionCount()).toBe(0);
        expect(bus.listenerCount()).toBe(0);
    });

    it("streams only the caller's events", () => {
        const { res } = connect(events, jwt.sign({ userId: "u1" }, SECRET));
        expect(res.statusCode).toBe(200);
        expect(res.headers?.["Content-Type"]).toBe("text/event-stream");

        bus.emit({ type: "downloads:finished", userId: "u2", payload: { batchId: "b0", outcome: "completed" } });
        bus.emit({ type: "downloads:finished", userId: "u1", payload: { batchId: "b1", outcome: "lost" } });

        expect(res.chunks).toEqual([
            'data: {"type":"connected"}\n\n',
            'data: {"type":"downloads:finished","userId":"u1","payload":{"batchId":"b1","outcome":"lost"}}\n\n',
        ]);
    });

    it("sends heartbeats and cleans up when the client leaves", () => {
        const { req, res } = connect(events, jwt.sign({ userId: "u1" }, SECRET));
        connect(events, jwt.sign({ userId: "u1" }, SECRET));
        expect(events.connectionCount()).toBe(2);

        jest.advanceTimersByTime(30_000);
        expect(res.chunks[1]).toBe(": heartbeat\n\n");

        req.emit("close");
        expect(events.connectionCount()).toBe(1);
        expect(bus.listenerCount()).toBe(1);

        jest.advanceTimersByTime(30_000);
        expect(res.chunks).toHaveLength(2);
    });

    it("ends every stream on closeAll", () => {
        const first = connect(events, jwt.sign({ userId: "u1" }, SECRET));
        const second = connect(events, jwt.sign({ userId: "u2" }, SECRET));

        events.closeAll();

        expect(first.res.ended).toBe(true);
        expect(second.res.ended).toBe(true);
    });
});
