import { Router, Request, Response } from "express";
import { EventBus, SSEEvent } from "../services/eventBus";
import { extractToken, verifyToken } from "../middleware/auth";
import { logger } from "../utils/logger";

const HEARTBEAT_MS = 30_000;

export interface EventsRouter {
    router: Router;
    connectionCount(): number;
    /** End every open stream */
    closeAll(): void;
}

/**
 * GET /api/events?token=<jwt>
 * SSE stream of the caller's transfer record updates.
 * Auth via query param because EventSource API cannot set headers.
 */
export function createEventsRouter(bus: EventBus, jwtSecret: string | undefined): EventsRouter {
    const router = Router();
    const connections = new Map<string, Set<Response>>();

    router.get("/", (req: Request, res: Response) => {
        const token = extractToken(req);
        if (!token || !jwtSecret) {
            res.status(401).json({ error: "Unauthorized" });
            return;
        }
        const userId = verifyToken(token, jwtSecret);
        if (!userId) {
            res.status(401).json({ error: "Invalid token" });
            return;
        }

        res.writeHead(200, {
            "Content-Type": "text/event-stream",
            "Cache-Control": "no-cache",
            Connection: "keep-alive",
            "X-Accel-Buffering": "no",
        });

        res.write(`data: ${JSON.stringify({ type: "connected" })}\n\n`);

        let userConns = connections.get(userId);
        if (!userConns) {
            userConns = new Set();
            connections.set(userId, userConns);
        }
        userConns.add(res);

        logger.debug(`[SSE] Client connected: userId=${userId}`);

        const unsubscribe = bus.subscribe((event: SSEEvent) => {
            if (event.userId === userId) {
                res.write(`data: ${JSON.stringify(event)}\n\n`);
            }
        });

        const heartbeat = setInterval(() => {
            res.write(`: heartbeat\n\n`);
        }, HEARTBEAT_MS);

        req.on("close", () => {
            clearInterval(heartbeat);
            unsubscribe();
            const remaining = connections.get(userId);
            if (remaining) {
                remaining.delete(res);
                if (remaining.size === 0) {
                    connections.delete(userId);
                }
            }
            logger.debug(`[SSE] Client disconnected: userId=${userId}`);
        });
    });

    return {
        router,
        connectionCount() {
            let count = 0;
            for (const set of connections.values()) {
                count += set.size;
            }
            return count;
        },
        closeAll() {
            for (const set of connections.values()) {
                for (const res of set) res.end();
            }
        },
    };
}
