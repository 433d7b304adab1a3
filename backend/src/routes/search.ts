import { Router, RequestHandler } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { errorMessage, httpStatusFor } from "../utils/errors";
import { DEFAULT_SEARCH_TIMEOUT_MS, SearchCoordinator } from "../services/searchCoordinator";

const startSearchSchema = z.object({
    artist: z.string().trim().min(1, "artist is required"),
    album: z.string().optional(),
    tracks: z.array(z.string()).default([]),
    timeoutMs: z.number().int().min(1000).max(300000).default(DEFAULT_SEARCH_TIMEOUT_MS),
});

export function createSearchRouter(coordinator: SearchCoordinator, auth: RequestHandler): Router {
    const router = Router();
    router.use(auth);

    /**
     * POST /api/search
     * Starts a search; poll GET /api/search/:id for grouped results.
     */
    router.post("/", async (req, res) => {
        const parsed = startSearchSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: "Invalid request", details: parsed.error.issues });
        }
        const { artist, album, tracks, timeoutMs } = parsed.data;
        try {
            const searchId = await coordinator.startSearch(artist, album, tracks, timeoutMs);
            logger.debug(`[SEARCH] User ${req.user?.id} started search ${searchId}`);
            res.status(201).json({ searchId });
        } catch (error) {
            logger.error(`[SEARCH] Failed to start search: ${errorMessage(error)}`);
            res.status(httpStatusFor(error)).json({ error: "Failed to start search" });
        }
    });

    router.get("/:id", async (req, res) => {
        try {
            res.json(await coordinator.pollSearch(req.params.id));
        } catch (error) {
            logger.error(`[SEARCH] Poll of ${req.params.id} failed: ${errorMessage(error)}`);
            res.status(httpStatusFor(error)).json({ error: "Failed to poll search" });
        }
    });

    router.delete("/:id", async (req, res) => {
        try {
            await coordinator.deleteSearch(req.params.id);
            res.status(204).end();
        } catch (error) {
            logger.error(`[SEARCH] Delete of ${req.params.id} failed: ${errorMessage(error)}`);
            res.status(httpStatusFor(error)).json({ error: "Failed to delete search" });
        }
    });

    return router;
}
