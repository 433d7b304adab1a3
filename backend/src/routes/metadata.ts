import { Router, RequestHandler } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { MetadataProvider } from "../services/backends";

const lookupSchema = z.object({
    q: z.string().trim().min(1, "q is required"),
    artist: z.string().trim().optional(),
    limit: z.coerce.number().int().min(1).max(100).default(10),
});

/** Album and track lookups used to build the expected track list of a search */
export function createMetadataRouter(provider: MetadataProvider, auth: RequestHandler): Router {
    const router = Router();
    router.use(auth);

    router.get("/albums", async (req, res) => {
        const parsed = lookupSchema.safeParse(req.query);
        if (!parsed.success) {
            return res.status(400).json({ error: "Invalid request", details: parsed.error.issues });
        }
        try {
            const { artist, q, limit } = parsed.data;
            res.json(await provider.searchAlbums(artist || undefined, q, limit));
        } catch (error) {
            logger.error(`[METADATA] Album search failed: ${errorMessage(error)}`);
            res.status(502).json({ error: "Metadata lookup failed" });
        }
    });

    router.get("/tracks", async (req, res) => {
        const parsed = lookupSchema.safeParse(req.query);
        if (!parsed.success) {
            return res.status(400).json({ error: "Invalid request", details: parsed.error.issues });
        }
        try {
            const { artist, q, limit } = parsed.data;
            res.json(await provider.searchTracks(artist || undefined, q, limit));
        } catch (error) {
            logger.error(`[METADATA] Track search failed: ${errorMessage(error)}`);
            res.status(502).json({ error: "Metadata lookup failed" });
        }
    });

    router.get("/albums/:id", async (req, res) => {
        try {
            res.json(await provider.getAlbum(req.params.id));
        } catch (error) {
            logger.error(`[METADATA] Album ${req.params.id} lookup failed: ${errorMessage(error)}`);
            res.status(502).json({ error: "Metadata lookup failed" });
        }
    });

    return router;
}
