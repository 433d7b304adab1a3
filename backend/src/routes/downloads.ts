import { Router, RequestHandler } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { errorMessage, httpStatusFor } from "../utils/errors";
import { withStatus } from "../utils/fileEntries";
import type { DownloadService } from "../services/downloadService";
import type { DownloadBackend } from "../services/backends";

const queueSchema = z.object({
    items: z
        .array(
            z.object({
                username: z.string().min(1),
                filename: z.string().min(1),
                size: z.number().int().nonnegative(),
            })
        )
        .min(1, "at least one item is required"),
    targetFolder: z.string().trim().min(1, "targetFolder is required"),
});

export function createDownloadsRouter(
    downloads: DownloadService,
    backend: DownloadBackend,
    auth: RequestHandler
): Router {
    const router = Router();
    router.use(auth);

    // POST /api/downloads - queue files and start monitoring them
    router.post("/", async (req, res) => {
        const userId = req.user?.id;
        if (!userId) {
            return res.status(401).json({ error: "Not authenticated" });
        }
        const parsed = queueSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: "Invalid request", details: parsed.error.issues });
        }
        try {
            const { batchId, results } = await downloads.queueDownloads(
                userId,
                parsed.data.items,
                parsed.data.targetFolder
            );
            res.status(202).json({ batchId, results });
        } catch (error) {
            logger.error(`[DOWNLOAD] Queue request failed: ${errorMessage(error)}`);
            const status = httpStatusFor(error);
            res.status(status).json({ error: status === 400 ? errorMessage(error) : "Failed to queue downloads" });
        }
    });

    router.get("/", async (_req, res) => {
        try {
            const transfers = await backend.listAllTransfers();
            res.json(transfers.map(withStatus));
        } catch (error) {
            logger.error(`[DOWNLOAD] Listing transfers failed: ${errorMessage(error)}`);
            res.status(httpStatusFor(error)).json({ error: "Failed to list downloads" });
        }
    });

    router.delete("/completed", async (_req, res) => {
        try {
            await backend.clearCompletedTransfers();
            res.status(204).end();
        } catch (error) {
            logger.error(`[DOWNLOAD] Clearing completed transfers failed: ${errorMessage(error)}`);
            res.status(httpStatusFor(error)).json({ error: "Failed to clear completed downloads" });
        }
    });

    router.post("/batches/:batchId/cancel", (req, res) => {
        const userId = req.user?.id;
        if (!userId || !downloads.cancel(req.params.batchId, userId)) {
            return res.status(404).json({ error: "Batch not found" });
        }
        res.status(202).json({ cancelled: true });
    });

    router.delete("/:username/:id", async (req, res) => {
        const remove = req.query.remove === "true";
        try {
            await backend.cancelTransfer(req.params.username, req.params.id, remove);
            res.status(204).end();
        } catch (error) {
            logger.error(`[DOWNLOAD] Cancel of ${req.params.id} failed: ${errorMessage(error)}`);
            res.status(httpStatusFor(error)).json({ error: "Failed to cancel download" });
        }
    });

    return router;
}
