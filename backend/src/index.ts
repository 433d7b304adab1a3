import express, { Express } from "express";
import { Server } from "http";
import { loadConfig, AppConfig } from "./config";
import { logger } from "./utils/logger";
import { errorMessage } from "./utils/errors";
import { enableDefaultMetrics, metricsRegistry } from "./utils/metrics";
import { requireAuth } from "./middleware/auth";
import { createServices, Services } from "./services/backends";
import { SlskdClient } from "./services/slskd";
import { BeetsImporter } from "./services/beets";
import { FallbackMetadataProvider, MusicBrainzProvider } from "./services/musicbrainz";
import { SearchCoordinator } from "./services/searchCoordinator";
import { TransferBatcher } from "./services/transferBatcher";
import { DownloadService } from "./services/downloadService";
import { EventBus, eventBus } from "./services/eventBus";
import { createSearchRouter } from "./routes/search";
import { createDownloadsRouter } from "./routes/downloads";
import { createEventsRouter, EventsRouter } from "./routes/events";
import { createMetadataRouter } from "./routes/metadata";

export interface AppDeps {
    services: Services;
    searches: SearchCoordinator;
    downloads: DownloadService;
    bus: EventBus;
    jwtSecret?: string;
}

export function createApp(deps: AppDeps): { app: Express; events: EventsRouter } {
    const app = express();
    app.use(express.json({ limit: "1mb" }));

    const auth = requireAuth(deps.jwtSecret);
    const backend = deps.services.downloads.require();
    const events = createEventsRouter(deps.bus, deps.jwtSecret);

    app.use("/api/search", createSearchRouter(deps.searches, auth));
    app.use("/api/downloads", createDownloadsRouter(deps.downloads, backend, auth));
    app.use("/api/metadata", createMetadataRouter(deps.services.metadata.require(), auth));
    app.use("/api/events", events.router);

    app.get("/health", async (_req, res) => {
        const [slskd, importer] = await Promise.all([
            backend.checkConnectivity(),
            deps.services.importers.require().healthCheck(),
        ]);
        res.status(slskd && importer ? 200 : 503).json({
            status: slskd && importer ? "ok" : "degraded",
            slskd,
            importer,
            activeSearches: deps.searches.activeSessionCount(),
            activeDownloads: deps.downloads.activeMonitorCount(),
            sseConnections: events.connectionCount(),
        });
    });

    app.get("/metrics", async (_req, res) => {
        res.set("Content-Type", metricsRegistry.contentType);
        res.send(await metricsRegistry.metrics());
    });

    return { app, events };
}

/** Wire the default implementations from configuration */
export function buildDeps(config: AppConfig): AppDeps {
    const services = createServices();

    const slskd = new SlskdClient({
        baseUrl: config.slskd.url,
        apiKey: config.slskd.apiKey,
        requestTimeoutMs: config.slskd.requestTimeoutMs,
        maxSearchesPerWindow: config.slskd.maxSearchesPerWindow,
        rateLimitWindowMs: config.slskd.rateLimitWindowMs,
    });
    services.downloads.register(slskd);

    const beets = new BeetsImporter({ configPath: config.beets.configPath });
    services.importers.register(beets);

    const musicbrainz = new MusicBrainzProvider({ baseUrl: config.musicbrainzUrl });
    services.metadata.register(musicbrainz);
    services.metadata.register(new FallbackMetadataProvider([musicbrainz]), true);

    const batcher = new TransferBatcher({
        backend: slskd,
        batchSize: config.downloads.batchSize,
        batchDelayMs: config.downloads.batchDelayMs,
        maxRetries: config.downloads.maxRetries,
    });

    return {
        services,
        searches: new SearchCoordinator({ backend: slskd }),
        downloads: new DownloadService({
            backend: slskd,
            importer: beets,
            batcher,
            bus: eventBus,
            downloadRoot: config.slskd.downloadPath,
            libraryRoot: config.downloads.libraryRoot,
            albumMode: config.beets.albumMode,
        }),
        bus: eventBus,
        jwtSecret: config.server.jwtSecret,
    };
}

async function main(): Promise<void> {
    const config = loadConfig();
    enableDefaultMetrics();

    const deps = buildDeps(config);
    const { app, events } = createApp(deps);

    const server: Server = app.listen(config.server.port, config.server.ip, () => {
        logger.info(`[SERVER] Listening on ${config.server.ip}:${config.server.port}`);
    });

    if (!(await deps.services.downloads.require().checkConnectivity())) {
        logger.warn(`[SERVER] slskd at ${config.slskd.url} is not reachable yet`);
    }

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`[SERVER] ${signal} received, shutting down`);
        events.closeAll();
        server.close();
        await deps.downloads.shutdown();
        logger.info("[SERVER] Shutdown complete");
        process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                logger.error(`[SERVER] Shutdown failed: ${errorMessage(error)}`);
                process.exit(1);
            });
        });
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error(`[SERVER] Failed to start: ${errorMessage(error)}`);
        process.exit(1);
    });
}
