import { z } from "zod";
import { ConfigurationError } from "./utils/errors";

const booleanFlag = z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ["true", "1", "yes", "false", "0", "no", ""].includes(value), {
        message: "Expected one of true/1/yes/false/0/no",
    })
    .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    SLSKD_URL: z.string().trim().min(1, "SLSKD_URL is required"),
    SLSKD_API_KEY: z.string().trim().min(1, "SLSKD_API_KEY is required"),
    SLSKD_DOWNLOAD_PATH: z.string().trim().min(1).default("/downloads"),
    SLSKD_REQUEST_TIMEOUT_MS: positiveInt(15000),
    SLSKD_SEARCH_LIMIT: positiveInt(35),
    SLSKD_SEARCH_WINDOW_SECONDS: positiveInt(220),
    BEETS_CONFIG: z.string().trim().min(1).default("beets_config.yaml"),
    BEETS_ALBUM_MODE: booleanFlag.default("false"),
    DOWNLOAD_BATCH_SIZE: positiveInt(3),
    DOWNLOAD_BATCH_DELAY_MS: z.coerce.number().int().nonnegative().default(3000),
    DOWNLOAD_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    LIBRARY_ROOT: z.string().trim().min(1).default("/music"),
    MUSICBRAINZ_URL: z.string().trim().url().default("https://musicbrainz.org/ws/2"),
    PORT: z.coerce.number().int().min(1).max(65535).default(9765),
    IP: z.string().trim().min(1).default("0.0.0.0"),
    JWT_SECRET: z.string().min(1).optional(),
});

export interface AppConfig {
    slskd: {
        url: string;
        apiKey: string;
        downloadPath: string;
        requestTimeoutMs: number;
        maxSearchesPerWindow: number;
        rateLimitWindowMs: number;
    };
    beets: {
        configPath: string;
        albumMode: boolean;
    };
    downloads: {
        batchSize: number;
        batchDelayMs: number;
        maxRetries: number;
        /** Every import target must resolve inside this folder */
        libraryRoot: string;
    };
    musicbrainzUrl: string;
    server: {
        port: number;
        ip: string;
        jwtSecret?: string;
    };
}

/**
 * Parse configuration from the environment. Empty strings count as unset so
 * docker-compose files can leave optional keys blank.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
    );

    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    const values = parsed.data;
    return {
        slskd: {
            url: values.SLSKD_URL,
            apiKey: values.SLSKD_API_KEY,
            downloadPath: values.SLSKD_DOWNLOAD_PATH,
            requestTimeoutMs: values.SLSKD_REQUEST_TIMEOUT_MS,
            maxSearchesPerWindow: values.SLSKD_SEARCH_LIMIT,
            rateLimitWindowMs: values.SLSKD_SEARCH_WINDOW_SECONDS * 1000,
        },
        beets: {
            configPath: values.BEETS_CONFIG,
            albumMode: values.BEETS_ALBUM_MODE,
        },
        downloads: {
            batchSize: values.DOWNLOAD_BATCH_SIZE,
            batchDelayMs: values.DOWNLOAD_BATCH_DELAY_MS,
            maxRetries: values.DOWNLOAD_MAX_RETRIES,
            libraryRoot: values.LIBRARY_ROOT,
        },
        musicbrainzUrl: values.MUSICBRAINZ_URL,
        server: {
            port: values.PORT,
            ip: values.IP,
            jwtSecret: values.JWT_SECRET,
        },
    };
}
