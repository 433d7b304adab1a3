/**
 * HTTP client for the slskd gateway (REST API under /api/v0).
 *
 * Every call carries the static API key and a per-request timeout. Search
 * submissions go through a sliding-window rate limiter shared by all callers
 * of one client, since slskd (and the Soulseek server behind it) bans clients
 * that search too often.
 */

import fs from "fs";
import axios, { AxiosAdapter, AxiosInstance, Method } from "axios";
import { z } from "zod";
import { logger } from "../utils/logger";
import { ConfigurationError, SlskdApiError, errorMessage } from "../utils/errors";
import { SlidingWindowRateLimiter } from "../utils/rateLimiter";
import { parseStateTags } from "../utils/fileEntries";
import { slskdRequestErrorsTotal } from "../utils/metrics";
import type { DownloadBackend } from "./backends";
import type {
    DownloadRequestFile,
    DownloadResponse,
    FileEntry,
    PeerSearchResponse,
} from "../types/slskd";

export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;
export const DEFAULT_MAX_SEARCHES_PER_WINDOW = 35;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 220000;

export interface SlskdClientOptions {
    baseUrl: string | undefined;
    apiKey: string;
    requestTimeoutMs?: number;
    maxSearchesPerWindow?: number;
    rateLimitWindowMs?: number;
    /** Share one limiter between clients pointing at the same gateway */
    rateLimiter?: SlidingWindowRateLimiter;
    /** Transport override, used by tests */
    adapter?: AxiosAdapter;
    isDocker?: () => boolean;
}

interface RawResponse {
    status: number;
    text: string;
}

const optionalNumber = z
    .number()
    .nullish()
    .transform((value) => value ?? undefined);
const optionalString = z
    .string()
    .nullish()
    .transform((value) => value ?? undefined);

const searchIdSchema = z.object({ id: z.string().min(1) });

const peerSearchResponseSchema = z.object({
    username: z.string(),
    files: z.array(
        z.object({
            filename: z.string(),
            size: z.number(),
            bitRate: optionalNumber,
            length: optionalNumber,
        })
    ),
    hasFreeUploadSlot: z.boolean().default(false),
    uploadSpeed: z.number().default(0),
    queueLength: z.number().default(0),
});

const fileEntrySchema = z.object({
    id: z.string(),
    username: z.string(),
    direction: z.string().default("Download"),
    filename: z.string(),
    size: z.number(),
    startOffset: z.number().default(0),
    state: z.union([z.string(), z.array(z.string())]).transform(parseStateTags),
    stateDescription: z.string().default(""),
    requestedAt: z.string().default(""),
    enqueuedAt: optionalString,
    startedAt: optionalString,
    endedAt: optionalString,
    bytesTransferred: z.number().default(0),
    averageSpeed: z.number().default(0),
    bytesRemaining: z.number().default(0),
    elapsedTime: optionalString,
    percentComplete: z.number().default(0),
    remainingTime: optionalString,
    exception: optionalString,
});

const transferUserSchema = z.object({ directories: z.array(z.unknown()) });
const transferDirectorySchema = z.object({ files: z.array(z.unknown()) });

const acknowledgedFileSchema = z.object({ filename: z.string() });
const failedFileSchema = z.union([
    z.string().transform((filename) => ({ filename, error: undefined })),
    z.object({ filename: z.string(), error: optionalString }),
]);
const batchResponseSchema = z.object({
    enqueued: z.array(acknowledgedFileSchema).default([]),
    failed: z.array(failedFileSchema).default([]),
});

export const UNPARSEABLE_RESPONSE = "Unparseable response from slskd";
export const NOT_ACKNOWLEDGED = "Not acknowledged by slskd";
const FAILED_BY_GATEWAY = "Download failed";

/**
 * Flatten GET /transfers/downloads into file entries. slskd nests files as
 * users -> directories -> files and occasionally returns a single user object
 * instead of an array. Entries that do not look like transfers are skipped.
 */
export function flattenTransfers(body: unknown): FileEntry[] {
    const users = Array.isArray(body) ? body : body !== null && typeof body === "object" ? [body] : [];
    const entries: FileEntry[] = [];

    for (const user of users) {
        const parsedUser = transferUserSchema.safeParse(user);
        if (!parsedUser.success) continue;

        for (const directory of parsedUser.data.directories) {
            const parsedDirectory = transferDirectorySchema.safeParse(directory);
            if (!parsedDirectory.success) continue;

            for (const file of parsedDirectory.data.files) {
                const parsedFile = fileEntrySchema.safeParse(file);
                if (parsedFile.success) {
                    entries.push(parsedFile.data);
                } else {
                    logger.debug(`[SLSKD] Skipping malformed transfer entry: ${parsedFile.error.message}`);
                }
            }
        }
    }

    return entries;
}

/**
 * Interpret the body of POST /transfers/downloads/{username}.
 *
 * Accepted shapes, tried in order: empty body (everything queued), a single
 * `{filename}`, an array of `{filename}`, and `{enqueued, failed}`. Results are
 * reported in request order with the requested sizes; requested files the
 * gateway did not mention count as failed.
 */
export function parseDownloadResponse(
    username: string,
    requested: DownloadRequestFile[],
    text: string
): DownloadResponse[] {
    const accepted = (file: DownloadRequestFile): DownloadResponse => ({ username, ...file });
    const failed = (file: DownloadRequestFile, error: string): DownloadResponse => ({
        username,
        ...file,
        error,
    });

    if (text.trim() === "") {
        return requested.map(accepted);
    }

    let body: unknown;
    try {
        body = JSON.parse(text);
    } catch {
        logger.error(`[SLSKD] Failed to parse download response: '${text}'`);
        return requested.map((file) => failed(file, UNPARSEABLE_RESPONSE));
    }

    const enqueued = new Set<string>();
    const rejected = new Map<string, string>();

    const single = acknowledgedFileSchema.safeParse(body);
    const list = z.array(acknowledgedFileSchema).safeParse(body);
    const batch = batchResponseSchema.safeParse(body);

    if (single.success) {
        enqueued.add(single.data.filename);
    } else if (list.success) {
        for (const item of list.data) enqueued.add(item.filename);
    } else if (batch.success) {
        for (const item of batch.data.enqueued) enqueued.add(item.filename);
        for (const item of batch.data.failed) {
            rejected.set(item.filename, item.error ?? FAILED_BY_GATEWAY);
        }
    } else {
        logger.error(`[SLSKD] Unexpected download response shape: '${text}'`);
        return requested.map((file) => failed(file, UNPARSEABLE_RESPONSE));
    }

    return requested.map((file) => {
        const error = rejected.get(file.filename);
        if (error !== undefined) return failed(file, error);
        if (enqueued.has(file.filename)) return accepted(file);
        return failed(file, NOT_ACKNOWLEDGED);
    });
}

function resolveBaseUrl(baseUrl: string | undefined, isDocker: () => boolean): string {
    if (!baseUrl || baseUrl.trim() === "") {
        throw new ConfigurationError("slskd URL is not configured");
    }

    let resolved = baseUrl.trim().replace(/\/+$/, "");
    if (isDocker() && resolved.includes("localhost")) {
        resolved = resolved.replace("localhost", "host.docker.internal");
        logger.info(`[SLSKD] Docker detected, using ${resolved} for slskd connection`);
    }

    let parsed: URL;
    try {
        parsed = new URL(resolved);
    } catch {
        throw new ConfigurationError(`Invalid slskd URL: ${baseUrl}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        throw new ConfigurationError(`Invalid slskd URL: ${baseUrl}`);
    }
    return resolved;
}

export class SlskdClient implements DownloadBackend {
    readonly id = "slskd";
    readonly name = "slskd";
    readonly baseUrl: string;
    private readonly http: AxiosInstance;
    private readonly rateLimiter: SlidingWindowRateLimiter;

    constructor(options: SlskdClientOptions) {
        this.baseUrl = resolveBaseUrl(
            options.baseUrl,
            options.isDocker ?? (() => fs.existsSync("/.dockerenv"))
        );
        this.rateLimiter =
            options.rateLimiter ??
            new SlidingWindowRateLimiter({
                maxRequests: options.maxSearchesPerWindow ?? DEFAULT_MAX_SEARCHES_PER_WINDOW,
                windowMs: options.rateLimitWindowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS,
            });
        this.http = axios.create({
            baseURL: `${this.baseUrl}/api/v0/`,
            timeout: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
            headers: { "X-API-Key": options.apiKey },
            // Bodies are parsed here so empty and malformed bodies can be told apart
            responseType: "text",
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    private async send(
        method: Method,
        endpoint: string,
        body?: unknown,
        params?: Record<string, string | boolean>
    ): Promise<RawResponse> {
        logger.debug(`[SLSKD] ${method.toUpperCase()} ${endpoint}`);

        let status: number;
        let data: unknown;
        try {
            const response = await this.http.request<unknown>({
                method,
                url: endpoint,
                data: body,
                params,
            });
            status = response.status;
            data = response.data;
        } catch (error) {
            slskdRequestErrorsTotal.inc({ status: "0" });
            throw new SlskdApiError(0, errorMessage(error));
        }

        const text =
            typeof data === "string" ? data : data === undefined || data === null ? "" : JSON.stringify(data);

        if (status < 200 || status >= 300) {
            slskdRequestErrorsTotal.inc({ status: String(status) });
            throw new SlskdApiError(status, text || "Could not read error body");
        }
        return { status, text };
    }

    /** Empty bodies come back as null */
    private async request(
        method: Method,
        endpoint: string,
        body?: unknown,
        params?: Record<string, string | boolean>
    ): Promise<unknown> {
        const { status, text } = await this.send(method, endpoint, body, params);
        if (text.trim() === "") return null;
        try {
            return JSON.parse(text);
        } catch (error) {
            throw new SlskdApiError(status, `JSON parse error: ${errorMessage(error)}`);
        }
    }

    async submitSearch(query: string, timeoutMs: number): Promise<string> {
        await this.rateLimiter.acquire();

        logger.info(`[SLSKD] Starting search for: '${query}' with timeout ${timeoutMs}ms`);
        const body = await this.request("post", "searches", {
            searchText: query,
            timeout: timeoutMs,
            filterResponses: true,
            minimumPeerUploadSpeed: 10,
        });

        const parsed = searchIdSchema.safeParse(body);
        if (!parsed.success) {
            throw new SlskdApiError(200, "Search response did not include an id");
        }
        logger.info(`[SLSKD] Search initiated with ID: ${parsed.data.id}`);
        return parsed.data.id;
    }

    async pollSearchResponses(searchId: string): Promise<PeerSearchResponse[]> {
        const body = await this.request(
            "get",
            `searches/${encodeURIComponent(searchId)}/responses`
        );
        if (!Array.isArray(body)) return [];

        const responses: PeerSearchResponse[] = [];
        for (const item of body) {
            const parsed = peerSearchResponseSchema.safeParse(item);
            if (parsed.success) {
                responses.push(parsed.data);
            } else {
                logger.debug(`[SLSKD] Skipping malformed search response: ${parsed.error.message}`);
            }
        }
        return responses;
    }

    /** Idempotent: a search slskd no longer knows about counts as deleted */
    async deleteSearch(searchId: string): Promise<void> {
        logger.debug(`[SLSKD] Deleting search ${searchId}`);
        try {
            await this.request("delete", `searches/${encodeURIComponent(searchId)}`);
        } catch (error) {
            if (error instanceof SlskdApiError && error.isNotFound) return;
            throw error;
        }
    }

    async submitDownloads(
        username: string,
        files: DownloadRequestFile[]
    ): Promise<DownloadResponse[]> {
        logger.info(`[SLSKD] Sending download request for ${username} with ${files.length} files`);
        const { text } = await this.send(
            "post",
            `transfers/downloads/${encodeURIComponent(username)}`,
            files.map((file) => ({ filename: file.filename, size: file.size }))
        );
        return parseDownloadResponse(username, files, text);
    }

    async listAllTransfers(): Promise<FileEntry[]> {
        const body = await this.request("get", "transfers/downloads");
        return flattenTransfers(body);
    }

    async cancelTransfer(username: string, id: string, remove: boolean): Promise<void> {
        logger.info(`[SLSKD] Cancelling download: ${id}`);
        await this.request(
            "delete",
            `transfers/downloads/${encodeURIComponent(username)}/${encodeURIComponent(id)}`,
            undefined,
            { remove }
        );
    }

    async clearCompletedTransfers(): Promise<void> {
        logger.info("[SLSKD] Clearing all completed downloads");
        await this.request("delete", "transfers/downloads/all/completed");
    }

    async checkConnectivity(): Promise<boolean> {
        try {
            await this.request("get", "session");
            return true;
        } catch (error) {
            logger.debug(`[SLSKD] Connectivity check failed: ${errorMessage(error)}`);
            return false;
        }
    }
}
