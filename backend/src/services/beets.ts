import path from "path";
import { spawn } from "child_process";
import { stat } from "fs/promises";
import type { Stats } from "fs";
import { logger } from "../utils/logger";
import { InvalidSourceError, errorMessage } from "../utils/errors";
import type { ImportResult, MusicImporter } from "./backends";

export const IMPORT_TIMEOUT_MS = 300000;
const HEALTH_CHECK_TIMEOUT_MS = 10000;

export interface CommandResult {
    code: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export type RunCommand = (
    command: string,
    args: string[],
    timeoutMs: number
) => Promise<CommandResult>;

/**
 * Run a command to completion, collecting its output. When `timeoutMs`
 * elapses the process is killed and the result is flagged `timedOut`.
 * Rejects only when the process cannot be started.
 */
export const runCommand: RunCommand = (command, args, timeoutMs) =>
    new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
        let stdout = "";
        let stderr = "";
        let timedOut = false;

        child.stdout.setEncoding("utf8");
        child.stderr.setEncoding("utf8");
        child.stdout.on("data", (chunk: string) => {
            stdout += chunk;
        });
        child.stderr.on("data", (chunk: string) => {
            stderr += chunk;
        });

        const timer = setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
        }, timeoutMs);

        child.on("error", (error) => {
            clearTimeout(timer);
            reject(error);
        });
        child.on("close", (code) => {
            clearTimeout(timer);
            resolve({ code, stdout, stderr, timedOut });
        });
    });

async function validateSources(sources: string[]): Promise<void> {
    if (sources.length === 0) {
        throw new InvalidSourceError("No source paths given");
    }
    for (const source of sources) {
        let info: Stats;
        try {
            info = await stat(source);
        } catch {
            throw new InvalidSourceError(`Source path does not exist: ${source}`);
        }
        if (!info.isFile() && !info.isDirectory()) {
            throw new InvalidSourceError(`Source path is neither a file nor directory: ${source}`);
        }
    }
}

export interface BeetsImporterOptions {
    configPath: string;
    command?: string;
    timeoutMs?: number;
    run?: RunCommand;
}

/**
 * Imports files through the `beet` CLI. Every target folder gets its own
 * library database so duplicate detection is per library.
 */
export class BeetsImporter implements MusicImporter {
    readonly id = "beets";
    readonly name = "beets";
    private readonly configPath: string;
    private readonly command: string;
    private readonly timeoutMs: number;
    private readonly run: RunCommand;

    constructor(options: BeetsImporterOptions) {
        this.configPath = options.configPath;
        this.command = options.command ?? "beet";
        this.timeoutMs = options.timeoutMs ?? IMPORT_TIMEOUT_MS;
        this.run = options.run ?? runCommand;
    }

    buildImportArgs(sources: string[], target: string, asAlbum: boolean): string[] {
        return [
            "-c",
            this.configPath,
            "-l",
            path.join(target, ".beets_library.db"),
            "-d",
            target,
            "import",
            "-q",
            ...(asAlbum ? [] : ["-s"]),
            ...sources,
        ];
    }

    async import(sources: string[], target: string, asAlbum: boolean): Promise<ImportResult> {
        await validateSources(sources);

        logger.info(
            `[BEETS] Starting import of ${sources.length} item(s) to ${target} using ${this.configPath} (album: ${asAlbum})`
        );

        const result = await this.run(
            this.command,
            this.buildImportArgs(sources, target, asAlbum),
            this.timeoutMs
        );

        if (result.timedOut) {
            logger.warn(
                `[BEETS] Import timed out after ${this.timeoutMs / 1000}s for: ${sources.join(", ")}`
            );
            return { status: "timedOut", timeoutMs: this.timeoutMs };
        }

        if (result.code === 0) {
            // beets reports duplicates on either stream depending on version
            const combined = `${result.stdout}${result.stderr}`.toLowerCase();
            if (combined.includes("skip")) {
                logger.info("[BEETS] Import skipped items");
                return { status: "skipped" };
            }
            logger.info("[BEETS] Import successful");
            return { status: "success" };
        }

        const reason =
            result.stderr.trim() ||
            result.stdout.trim() ||
            `Beet import failed with exit code: ${result.code ?? "unknown"}`;
        logger.warn(`[BEETS] Import failed: ${reason}`);
        return { status: "failed", reason };
    }

    async healthCheck(): Promise<boolean> {
        try {
            const result = await this.run(this.command, ["version"], HEALTH_CHECK_TIMEOUT_MS);
            return result.code === 0 && !result.timedOut;
        } catch (error) {
            logger.debug(`[BEETS] Health check failed: ${errorMessage(error)}`);
            return false;
        }
    }
}
