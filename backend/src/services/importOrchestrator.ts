import path from "path";
import { readdir, rm, rmdir, stat } from "fs/promises";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { withState } from "../utils/fileEntries";
import { importOutcomesTotal } from "../utils/metrics";
import type { ImportResult, MusicImporter } from "./backends";
import type { Publish } from "./eventBus";
import type { FileEntry } from "../types/slskd";

const MAX_SEARCH_DEPTH = 5;

export type ResolveStrategy =
    | "exact"
    | "stripMarker"
    | "lastThree"
    | "lastTwo"
    | "basename"
    | "search";

export interface ResolvedPath {
    path: string;
    strategy: ResolveStrategy;
}

async function isFile(candidate: string): Promise<boolean> {
    try {
        return (await stat(candidate)).isFile();
    } catch {
        return false;
    }
}

/** Breadth-first search for `name` below `root`, at most `maxDepth` levels down */
async function findByName(root: string, name: string, maxDepth: number): Promise<string | undefined> {
    let level = [root];
    for (let depth = 0; depth <= maxDepth && level.length > 0; depth++) {
        const next: string[] = [];
        for (const dir of level) {
            const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
                logger.debug(`[IMPORT] Cannot read ${dir}: ${errorMessage(error)}`);
                return [];
            });
            for (const entry of entries) {
                const full = path.join(dir, entry.name);
                if (entry.isFile() && entry.name === name) return full;
                if (entry.isDirectory()) next.push(full);
            }
        }
        level = next;
    }
    return undefined;
}

/**
 * Map a transfer's remote filename to the file slskd wrote under
 * `downloadRoot`. slskd keeps only part of the remote path, and which part
 * depends on its version and settings, so candidates are tried from the most
 * to the least specific. `..` segments are dropped, so no candidate can
 * point outside the download root.
 */
export async function resolveDownloadPath(
    filename: string,
    downloadRoot: string
): Promise<ResolvedPath | undefined> {
    const root = path.resolve(downloadRoot);
    const segments = filename
        .replace(/\\/g, "/")
        .split("/")
        .filter((segment) => segment.length > 0 && segment !== "." && segment !== "..");
    if (segments.length === 0) return undefined;

    const candidates: Array<[ResolveStrategy, string[]]> = [["exact", segments]];
    if (segments[0].startsWith("@@") && segments.length > 1) {
        candidates.push(["stripMarker", segments.slice(1)]);
    }
    if (segments.length >= 3) candidates.push(["lastThree", segments.slice(-3)]);
    if (segments.length >= 2) candidates.push(["lastTwo", segments.slice(-2)]);
    candidates.push(["basename", segments.slice(-1)]);

    for (const [strategy, parts] of candidates) {
        const candidate = path.join(root, ...parts);
        if (await isFile(candidate)) {
            return { path: candidate, strategy };
        }
    }

    const found = await findByName(root, segments[segments.length - 1], MAX_SEARCH_DEPTH);
    return found ? { path: found, strategy: "search" } : undefined;
}

type ImportState = "Imported" | "ImportSkipped" | "ImportFailed";

function describeResult(result: ImportResult): [ImportState, string] {
    switch (result.status) {
        case "success":
            return ["Imported", "Imported"];
        case "skipped":
            return ["ImportSkipped", "Already in library or skipped by beets"];
        case "failed":
            return ["ImportFailed", `Beet import failed: ${result.reason}`];
        case "timedOut":
            return ["ImportFailed", `Import timed out after ${Math.round(result.timeoutMs / 1000)}s`];
    }
}

interface ResolvedRecord {
    entry: FileEntry;
    file: string;
}

export interface ImportOrchestratorOptions {
    importer: MusicImporter;
    downloadRoot: string;
    publish: Publish;
}

/**
 * Hands finished downloads to the importer and reports each file's import
 * state. Files the importer does not take are deleted so they do not pile
 * up in the download folder.
 */
export class ImportOrchestrator {
    private readonly importer: MusicImporter;
    private readonly downloadRoot: string;
    private readonly publish: Publish;

    constructor(options: ImportOrchestratorOptions) {
        this.importer = options.importer;
        this.downloadRoot = path.resolve(options.downloadRoot);
        this.publish = options.publish;
    }

    async processCompleted(records: FileEntry[], targetPath: string, albumMode: boolean): Promise<void> {
        if (records.length === 0) {
            logger.info("[IMPORT] Downloads finished but none succeeded, skipping import");
            return;
        }
        logger.info(`[IMPORT] ${records.length} download(s) completed, importing to ${targetPath}`);

        const resolved: ResolvedRecord[] = [];
        for (const entry of records) {
            const result = await resolveDownloadPath(entry.filename, this.downloadRoot);
            if (!result) {
                logger.warn(`[IMPORT] Could not resolve path for file: ${entry.filename}`);
                importOutcomesTotal.inc({ outcome: "unresolved" });
                this.publish([
                    withState(entry, "ImportFailed", `Could not resolve file path: ${entry.filename}`),
                ]);
                continue;
            }
            logger.debug(`[IMPORT] Resolved ${entry.filename} -> ${result.path} (${result.strategy})`);
            resolved.push({ entry, file: result.path });
        }

        if (!albumMode) {
            for (const record of resolved) {
                await this.importGroup([record], [record.file], targetPath, false);
            }
            return;
        }

        const albums = new Map<string, ResolvedRecord[]>();
        // Files sitting directly in the download root have no album folder
        const singletons: ResolvedRecord[] = [];
        for (const record of resolved) {
            const parent = path.dirname(record.file);
            if (parent === this.downloadRoot) {
                singletons.push(record);
                continue;
            }
            const group = albums.get(parent);
            if (group) group.push(record);
            else albums.set(parent, [record]);
        }

        for (const [folder, group] of albums) {
            await this.importGroup(group, [folder], targetPath, true);
        }
        for (const record of singletons) {
            await this.importGroup([record], [record.file], targetPath, false);
        }
    }

    private async importGroup(
        records: ResolvedRecord[],
        sources: string[],
        targetPath: string,
        asAlbum: boolean
    ): Promise<void> {
        const entries = records.map((record) => record.entry);
        logger.info(`[IMPORT] Importing group from ${sources.join(", ")} (album: ${asAlbum})`);
        this.publish(entries.map((entry) => withState(entry, "Importing", "Importing")));

        let state: ImportState;
        let description: string;
        try {
            const result = await this.importer.import(sources, targetPath, asAlbum);
            [state, description] = describeResult(result);
            importOutcomesTotal.inc({ outcome: result.status });
        } catch (error) {
            logger.error(`[IMPORT] Import failed to run: ${errorMessage(error)}`);
            importOutcomesTotal.inc({ outcome: "error" });
            state = "ImportFailed";
            description = `Import error: ${errorMessage(error)}`;
        }

        this.publish(entries.map((entry) => withState(entry, state, description)));

        if (state !== "Imported") {
            await this.cleanup(records.map((record) => record.file));
        }
    }

    /** Best effort: remove the files, then any parent folder left empty */
    private async cleanup(files: string[]): Promise<void> {
        const parents = new Set<string>();
        for (const file of files) {
            try {
                await rm(file, { force: true });
                logger.debug(`[IMPORT] Removed ${file}`);
            } catch (error) {
                logger.warn(`[IMPORT] Failed to remove ${file}: ${errorMessage(error)}`);
            }
            parents.add(path.dirname(file));
        }

        for (const parent of parents) {
            const relative = path.relative(this.downloadRoot, parent);
            if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) continue;
            try {
                const remaining = await readdir(parent);
                if (remaining.length === 0) {
                    await rmdir(parent);
                    logger.debug(`[IMPORT] Removed empty folder ${parent}`);
                }
            } catch (error) {
                logger.warn(`[IMPORT] Failed to clean up ${parent}: ${errorMessage(error)}`);
            }
        }
    }
}
