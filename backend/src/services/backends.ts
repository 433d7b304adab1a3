/**
 * Capability interfaces for the pluggable parts of the pipeline and the
 * registry that resolves them by id.
 */

import type {
    DownloadRequestFile,
    DownloadResponse,
    FileEntry,
    PeerSearchResponse,
} from "../types/slskd";
import type { AlbumMetadata, AlbumWithTracks, TrackMetadata } from "../types/metadata";

export interface NamedService {
    readonly id: string;
    readonly name: string;
}

export interface DownloadBackend extends NamedService {
    submitSearch(query: string, timeoutMs: number): Promise<string>;
    pollSearchResponses(searchId: string): Promise<PeerSearchResponse[]>;
    deleteSearch(searchId: string): Promise<void>;
    submitDownloads(username: string, files: DownloadRequestFile[]): Promise<DownloadResponse[]>;
    listAllTransfers(): Promise<FileEntry[]>;
    cancelTransfer(username: string, id: string, remove: boolean): Promise<void>;
    clearCompletedTransfers(): Promise<void>;
    checkConnectivity(): Promise<boolean>;
}

export type ImportResult =
    | { status: "success" }
    | { status: "skipped" }
    | { status: "failed"; reason: string }
    | { status: "timedOut"; timeoutMs: number };

export interface MusicImporter extends NamedService {
    /**
     * Import `sources` into the library at `target`. With `asAlbum` the
     * sources form one release; otherwise each is a singleton track.
     */
    import(sources: string[], target: string, asAlbum: boolean): Promise<ImportResult>;
    healthCheck(): Promise<boolean>;
}

export interface MetadataProvider extends NamedService {
    searchAlbums(artist: string | undefined, query: string, limit: number): Promise<AlbumMetadata[]>;
    searchTracks(artist: string | undefined, query: string, limit: number): Promise<TrackMetadata[]>;
    getAlbum(id: string): Promise<AlbumWithTracks>;
}

/**
 * Implementations of one capability keyed by id. The first registered
 * implementation is the default until another is chosen.
 */
export class ServiceRegistry<T extends NamedService> {
    private readonly services = new Map<string, T>();
    private defaultId: string | undefined;

    constructor(private readonly capability: string) {}

    register(service: T, makeDefault = false): this {
        this.services.set(service.id, service);
        if (makeDefault || this.defaultId === undefined) {
            this.defaultId = service.id;
        }
        return this;
    }

    setDefault(id: string): this {
        if (!this.services.has(id)) {
            throw new Error(`Unknown ${this.capability} service: ${id}`);
        }
        this.defaultId = id;
        return this;
    }

    /** Look up by id, or the default when no id is given */
    get(id?: string): T | undefined {
        const key = id ?? this.defaultId;
        return key === undefined ? undefined : this.services.get(key);
    }

    require(id?: string): T {
        const service = this.get(id);
        if (!service) {
            throw new Error(`No ${this.capability} service registered for ${id ?? "default"}`);
        }
        return service;
    }

    list(): Array<{ id: string; name: string }> {
        return [...this.services.values()].map(({ id, name }) => ({ id, name }));
    }
}

export interface Services {
    downloads: ServiceRegistry<DownloadBackend>;
    importers: ServiceRegistry<MusicImporter>;
    metadata: ServiceRegistry<MetadataProvider>;
}

export function createServices(): Services {
    return {
        downloads: new ServiceRegistry<DownloadBackend>("download"),
        importers: new ServiceRegistry<MusicImporter>("importer"),
        metadata: new ServiceRegistry<MetadataProvider>("metadata"),
    };
}
