export interface AlbumMetadata {
    id: string;
    title: string;
    artist: string;
    releaseDate?: string;
}

export interface TrackMetadata {
    id: string;
    title: string;
    artist: string;
    albumId?: string;
    albumTitle?: string;
    releaseDate?: string;
    /** mm:ss */
    duration?: string;
}

export interface AlbumWithTracks {
    album: AlbumMetadata;
    tracks: TrackMetadata[];
}
