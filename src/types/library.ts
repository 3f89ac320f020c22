export type PlayState = "play" | "pause" | "stop";

/** A song record as reported by the daemon, before any library resolution. */
export interface DaemonSong {
    file: string;
    title?: string;
    artists: string[];
    album?: string;
    albumArtists: string[];
    track?: string;
    disc?: string;
    format?: string;
    durationSeconds?: number;
    /** Queue position and id, present only for queue entries. */
    pos?: number;
    id?: number;
}

export interface DaemonStatus {
    state: PlayState | null;
    volume: number | null;
    repeat: boolean;
    random: boolean;
    single: boolean;
    consume: boolean;
    playlistLength: number;
    /** Queue version; changes whenever the queue does. */
    playlistVersion?: number;
    song?: number;
    songId?: number;
    elapsedSeconds?: number;
    durationSeconds?: number;
    audioFormat?: string;
}

export interface Track {
    readonly title: string;
    readonly artist: string;
    readonly album: string;
    readonly albumArtist: string;
    readonly hasExplicitAlbumArtist: boolean;
    /** File key the daemon uses to reference the song. */
    readonly file: string;
    /** Audio format as `rate:bits:channels`, empty when unknown. */
    readonly format: string;
    readonly discNumber: number;
    readonly trackNumber: number;
    readonly queueId?: number;
    readonly queuePosition?: number;
    // Playback fields, refreshed in place on every poll.
    durationSeconds?: number;
    elapsedSeconds?: number;
    progress?: number;
    playState?: PlayState;
}

export interface Album {
    name: string;
    tracks: Track[];
}

export interface Artist {
    name: string;
    albums: Album[];
}

export type ArtistAlbums =
    | { status: "not_loaded" }
    | { status: "loaded"; albums: Album[] };

export interface LazyArtist {
    name: string;
    albums: ArtistAlbums;
}

export interface AlbumIndexEntry {
    artistName: string;
    album: Album;
}

export interface Library {
    artists: Artist[];
    albumIndex: AlbumIndexEntry[];
}

export interface CoverArtMessage {
    data: Buffer | null;
    file: string;
}
