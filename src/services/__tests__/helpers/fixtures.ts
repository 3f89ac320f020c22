import type { DaemonSong, DaemonStatus, Track } from "../../../types/library";

export function makeTrack(overrides: Partial<Track> = {}): Track {
    const title = overrides.title ?? "Untitled";
    const album = overrides.album ?? "Album";
    const artist = overrides.artist ?? "Artist";

    return {
        title,
        artist,
        album,
        albumArtist: overrides.albumArtist ?? artist,
        hasExplicitAlbumArtist: overrides.hasExplicitAlbumArtist ?? false,
        file: overrides.file ?? `${album}/${title}.flac`,
        format: overrides.format ?? "44100:16:2",
        discNumber: overrides.discNumber ?? 1,
        trackNumber: overrides.trackNumber ?? 1,
        queueId: overrides.queueId,
        queuePosition: overrides.queuePosition,
        durationSeconds: overrides.durationSeconds,
    };
}

export function makeSong(overrides: Partial<DaemonSong> & { file: string }): DaemonSong {
    return {
        artists: [],
        albumArtists: [],
        ...overrides,
    };
}

export function makeStatus(overrides: Partial<DaemonStatus> = {}): DaemonStatus {
    return {
        state: "stop",
        volume: 50,
        repeat: false,
        random: false,
        single: false,
        consume: false,
        playlistLength: 0,
        ...overrides,
    };
}

/** A promise whose settlement the test controls. */
export function deferred<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
} {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
