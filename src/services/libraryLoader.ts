/**
 * Library loading - builds the artist → album → track hierarchy from the
 * daemon's flat song catalog.
 *
 * Two strategies produce the same Library shape:
 * - eager: one bulk `listallinfo`, with album-artists canonicalized per album
 * - lazy: artist names up front, each artist's songs fetched on first use
 */

import { createLogger, withLogTiming } from "../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    errorMessage,
    toAppError,
} from "../utils/errors";
import { withRetry } from "../utils/retry";
import { trackFromSong } from "../utils/song";
import {
    buildAlbumIndex,
    compareNamesInsensitive,
    groupTracksIntoAlbums,
    groupTracksIntoArtists,
    mergeAlbumIndex,
    resolveCanonicalArtists,
} from "../utils/libraryIndex";
import type {
    Album,
    AlbumIndexEntry,
    Artist,
    DaemonSong,
    LazyArtist,
    Library,
    Track,
} from "../types/library";
import type { DaemonClient } from "./mpd/client";

const log = createLogger("Library");
const lazyLog = log.child("Lazy");

export type LibraryDaemon = Pick<DaemonClient, "status" | "listAllInfo" | "list" | "find">;

export interface EagerLoadOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_CATALOG_ATTEMPTS = 3;
export const DEFAULT_CATALOG_RETRY_BASE_MS = 1000;

/**
 * Builds a library from a whole catalog in two passes. Pass 1 resolves one
 * album-artist per album name; pass 2 files every track under it. A single
 * pass would split an album whose tracks only partly carry the tag across
 * several artists.
 */
export function buildLibrary(songs: Iterable<DaemonSong>): Library {
    const tracks: Track[] = Array.from(songs, trackFromSong);
    const canonical = resolveCanonicalArtists(tracks);

    const resolved = tracks.map((track) => ({
        ...track,
        albumArtist: canonical.get(track.album) ?? track.albumArtist,
    }));

    const artists = groupTracksIntoArtists(resolved);
    return { artists, albumIndex: buildAlbumIndex(artists) };
}

/** Eager strategy: check the daemon answers, fetch the whole catalog, build everything. */
export async function loadLibrary(
    client: LibraryDaemon,
    options: EagerLoadOptions = {}
): Promise<Library> {
    try {
        await client.status();
    } catch (error) {
        throw new AppError(
            ErrorCode.DAEMON_UNREACHABLE,
            ErrorCategory.FATAL,
            `Daemon did not answer the status check: ${errorMessage(error)}`
        );
    }

    const maxAttempts = options.maxAttempts ?? DEFAULT_CATALOG_ATTEMPTS;
    const songs = await withRetry(() => client.listAllInfo(), {
        maxAttempts,
        baseDelayMs: options.baseDelayMs ?? DEFAULT_CATALOG_RETRY_BASE_MS,
        label: "Catalog fetch",
        sleep: options.sleep,
    }).catch((error: unknown) => {
        throw new AppError(
            ErrorCode.CATALOG_FETCH_FAILED,
            ErrorCategory.FATAL,
            `Failed to fetch song catalog: ${errorMessage(error)}`,
            { maxAttempts }
        );
    });

    return withLogTiming(log, "Library build", () => buildLibrary(songs), {
        songs: songs.length,
    });
}

/**
 * Lazy strategy. Artists start without albums; `loadArtist` fills one in
 * and grows the album index, which stays sorted and complete for every
 * loaded artist at all times.
 */
export class LazyLibraryLoader {
    private artists: LazyArtist[] = [];
    private index: AlbumIndexEntry[] = [];
    private complete = false;

    constructor(private readonly client: LibraryDaemon) {}

    async init(): Promise<void> {
        let names: string[];
        try {
            names = await this.client.list("albumartist");
        } catch (error) {
            throw libraryQueryError("list album artists", error);
        }

        // Names stay exactly as tagged: `find` matches them byte for byte.
        this.artists = Array.from(new Set(names))
            .filter((name) => name.trim().length > 0)
            .sort(compareNamesInsensitive)
            .map((name): LazyArtist => ({ name, albums: { status: "not_loaded" } }));
        this.index = [];
        this.complete = this.artists.length === 0;
        lazyLog.debug(`Initialized with ${this.artists.length} artists`);
    }

    get artistCount(): number {
        return this.artists.length;
    }

    get albumIndex(): readonly AlbumIndexEntry[] {
        return this.index;
    }

    get allLoaded(): boolean {
        return this.complete;
    }

    getArtist(index: number): LazyArtist {
        const artist = this.artists[index];
        if (!artist) {
            throw new AppError(
                ErrorCode.ARTIST_INDEX_OUT_OF_RANGE,
                ErrorCategory.RECOVERABLE,
                `Artist index ${index} out of range (0..${this.artists.length - 1})`,
                { index, artistCount: this.artists.length }
            );
        }
        return artist;
    }

    /** Albums for a loaded artist, or null while it is not loaded yet. */
    getAlbums(index: number): Album[] | null {
        const { albums } = this.getArtist(index);
        return albums.status === "loaded" ? albums.albums : null;
    }

    isLoaded(index: number): boolean {
        return this.getArtist(index).albums.status === "loaded";
    }

    async loadArtist(index: number): Promise<void> {
        const artist = this.getArtist(index);
        if (this.isLoaded(index)) {
            return;
        }

        let songs: DaemonSong[];
        try {
            songs = await this.client.find([["AlbumArtist", artist.name]]);
        } catch (error) {
            throw libraryQueryError(`find songs for ${artist.name}`, error);
        }

        // Another call may have finished this artist while the query ran.
        if (this.isLoaded(index)) {
            return;
        }

        const albums = groupTracksIntoAlbums(
            songs.map((song) => ({ ...trackFromSong(song), albumArtist: artist.name }))
        );
        artist.albums = { status: "loaded", albums };
        this.index = mergeAlbumIndex(this.index, artist.name, albums);
        this.complete = this.artists.every((entry) => entry.albums.status === "loaded");
        lazyLog.debug(`Loaded ${albums.length} albums for ${artist.name}`);
    }

    /** Loads every remaining artist one by one and returns the full library. */
    async loadAll(): Promise<Library> {
        for (let index = 0; index < this.artists.length; index++) {
            await this.loadArtist(index);
        }
        return this.toLibrary();
    }

    /** Snapshot of the loaded part of the library. */
    toLibrary(): Library {
        const artists: Artist[] = [];
        for (const artist of this.artists) {
            if (artist.albums.status === "loaded") {
                artists.push({ name: artist.name, albums: artist.albums.albums });
            }
        }
        return { artists, albumIndex: [...this.index] };
    }
}

function libraryQueryError(operation: string, error: unknown): AppError {
    return toAppError(error, `Failed to ${operation}`, ErrorCode.LIBRARY_QUERY_FAILED);
}
