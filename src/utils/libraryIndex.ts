import type {
    Album,
    AlbumIndexEntry,
    Artist,
    Track,
} from "../types/library";

/**
 * Case-insensitive name ordering. Names equal ignoring case fall back to a
 * plain comparison so the order never depends on input order.
 */
export function compareNamesInsensitive(left: string, right: string): number {
    return (
        compareLexicographic(left.toLowerCase(), right.toLowerCase()) ||
        compareLexicographic(left, right)
    );
}

function compareLexicographic(left: string, right: string): number {
    return left < right ? -1 : left > right ? 1 : 0;
}

/** Orders tracks by disc number, then track number, then title. */
export function compareTracks(left: Track, right: Track): number {
    return (
        left.discNumber - right.discNumber ||
        left.trackNumber - right.trackNumber ||
        compareLexicographic(left.title, right.title)
    );
}

export function compareAlbums(left: Album, right: Album): number {
    return compareNamesInsensitive(left.name, right.name);
}

export function compareArtists(left: { name: string }, right: { name: string }): number {
    return compareNamesInsensitive(left.name, right.name);
}

function compareAlbumIndexEntries(
    left: AlbumIndexEntry,
    right: AlbumIndexEntry
): number {
    return (
        compareNamesInsensitive(left.album.name, right.album.name) ||
        compareNamesInsensitive(left.artistName, right.artistName)
    );
}

/** Groups tracks by album name into sorted albums with sorted tracks. */
export function groupTracksIntoAlbums(tracks: Iterable<Track>): Album[] {
    const byAlbum = new Map<string, Track[]>();
    for (const track of tracks) {
        const bucket = byAlbum.get(track.album);
        if (bucket) {
            bucket.push(track);
        } else {
            byAlbum.set(track.album, [track]);
        }
    }

    return Array.from(byAlbum.entries())
        .map(([name, albumTracks]) => ({
            name,
            tracks: [...albumTracks].sort(compareTracks),
        }))
        .sort(compareAlbums);
}

export function buildAlbumIndex(artists: Artist[]): AlbumIndexEntry[] {
    const entries: AlbumIndexEntry[] = [];
    for (const artist of artists) {
        for (const album of artist.albums) {
            entries.push({ artistName: artist.name, album });
        }
    }
    return entries.sort(compareAlbumIndexEntries);
}

/**
 * Adds an artist's albums to an existing album index, skipping any
 * (artist, album name) pair already present, and re-sorts the result.
 */
export function mergeAlbumIndex(
    index: AlbumIndexEntry[],
    artistName: string,
    albums: Album[]
): AlbumIndexEntry[] {
    const seen = new Set(
        index.map((entry) => albumIndexKey(entry.artistName, entry.album.name))
    );
    const merged = [...index];

    for (const album of albums) {
        const key = albumIndexKey(artistName, album.name);
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push({ artistName, album });
    }

    return merged.sort(compareAlbumIndexEntries);
}

function albumIndexKey(artistName: string, albumName: string): string {
    return JSON.stringify([artistName, albumName]);
}

/**
 * Resolves one album-artist per album name. An explicit album-artist tag
 * wins (the first one seen in catalog order); otherwise the most frequent
 * track artist, with ties broken by lexicographic artist name.
 */
export function resolveCanonicalArtists(tracks: Iterable<Track>): Map<string, string> {
    const explicit = new Map<string, string>();
    const artistCounts = new Map<string, Map<string, number>>();

    for (const track of tracks) {
        if (track.hasExplicitAlbumArtist && !explicit.has(track.album)) {
            explicit.set(track.album, track.albumArtist);
        }

        let counts = artistCounts.get(track.album);
        if (!counts) {
            counts = new Map();
            artistCounts.set(track.album, counts);
        }
        counts.set(track.artist, (counts.get(track.artist) ?? 0) + 1);
    }

    const canonical = new Map<string, string>();
    for (const [album, counts] of artistCounts) {
        const tagged = explicit.get(album);
        if (tagged !== undefined) {
            canonical.set(album, tagged);
            continue;
        }

        let best: { artist: string; count: number } | null = null;
        for (const [artist, count] of counts) {
            if (
                !best ||
                count > best.count ||
                (count === best.count && compareLexicographic(artist, best.artist) < 0)
            ) {
                best = { artist, count };
            }
        }
        if (best) {
            canonical.set(album, best.artist);
        }
    }

    return canonical;
}

/**
 * Builds the artist → album → track hierarchy for tracks that already carry
 * their resolved album-artist.
 */
export function groupTracksIntoArtists(tracks: Iterable<Track>): Artist[] {
    const byArtist = new Map<string, Track[]>();
    for (const track of tracks) {
        const bucket = byArtist.get(track.albumArtist);
        if (bucket) {
            bucket.push(track);
        } else {
            byArtist.set(track.albumArtist, [track]);
        }
    }

    return Array.from(byArtist.entries())
        .map(([name, artistTracks]) => ({
            name,
            albums: groupTracksIntoAlbums(artistTracks),
        }))
        .sort(compareArtists);
}
