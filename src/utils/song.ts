import type { DaemonSong, DaemonStatus, Track } from "../types/library";

export const UNKNOWN_TITLE = "Unknown Title";
export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_ALBUM = "Unknown Album";

const normalizeTag = (value: string | undefined): string | undefined => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
};

/**
 * Parses the leading number of a track/disc tag ("3", "3/12"), defaulting to 0.
 */
export function parseTagNumber(value: string | undefined): number {
    if (!value) return 0;
    const parsed = Number.parseInt(value.split("/")[0]?.trim() ?? "", 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0;
}

export function trackFromSong(song: DaemonSong): Track {
    const artist = normalizeTag(song.artists[0]) ?? UNKNOWN_ARTIST;
    const explicitAlbumArtist = normalizeTag(song.albumArtists[0]);

    return {
        title: normalizeTag(song.title) ?? UNKNOWN_TITLE,
        artist,
        album: normalizeTag(song.album) ?? UNKNOWN_ALBUM,
        albumArtist: explicitAlbumArtist ?? artist,
        hasExplicitAlbumArtist: explicitAlbumArtist !== undefined,
        file: song.file,
        format: song.format ?? "",
        discNumber: parseTagNumber(song.disc),
        trackNumber: parseTagNumber(song.track),
        queueId: song.id,
        queuePosition: song.pos,
        durationSeconds: song.durationSeconds,
    };
}

/** Sample rate in Hz from an MPD audio format (`44100:24:2`), if known. */
export function parseSampleRate(format: string | undefined): number | null {
    if (!format) return null;
    const [rate] = format.split(":");
    if (!rate || !/^\d+$/.test(rate)) return null;
    const parsed = Number.parseInt(rate, 10);
    return parsed > 0 ? parsed : null;
}

export function trackSampleRate(track: Track): number | null {
    return parseSampleRate(track.format);
}

/** Refreshes the playback fields of the currently playing track in place. */
export function applyPlaybackStatus(track: Track, status: DaemonStatus): void {
    track.playState = status.state ?? undefined;
    track.elapsedSeconds = status.elapsedSeconds;
    if (status.durationSeconds !== undefined) {
        track.durationSeconds = status.durationSeconds;
    }

    const duration = track.durationSeconds;
    const elapsed = track.elapsedSeconds;
    track.progress =
        duration !== undefined && duration > 0 && elapsed !== undefined
            ? Math.min(1, Math.max(0, elapsed / duration))
            : undefined;
}
