/**
 * MPD text protocol codec.
 *
 * Requests are single lines: a command name followed by quoted arguments.
 * Responses are `key: value` lines terminated by `OK`, or a single
 * `ACK [code@index] {command} message` line. A `binary: N` line is followed
 * by exactly N raw bytes and a newline.
 */

import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import type { DaemonSong, DaemonStatus, PlayState } from "../../types/library";

export type MpdPair = [key: string, value: string];
export type MpdArgument = string | number;

export interface MpdAck {
    code: number;
    commandIndex: number;
    command: string;
    message: string;
}

export type MpdResponse =
    | { kind: "ok"; pairs: MpdPair[]; binary: Buffer | null }
    | { kind: "ack"; ack: MpdAck };

/** ACK code MPD uses when the requested object does not exist. */
export const ACK_ERROR_NO_EXIST = 50;

const NEWLINE = 0x0a;

export function quoteArgument(value: MpdArgument): string {
    const text = String(value);
    return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function encodeCommand(name: string, ...args: MpdArgument[]): string {
    if (args.length === 0) {
        return `${name}\n`;
    }
    return `${name} ${args.map(quoteArgument).join(" ")}\n`;
}

/** Builds a filter expression such as `((AlbumArtist == "Nina") AND (Album == "Pastel Blues"))`. */
export function buildFilter(filters: ReadonlyArray<readonly [string, string]>): string {
    const clauses = filters.map(([tag, value]) => `(${tag} == ${quoteArgument(value)})`);
    if (clauses.length === 1) {
        return clauses[0] ?? "";
    }
    return `(${clauses.join(" AND ")})`;
}

export function parseAck(line: string): MpdAck {
    const match = /^ACK \[(\d+)@(\d+)\] \{([^}]*)\}\s?(.*)$/.exec(line);
    if (!match) {
        throw new AppError(
            ErrorCode.PROTOCOL_ERROR,
            ErrorCategory.FATAL,
            `Malformed ACK line: ${line}`
        );
    }
    return {
        code: Number.parseInt(match[1] ?? "0", 10),
        commandIndex: Number.parseInt(match[2] ?? "0", 10),
        command: match[3] ?? "",
        message: match[4] ?? "",
    };
}

/**
 * Incremental response parser. Feed it socket chunks with `push` and pull
 * complete responses with `readResponse`; partial data stays buffered.
 */
export class ResponseReader {
    private buffer: Buffer = Buffer.alloc(0);
    private pairs: MpdPair[] = [];
    private binary: Buffer | null = null;
    private awaitingBinary: number | null = null;

    push(chunk: Buffer): void {
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    }

    /** Reads one raw line, used for the connection greeting. */
    readLine(): string | null {
        const newline = this.buffer.indexOf(NEWLINE);
        if (newline < 0) return null;
        const line = this.buffer.toString("utf8", 0, newline);
        this.buffer = this.buffer.subarray(newline + 1);
        return line;
    }

    readResponse(): MpdResponse | null {
        for (;;) {
            if (this.awaitingBinary !== null) {
                const size = this.awaitingBinary;
                if (this.buffer.length < size + 1) return null;
                this.binary = Buffer.from(this.buffer.subarray(0, size));
                this.buffer = this.buffer.subarray(size + 1);
                this.awaitingBinary = null;
            }

            const line = this.readLine();
            if (line === null) return null;

            if (line === "OK") {
                const response: MpdResponse = {
                    kind: "ok",
                    pairs: this.pairs,
                    binary: this.binary,
                };
                this.pairs = [];
                this.binary = null;
                return response;
            }

            if (line.startsWith("ACK ")) {
                this.pairs = [];
                this.binary = null;
                return { kind: "ack", ack: parseAck(line) };
            }

            const separator = line.indexOf(": ");
            if (separator < 0) {
                throw new AppError(
                    ErrorCode.PROTOCOL_ERROR,
                    ErrorCategory.FATAL,
                    `Malformed response line: ${line}`
                );
            }

            const key = line.slice(0, separator);
            const value = line.slice(separator + 2);
            if (key === "binary") {
                const size = Number.parseInt(value, 10);
                if (!Number.isInteger(size) || size < 0) {
                    throw new AppError(
                        ErrorCode.PROTOCOL_ERROR,
                        ErrorCategory.FATAL,
                        `Invalid binary size: ${value}`
                    );
                }
                this.awaitingBinary = size;
                continue;
            }

            this.pairs.push([key, value]);
        }
    }
}

export function pairValue(pairs: readonly MpdPair[], key: string): string | undefined {
    const wanted = key.toLowerCase();
    return pairs.find(([name]) => name.toLowerCase() === wanted)?.[1];
}

export function pairValues(pairs: readonly MpdPair[], key: string): string[] {
    const wanted = key.toLowerCase();
    return pairs.filter(([name]) => name.toLowerCase() === wanted).map(([, value]) => value);
}

function parseOptionalInt(value: string | undefined): number | undefined {
    if (value === undefined || !/^-?\d+$/.test(value.trim())) return undefined;
    return Number.parseInt(value, 10);
}

function parseOptionalFloat(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function songFromPairs(pairs: readonly MpdPair[]): DaemonSong | null {
    const file = pairValue(pairs, "file");
    if (file === undefined) return null;

    return {
        file,
        title: pairValue(pairs, "Title"),
        artists: pairValues(pairs, "Artist"),
        album: pairValue(pairs, "Album"),
        albumArtists: pairValues(pairs, "AlbumArtist"),
        track: pairValue(pairs, "Track"),
        disc: pairValue(pairs, "Disc"),
        format: pairValue(pairs, "Format"),
        durationSeconds:
            parseOptionalFloat(pairValue(pairs, "duration")) ??
            parseOptionalFloat(pairValue(pairs, "Time")),
        pos: parseOptionalInt(pairValue(pairs, "Pos")),
        id: parseOptionalInt(pairValue(pairs, "Id")),
    };
}

// Keys that open a new record in listings mixing songs and other objects.
const RECORD_KEYS = new Set(["file", "directory", "playlist"]);

/** Splits a song listing into one record per `file:` entry. */
export function groupSongs(pairs: readonly MpdPair[]): DaemonSong[] {
    const songs: DaemonSong[] = [];
    let record: MpdPair[] | null = null;

    const flush = (): void => {
        const song = record ? songFromPairs(record) : null;
        if (song) songs.push(song);
    };

    for (const pair of pairs) {
        const key = pair[0].toLowerCase();
        if (RECORD_KEYS.has(key)) {
            flush();
            record = key === "file" ? [pair] : null;
            continue;
        }
        record?.push(pair);
    }
    flush();

    return songs;
}

function parsePlayState(value: string | undefined): PlayState | null {
    return value === "play" || value === "pause" || value === "stop" ? value : null;
}

export function parseStatus(pairs: readonly MpdPair[]): DaemonStatus {
    const volume = parseOptionalInt(pairValue(pairs, "volume"));
    const single = pairValue(pairs, "single");
    const [timeElapsed, timeTotal] = (pairValue(pairs, "time") ?? "").split(":");

    return {
        state: parsePlayState(pairValue(pairs, "state")),
        volume: volume === undefined || volume < 0 ? null : volume,
        repeat: pairValue(pairs, "repeat") === "1",
        random: pairValue(pairs, "random") === "1",
        single: single === "1" || single === "oneshot",
        consume: pairValue(pairs, "consume") === "1",
        playlistLength: parseOptionalInt(pairValue(pairs, "playlistlength")) ?? 0,
        playlistVersion: parseOptionalInt(pairValue(pairs, "playlist")),
        song: parseOptionalInt(pairValue(pairs, "song")),
        songId: parseOptionalInt(pairValue(pairs, "songid")),
        elapsedSeconds:
            parseOptionalFloat(pairValue(pairs, "elapsed")) ?? parseOptionalFloat(timeElapsed),
        durationSeconds:
            parseOptionalFloat(pairValue(pairs, "duration")) ?? parseOptionalFloat(timeTotal),
        audioFormat: pairValue(pairs, "audio"),
    };
}
