import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import type { DaemonSong, DaemonStatus } from "../../types/library";
import type { CoverArtSource } from "../coverLoader";
import type { MpdConnection } from "./connection";
import {
    ACK_ERROR_NO_EXIST,
    buildFilter,
    groupSongs,
    pairValue,
    pairValues,
    parseStatus,
    songFromPairs,
    type MpdArgument,
} from "./protocol";

export type SongFilter = ReadonlyArray<readonly [tag: string, value: string]>;

/** Everything the core needs from the daemon. */
export interface DaemonClient extends CoverArtSource {
    status(): Promise<DaemonStatus>;
    currentSong(): Promise<DaemonSong | null>;
    playlistInfo(): Promise<DaemonSong[]>;
    listAllInfo(): Promise<DaemonSong[]>;
    list(tag: string): Promise<string[]>;
    find(filter: SongFilter, sort?: string): Promise<DaemonSong[]>;
    setBinaryLimit(bytes: number): Promise<void>;
    run(command: string, ...args: MpdArgument[]): Promise<void>;
}

type CommandConnection = Pick<MpdConnection, "command">;

function isNoSuchObject(error: unknown): boolean {
    return (
        error instanceof AppError &&
        error.details?.ackCode === ACK_ERROR_NO_EXIST
    );
}

export class MpdClient implements DaemonClient {
    constructor(private readonly connection: CommandConnection) {}

    async status(): Promise<DaemonStatus> {
        const { pairs } = await this.connection.command("status");
        return parseStatus(pairs);
    }

    async currentSong(): Promise<DaemonSong | null> {
        const { pairs } = await this.connection.command("currentsong");
        return songFromPairs(pairs);
    }

    async playlistInfo(): Promise<DaemonSong[]> {
        const { pairs } = await this.connection.command("playlistinfo");
        return groupSongs(pairs);
    }

    async listAllInfo(): Promise<DaemonSong[]> {
        const { pairs } = await this.connection.command("listallinfo");
        return groupSongs(pairs);
    }

    async list(tag: string): Promise<string[]> {
        const { pairs } = await this.connection.command("list", tag);
        return pairValues(pairs, tag);
    }

    async find(filter: SongFilter, sort?: string): Promise<DaemonSong[]> {
        const args: MpdArgument[] = [buildFilter(filter)];
        if (sort) {
            args.push("sort", sort);
        }
        const { pairs } = await this.connection.command("find", ...args);
        return groupSongs(pairs);
    }

    /**
     * Reads the art stored beside a song in chunks of the server's binary
     * limit. Resolves to null when the daemon has no art for the file and
     * rejects when the transfer stops short of the announced size.
     */
    async albumArt(file: string): Promise<Buffer | null> {
        const chunks: Buffer[] = [];
        let offset = 0;
        let total: number | null = null;

        try {
            do {
                const { pairs, binary } = await this.connection.command("albumart", file, offset);
                const size = Number.parseInt(pairValue(pairs, "size") ?? "", 10);
                if (!binary || !Number.isInteger(size)) {
                    break;
                }
                total = size;
                if (binary.length === 0) {
                    break;
                }
                chunks.push(binary);
                offset += binary.length;
            } while (total !== null && offset < total);
        } catch (error) {
            if (isNoSuchObject(error)) {
                return null;
            }
            throw error;
        }

        if (total !== null && offset < total) {
            throw new AppError(
                ErrorCode.PROTOCOL_ERROR,
                ErrorCategory.RECOVERABLE,
                `Album art for ${file} ended after ${offset} of ${total} bytes`,
                { file, received: offset, size: total }
            );
        }
        return chunks.length > 0 ? Buffer.concat(chunks) : null;
    }

    async setBinaryLimit(bytes: number): Promise<void> {
        await this.connection.command("binarylimit", bytes);
    }

    async run(command: string, ...args: MpdArgument[]): Promise<void> {
        await this.connection.command(command, ...args);
    }
}
