/**
 * PlayerSession - the state a terminal UI renders from, refreshed by `poll`.
 *
 * Owns the queue, the current track, the displayed cover art and the loaded
 * library. The cover cache is the only piece shared with background tasks;
 * everything else here is touched by the UI loop alone.
 */

import { createLogger } from "../utils/logger";
import { Channel } from "../utils/channel";
import { applyPlaybackStatus, trackFromSong } from "../utils/song";
import type { AppConfig } from "../config";
import type {
    CoverArtMessage,
    DaemonStatus,
    Library,
    Track,
} from "../types/library";
import { CoverCache } from "./coverCache";
import { CoverLoader } from "./coverLoader";
import { LazyLibraryLoader, loadLibrary } from "./libraryLoader";
import type { DaemonClient } from "./mpd/client";
import { PlaybackController, type PlaybackAction } from "./playbackCommands";
import { SampleRateReactor, type RateController } from "./sampleRateReactor";
import { SongChangeReactor, type CoverDisplay } from "./songChangeReactor";

export type SessionLibrary =
    | { mode: "none" }
    | { mode: "eager"; library: Library }
    | { mode: "lazy"; loader: LazyLibraryLoader };

export interface DisplayedCover {
    file: string;
    data: Buffer | null;
}

export type SessionConfig = Pick<AppConfig, "library" | "cover" | "playback" | "bitPerfect">;

export class PlayerSession implements CoverDisplay {
    private readonly cache: CoverCache;
    private readonly channel = new Channel<CoverArtMessage>();
    private readonly coverLoader: CoverLoader;
    private readonly songChanges: SongChangeReactor;
    private readonly sampleRates: SampleRateReactor;
    private readonly playback: PlaybackController;
    private readonly log = createLogger("Session");

    private status: DaemonStatus | null = null;
    private queueTracks: Track[] = [];
    private queueVersion: number | null = null;
    private current: Track | null = null;
    private cover: DisplayedCover | null = null;
    private libraryState: SessionLibrary = { mode: "none" };

    constructor(
        private readonly client: DaemonClient,
        private readonly sessionConfig: SessionConfig,
        rateController: RateController | null = null
    ) {
        this.cache = new CoverCache(sessionConfig.cover.maxEntries);
        this.coverLoader = new CoverLoader(client, this.cache, this.channel, {
            concurrency: sessionConfig.cover.fetchConcurrency,
        });
        this.songChanges = new SongChangeReactor(this.coverLoader, this, {
            ahead: sessionConfig.cover.prefetchAhead,
            behind: sessionConfig.cover.prefetchBehind,
        });
        this.sampleRates = new SampleRateReactor(
            rateController,
            sessionConfig.bitPerfect.enabled
        );
        this.playback = new PlaybackController(client, sessionConfig.playback);
    }

    get currentTrack(): Track | null {
        return this.current;
    }

    get queue(): readonly Track[] {
        return this.queueTracks;
    }

    get playerStatus(): DaemonStatus | null {
        return this.status;
    }

    get displayedCover(): DisplayedCover | null {
        return this.cover;
    }

    get library(): SessionLibrary {
        return this.libraryState;
    }

    get coverCache(): CoverCache {
        return this.cache;
    }

    clearImage(): void {
        this.cover = null;
    }

    /** One UI tick: refresh daemon state, react to changes, collect cover art. */
    async poll(): Promise<void> {
        const status = await this.client.status();
        this.status = status;

        if (
            status.playlistVersion === undefined ||
            status.playlistVersion !== this.queueVersion
        ) {
            const entries = await this.client.playlistInfo();
            this.queueTracks = entries.map(trackFromSong);
            this.queueVersion = status.playlistVersion ?? null;
        }

        const song = await this.client.currentSong();
        const current = song ? trackFromSong(song) : null;
        if (current) {
            applyPlaybackStatus(current, status);
        }
        this.current = current;

        const changed = this.songChanges.check(current, this.queueTracks);
        this.sampleRates.handle(status, current);

        // An on-demand load that found the key pending delivered nothing; once
        // the earlier fetch has landed in the cache, load it again.
        if (
            !changed &&
            current &&
            this.cover?.file !== current.file &&
            this.cache.contains(current.file)
        ) {
            this.coverLoader.spawnCoverArtLoader(current.file);
        }

        this.collectCoverArt();
    }

    async execute(action: PlaybackAction): Promise<void> {
        const status = this.status ?? (await this.client.status());
        await this.playback.execute(action, status);
    }

    async loadLibrary(): Promise<SessionLibrary> {
        const { library } = this.sessionConfig;

        if (library.loadMode === "eager") {
            const loaded = await loadLibrary(this.client, {
                maxAttempts: library.maxAttempts,
                baseDelayMs: library.retryBaseDelayMs,
            });
            this.libraryState = { mode: "eager", library: loaded };
        } else {
            const loader = new LazyLibraryLoader(this.client);
            await loader.init();
            this.libraryState = { mode: "lazy", loader };
        }

        this.log.debug(`Library ready (${this.libraryState.mode})`);
        return this.libraryState;
    }

    /** Waits for detached cover and rate work, then stops accepting results. */
    async close(): Promise<void> {
        await Promise.all([this.coverLoader.onIdle(), this.sampleRates.settled()]);
        this.channel.close();
    }

    private collectCoverArt(): void {
        for (const message of this.channel.drain()) {
            if (this.songChanges.acceptCoverArt(message)) {
                this.cover = { file: message.file, data: message.data };
            }
        }
    }
}
