import { createLogger } from "../utils/logger";
import type { CoverArtMessage, Track } from "../types/library";
import type { CoverLoader } from "./coverLoader";
import {
    DEFAULT_PREFETCH_WINDOW,
    findCurrentIndex,
    getPrefetchTargets,
    type PrefetchWindow,
} from "./prefetchPlanner";

/** The UI-owned image slot; the core can only empty it. */
export interface CoverDisplay {
    clearImage(): void;
}

type CoverTriggers = Pick<CoverLoader, "spawnCoverArtLoader" | "spawnPrefetchLoaders">;

/**
 * Watches the current track between polls and starts cover loading and
 * prefetching whenever it changes.
 */
export class SongChangeReactor {
    private lastFile: string | null = null;
    private readonly log = createLogger("SongChange");

    constructor(
        private readonly loader: CoverTriggers,
        private readonly display: CoverDisplay,
        private readonly window: PrefetchWindow = DEFAULT_PREFETCH_WINDOW
    ) {}

    get currentFile(): string | null {
        return this.lastFile;
    }

    /** Returns true when the current track changed since the previous call. */
    check(currentSong: Track | null, queue: readonly Track[]): boolean {
        const nextFile = currentSong?.file ?? null;
        if (nextFile === this.lastFile) {
            return false;
        }

        this.log.debug(`Song changed: ${this.lastFile ?? "none"} -> ${nextFile ?? "none"}`);

        if (!currentSong) {
            this.display.clearImage();
        }

        if (nextFile !== null) {
            this.loader.spawnCoverArtLoader(nextFile);
        }

        const currentIndex = findCurrentIndex(queue, currentSong);
        this.loader.spawnPrefetchLoaders(
            getPrefetchTargets(queue, currentIndex, this.window)
        );

        this.lastFile = nextFile;
        return true;
    }

    /**
     * Fetches finish in any order, so a delivered result is only shown when it
     * still belongs to the current track.
     */
    acceptCoverArt(message: CoverArtMessage): boolean {
        if (message.file !== this.lastFile) {
            this.log.debug(`Discarding stale cover art for ${message.file}`);
            return false;
        }
        return true;
    }
}
