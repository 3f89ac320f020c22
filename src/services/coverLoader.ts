/**
 * Cover art loading against the shared CoverCache.
 *
 * Both entry points are fire-and-forget: they claim keys synchronously and
 * hand the actual daemon round-trip to a background queue, so the UI loop
 * never waits on the network. Superseded work is never cancelled; a late
 * fetch only writes its result into the cache, which is idempotent.
 */

import PQueue from "p-queue";
import { createLogger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { Channel } from "../utils/channel";
import type { CoverArtMessage } from "../types/library";
import type { CoverCache } from "./coverCache";

export interface CoverArtSource {
    albumArt(file: string): Promise<Buffer | null>;
}

export interface CoverLoaderOptions {
    /** Maximum number of art fetches in flight at once. */
    concurrency?: number;
}

const DEFAULT_FETCH_CONCURRENCY = 4;

export class CoverLoader {
    private readonly queue: PQueue;
    private readonly log = createLogger("CoverLoader");

    constructor(
        private readonly source: CoverArtSource,
        private readonly cache: CoverCache,
        private readonly channel: Channel<CoverArtMessage>,
        options: CoverLoaderOptions = {}
    ) {
        this.queue = new PQueue({
            concurrency: options.concurrency ?? DEFAULT_FETCH_CONCURRENCY,
        });
    }

    /** Number of fetches queued or running. */
    get activeFetches(): number {
        return this.queue.size + this.queue.pending;
    }

    /**
     * Loads art for the track on screen. Cached results are delivered at once;
     * a key already being fetched delivers nothing, since the next song-change
     * check re-triggers the load once the earlier fetch has filled the cache.
     */
    spawnCoverArtLoader(file: string): void {
        const claim = this.cache.claim(file);

        if (claim.status === "hit") {
            this.log.debug(`Cover art cache hit: ${file}`);
            this.deliver({ data: claim.entry.data, file });
            return;
        }

        if (claim.status === "pending") {
            this.log.debug(`Cover art already pending: ${file}`);
            return;
        }

        this.schedule(file, async () => {
            const data = await this.fetch(file);
            this.cache.insert(file, data);
            this.deliver({ data, file });
        });
    }

    /** Warms the cache for upcoming tracks without delivering anything. */
    spawnPrefetchLoaders(files: Iterable<string>): void {
        for (const file of files) {
            if (this.cache.claim(file).status !== "claimed") {
                continue;
            }

            this.schedule(file, async () => {
                const data = await this.fetch(file);
                this.cache.insert(file, data);
                this.log.debug(`Prefetched cover art: ${file}`);
            });
        }
    }

    /** Resolves once every scheduled fetch has settled. */
    onIdle(): Promise<void> {
        return this.queue.onIdle();
    }

    private schedule(file: string, task: () => Promise<void>): void {
        this.queue.add(task).catch((error: unknown) => {
            // Leave the key fetchable again rather than pending forever.
            this.cache.release(file);
            this.log.warn(`Cover art task failed for ${file}:`, errorMessage(error));
        });
    }

    private async fetch(file: string): Promise<Buffer | null> {
        try {
            return await this.source.albumArt(file);
        } catch (error) {
            this.log.debug(`Failed to load cover art for ${file}:`, errorMessage(error));
            return null;
        }
    }

    private deliver(message: CoverArtMessage): void {
        if (!this.channel.send(message)) {
            this.log.debug(`Cover art receiver closed, dropping ${message.file}`);
        }
    }
}
