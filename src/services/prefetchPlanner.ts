import type { Track } from "../types/library";

export interface PrefetchWindow {
    ahead: number;
    behind: number;
}

export const DEFAULT_PREFETCH_WINDOW: PrefetchWindow = { ahead: 1, behind: 1 };

/**
 * File keys worth fetching art for ahead of need: the `ahead` entries after
 * the current queue position, then the `behind` entries before it, nearest
 * first. The current track's own key is never included.
 */
export function getPrefetchTargets(
    queue: readonly Pick<Track, "file">[],
    currentIndex: number | null,
    window: PrefetchWindow = DEFAULT_PREFETCH_WINDOW
): string[] {
    if (currentIndex === null || currentIndex < 0 || currentIndex >= queue.length) {
        return [];
    }

    const currentFile = queue[currentIndex]?.file;
    const targets: string[] = [];
    const seen = new Set<string>();

    const consider = (index: number): void => {
        const entry = queue[index];
        if (!entry || entry.file === currentFile || seen.has(entry.file)) {
            return;
        }
        seen.add(entry.file);
        targets.push(entry.file);
    };

    for (let offset = 1; offset <= window.ahead; offset++) {
        consider(currentIndex + offset);
    }
    for (let offset = 1; offset <= window.behind; offset++) {
        consider(currentIndex - offset);
    }

    return targets;
}

/**
 * Queue position of the current song: matched by queue id when both sides
 * carry one, otherwise by file key.
 */
export function findCurrentIndex(
    queue: readonly Pick<Track, "file" | "queueId">[],
    currentSong: Pick<Track, "file" | "queueId"> | null
): number | null {
    if (!currentSong) return null;

    if (currentSong.queueId !== undefined) {
        const byId = queue.findIndex((entry) => entry.queueId === currentSong.queueId);
        if (byId >= 0) return byId;
    }

    const byFile = queue.findIndex((entry) => entry.file === currentSong.file);
    return byFile >= 0 ? byFile : null;
}
