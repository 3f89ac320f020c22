import { createLogger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { parseSampleRate, trackSampleRate } from "../utils/song";
import type { DaemonStatus, PlayState, Track } from "../types/library";

/** Audio device rate control. Every call is best-effort. */
export interface RateController {
    getSupportedRates(): number[] | null;
    setRate(rate: number): Promise<void>;
    resetRate(): Promise<void>;
}

export type RateAction =
    | { type: "none" }
    | { type: "set"; rate: number; songRate: number }
    | { type: "reset" };

/**
 * Picks the device rate for a song: the song's own rate when supported,
 * else the smallest supported integer multiple of it, else the smallest
 * supported rate above it, else the highest supported rate.
 */
export function resolveBitPerfectRate(songRate: number, supportedRates: readonly number[]): number {
    if (supportedRates.length === 0 || supportedRates.includes(songRate)) {
        return songRate;
    }

    const ascending = [...supportedRates].sort((a, b) => a - b);
    const multiple = ascending.find((rate) => rate > songRate && rate % songRate === 0);
    if (multiple !== undefined) return multiple;

    const higher = ascending.find((rate) => rate > songRate);
    if (higher !== undefined) return higher;

    return ascending[ascending.length - 1] ?? songRate;
}

/**
 * Switches the output device to the playing song's sample rate and back to
 * automatic when playback stops. Switch requests run detached; a failure is
 * logged and never reaches the caller.
 */
export class SampleRateReactor {
    private lastPlayState: PlayState | null = null;
    private lastSampleRate: number | null = null;
    private readonly inFlight = new Set<Promise<void>>();
    private readonly log = createLogger("SampleRate");

    constructor(
        private readonly controller: RateController | null,
        private readonly enabled: boolean
    ) {}

    handle(status: DaemonStatus | null, currentSong: Track | null): RateAction {
        if (!this.enabled || !this.controller) {
            return { type: "none" };
        }

        const playState = status?.state ?? null;
        const sampleRate =
            (currentSong ? trackSampleRate(currentSong) : null) ??
            parseSampleRate(status?.audioFormat);
        let action: RateAction = { type: "none" };

        if (playState === "play") {
            const stateChanged = playState !== this.lastPlayState;
            const rateChanged = sampleRate !== this.lastSampleRate;
            const supported = this.controller.getSupportedRates();

            if ((stateChanged || rateChanged) && sampleRate !== null && supported) {
                const target = resolveBitPerfectRate(sampleRate, supported);
                this.log.debug(`Setting sample rate to ${target} (song rate: ${sampleRate})`);
                action = { type: "set", rate: target, songRate: sampleRate };
                this.detach("set", this.controller.setRate(target));
            }
        } else if (this.lastPlayState === "play" || this.lastPlayState === null) {
            this.log.debug(
                `Resetting sample rate (playback stopped, last state: ${this.lastPlayState ?? "unknown"})`
            );
            action = { type: "reset" };
            this.detach("reset", this.controller.resetRate());
        }

        this.lastPlayState = playState;
        this.lastSampleRate = sampleRate;
        return action;
    }

    /** Resolves once every detached rate request has settled. */
    async settled(): Promise<void> {
        await Promise.all(Array.from(this.inFlight));
    }

    private detach(label: string, request: Promise<void>): void {
        const tracked = request
            .catch((error: unknown) => {
                this.log.warn(`Sample rate ${label} failed:`, errorMessage(error));
            })
            .finally(() => {
                this.inFlight.delete(tracked);
            });
        this.inFlight.add(tracked);
    }
}
