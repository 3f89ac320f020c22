import { createLogger } from "../utils/logger";
import type { Album, DaemonStatus } from "../types/library";
import type { DaemonClient } from "./mpd/client";

export type PlaybackAction =
    | { type: "togglePlayPause" }
    | { type: "next" }
    | { type: "previous" }
    | { type: "volumeUp" }
    | { type: "volumeDown" }
    | { type: "toggleMute" }
    | { type: "clearQueue" }
    | { type: "toggleRepeat" }
    | { type: "toggleRandom" }
    | { type: "toggleSingle" }
    | { type: "toggleConsume" }
    | { type: "seekForward" }
    | { type: "seekBackward" }
    | { type: "playPosition"; position: number }
    | { type: "removePosition"; position: number }
    | { type: "moveUp"; position: number }
    | { type: "moveDown"; position: number }
    | { type: "addTrack"; file: string }
    | { type: "addAlbum"; album: Album };

export interface PlaybackOptions {
    volumeStep: number;
    seekStepSeconds: number;
}

const DEFAULT_UNMUTE_VOLUME = 50;

const flag = (enabled: boolean): number => (enabled ? 1 : 0);

export function clampVolume(volume: number): number {
    return Math.min(100, Math.max(0, Math.round(volume)));
}

/** Translates UI playback actions into daemon commands. */
export class PlaybackController {
    private volumeBeforeMute: number | null = null;
    private readonly log = createLogger("Playback");

    constructor(
        private readonly client: Pick<DaemonClient, "run">,
        private readonly options: PlaybackOptions
    ) {}

    async execute(action: PlaybackAction, status: DaemonStatus): Promise<void> {
        switch (action.type) {
            case "togglePlayPause":
                if (status.state === "play") {
                    await this.client.run("pause", 1);
                } else if (status.state === "pause") {
                    await this.client.run("pause", 0);
                } else {
                    await this.client.run("play");
                }
                return;
            case "next":
                await this.client.run("next");
                return;
            case "previous":
                await this.client.run("previous");
                return;
            case "volumeUp":
                await this.changeVolume(status, this.options.volumeStep);
                return;
            case "volumeDown":
                await this.changeVolume(status, -this.options.volumeStep);
                return;
            case "toggleMute":
                await this.toggleMute(status);
                return;
            case "clearQueue":
                await this.client.run("clear");
                return;
            case "toggleRepeat":
                await this.client.run("repeat", flag(!status.repeat));
                return;
            case "toggleRandom":
                await this.client.run("random", flag(!status.random));
                return;
            case "toggleSingle":
                await this.client.run("single", flag(!status.single));
                return;
            case "toggleConsume":
                await this.client.run("consume", flag(!status.consume));
                return;
            case "seekForward":
                await this.client.run("seekcur", `+${this.options.seekStepSeconds}`);
                return;
            case "seekBackward":
                await this.client.run("seekcur", `-${this.options.seekStepSeconds}`);
                return;
            case "playPosition":
                await this.client.run("play", action.position);
                return;
            case "removePosition":
                await this.client.run("delete", action.position);
                return;
            case "moveUp":
                if (action.position > 0) {
                    await this.client.run("move", action.position, action.position - 1);
                }
                return;
            case "moveDown":
                if (action.position < status.playlistLength - 1) {
                    await this.client.run("move", action.position, action.position + 1);
                }
                return;
            case "addTrack":
                await this.client.run("add", action.file);
                return;
            case "addAlbum":
                for (const track of action.album.tracks) {
                    await this.client.run("add", track.file);
                }
                return;
            default: {
                const unhandled: never = action;
                throw new Error(`Unknown playback action: ${JSON.stringify(unhandled)}`);
            }
        }
    }

    private async changeVolume(status: DaemonStatus, delta: number): Promise<void> {
        if (status.volume === null) {
            this.log.debug("Volume change ignored: daemon has no mixer");
            return;
        }
        const target = clampVolume(status.volume + delta);
        if (target !== status.volume) {
            await this.client.run("setvol", target);
        }
    }

    private async toggleMute(status: DaemonStatus): Promise<void> {
        if (status.volume === null) {
            this.log.debug("Mute ignored: daemon has no mixer");
            return;
        }

        if (status.volume > 0) {
            this.volumeBeforeMute = status.volume;
            await this.client.run("setvol", 0);
            return;
        }

        const restored = this.volumeBeforeMute ?? DEFAULT_UNMUTE_VOLUME;
        this.volumeBeforeMute = null;
        await this.client.run("setvol", restored);
    }
}
