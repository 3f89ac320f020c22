import type { DaemonSong, DaemonStatus } from "../../types/library";
import type { DaemonClient, SongFilter } from "../mpd/client";
import type { MpdArgument } from "../mpd/protocol";
import { PlayerSession, type SessionConfig } from "../playerSession";
import type { RateController } from "../sampleRateReactor";
import { deferred, makeSong, makeStatus } from "./helpers/fixtures";

const queue: DaemonSong[] = ["A", "B", "C"].map((name, index) =>
    makeSong({
        file: `${name}.flac`,
        title: name,
        artists: ["Nina"],
        album: "Pastel",
        format: "44100:16:2",
        pos: index,
        id: 10 + index,
    })
);

const sessionConfig: SessionConfig = {
    library: { loadMode: "lazy", maxAttempts: 3, retryBaseDelayMs: 0 },
    cover: { maxEntries: 16, fetchConcurrency: 2, prefetchAhead: 1, prefetchBehind: 1 },
    playback: { pollIntervalMs: 250, volumeStep: 5, seekStepSeconds: 5 },
    bitPerfect: { enabled: false },
};

function makeClient() {
    return {
        status: jest
            .fn<Promise<DaemonStatus>, []>()
            .mockResolvedValue(
                makeStatus({ state: "play", playlistVersion: 1, playlistLength: queue.length })
            ),
        currentSong: jest.fn<Promise<DaemonSong | null>, []>().mockResolvedValue(queue[0] ?? null),
        playlistInfo: jest.fn<Promise<DaemonSong[]>, []>().mockResolvedValue(queue),
        listAllInfo: jest.fn<Promise<DaemonSong[]>, []>().mockResolvedValue(queue),
        list: jest.fn<Promise<string[]>, [string]>().mockResolvedValue(["Nina"]),
        find: jest.fn<Promise<DaemonSong[]>, [SongFilter, string?]>().mockResolvedValue(queue),
        albumArt: jest
            .fn<Promise<Buffer | null>, [string]>()
            .mockImplementation(async (file) => Buffer.from(`art:${file}`)),
        setBinaryLimit: jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined),
        run: jest.fn<Promise<void>, [string, ...MpdArgument[]]>().mockResolvedValue(undefined),
    } satisfies DaemonClient;
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("PlayerSession", () => {
    it("shows the current song's cover once its fetch lands", async () => {
        const client = makeClient();
        const session = new PlayerSession(client, sessionConfig);

        await session.poll();
        expect(session.currentTrack?.file).toBe("A.flac");
        expect(session.displayedCover).toBeNull();

        await flush();
        await session.poll();

        expect(session.displayedCover).toEqual({
            file: "A.flac",
            data: Buffer.from("art:A.flac"),
        });
        expect(client.albumArt.mock.calls).toEqual([["A.flac"], ["B.flac"]]);
        expect(client.playlistInfo).toHaveBeenCalledTimes(1);
    });

    it("serves a prefetched cover without another fetch", async () => {
        const client = makeClient();
        const session = new PlayerSession(client, sessionConfig);
        await session.poll();
        await flush();

        client.currentSong.mockResolvedValue(queue[1] ?? null);
        await session.poll();

        expect(session.displayedCover).toEqual({
            file: "B.flac",
            data: Buffer.from("art:B.flac"),
        });
        await flush();
        expect(client.albumArt.mock.calls).toEqual([["A.flac"], ["B.flac"], ["C.flac"]]);
    });

    it("never shows art that arrives after its song has been skipped", async () => {
        const client = makeClient();
        const slowArt = deferred<Buffer | null>();
        client.albumArt.mockImplementation((file) =>
            file === "A.flac" ? slowArt.promise : Promise.resolve(Buffer.from(`art:${file}`))
        );
        const session = new PlayerSession(client, sessionConfig);

        await session.poll();
        await flush();
        client.currentSong.mockResolvedValue(queue[1] ?? null);
        await session.poll();

        slowArt.resolve(Buffer.from("art:A.flac"));
        await flush();
        await session.poll();

        expect(session.displayedCover?.file).toBe("B.flac");
        expect(session.coverCache.get("A.flac")).toEqual({ data: Buffer.from("art:A.flac") });
    });

    it("clears the cover when playback leaves the queue", async () => {
        const client = makeClient();
        const session = new PlayerSession(client, sessionConfig);
        await session.poll();
        await flush();
        await session.poll();
        expect(session.displayedCover).not.toBeNull();

        client.currentSong.mockResolvedValue(null);
        client.status.mockResolvedValue(makeStatus({ state: "stop", playlistVersion: 1 }));
        await session.poll();

        expect(session.currentTrack).toBeNull();
        expect(session.displayedCover).toBeNull();
    });

    it("refetches the queue only when its version changes", async () => {
        const client = makeClient();
        const session = new PlayerSession(client, sessionConfig);

        await session.poll();
        await session.poll();
        client.status.mockResolvedValue(makeStatus({ state: "play", playlistVersion: 2 }));
        await session.poll();

        expect(client.playlistInfo).toHaveBeenCalledTimes(2);
        expect(session.queue.map((track) => track.file)).toEqual(["A.flac", "B.flac", "C.flac"]);
    });

    it("refreshes the playback position of the current track", async () => {
        const client = makeClient();
        client.status.mockResolvedValue(
            makeStatus({ state: "play", playlistVersion: 1, elapsedSeconds: 30, durationSeconds: 120 })
        );
        const session = new PlayerSession(client, sessionConfig);

        await session.poll();

        expect(session.currentTrack).toMatchObject({
            playState: "play",
            elapsedSeconds: 30,
            durationSeconds: 120,
            progress: 0.25,
        });
    });

    it("runs playback actions against the latest status", async () => {
        const client = makeClient();
        const session = new PlayerSession(client, sessionConfig);

        await session.poll();
        await session.execute({ type: "togglePlayPause" });

        expect(client.run).toHaveBeenCalledWith("pause", 1);
    });

    it("switches the device rate for bit-perfect playback", async () => {
        const client = makeClient();
        client.currentSong.mockResolvedValue(
            makeSong({ file: "hi.flac", format: "96000:24:2", id: 99 })
        );
        const controller = {
            getSupportedRates: jest.fn<number[] | null, []>(() => [44100, 48000, 96000]),
            setRate: jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined),
            resetRate: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
        } satisfies RateController;
        const session = new PlayerSession(
            client,
            { ...sessionConfig, bitPerfect: { enabled: true } },
            controller
        );

        await session.poll();
        await session.close();

        expect(controller.setRate).toHaveBeenCalledWith(96000);
    });

    it("loads the library with the configured strategy", async () => {
        const client = makeClient();

        const lazy = await new PlayerSession(client, sessionConfig).loadLibrary();
        const eager = await new PlayerSession(client, {
            ...sessionConfig,
            library: { ...sessionConfig.library, loadMode: "eager" },
        }).loadLibrary();

        expect(lazy.mode === "lazy" ? lazy.loader.artistCount : -1).toBe(1);
        expect(eager.mode === "eager" ? eager.library.artists.map((a) => a.name) : []).toEqual([
            "Nina",
        ]);
        expect(client.list).toHaveBeenCalledWith("albumartist");
        expect(client.listAllInfo).toHaveBeenCalledTimes(1);
    });
});
