#!/usr/bin/env node
import { config, type AppConfig } from "./config";
import { logErrorWithContext, logger } from "./utils/logger";
import { canContinueAfter, errorMessage } from "./utils/errors";
import { sleep } from "./utils/retry";
import { MpdConnection } from "./services/mpd/connection";
import { MpdClient } from "./services/mpd/client";
import { createRateController } from "./services/pipewire";
import { PlayerSession } from "./services/playerSession";

export interface RunningSession {
    session: PlayerSession;
    stop: () => Promise<void>;
}

/** Connects to MPD and starts the polling loop that keeps the session fresh. */
export async function startSession(appConfig: AppConfig = config): Promise<RunningSession> {
    const connection = await MpdConnection.connect(appConfig.mpd);
    const client = new MpdClient(connection);
    await client.setBinaryLimit(appConfig.mpd.binaryLimit);

    const rateController = appConfig.bitPerfect.enabled
        ? createRateController({ rates: appConfig.bitPerfect.rates })
        : null;
    await rateController?.initializeSupportedRates();

    const session = new PlayerSession(client, appConfig, rateController);
    await session.loadLibrary();

    let running = true;
    let lastFile: string | null = null;

    const loop = (async () => {
        while (running) {
            try {
                await session.poll();
                const file = session.currentTrack?.file ?? null;
                if (file !== lastFile) {
                    logger.info(`Now playing: ${file ?? "nothing"}`);
                    lastFile = file;
                }
            } catch (error) {
                logErrorWithContext(logger, "Poll failed", error, { file: lastFile });
                if (connection.isClosed || !canContinueAfter(error)) {
                    running = false;
                    break;
                }
            }
            await sleep(appConfig.playback.pollIntervalMs);
        }
    })();

    return {
        session,
        stop: async () => {
            running = false;
            await loop;
            await session.close();
            connection.close();
        },
    };
}

async function main(): Promise<void> {
    const { stop } = await startSession();

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down`);
        stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error("Shutdown failed:", errorMessage(error));
                process.exit(1);
            });
    };

    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error("Failed to start:", errorMessage(error));
        process.exit(1);
    });
}
