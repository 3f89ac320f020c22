/**
 * PipeWire sample-rate control through the `pw-metadata` CLI.
 *
 * Forcing `clock.force-rate` in the `settings` metadata switches the graph
 * rate; writing 0 hands control back to PipeWire.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import type { RateController } from "./sampleRateReactor";

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

const execFileAsync = promisify(execFile);
const PW_METADATA = "pw-metadata";
const COMMAND_TIMEOUT_MS = 2000;

const runCommand: CommandRunner = async (command, args) => {
    const { stdout } = await execFileAsync(command, args, {
        timeout: COMMAND_TIMEOUT_MS,
        encoding: "utf8",
    });
    return stdout;
};

function metadataValue(output: string, key: string): string | null {
    for (const line of output.split("\n")) {
        const match = /key:'([^']*)' value:'([^']*)'/.exec(line);
        if (match && match[1] === key) {
            return match[2] ?? null;
        }
    }
    return null;
}

/** Extracts the allowed rates from `pw-metadata -n settings` output. */
export function parseAllowedRates(output: string): number[] | null {
    const allowed = metadataValue(output, "clock.allowed-rates");
    const source = allowed ?? metadataValue(output, "clock.rate");
    if (source === null) return null;

    const rates = (source.match(/\d+/g) ?? [])
        .map((value) => Number.parseInt(value, 10))
        .filter((rate) => rate > 0);
    return rates.length > 0 ? Array.from(new Set(rates)).sort((a, b) => a - b) : null;
}

export class PipeWireRateController implements RateController {
    private supportedRates: number[] | null;

    constructor(
        private readonly run: CommandRunner = runCommand,
        configuredRates?: number[]
    ) {
        this.supportedRates = configuredRates && configuredRates.length > 0
            ? [...configuredRates].sort((a, b) => a - b)
            : null;
    }

    /** Reads the allowed rates once; configured rates take precedence. */
    async initializeSupportedRates(): Promise<number[] | null> {
        if (this.supportedRates) {
            return this.supportedRates;
        }

        try {
            const output = await this.run(PW_METADATA, ["-n", "settings"]);
            this.supportedRates = parseAllowedRates(output);
            logger.debug("[PipeWire] Supported rates:", this.supportedRates);
        } catch (error) {
            logger.warn("[PipeWire] Could not read supported rates:", errorMessage(error));
            this.supportedRates = null;
        }
        return this.supportedRates;
    }

    getSupportedRates(): number[] | null {
        return this.supportedRates;
    }

    async setRate(rate: number): Promise<void> {
        await this.forceRate(rate);
    }

    async resetRate(): Promise<void> {
        await this.forceRate(0);
    }

    private async forceRate(rate: number): Promise<void> {
        try {
            await this.run(PW_METADATA, [
                "-n",
                "settings",
                "0",
                "clock.force-rate",
                String(rate),
            ]);
        } catch (error) {
            throw new AppError(
                ErrorCode.RATE_CONTROL_FAILED,
                ErrorCategory.RECOVERABLE,
                `Failed to force PipeWire rate ${rate}`,
                { originalError: errorMessage(error) }
            );
        }
    }
}

/** PipeWire only exists on Linux; other platforms get no rate controller. */
export function createRateController(options: {
    platform?: NodeJS.Platform;
    rates?: number[];
    run?: CommandRunner;
} = {}): PipeWireRateController | null {
    const platform = options.platform ?? process.platform;
    if (platform !== "linux") {
        return null;
    }
    return new PipeWireRateController(options.run, options.rates);
}
