import * as net from "net";
import type { Duplex } from "stream";
import PQueue from "p-queue";
import { createLogger } from "../../utils/logger";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    wrapSocketError,
} from "../../utils/errors";
import {
    encodeCommand,
    ResponseReader,
    type MpdArgument,
    type MpdPair,
} from "./protocol";

export interface MpdOkResponse {
    pairs: MpdPair[];
    binary: Buffer | null;
}

export interface MpdConnectionOptions {
    host: string;
    port: number;
    timeoutMs: number;
}

interface InFlightCommand {
    name: string;
    resolve: (response: MpdOkResponse) => void;
    reject: (error: AppError) => void;
    timer: NodeJS.Timeout;
}

const log = createLogger("MpdConnection");

/**
 * A single MPD socket. MPD answers commands strictly in order, so commands
 * are serialized through a one-slot queue and matched to responses FIFO.
 */
export class MpdConnection {
    private readonly reader = new ResponseReader();
    private readonly commands = new PQueue({ concurrency: 1 });
    private inFlight: InFlightCommand | null = null;
    private closedError: AppError | null = null;
    private serverVersion: string | null = null;
    private readonly greeting: Promise<string>;
    private settleGreeting: {
        resolve: (version: string) => void;
        reject: (error: AppError) => void;
    } | null = null;

    constructor(
        private readonly socket: Duplex,
        private readonly timeoutMs: number
    ) {
        this.greeting = new Promise<string>((resolve, reject) => {
            this.settleGreeting = { resolve, reject };
        });
        // The greeting may fail before anyone awaits it; ready() reports it.
        this.greeting.catch(() => undefined);

        socket.on("data", (chunk: Buffer) => this.handleData(chunk));
        socket.on("error", (error: Error) => {
            this.shutdown(wrapSocketError(error, "socket error"));
        });
        socket.on("close", () => {
            this.shutdown(
                new AppError(
                    ErrorCode.DAEMON_CONNECTION_CLOSED,
                    ErrorCategory.TRANSIENT,
                    "Daemon connection closed"
                )
            );
        });
    }

    static async connect(options: MpdConnectionOptions): Promise<MpdConnection> {
        const socket = await new Promise<net.Socket>((resolve, reject) => {
            const candidate = net.createConnection({
                host: options.host,
                port: options.port,
            });
            const onError = (error: Error): void => {
                candidate.destroy();
                reject(wrapSocketError(error, `${options.host}:${options.port}`));
            };
            candidate.setTimeout(options.timeoutMs, () => {
                candidate.setTimeout(0);
                candidate.destroy();
                reject(
                    new AppError(
                        ErrorCode.DAEMON_TIMEOUT,
                        ErrorCategory.TRANSIENT,
                        `Timed out connecting to ${options.host}:${options.port}`
                    )
                );
            });
            candidate.once("error", onError);
            candidate.once("connect", () => {
                candidate.setTimeout(0);
                candidate.off("error", onError);
                resolve(candidate);
            });
        });

        const connection = new MpdConnection(socket, options.timeoutMs);
        const version = await connection.ready();
        log.info(`Connected to MPD ${version} at ${options.host}:${options.port}`);
        return connection;
    }

    get version(): string | null {
        return this.serverVersion;
    }

    get isClosed(): boolean {
        return this.closedError !== null;
    }

    /** Resolves with the server version once the `OK MPD` greeting arrives. */
    ready(): Promise<string> {
        return this.greeting;
    }

    async command(name: string, ...args: MpdArgument[]): Promise<MpdOkResponse> {
        await this.ready();
        return this.commands.add(() => this.send(name, encodeCommand(name, ...args)));
    }

    close(): void {
        this.shutdown(
            new AppError(
                ErrorCode.DAEMON_CONNECTION_CLOSED,
                ErrorCategory.TRANSIENT,
                "Connection closed by client"
            )
        );
        this.socket.end("close\n");
    }

    private send(name: string, line: string): Promise<MpdOkResponse> {
        if (this.closedError) {
            return Promise.reject(this.closedError);
        }

        return new Promise<MpdOkResponse>((resolve, reject) => {
            const timer = setTimeout(() => {
                const error = new AppError(
                    ErrorCode.DAEMON_TIMEOUT,
                    ErrorCategory.TRANSIENT,
                    `MPD command timed out: ${name}`
                );
                // A late reply would desynchronize every following command.
                this.shutdown(error);
                this.socket.destroy();
            }, this.timeoutMs);

            this.inFlight = { name, resolve, reject, timer };
            this.socket.write(line);
        });
    }

    private handleData(chunk: Buffer): void {
        this.reader.push(chunk);

        try {
            if (this.serverVersion === null) {
                const line = this.reader.readLine();
                if (line === null) return;
                if (!line.startsWith("OK MPD ")) {
                    throw new AppError(
                        ErrorCode.PROTOCOL_ERROR,
                        ErrorCategory.FATAL,
                        `Unexpected greeting: ${line}`
                    );
                }
                this.serverVersion = line.slice("OK MPD ".length).trim();
                this.settleGreeting?.resolve(this.serverVersion);
                this.settleGreeting = null;
            }

            while (this.inFlight) {
                const response = this.reader.readResponse();
                if (!response) return;

                const current = this.inFlight;
                this.inFlight = null;
                clearTimeout(current.timer);

                if (response.kind === "ok") {
                    current.resolve({ pairs: response.pairs, binary: response.binary });
                } else {
                    current.reject(
                        new AppError(
                            ErrorCode.DAEMON_COMMAND_FAILED,
                            ErrorCategory.RECOVERABLE,
                            `MPD rejected ${current.name}: ${response.ack.message}`,
                            {
                                ackCode: response.ack.code,
                                command: response.ack.command,
                            }
                        )
                    );
                }
            }
        } catch (error) {
            this.shutdown(wrapSocketError(error, "malformed response"));
            this.socket.destroy();
        }
    }

    private shutdown(error: AppError): void {
        if (this.closedError) return;
        this.closedError = error;
        log.debug(`Connection shut down: ${error.message}`);

        this.settleGreeting?.reject(error);
        this.settleGreeting = null;

        if (this.inFlight) {
            clearTimeout(this.inFlight.timer);
            this.inFlight.reject(error);
            this.inFlight = null;
        }
        // Queued commands still run and fail fast against closedError.
    }
}
