import {
    ConnectionError,
    DeviceBusyError,
    NotConnectedError,
    getErrorCode,
    getErrorMessage
} from '../errors';
import log from '../logger';
import { STOP_COMMAND, hexToBytes } from '../protocols';
import { createSerialLink } from './strategies/SerialStrategy';
import type {
    ConnectionState,
    DeviceStatus,
    ISerialLink,
    LinkFactory,
    PortResolver,
    ReceiveOptions,
    ReceiveResult
} from './types';

export const DEFAULT_BAUD_RATE = 512000;
const DEFAULT_POLL_INTERVAL_MS = 100;

export interface SerialDeviceOptions {
    deviceId: string;
    port: string;
    baudRate?: number;
    readChunkSize?: number;
    pollIntervalMs?: number;
    linkFactory?: LinkFactory;
    resolvePort?: PortResolver;
}

type OpenFailure = 'missing' | 'permission' | 'other';

function classifyOpenError(error: unknown): OpenFailure {
    const code = getErrorCode(error);
    const message = getErrorMessage(error);
    if (code === 'EACCES' || code === 'EPERM' || /permission denied|access denied/i.test(message)) {
        return 'permission';
    }
    if (code === 'ENOENT' || /no such file|file not found|cannot find/i.test(message)) {
        return 'missing';
    }
    return 'other';
}

function noop(): void {
    // write chain placeholder
}

interface NamedTerminator {
    name: string;
    bytes: Buffer;
}

/**
 * Exclusive owner of one serial link. Enforces a single in-flight command,
 * serialises writes and implements read-until-terminator with cooperative
 * cancellation.
 */
export class SerialDevice {
    readonly deviceId: string;
    private port: string;
    private readonly baudRate: number;
    private readonly readChunkSize?: number;
    private readonly pollIntervalMs: number;
    private readonly linkFactory: LinkFactory;
    private readonly resolvePort?: PortResolver;

    private link: ISerialLink | null = null;
    private state: ConnectionState = 'disconnected';
    private connecting: Promise<void> | null = null;
    private busy: boolean = false;
    private stopRequested: boolean = false;
    private writeChain: Promise<void> = Promise.resolve();

    // Bytes that arrived since the last read, and the wake-up for a waiting read
    private inbox: Buffer[] = [];
    private wake: (() => void) | null = null;
    private linkError: Error | null = null;

    constructor(options: SerialDeviceOptions) {
        this.deviceId = options.deviceId;
        this.port = options.port;
        this.baudRate = options.baudRate || DEFAULT_BAUD_RATE;
        this.readChunkSize = options.readChunkSize;
        this.pollIntervalMs = options.pollIntervalMs || DEFAULT_POLL_INTERVAL_MS;
        this.linkFactory = options.linkFactory || createSerialLink;
        this.resolvePort = options.resolvePort;
    }

    public getStatus(): DeviceStatus {
        return {
            deviceId: this.deviceId,
            port: this.port,
            baudRate: this.baudRate,
            state: this.state,
            busy: this.busy
        };
    }

    public getPort(): string {
        return this.port;
    }

    public isConnected(): boolean {
        return this.state === 'connected' && !!this.link && this.link.isOpen();
    }

    public isBusy(): boolean {
        return this.busy;
    }

    public isStopRequested(): boolean {
        return this.stopRequested;
    }

    public clearStop(): void {
        this.stopRequested = false;
    }

    /**
     * Asks the running receive loop to stop. The loop notices on its next
     * iteration, sends the STOP frame and returns; await the command to know
     * when that happened.
     */
    public stop(): void {
        this.stopRequested = true;
        if (this.wake) this.wake();
    }

    public async connect(): Promise<void> {
        if (this.isConnected()) {
            return;
        }
        if (this.connecting) {
            return this.connecting;
        }
        this.connecting = this.openLink().finally(() => {
            this.connecting = null;
        });
        return this.connecting;
    }

    public async disconnect(): Promise<void> {
        const link = this.link;
        this.link = null;
        this.state = 'disconnected';
        this.inbox = [];
        if (this.wake) this.wake();

        if (link && link.isOpen()) {
            try {
                await link.close();
                log.info(`[SerialDevice] ${this.deviceId}: port ${this.port} closed`);
            } catch (error) {
                log.warn(`[SerialDevice] ${this.deviceId}: error while closing ${this.port}:`, getErrorMessage(error));
            }
        }
    }

    /**
     * Writes raw bytes (or a hex string). Writes from concurrent callers are
     * serialised per device.
     */
    public async send(data: Buffer | string): Promise<void> {
        const bytes = typeof data === 'string' ? hexToBytes(data) : data;
        const link = this.link;
        if (!link || this.state !== 'connected') {
            throw new NotConnectedError(this.deviceId);
        }
        const write = this.writeChain.then(() => link.write(bytes));
        // The caller observes failures through `write`; the chain only orders writes
        this.writeChain = write.then(noop, noop);
        return write;
    }

    /**
     * Sends `command` and collects the response until its tail matches one of
     * `terminators` (name -> hex). Whole packets are passed to `onData` as they
     * arrive; the last bytes are held back until they can no longer be part of
     * a terminator, so terminator bytes never reach `onData`.
     *
     * Throws DeviceBusyError when a command is already in flight and
     * ConnectionError when the port cannot be opened. Everything after the
     * command has been written ends in a ReceiveResult.
     */
    public async sendAndReceiveUntil(
        command: Buffer | string,
        terminators: Record<string, string>,
        options: ReceiveOptions = {}
    ): Promise<ReceiveResult> {
        if (this.busy) {
            throw new DeviceBusyError(this.deviceId);
        }
        this.busy = true;
        this.stopRequested = false;
        try {
            await this.connect();
            return await this.receiveUntil(command, terminators, options);
        } finally {
            this.busy = false;
        }
    }

    private async receiveUntil(
        command: Buffer | string,
        terminators: Record<string, string>,
        options: ReceiveOptions
    ): Promise<ReceiveResult> {
        const named: NamedTerminator[] = Object.entries(terminators).map(([name, hex]) => ({ name, bytes: hexToBytes(hex) }));
        const holdback = named.reduce((max, t) => Math.max(max, t.bytes.length), 0);
        const packetSize = options.packetSize && options.packetSize > 0 ? options.packetSize : 0;
        const deadline = options.timeoutMs ? Date.now() + options.timeoutMs : null;

        const chunks: Buffer[] = [];
        let total = 0;
        let tail = Buffer.alloc(0);
        let pending: Buffer = Buffer.alloc(0);

        // Hands `limit` bytes of `pending` to onData: whole packets, plus the
        // partial remainder when `final` is set.
        const deliver = async (limit: number, final: boolean): Promise<void> => {
            if (limit <= 0) {
                return;
            }
            const size = packetSize || limit;
            const whole = Math.floor(limit / size) * size;
            for (let offset = 0; offset < whole; offset += size) {
                if (options.onData) await options.onData(pending.subarray(offset, offset + size), this.deviceId);
            }
            let consumed = whole;
            if (final && limit > whole) {
                if (options.onData) await options.onData(pending.subarray(whole, limit), this.deviceId);
                consumed = limit;
            }
            pending = pending.subarray(consumed);
        };

        const collected = (): Buffer => Buffer.concat(chunks, total);

        try {
            this.inbox = [];
            this.linkError = null;
            await this.send(command);

            while (true) {
                if (deadline !== null && Date.now() >= deadline) {
                    log.warn(`[SerialDevice] ${this.deviceId}: no terminator after ${options.timeoutMs}ms, stopping device`);
                    await this.sendStopFrame();
                    await deliver(pending.length, true);
                    return { data: collected(), reason: 'timeout' };
                }
                if (this.stopRequested) {
                    log.info(`[SerialDevice] ${this.deviceId}: stop requested after ${total} bytes`);
                    await this.sendStopFrame();
                    await deliver(pending.length, true);
                    return { data: collected(), reason: 'stopped' };
                }
                if (this.linkError) {
                    throw this.linkError;
                }

                const wait = deadline === null
                    ? this.pollIntervalMs
                    : Math.max(0, Math.min(this.pollIntervalMs, deadline - Date.now()));
                const chunk = await this.nextChunk(wait);
                if (!chunk) {
                    continue;
                }

                chunks.push(chunk);
                total += chunk.length;
                pending = pending.length ? Buffer.concat([pending, chunk]) : chunk;
                tail = Buffer.concat([tail, chunk]);
                if (tail.length > holdback) tail = tail.subarray(tail.length - holdback);

                if (options.onProgress) await options.onProgress(total, this.deviceId);

                const match = named.find(t => tail.length >= t.bytes.length && tail.subarray(tail.length - t.bytes.length).equals(t.bytes));
                if (match) {
                    await deliver(pending.length - match.bytes.length, true);
                    log.debug(`[SerialDevice] ${this.deviceId}: ${match.name} terminator after ${total} bytes`);
                    return { data: collected(), reason: match.name };
                }
                await deliver(pending.length - holdback, false);
            }
        } catch (error) {
            const message = getErrorMessage(error);
            log.error(`[SerialDevice] ${this.deviceId}: I/O error: ${message}`);
            if (classifyOpenError(error) === 'permission') {
                await this.resetConnection();
            }
            return { data: null, reason: `error:${message}` };
        }
    }

    private async sendStopFrame(): Promise<void> {
        try {
            await this.send(STOP_COMMAND);
        } catch (error) {
            log.warn(`[SerialDevice] ${this.deviceId}: could not send STOP:`, getErrorMessage(error));
        }
    }

    private async resetConnection(): Promise<void> {
        log.warn(`[SerialDevice] ${this.deviceId}: permission error, resetting connection`);
        await this.disconnect();
        try {
            await this.connect();
        } catch (error) {
            log.error(`[SerialDevice] ${this.deviceId}: reconnect failed:`, getErrorMessage(error));
        }
    }

    private nextChunk(waitMs: number): Promise<Buffer | null> {
        if (this.inbox.length > 0 || this.linkError) {
            return Promise.resolve(this.takeInbox());
        }
        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve(null);
            }, waitMs);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve(this.takeInbox());
            };
        });
    }

    private takeInbox(): Buffer | null {
        if (this.inbox.length === 0) {
            return null;
        }
        const data = this.inbox.length === 1 ? this.inbox[0] : Buffer.concat(this.inbox);
        this.inbox = [];
        return data;
    }

    private async openLink(): Promise<void> {
        this.state = 'connecting';
        try {
            await this.tryOpen(this.port);
            return;
        } catch (error) {
            if (classifyOpenError(error) === 'missing' && this.resolvePort) {
                log.warn(`[SerialDevice] ${this.deviceId}: ${this.port} not found, searching other ports`);
                const found = await this.resolvePort(this.deviceId);
                if (found && found !== this.port) {
                    log.info(`[SerialDevice] ${this.deviceId}: found on ${found}`);
                    this.port = found;
                    try {
                        await this.tryOpen(found);
                        return;
                    } catch (retryError) {
                        this.state = 'disconnected';
                        throw this.toConnectionError(retryError);
                    }
                }
            }
            this.state = 'disconnected';
            throw this.toConnectionError(error);
        }
    }

    private async tryOpen(port: string): Promise<void> {
        const link = this.linkFactory({ path: port, baudRate: this.baudRate, readChunkSize: this.readChunkSize });
        link.onData((chunk) => {
            if (link !== this.link) return;
            this.inbox.push(chunk);
            if (this.wake) this.wake();
        });
        link.onError((err) => {
            if (link !== this.link) return;
            log.error(`[SerialDevice] ${this.deviceId}: serial port error:`, err.message);
            this.linkError = err;
            if (this.wake) this.wake();
        });

        log.info(`[SerialDevice] ${this.deviceId}: opening ${port} (${this.baudRate})`);
        await link.open();
        this.link = link;
        this.state = 'connected';
        log.info(`[SerialDevice] ${this.deviceId}: port ${port} OPENED`);
    }

    private toConnectionError(error: unknown): ConnectionError {
        switch (classifyOpenError(error)) {
            case 'permission':
                return ConnectionError.permissionDenied(this.port);
            case 'missing':
                return ConnectionError.portNotFound(this.port);
            default:
                return new ConnectionError(`Failed to open ${this.port}: ${getErrorMessage(error)}`, this.port);
        }
    }
}
