import { setTimeout as sleep } from 'timers/promises';
import { getErrorMessage } from '../errors';
import log from '../logger';
import type { BoundedQueue } from './queue';
import type {
    DataMessage,
    DriverMessage,
    PersistTarget,
    SaveResultMessage,
    SaveTask,
    UiMessage
} from './messages';

export interface AggregatorOptions {
    flushPacketCount: number;
    flushIntervalMs: number;
    // Minimum gap between two appends of a streamed step
    incrementalIntervalMs: number;
    pollIntervalMs?: number;
    now?: () => number;
}

interface DisplayBuffer {
    first: DataMessage;
    chunks: string[];
    packets: number;
    lastFlush: number;
}

interface PersistBuffer {
    testId: string;
    target: PersistTarget;
    chunks: string[];
    lastSave: number;
}

export interface AggregatorStats {
    received: number;
    displayFlushes: number;
    appends: number;
}

/**
 * Stage B: batches data for display, turns streamed chunks into append
 * tasks and relays everything else.
 *
 * Display buffers are keyed by test and step type and never mix two steps:
 * a data message for a new step index flushes everything the test buffered.
 */
export class DataAggregator {
    private display = new Map<string, DisplayBuffer>();
    private persist = new Map<string, PersistBuffer>();
    private currentStep = new Map<string, number>();
    private stats: AggregatorStats = { received: 0, displayFlushes: 0, appends: 0 };
    private readonly now: () => number;

    constructor(
        private readonly inbound: BoundedQueue<DriverMessage>,
        private readonly ui: BoundedQueue<UiMessage>,
        private readonly saves: BoundedQueue<SaveTask>,
        private readonly options: AggregatorOptions
    ) {
        this.now = options.now || Date.now;
    }

    public getStats(): AggregatorStats {
        return { ...this.stats };
    }

    /**
     * Consumes the driver queue and flushes on a timer until `signal` fires,
     * then drains what is left and flushes every buffer.
     */
    public async run(signal: AbortSignal): Promise<void> {
        log.info('[Aggregator] Started');
        await Promise.all([this.consume(signal), this.flushPeriodically(signal)]);
        for (const message of this.inbound.drain()) {
            await this.safeHandle(message);
        }
        await this.flushAll();
        log.info(`[Aggregator] Stopped. received=${this.stats.received} flushes=${this.stats.displayFlushes} appends=${this.stats.appends}`);
    }

    /** Forwards save acknowledgements from Stage C to the UI queue. */
    public async relaySaveResults(results: BoundedQueue<SaveResultMessage>, signal: AbortSignal): Promise<void> {
        const poll = this.options.pollIntervalMs || 50;
        while (!signal.aborted) {
            const result = await results.get(poll);
            if (result) await this.ui.put(result);
        }
        for (const result of results.drain()) {
            await this.ui.put(result);
        }
    }

    public async handle(message: DriverMessage): Promise<void> {
        this.stats.received++;
        const now = this.now();
        switch (message.type) {
            case 'test_data':
                await this.addData(message, now);
                break;
            case 'save_data':
                // Pending appends of the test go first so they land before its status files
                await this.flushPersisted(message.task.testId);
                await this.saves.put(message.task);
                break;
            case 'test_result':
                await this.flushTest(message.testId);
                this.currentStep.delete(message.testId);
                await this.ui.put(message);
                break;
            default:
                await this.ui.put(message);
        }
    }

    /** Flushes buffers whose interval elapsed. */
    public async flushDue(now: number = this.now()): Promise<void> {
        for (const [key, buffer] of this.display) {
            if (now - buffer.lastFlush >= this.options.flushIntervalMs) {
                await this.flushDisplay(key, now);
            }
        }
        for (const [filePath, buffer] of this.persist) {
            if (now - buffer.lastSave >= this.options.incrementalIntervalMs) {
                await this.flushPersist(filePath, now);
            }
        }
    }

    public async flushAll(): Promise<void> {
        const now = this.now();
        for (const key of [...this.display.keys()]) {
            await this.flushDisplay(key, now);
        }
        for (const filePath of [...this.persist.keys()]) {
            await this.flushPersist(filePath, now);
        }
    }

    private async consume(signal: AbortSignal): Promise<void> {
        const poll = this.options.pollIntervalMs || 50;
        while (!signal.aborted) {
            const message = await this.inbound.get(poll);
            if (message) await this.safeHandle(message);
        }
    }

    private async flushPeriodically(signal: AbortSignal): Promise<void> {
        const interval = Math.max(1, Math.floor(this.options.flushIntervalMs / 2));
        while (!signal.aborted) {
            await sleep(interval);
            try {
                await this.flushDue();
            } catch (error) {
                log.error('[Aggregator] Periodic flush failed:', getErrorMessage(error));
            }
        }
    }

    private async safeHandle(message: DriverMessage): Promise<void> {
        try {
            await this.handle(message);
        } catch (error) {
            log.error(`[Aggregator] Dropped ${message.type} message:`, getErrorMessage(error));
        }
    }

    private async addData(message: DataMessage, now: number): Promise<void> {
        const stepIndex = message.workflowInfo.stepIndex;
        const previous = this.currentStep.get(message.testId);
        if (previous !== undefined && previous !== stepIndex) {
            await this.flushTest(message.testId);
        }
        this.currentStep.set(message.testId, stepIndex);

        const key = `${message.testId}:${message.stepType}`;
        let buffer = this.display.get(key);
        if (!buffer) {
            buffer = { first: message, chunks: [], packets: 0, lastFlush: now };
            this.display.set(key, buffer);
        }
        buffer.chunks.push(message.data);
        buffer.packets += message.packets;
        if (buffer.packets >= this.options.flushPacketCount) {
            await this.flushDisplay(key, now);
        }

        if (message.persist) {
            const target = message.persist;
            let pending = this.persist.get(target.filePath);
            if (!pending) {
                pending = { testId: message.testId, target, chunks: [], lastSave: now };
                this.persist.set(target.filePath, pending);
            }
            pending.chunks.push(message.data);
            if (now - pending.lastSave >= this.options.incrementalIntervalMs) {
                await this.flushPersist(target.filePath, now);
            }
        }
    }

    private async flushTest(testId: string): Promise<void> {
        const now = this.now();
        for (const [key, buffer] of [...this.display]) {
            if (buffer.first.testId === testId) {
                await this.flushDisplay(key, now);
            }
        }
        await this.flushPersisted(testId);
    }

    private async flushPersisted(testId: string): Promise<void> {
        const now = this.now();
        for (const [filePath, buffer] of [...this.persist]) {
            if (buffer.testId === testId) {
                await this.flushPersist(filePath, now);
            }
        }
    }

    private async flushDisplay(key: string, now: number): Promise<void> {
        const buffer = this.display.get(key);
        if (!buffer) {
            return;
        }
        this.display.delete(key);
        if (buffer.chunks.length === 0) {
            return;
        }
        const { first } = buffer;
        this.stats.displayFlushes++;
        await this.ui.put({
            type: 'test_data',
            testId: first.testId,
            deviceId: first.deviceId,
            stepType: first.stepType,
            packetSize: first.packetSize,
            packets: buffer.packets,
            data: buffer.chunks.join(''),
            workflowInfo: first.workflowInfo,
            timestamp: now
        });
    }

    // The persist buffer stays registered until the test moves on, so the
    // append interval keeps counting from the last write.
    private async flushPersist(filePath: string, now: number): Promise<void> {
        const buffer = this.persist.get(filePath);
        if (!buffer) {
            return;
        }
        if (buffer.chunks.length === 0) {
            this.persist.delete(filePath);
            return;
        }
        const data = buffer.chunks.join('');
        buffer.chunks = [];
        buffer.lastSave = now;
        this.stats.appends++;
        await this.saves.put({
            kind: 'samples',
            testId: buffer.testId,
            filePath,
            mode: buffer.target.mode,
            packetSize: buffer.target.packetSize,
            data,
            append: true,
            transimpedanceOhms: buffer.target.transimpedanceOhms
        });
    }
}
