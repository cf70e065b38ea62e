import mitt, { type Emitter } from 'mitt';
import { effectiveBiasCurrent, type CoreConfig } from '../config';
import type { DeviceInfo, LinkFactory, PortInfo, PortResolver } from '../device/types';
import { getErrorMessage } from '../errors';
import type { TestHistory } from '../history/database';
import log from '../logger';
import type { SyncCoordinator } from '../workflow/sync';
import { DataAggregator } from './aggregator';
import { TestManager, type StartedTest, type StopOutcome, type TestStatusReport } from './driver';
import type {
    DataMessage,
    DeviceStatusMessage,
    DriverMessage,
    ErrorMessage,
    ProgressMessage,
    ResultMessage,
    SaveResultMessage,
    SaveTask,
    UiMessage
} from './messages';
import { DataSaveManager } from './persistence';
import { BoundedQueue } from './queue';
import { QueueDataSink } from './sink';

export type BackendEvents = {
    progress: ProgressMessage;
    data: DataMessage;
    result: ResultMessage;
    error: ErrorMessage;
    device: DeviceStatusMessage;
    saved: SaveResultMessage;
};

export interface BackendOptions {
    linkFactory?: LinkFactory;
    listPorts?: () => Promise<PortInfo[]>;
    resolvePort?: PortResolver;
    coordinator?: SyncCoordinator;
    // Finished tests are indexed here when given
    history?: TestHistory;
    clock?: () => Date;
}

interface Loop {
    name: string;
    controller: AbortController;
    done: Promise<void>;
}

/**
 * Wires the three stages together: the test manager feeds the aggregator,
 * which feeds the save workers and the UI event emitter.
 */
export class Backend {
    public readonly events: Emitter<BackendEvents> = mitt<BackendEvents>();
    public readonly manager: TestManager;

    private readonly driverQueue: BoundedQueue<DriverMessage>;
    private readonly uiQueue: BoundedQueue<UiMessage>;
    private readonly saveQueue: BoundedQueue<SaveTask>;
    private readonly resultQueue: BoundedQueue<SaveResultMessage>;
    private readonly aggregator: DataAggregator;
    private readonly saver: DataSaveManager;
    private loops: Loop[] = [];

    constructor(private readonly config: CoreConfig, private readonly options: BackendOptions = {}) {
        const capacity = config.queue.capacity;
        this.driverQueue = new BoundedQueue(capacity);
        this.uiQueue = new BoundedQueue(capacity);
        this.saveQueue = new BoundedQueue(capacity);
        this.resultQueue = new BoundedQueue(capacity);

        this.manager = new TestManager({
            config,
            sink: new QueueDataSink(this.driverQueue),
            linkFactory: options.linkFactory,
            resolvePort: options.resolvePort,
            listPorts: options.listPorts,
            coordinator: options.coordinator,
            clock: options.clock
        });
        this.aggregator = new DataAggregator(this.driverQueue, this.uiQueue, this.saveQueue, {
            flushPacketCount: config.buffer.flushPacketCount,
            flushIntervalMs: config.buffer.flushIntervalMs,
            incrementalIntervalMs: config.save.incrementalIntervalMs
        });
        this.saver = new DataSaveManager(this.saveQueue, this.resultQueue, {
            workers: config.save.workers,
            biasCurrent: effectiveBiasCurrent(config)
        });
    }

    public isRunning(): boolean {
        return this.loops.length > 0;
    }

    public start(): void {
        if (this.isRunning()) {
            return;
        }
        log.info(`[Backend] Starting (data root ${this.config.save.rootDir})`);
        this.loops = [
            this.spawn('aggregator', signal => this.aggregator.run(signal)),
            this.spawn('saver', signal => this.saver.run(signal)),
            this.spawn('relay', signal => this.aggregator.relaySaveResults(this.resultQueue, signal)),
            this.spawn('ui', signal => this.dispatch(signal))
        ];
    }

    /**
     * Stops running tests, then each stage in flow order so that everything
     * already queued still reaches disk and the UI.
     */
    public async shutdown(): Promise<void> {
        log.info('[Backend] Shutting down');
        await this.manager.shutdown();
        for (const loop of this.loops) {
            loop.controller.abort();
            await loop.done;
        }
        this.loops = [];
        log.info('[Backend] Stopped');
    }

    public startWorkflow(request: unknown): Promise<StartedTest> {
        return this.manager.startWorkflow(request);
    }

    public startBatch(requests: unknown[]): Promise<StartedTest[]> {
        return this.manager.startBatch(requests);
    }

    public stopTest(target: { testId?: string; deviceId?: string }): Promise<StopOutcome[]> {
        return this.manager.stopTest(target);
    }

    public getTestStatus(testId: string): TestStatusReport | null {
        return this.manager.getTestStatus(testId);
    }

    public listDevices(): Promise<DeviceInfo[]> {
        return this.manager.listDevices();
    }

    private spawn(name: string, body: (signal: AbortSignal) => Promise<void>): Loop {
        const controller = new AbortController();
        const done = body(controller.signal).catch((error: unknown) => {
            log.error(`[Backend] ${name} loop crashed:`, getErrorMessage(error));
        });
        return { name, controller, done };
    }

    private async dispatch(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            const message = await this.uiQueue.get(50);
            if (message) this.emit(message);
        }
        for (const message of this.uiQueue.drain()) {
            this.emit(message);
        }
    }

    // A throwing listener must not take the dispatch loop down
    private emit(message: UiMessage): void {
        try {
            switch (message.type) {
                case 'test_progress':
                    this.events.emit('progress', message);
                    break;
                case 'test_data':
                    this.events.emit('data', message);
                    break;
                case 'test_result':
                    this.recordHistory(message);
                    this.events.emit('result', message);
                    break;
                case 'test_error':
                    this.events.emit('error', message);
                    break;
                case 'device_status':
                    this.events.emit('device', message);
                    break;
                case 'save_result':
                    this.events.emit('saved', message);
                    break;
            }
        } catch (error) {
            log.error(`[Backend] Listener for ${message.type} failed:`, getErrorMessage(error));
        }
    }

    private recordHistory(message: ResultMessage): void {
        const history = this.options.history;
        if (!history) {
            return;
        }
        try {
            history.record(message.info, message.directory);
        } catch (error) {
            log.error(`[Backend] Could not index ${message.testId}:`, getErrorMessage(error));
        }
    }
}
