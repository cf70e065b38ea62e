import { setTimeout as sleep } from 'timers/promises';
import { effectiveTransimpedance, type CoreConfig } from '../config';
import { listPorts, queryIdentity } from '../device/discovery';
import { SerialDevice } from '../device/SerialDevice';
import type { DeviceInfo, DeviceStatus, LinkFactory, PortInfo, PortResolver } from '../device/types';
import { ConfigurationError, DeviceBusyError, getErrorMessage } from '../errors';
import log from '../logger';
import { STOP_COMMAND } from '../protocols';
import { buildSteps } from '../workflow/builder';
import { parseWorkflowRequest, type WorkflowRequest } from '../workflow/schema';
import { SyncCoordinator } from '../workflow/sync';
import { TestRun } from '../workflow/TestRun';
import type { TestInfo, TestStatus } from '../workflow/types';
import type { DataSink } from './sink';

export interface TestManagerOptions {
    config: CoreConfig;
    sink: DataSink;
    linkFactory?: LinkFactory;
    resolvePort?: PortResolver;
    listPorts?: () => Promise<PortInfo[]>;
    coordinator?: SyncCoordinator;
    clock?: () => Date;
}

export interface StartedTest {
    testId: string;
    deviceId: string;
    directory: string;
    totalSteps: number;
}

export interface StopOutcome {
    testId: string;
    status: 'stopped' | 'stop_pending';
}

export interface TestStatusReport {
    testId: string;
    deviceId: string;
    status: TestStatus;
    completedSteps: number;
    totalSteps: number;
    directory?: string;
    device?: DeviceStatus;
}

interface DeviceEntry {
    device: SerialDevice;
    tests: Set<string>;
}

interface ActiveTest {
    run: TestRun;
    deviceId: string;
    // Never rejects; null when the run itself blew up
    done: Promise<TestInfo | null>;
}

/**
 * Stage A: owns one SerialDevice per active device and runs tests on them.
 * Devices are opened on first use and closed once no test needs them.
 */
export class TestManager {
    private devices = new Map<string, DeviceEntry>();
    private tests = new Map<string, ActiveTest>();
    private finished = new Map<string, TestInfo>();
    private readonly coordinator: SyncCoordinator;

    constructor(private readonly options: TestManagerOptions) {
        this.coordinator = options.coordinator || new SyncCoordinator(options.config.sync.timeoutMs);
    }

    public async startWorkflow(input: unknown): Promise<StartedTest> {
        const request = parseWorkflowRequest(input);
        if (!request.syncMode || !request.batchId) {
            return this.launch(request);
        }
        this.coordinator.register(request.batchId, request.testId, request.deviceId);
        try {
            return await this.launch(request);
        } catch (error) {
            this.coordinator.leave(request.batchId, request.testId);
            throw error;
        }
    }

    /**
     * Starts several tests that share a batch. Every participant is
     * registered before the first one starts, so no barrier can release early.
     */
    public async startBatch(inputs: unknown[]): Promise<StartedTest[]> {
        const requests = inputs.map(input => parseWorkflowRequest(input));
        for (const request of requests) {
            if (request.syncMode && request.batchId) {
                this.coordinator.register(request.batchId, request.testId, request.deviceId);
            }
        }
        const started: StartedTest[] = [];
        for (const request of requests) {
            try {
                started.push(await this.launch(request));
            } catch (error) {
                if (request.syncMode && request.batchId) {
                    this.coordinator.leave(request.batchId, request.testId);
                }
                throw error;
            }
        }
        return started;
    }

    public async stopTest(target: { testId?: string; deviceId?: string }): Promise<StopOutcome[]> {
        const matches = [...this.tests.entries()].filter(([testId, test]) =>
            (target.testId !== undefined && testId === target.testId) ||
            (target.deviceId !== undefined && test.deviceId === target.deviceId)
        );
        if (matches.length === 0) {
            log.warn('[TestManager] stopTest: nothing running for', JSON.stringify(target));
            return [];
        }

        const outcomes = matches.map(async ([testId, test]): Promise<StopOutcome> => {
            const entry = this.devices.get(test.deviceId);
            entry?.device.stop();
            // Leave before any await so a barrier released meanwhile cannot run the next step
            const batchId = test.run.batchId;
            if (batchId) {
                this.coordinator.leave(batchId, testId);
            }
            // An idle device is between steps; tell it directly
            if (entry && !entry.device.isBusy() && entry.device.isConnected()) {
                await this.sendStop(entry.device);
            }
            const timer = new AbortController();
            const finished = await Promise.race([
                test.done.then(() => true),
                sleep(this.options.config.driver.stopWaitMs, false, { signal: timer.signal }).catch(() => false)
            ]);
            timer.abort();
            if (!finished) {
                log.warn(`[TestManager] ${testId}: stop requested but the run has not returned yet`);
            }
            return { testId, status: finished ? 'stopped' : 'stop_pending' };
        });
        return Promise.all(outcomes);
    }

    public getTestStatus(testId: string): TestStatusReport | null {
        const active = this.tests.get(testId);
        if (active) {
            return {
                testId,
                deviceId: active.deviceId,
                status: active.run.getStatus(),
                completedSteps: active.run.completedSteps,
                totalSteps: active.run.totalSteps,
                directory: active.run.directory,
                device: this.devices.get(active.deviceId)?.device.getStatus()
            };
        }
        const info = this.finished.get(testId);
        if (info) {
            return {
                testId,
                deviceId: info.device_id,
                status: info.status,
                completedSteps: info.summary?.completed_steps ?? info.steps.length,
                totalSteps: info.summary?.total_steps ?? info.steps.length
            };
        }
        return null;
    }

    public activeTests(): string[] {
        return [...this.tests.keys()];
    }

    /**
     * Lists serial ports with the identity of the device behind each. Ports
     * held by an active device report that device without being probed.
     */
    public async listDevices(): Promise<DeviceInfo[]> {
        const ports = await (this.options.listPorts || listPorts)();
        const held = new Map<string, string>();
        for (const [deviceId, entry] of this.devices) {
            held.set(entry.device.getPort(), deviceId);
        }
        return Promise.all(ports.map(async (port): Promise<DeviceInfo> => ({
            ...port,
            identity: held.get(port.path) ?? await queryIdentity(port.path, {
                baudRate: this.options.config.serial.baudRate,
                timeoutMs: this.options.config.serial.identityTimeoutMs,
                pollIntervalMs: this.options.config.serial.pollIntervalMs,
                linkFactory: this.options.linkFactory
            })
        })));
    }

    public async waitForTest(testId: string): Promise<TestInfo | null> {
        const active = this.tests.get(testId);
        if (active) {
            return active.done;
        }
        return this.finished.get(testId) ?? null;
    }

    public async shutdown(): Promise<void> {
        const running = [...this.tests.keys()];
        if (running.length > 0) {
            log.info(`[TestManager] Shutting down, stopping ${running.length} test(s)`);
            await Promise.all(running.map(testId => this.stopTest({ testId })));
        }
        for (const [deviceId, entry] of [...this.devices]) {
            await entry.device.disconnect();
            this.devices.delete(deviceId);
        }
    }

    private async launch(request: WorkflowRequest): Promise<StartedTest> {
        const { config, sink } = this.options;
        if (this.tests.has(request.testId)) {
            throw new ConfigurationError(`Test ${request.testId} is already running`, { testId: request.testId });
        }
        const steps = buildSteps(request.steps, { maxLoopIterations: config.workflow.maxLoopIterations });
        const entry = await this.acquireDevice(request);

        const run = new TestRun({
            testId: request.testId,
            deviceId: request.deviceId,
            testType: request.testType || (request.steps.length === 1 && request.steps[0].type !== 'loop' ? request.steps[0].type : 'workflow'),
            port: request.port,
            baudRate: request.baudRate || config.serial.baudRate,
            name: request.name,
            description: request.description,
            metadata: { chip_id: request.chipId, device_number: request.deviceNumber },
            rootDir: config.save.rootDir,
            transimpedanceOhms: effectiveTransimpedance(request.transimpedanceOhms ?? config.transimpedanceOhms),
            incrementalIntervalMs: config.save.incrementalIntervalMs,
            workflow: request.steps,
            sync: request.syncMode && request.batchId ? { coordinator: this.coordinator, batchId: request.batchId } : undefined,
            clock: this.options.clock
        }, steps, entry.device, sink);

        entry.tests.add(request.testId);
        const done = run.execute()
            .catch((error: unknown) => {
                log.error(`[TestManager] ${request.testId}: run failed:`, getErrorMessage(error));
                return null;
            })
            .then(async (info) => {
                await this.release(request.testId, request.deviceId, info ?? run.getInfo());
                return info;
            });
        this.tests.set(request.testId, { run, deviceId: request.deviceId, done });

        log.info(`[TestManager] Started ${request.testId} on ${request.deviceId} (${steps.length} step(s))`);
        return { testId: request.testId, deviceId: request.deviceId, directory: run.directory, totalSteps: steps.length };
    }

    private async acquireDevice(request: WorkflowRequest): Promise<DeviceEntry> {
        const { config, sink } = this.options;
        const existing = this.devices.get(request.deviceId);
        if (existing) {
            if (existing.tests.size > 0) {
                throw new DeviceBusyError(request.deviceId);
            }
            return existing;
        }

        const device = new SerialDevice({
            deviceId: request.deviceId,
            port: request.port,
            baudRate: request.baudRate || config.serial.baudRate,
            readChunkSize: config.serial.readChunkSize,
            pollIntervalMs: config.serial.pollIntervalMs,
            linkFactory: this.options.linkFactory,
            resolvePort: this.options.resolvePort
        });
        try {
            await device.connect();
        } catch (error) {
            await sink.sendDeviceStatus({ deviceId: request.deviceId, port: request.port, status: 'error', message: getErrorMessage(error) });
            throw error;
        }

        const entry: DeviceEntry = { device, tests: new Set() };
        this.devices.set(request.deviceId, entry);
        await sink.sendDeviceStatus({ deviceId: request.deviceId, port: device.getPort(), status: 'connected' });
        return entry;
    }

    private async release(testId: string, deviceId: string, info: TestInfo): Promise<void> {
        this.tests.delete(testId);
        this.finished.set(testId, info);

        const entry = this.devices.get(deviceId);
        if (!entry) {
            return;
        }
        entry.tests.delete(testId);
        if (entry.tests.size > 0) {
            return;
        }
        this.devices.delete(deviceId);
        await entry.device.disconnect();
        try {
            await this.options.sink.sendDeviceStatus({ deviceId, port: entry.device.getPort(), status: 'disconnected' });
        } catch (error) {
            log.error(`[TestManager] ${deviceId}: could not report disconnect:`, getErrorMessage(error));
        }
    }

    private async sendStop(device: SerialDevice): Promise<void> {
        try {
            await device.send(STOP_COMMAND);
        } catch (error) {
            log.warn(`[TestManager] ${device.deviceId}: STOP frame failed:`, getErrorMessage(error));
        }
    }
}
