import path from 'path';
import type { SerialDevice } from '../device/SerialDevice';
import { getErrorMessage, wrapError } from '../errors';
import log from '../logger';
import type { PersistTarget } from '../pipeline/messages';
import type { DataSink } from '../pipeline/sink';
import { bytesToHex } from '../protocols';
import { workflowInfoOf } from './builder';
import { StepEngine, isCompletedReason, type StepResult } from './StepEngine';
import { expectedDurationMs, packetSizeOf } from './steps';
import type { SyncCoordinator } from './sync';
import type { Step, StepInfo, StepStatus, TestInfo, TestStatus, TestSummary, WorkflowInfo } from './types';

export interface TestRunOptions {
    testId: string;
    deviceId: string;
    testType: string;
    port: string;
    baudRate: number;
    name?: string;
    description?: string;
    metadata?: Record<string, unknown>;
    rootDir: string;
    transimpedanceOhms: number;
    // Transient steps expected to run longer than this are saved as they stream
    incrementalIntervalMs: number;
    // Step configuration as submitted, written to workflow.json
    workflow?: unknown;
    sync?: { coordinator: SyncCoordinator; batchId: string };
    clock?: () => Date;
}

interface ActiveStep {
    workflowInfo: WorkflowInfo;
    persist?: PersistTarget;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD-HHmmss */
export function formatDirectoryTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

// Keeps ids usable as single path segments
function safeSegment(value: string): string {
    return value.replace(/[^\w.-]+/g, '_');
}

export function summarize(steps: StepInfo[], totalSteps: number): TestSummary {
    const completed = steps.filter(s => s.status === 'completed').length;
    return {
        completed_steps: completed,
        total_steps: totalSteps,
        completion_percentage: totalSteps > 0 ? Math.round((completed / totalSteps) * 1000) / 10 : 0
    };
}

/**
 * Runs the flattened steps of one test on one device, streaming progress
 * and data through the sink and writing status files as it goes.
 */
export class TestRun {
    readonly testId: string;
    readonly deviceId: string;
    readonly directory: string;

    private status: TestStatus = 'created';
    private readonly info: TestInfo;
    private readonly clock: () => Date;
    private active: ActiveStep | null = null;

    constructor(
        private readonly options: TestRunOptions,
        private readonly steps: Step[],
        private readonly device: SerialDevice,
        private readonly sink: DataSink
    ) {
        this.testId = options.testId;
        this.deviceId = options.deviceId;
        this.clock = options.clock || (() => new Date());

        const createdAt = this.clock();
        this.directory = path.join(
            options.rootDir,
            safeSegment(options.deviceId),
            `${formatDirectoryTimestamp(createdAt)}_${safeSegment(options.testType)}_${safeSegment(options.testId)}`
        );
        this.info = {
            test_id: options.testId,
            device_id: options.deviceId,
            test_type: options.testType,
            port: options.port,
            baudrate: options.baudRate,
            name: options.name || options.testId,
            description: options.description || '',
            created_at: createdAt.toISOString(),
            status: 'created',
            batch_id: options.sync?.batchId,
            sync_mode: !!options.sync,
            metadata: { ...options.metadata, transimpedance_ohms: options.transimpedanceOhms },
            steps: []
        };
    }

    public getStatus(): TestStatus {
        return this.status;
    }

    public getInfo(): TestInfo {
        return { ...this.info, status: this.status, steps: [...this.info.steps] };
    }

    public get totalSteps(): number {
        return this.steps.length;
    }

    public get completedSteps(): number {
        return this.info.steps.length;
    }

    public get batchId(): string | undefined {
        return this.options.sync?.batchId;
    }

    public async execute(): Promise<TestInfo> {
        this.status = 'running';
        this.device.clearStop();
        log.info(`[TestRun] ${this.testId}: starting ${this.steps.length} step(s) on ${this.deviceId} -> ${this.directory}`);

        const engine = new StepEngine(this.device, {
            onProgress: (step, progress) => {
                const active = this.active;
                if (!active) return;
                return this.sink.sendProgress({
                    testId: this.testId,
                    deviceId: this.deviceId,
                    stepType: step.type,
                    bytes: progress.bytes,
                    expectedBytes: progress.expectedBytes,
                    progress: progress.fraction,
                    workflowInfo: active.workflowInfo
                });
            },
            onData: (step, chunk) => {
                const active = this.active;
                if (!active) return;
                const packetSize = packetSizeOf(step);
                return this.sink.sendData({
                    testId: this.testId,
                    deviceId: this.deviceId,
                    stepType: step.type,
                    packetSize,
                    packets: Math.floor(chunk.length / packetSize),
                    data: bytesToHex(chunk),
                    workflowInfo: active.workflowInfo,
                    persist: active.persist
                });
            }
        }, this.clock);

        const sync = this.options.sync;
        let stopped = false;
        let failure: unknown = null;

        try {
            if (this.options.workflow !== undefined) {
                await this.sink.save({
                    kind: 'json',
                    testId: this.testId,
                    filePath: path.join(this.directory, 'workflow.json'),
                    content: this.options.workflow
                });
            }

            for (const step of this.steps) {
                if (this.device.isStopRequested()) {
                    stopped = true;
                    break;
                }
                if (sync) {
                    await sync.coordinator.wait(sync.batchId, this.testId, String(step.index));
                    // A stop may have arrived while parked at the barrier
                    if (this.device.isStopRequested()) {
                        stopped = true;
                        break;
                    }
                }

                const stepInfo = await this.runStep(engine, step);
                this.info.steps.push(stepInfo);
                if (stepInfo.status === 'stopped') {
                    stopped = true;
                    break;
                }

                if (sync) {
                    await sync.coordinator.wait(sync.batchId, this.testId, `complete_${step.index}`);
                }
                await this.saveSnapshot();
            }
        } catch (error) {
            if (this.device.isStopRequested()) {
                stopped = true;
            } else {
                failure = error;
            }
        } finally {
            this.active = null;
            if (sync) {
                sync.coordinator.leave(sync.batchId, this.testId);
            }
        }

        if (failure !== null) {
            const wrapped = wrapError(failure);
            log.error(`[TestRun] ${this.testId}: aborted: ${wrapped.message}`);
            await this.sink.sendError({
                testId: this.testId,
                deviceId: this.deviceId,
                code: wrapped.code,
                error: wrapped.message
            });
        }

        this.status = failure !== null ? 'failed' : stopped ? 'stopped' : 'completed';
        return this.finalize();
    }

    private async runStep(engine: StepEngine, step: Step): Promise<StepInfo> {
        const workflowInfo = workflowInfoOf(step, this.steps.length);
        const fileName = `${step.index + 1}_${step.type}.csv`;
        const filePath = path.join(this.directory, fileName);
        const streamed = step.type === 'transient' && expectedDurationMs(step) > this.options.incrementalIntervalMs;

        this.active = {
            workflowInfo,
            persist: streamed
                ? { filePath, mode: 'transient', packetSize: packetSizeOf(step), transimpedanceOhms: this.options.transimpedanceOhms }
                : undefined
        };
        log.info(`[TestRun] ${this.testId}: step ${workflowInfo.stepIndex}/${workflowInfo.totalSteps} ${workflowInfo.readablePath}`);

        const base = {
            index: step.index,
            type: step.type,
            command_id: step.commandId,
            params: step.params,
            workflow_info: workflowInfo
        };

        let result: StepResult;
        try {
            result = await engine.execute(step);
        } catch (error) {
            const wrapped = wrapError(error);
            log.error(`[TestRun] ${this.testId}: step ${workflowInfo.stepIndex} failed: ${wrapped.message}`);
            await this.reportStepError(step, wrapped.code, wrapped.message);
            const now = this.clock().toISOString();
            return { ...base, start_time: now, end_time: now, reason: `error:${wrapped.message}`, status: 'failed', bytes: 0 };
        }

        const status: StepStatus = isCompletedReason(step, result.reason)
            ? 'completed'
            : result.reason === 'stopped' ? 'stopped' : 'failed';
        if (status === 'failed') {
            await this.reportStepError(step, result.reason === 'timeout' ? 'TIMEOUT' : 'STEP_FAILED', `Step ended with ${result.reason}`);
        }

        const saved = await this.persist(step, result, filePath, streamed);
        return {
            ...base,
            start_time: result.startedAt,
            end_time: result.endedAt,
            reason: result.reason,
            status,
            bytes: result.data.length,
            data_file: saved ? fileName : undefined
        };
    }

    // Streamed steps already went out chunk by chunk with their persist target
    private async persist(step: Step, result: StepResult, filePath: string, streamed: boolean): Promise<boolean> {
        if (result.data.length === 0) {
            return false;
        }
        if (streamed) {
            return true;
        }
        try {
            if (step.type === 'output') {
                await this.sink.save({
                    kind: 'output',
                    testId: this.testId,
                    filePath,
                    curves: (result.curves ?? []).map(c => ({ gateVoltage: c.gateVoltage, data: bytesToHex(c.data) })),
                    transimpedanceOhms: this.options.transimpedanceOhms
                });
            } else {
                await this.sink.save({
                    kind: 'samples',
                    testId: this.testId,
                    filePath,
                    mode: step.type,
                    packetSize: packetSizeOf(step),
                    data: bytesToHex(result.data),
                    append: false,
                    transimpedanceOhms: this.options.transimpedanceOhms
                });
            }
            return true;
        } catch (error) {
            log.error(`[TestRun] ${this.testId}: could not queue data of step ${step.index + 1}:`, getErrorMessage(error));
            return false;
        }
    }

    private reportStepError(step: Step, code: string, message: string): Promise<void> {
        return this.sink.sendError({
            testId: this.testId,
            deviceId: this.deviceId,
            code,
            error: message,
            stepIndex: step.index + 1
        });
    }

    private saveSnapshot(): Promise<void> {
        const snapshot: TestInfo = {
            ...this.info,
            status: 'running',
            last_updated: this.clock().toISOString(),
            summary: summarize(this.info.steps, this.steps.length)
        };
        return this.sink.save({
            kind: 'json',
            testId: this.testId,
            filePath: path.join(this.directory, 'test_info_temp.json'),
            content: snapshot
        });
    }

    private async finalize(): Promise<TestInfo> {
        const info: TestInfo = {
            ...this.info,
            status: this.status,
            completed_at: this.clock().toISOString(),
            summary: summarize(this.info.steps, this.steps.length)
        };
        log.info(`[TestRun] ${this.testId}: ${this.status} (${info.summary?.completed_steps}/${info.summary?.total_steps})`);

        await this.sink.save({
            kind: 'json',
            testId: this.testId,
            filePath: path.join(this.directory, 'test_info.json'),
            content: info
        });
        await this.sink.sendResult({
            testId: this.testId,
            deviceId: this.deviceId,
            status: this.status,
            directory: this.directory,
            info
        });
        return info;
    }
}
