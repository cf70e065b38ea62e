import type { StepType } from '../protocols';
import type { TestInfo, TestStatus, WorkflowInfo } from '../workflow/types';

// Messages exchanged between the driver, aggregator, persistence and UI
// stages. Binary payloads travel hex-encoded.

interface TestMessage {
    testId: string;
    deviceId: string;
    timestamp: number;
}

export interface ProgressMessage extends TestMessage {
    type: 'test_progress';
    stepType: StepType;
    bytes: number;
    expectedBytes: number;
    progress: number;
    workflowInfo: WorkflowInfo;
}

/** Where streamed chunks of a step are appended on disk. */
export interface PersistTarget {
    filePath: string;
    mode: 'transfer' | 'transient';
    packetSize: number;
    transimpedanceOhms: number;
}

export interface DataMessage extends TestMessage {
    type: 'test_data';
    stepType: StepType;
    packetSize: number;
    packets: number;
    data: string;
    workflowInfo: WorkflowInfo;
    persist?: PersistTarget;
}

export interface ResultMessage extends TestMessage {
    type: 'test_result';
    status: TestStatus;
    directory: string;
    info: TestInfo;
}

export interface ErrorMessage extends TestMessage {
    type: 'test_error';
    code: string;
    error: string;
    stepIndex?: number;
}

export interface DeviceStatusMessage {
    type: 'device_status';
    deviceId: string;
    port: string;
    status: 'connected' | 'disconnected' | 'error';
    message?: string;
    timestamp: number;
}

interface SaveTaskBase {
    testId: string;
    filePath: string;
}

export interface SamplesSaveTask extends SaveTaskBase {
    kind: 'samples';
    mode: 'transfer' | 'transient';
    packetSize: number;
    data: string;
    // Append to what earlier tasks wrote to the same file
    append: boolean;
    transimpedanceOhms: number;
}

export interface OutputSaveTask extends SaveTaskBase {
    kind: 'output';
    curves: Array<{ gateVoltage: number; data: string }>;
    transimpedanceOhms: number;
}

export interface JsonSaveTask extends SaveTaskBase {
    kind: 'json';
    content: unknown;
}

export type SaveTask = SamplesSaveTask | OutputSaveTask | JsonSaveTask;

export interface SaveDataMessage {
    type: 'save_data';
    task: SaveTask;
    timestamp: number;
}

export interface SaveResultMessage {
    type: 'save_result';
    testId: string;
    filePath: string;
    status: 'ok' | 'error';
    error?: string;
    timestamp: number;
}

/** Stage A -> Stage B */
export type DriverMessage =
    | ProgressMessage
    | DataMessage
    | ResultMessage
    | ErrorMessage
    | DeviceStatusMessage
    | SaveDataMessage;

/** Stage B -> UI */
export type UiMessage =
    | ProgressMessage
    | DataMessage
    | ResultMessage
    | ErrorMessage
    | DeviceStatusMessage
    | SaveResultMessage;

export type Payload<M> = Omit<M, 'type' | 'timestamp'>;
