import type { OutputParams, StepType, TransferParams, TransientParams } from '../protocols';

/**
 * One level of a step's position inside the workflow tree. A step nested in
 * a loop carries the loop's `step` entry, an `iteration` entry and its own
 * `step` entry, outermost first.
 */
export type PathNode =
    | { kind: 'step'; type: StepType | 'loop'; index: number; total: number }
    | { kind: 'iteration'; current: number; total: number };

export interface IterationInfo {
    current: number;
    total: number;
    parent?: IterationInfo;
}

interface StepBase {
    // Position in the flattened list, 0-based
    index: number;
    commandId: number;
    workflowPath: PathNode[];
    iteration?: IterationInfo;
}

export interface TransferStep extends StepBase {
    type: 'transfer';
    params: TransferParams;
}

export interface TransientStep extends StepBase {
    type: 'transient';
    params: TransientParams;
}

export interface OutputStep extends StepBase {
    type: 'output';
    params: OutputParams;
}

export type Step = TransferStep | TransientStep | OutputStep;

/** Step context attached to every message a step produces. */
export interface WorkflowInfo {
    stepIndex: number;
    totalSteps: number;
    path: PathNode[];
    readablePath: string;
    iteration?: IterationInfo;
}

export type TestStatus = 'created' | 'running' | 'completed' | 'stopped' | 'failed';
export type StepStatus = 'completed' | 'stopped' | 'failed';

// Persisted as test_info.json; keys follow the on-disk format.
export interface StepInfo {
    index: number;
    type: StepType;
    command_id: number;
    params: TransferParams | TransientParams | OutputParams;
    start_time: string;
    end_time: string;
    reason: string;
    status: StepStatus;
    bytes: number;
    data_file?: string;
    workflow_info: WorkflowInfo;
}

export interface TestSummary {
    completed_steps: number;
    total_steps: number;
    completion_percentage: number;
}

export interface TestInfo {
    test_id: string;
    device_id: string;
    test_type: string;
    port: string;
    baudrate: number;
    name: string;
    description: string;
    created_at: string;
    status: TestStatus;
    batch_id?: string;
    sync_mode: boolean;
    metadata: Record<string, unknown>;
    steps: StepInfo[];
    last_updated?: string;
    completed_at?: string;
    summary?: TestSummary;
}
