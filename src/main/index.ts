export * from './errors';
export {
    CoreConfigSchema,
    DEFAULT_CORE_CONFIG,
    getConfigPath,
    loadCoreConfig,
    resolveCoreConfig,
    saveCoreConfig,
    effectiveBiasCurrent,
    effectiveTransimpedance
} from './config';
export type { CoreConfig, CoreConfigInput } from './config';
export { configureLogging } from './logger';

export * from './protocols';

export { SerialDevice, DEFAULT_BAUD_RATE } from './device/SerialDevice';
export type { SerialDeviceOptions } from './device/SerialDevice';
export { SerialStrategy, createSerialLink } from './device/strategies/SerialStrategy';
export { listPorts, listDevices, queryIdentity, createPortResolver } from './device/discovery';
export type { DiscoveryOptions } from './device/discovery';
export type * from './device/types';

export { buildSteps, countTotalSteps, formatWorkflowPath } from './workflow/builder';
export { parseWorkflowRequest, parseWorkflowSteps, WorkflowRequestSchema, WorkflowNodeSchema } from './workflow/schema';
export type { WorkflowRequest, WorkflowNode, StepConfig, LoopConfig } from './workflow/schema';
export { expectedTotalBytes, expectedDurationMs, sweepPoints } from './workflow/steps';
export { StepEngine } from './workflow/StepEngine';
export type { StepCallbacks, StepProgress, StepResult, OutputCurve } from './workflow/StepEngine';
export { SyncCoordinator } from './workflow/sync';
export { TestRun } from './workflow/TestRun';
export type * from './workflow/types';

export { BoundedQueue } from './pipeline/queue';
export { QueueDataSink } from './pipeline/sink';
export type { DataSink } from './pipeline/sink';
export type * from './pipeline/messages';
export { DataAggregator } from './pipeline/aggregator';
export { DataSaveManager } from './pipeline/persistence';
export { TestManager } from './pipeline/driver';
export type { StartedTest, StopOutcome, TestStatusReport } from './pipeline/driver';
export { Backend } from './pipeline/backend';
export type { BackendEvents, BackendOptions } from './pipeline/backend';

export { TestHistory } from './history/database';
export type { TestRecord } from './history/database';
