import { z } from 'zod';
import { WorkflowValidationError } from '../errors';

// Voltages and step sizes are signed 16-bit; durations and counts unsigned
const word = z.number().int().min(-0x8000).max(0x7FFF);
const uword = z.number().int().min(0).max(0xFFFF);
const flag = z.number().int().min(0).max(1);
const commandId = z.number().int().min(0).max(255);

export const TransferParamsSchema = z.object({
    isSweep: flag,
    timeStep: uword,
    sourceVoltage: word,
    drainVoltage: word,
    gateVoltageStart: word,
    gateVoltageEnd: word,
    gateVoltageStep: word
});

export const TransientParamsSchema = z.object({
    timeStep: uword,
    sourceVoltage: word,
    drainVoltage: word,
    bottomTime: uword,
    topTime: uword,
    gateVoltageBottom: word,
    gateVoltageTop: word,
    cycles: uword,
    packetSize: z.union([z.literal(7), z.literal(9)]).optional()
});

export const OutputParamsSchema = z.object({
    isSweep: flag,
    timeStep: uword,
    sourceVoltage: word,
    drainVoltageStart: word,
    drainVoltageEnd: word,
    drainVoltageStep: word,
    gateVoltageList: z.array(word).min(1)
});

export const TransferStepSchema = z.object({
    type: z.literal('transfer'),
    commandId: commandId.optional(),
    params: TransferParamsSchema
});

export const TransientStepSchema = z.object({
    type: z.literal('transient'),
    commandId: commandId.optional(),
    params: TransientParamsSchema
});

// The command id is the frame type of output scans, so it is mandatory here
export const OutputStepSchema = z.object({
    type: z.literal('output'),
    commandId,
    params: OutputParamsSchema
});

export type TransferStepConfig = z.infer<typeof TransferStepSchema>;
export type TransientStepConfig = z.infer<typeof TransientStepSchema>;
export type OutputStepConfig = z.infer<typeof OutputStepSchema>;
export type StepConfig = TransferStepConfig | TransientStepConfig | OutputStepConfig;

export interface LoopConfig {
    type: 'loop';
    iterations: number;
    steps: WorkflowNode[];
}

export type WorkflowNode = StepConfig | LoopConfig;

export const WorkflowNodeSchema: z.ZodType<WorkflowNode> = z.lazy(() =>
    z.union([TransferStepSchema, TransientStepSchema, OutputStepSchema, LoopSchema])
);

const LoopSchema = z.object({
    type: z.literal('loop'),
    iterations: z.number().int().positive(),
    steps: z.array(WorkflowNodeSchema).min(1)
});

export const WorkflowRequestSchema = z.object({
    testId: z.string().min(1),
    deviceId: z.string().min(1),
    port: z.string().min(1),
    baudRate: z.number().int().positive().optional(),
    testType: z.string().min(1).optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    chipId: z.string().optional(),
    deviceNumber: z.string().optional(),
    transimpedanceOhms: z.number().optional(),
    syncMode: z.boolean().optional(),
    batchId: z.string().min(1).optional(),
    steps: z.array(WorkflowNodeSchema).min(1)
}).refine(request => !request.syncMode || request.batchId !== undefined, {
    message: 'batchId is required when syncMode is on',
    path: ['batchId']
});

export type WorkflowRequest = z.infer<typeof WorkflowRequestSchema>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseWorkflowRequest(input: unknown): WorkflowRequest {
    const parsed = WorkflowRequestSchema.safeParse(input);
    if (!parsed.success) {
        throw new WorkflowValidationError(formatIssues(parsed.error));
    }
    return parsed.data;
}

export function parseWorkflowSteps(input: unknown): WorkflowNode[] {
    const parsed = z.array(WorkflowNodeSchema).min(1).safeParse(input);
    if (!parsed.success) {
        throw new WorkflowValidationError(formatIssues(parsed.error));
    }
    return parsed.data;
}
