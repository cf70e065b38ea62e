import { describe, expect, it } from 'vitest';
import { WorkflowValidationError } from '../../src/main/errors';
import { buildSteps, countTotalSteps, formatWorkflowPath, workflowInfoOf } from '../../src/main/workflow/builder';
import { parseWorkflowRequest, parseWorkflowSteps, type WorkflowNode } from '../../src/main/workflow/schema';

const transfer = {
    type: 'transfer' as const,
    params: { isSweep: 1, timeStep: 10, sourceVoltage: 0, drainVoltage: 100, gateVoltageStart: 0, gateVoltageEnd: 100, gateVoltageStep: 10 }
};

const transient = {
    type: 'transient' as const,
    params: { timeStep: 1, sourceVoltage: 0, drainVoltage: 100, bottomTime: 10, topTime: 10, gateVoltageBottom: 0, gateVoltageTop: 500, cycles: 1 }
};

const output = {
    type: 'output' as const,
    commandId: 7,
    params: { isSweep: 0, timeStep: 10, sourceVoltage: 0, drainVoltageStart: 0, drainVoltageEnd: 100, drainVoltageStep: 50, gateVoltageList: [0, 200] }
};

const OPTIONS = { maxLoopIterations: 100 };

describe('buildSteps', () => {
    it('unrolls loops depth-first with readable paths', () => {
        const nodes: WorkflowNode[] = [transfer, { type: 'loop', iterations: 2, steps: [transient, output] }];
        const steps = buildSteps(nodes, OPTIONS);

        expect(steps.map(s => s.type)).toEqual(['transfer', 'transient', 'output', 'transient', 'output']);
        expect(steps.map(s => s.index)).toEqual([0, 1, 2, 3, 4]);
        expect(steps.map(s => formatWorkflowPath(s.workflowPath))).toEqual([
            'Transfer[1/2]',
            'Loop[2/2] > Iteration 1/2 > Transient[1/2]',
            'Loop[2/2] > Iteration 1/2 > Output[2/2]',
            'Loop[2/2] > Iteration 2/2 > Transient[1/2]',
            'Loop[2/2] > Iteration 2/2 > Output[2/2]'
        ]);
        expect(countTotalSteps(nodes)).toBe(5);
    });

    it('runs a nested loop body N x M times', () => {
        const nodes: WorkflowNode[] = [{ type: 'loop', iterations: 3, steps: [{ type: 'loop', iterations: 2, steps: [transfer] }] }];
        const steps = buildSteps(nodes, OPTIONS);

        expect(steps).toHaveLength(6);
        expect(countTotalSteps(nodes)).toBe(6);
        expect(steps[5].iteration).toEqual({ current: 2, total: 2, parent: { current: 3, total: 3 } });
        expect(steps.map(s => s.iteration?.parent?.current)).toEqual([1, 1, 2, 2, 3, 3]);
    });

    it('fills in default command ids', () => {
        const steps = buildSteps([transfer, transient, output], OPTIONS);
        expect(steps.map(s => s.commandId)).toEqual([1, 2, 7]);
    });

    it('rejects loops over the iteration limit', () => {
        const nodes: WorkflowNode[] = [{ type: 'loop', iterations: 11, steps: [transfer] }];
        expect(() => buildSteps(nodes, { maxLoopIterations: 10 })).toThrow(WorkflowValidationError);
        expect(buildSteps(nodes, { maxLoopIterations: 11 })).toHaveLength(11);
    });

    it('describes a step for messages', () => {
        const [, second] = buildSteps([transfer, { type: 'loop', iterations: 1, steps: [transient] }], OPTIONS);
        expect(workflowInfoOf(second, 2)).toEqual({
            stepIndex: 2,
            totalSteps: 2,
            path: second.workflowPath,
            readablePath: 'Loop[2/2] > Iteration 1/1 > Transient[1/1]',
            iteration: { current: 1, total: 1 }
        });
    });
});

describe('workflow validation', () => {
    const request = { testId: 't-1', deviceId: 'dev-1', port: '/dev/fake0', steps: [transfer] };

    it('accepts a minimal request', () => {
        expect(parseWorkflowRequest(request).steps).toHaveLength(1);
    });

    it('requires a batch id in sync mode', () => {
        expect(() => parseWorkflowRequest({ ...request, syncMode: true })).toThrow('batchId: batchId is required when syncMode is on');
        expect(parseWorkflowRequest({ ...request, syncMode: true, batchId: 'b-1' }).batchId).toBe('b-1');
    });

    it('requires a command id on output steps', () => {
        const { commandId: _unused, ...withoutId } = output;
        expect(() => parseWorkflowSteps([withoutId])).toThrow(WorkflowValidationError);
    });

    it('rejects empty workflows and out-of-range parameters', () => {
        expect(() => parseWorkflowSteps([])).toThrow(WorkflowValidationError);
        expect(() => parseWorkflowSteps([{ ...transfer, params: { ...transfer.params, timeStep: 70000 } }])).toThrow(WorkflowValidationError);
    });
});
