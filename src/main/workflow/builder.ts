import { WorkflowValidationError } from '../errors';
import type { StepConfig, WorkflowNode } from './schema';
import type { IterationInfo, PathNode, Step, WorkflowInfo } from './types';

export interface BuildOptions {
    maxLoopIterations: number;
}

const DEFAULT_COMMAND_IDS = { transfer: 1, transient: 2 } as const;

function makeStep(config: StepConfig, index: number, workflowPath: PathNode[], iteration?: IterationInfo): Step {
    switch (config.type) {
        case 'transfer':
            return {
                type: 'transfer',
                index,
                commandId: config.commandId ?? DEFAULT_COMMAND_IDS.transfer,
                params: config.params,
                workflowPath,
                iteration
            };
        case 'transient':
            return {
                type: 'transient',
                index,
                commandId: config.commandId ?? DEFAULT_COMMAND_IDS.transient,
                params: config.params,
                workflowPath,
                iteration
            };
        case 'output':
            return {
                type: 'output',
                index,
                commandId: config.commandId,
                params: config.params,
                workflowPath,
                iteration
            };
    }
}

/**
 * Unrolls loops depth-first into the flat, ordered list of steps that will
 * run. Nothing is executed here; an oversized loop rejects the whole
 * workflow before any hardware is touched.
 */
export function buildSteps(nodes: WorkflowNode[], options: BuildOptions): Step[] {
    const steps: Step[] = [];

    const visit = (list: WorkflowNode[], path: PathNode[], iteration?: IterationInfo): void => {
        list.forEach((node, i) => {
            const entry: PathNode = { kind: 'step', type: node.type, index: i + 1, total: list.length };
            if (node.type !== 'loop') {
                steps.push(makeStep(node, steps.length, [...path, entry], iteration));
                return;
            }
            if (node.iterations > options.maxLoopIterations) {
                throw new WorkflowValidationError([
                    `loop at ${formatWorkflowPath([...path, entry])} has ${node.iterations} iterations, the limit is ${options.maxLoopIterations}`
                ]);
            }
            for (let current = 1; current <= node.iterations; current++) {
                visit(
                    node.steps,
                    [...path, entry, { kind: 'iteration', current, total: node.iterations }],
                    { current, total: node.iterations, parent: iteration }
                );
            }
        });
    };

    visit(nodes, []);
    return steps;
}

export function countTotalSteps(nodes: WorkflowNode[]): number {
    return nodes.reduce((sum, node) => sum + (node.type === 'loop' ? node.iterations * countTotalSteps(node.steps) : 1), 0);
}

function label(type: string): string {
    return type.charAt(0).toUpperCase() + type.slice(1);
}

/** e.g. `Loop[1/2] > Iteration 2/3 > Transfer[1/2]` */
export function formatWorkflowPath(path: PathNode[]): string {
    return path.map(node => node.kind === 'iteration'
        ? `Iteration ${node.current}/${node.total}`
        : `${label(node.type)}[${node.index}/${node.total}]`
    ).join(' > ');
}

export function workflowInfoOf(step: Step, totalSteps: number): WorkflowInfo {
    return {
        stepIndex: step.index + 1,
        totalSteps,
        path: step.workflowPath,
        readablePath: formatWorkflowPath(step.workflowPath),
        iteration: step.iteration
    };
}
