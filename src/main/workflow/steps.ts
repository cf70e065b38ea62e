import {
    PROTOCOLS,
    encode,
    normalizeTransientPacketSize,
    type OutputScanParams
} from '../protocols';
import type { Step } from './types';

export function packetSizeOf(step: Step): number {
    switch (step.type) {
        case 'transfer':
        case 'output':
            return 5;
        case 'transient':
            return normalizeTransientPacketSize(step.params.packetSize);
    }
}

export function terminatorOf(step: Step): string {
    return PROTOCOLS[step.type].terminator;
}

/** Number of frames the step sends: one per gate voltage for output steps. */
export function scanCount(step: Step): number {
    return step.type === 'output' ? step.params.gateVoltageList.length : 1;
}

/**
 * Frame for scan `scan` of the step (only output steps have more than one).
 */
export function buildCommand(step: Step, scan = 0): Buffer {
    switch (step.type) {
        case 'transfer':
            return encode('transfer', step.params, step.commandId);
        case 'transient':
            return encode('transient', step.params, step.commandId);
        case 'output': {
            const { gateVoltageList, ...rest } = step.params;
            const params: OutputScanParams = { ...rest, gateVoltage: gateVoltageList[scan] };
            return encode('output', params, step.commandId);
        }
    }
}

export function sweepPoints(start: number, end: number, stepSize: number, isSweep: number): number {
    if (!stepSize) {
        return 0;
    }
    return (Math.floor(Math.abs(end - start) / Math.abs(stepSize)) + 1) * (isSweep ? 2 : 1);
}

/** Bytes the device is expected to stream; used for progress only. */
export function expectedTotalBytes(step: Step): number {
    const packetSize = packetSizeOf(step);
    switch (step.type) {
        case 'transfer': {
            const p = step.params;
            return sweepPoints(p.gateVoltageStart, p.gateVoltageEnd, p.gateVoltageStep, p.isSweep) * packetSize;
        }
        case 'transient': {
            const p = step.params;
            if (!p.timeStep) return 0;
            return Math.floor((p.bottomTime + p.topTime) / p.timeStep) * p.cycles * packetSize;
        }
        case 'output': {
            const p = step.params;
            return sweepPoints(p.drainVoltageStart, p.drainVoltageEnd, p.drainVoltageStep, p.isSweep) * packetSize * p.gateVoltageList.length;
        }
    }
}

/** Rough run time in ms; decides whether a step is saved incrementally. */
export function expectedDurationMs(step: Step): number {
    switch (step.type) {
        case 'transfer': {
            const p = step.params;
            return sweepPoints(p.gateVoltageStart, p.gateVoltageEnd, p.gateVoltageStep, p.isSweep) * p.timeStep;
        }
        case 'transient':
            return (step.params.bottomTime + step.params.topTime) * step.params.cycles;
        case 'output': {
            const p = step.params;
            return sweepPoints(p.drainVoltageStart, p.drainVoltageEnd, p.drainVoltageStep, p.isSweep) * p.timeStep * p.gateVoltageList.length;
        }
    }
}
