export type StepType = 'transfer' | 'transient' | 'output';

// Aliases rather than interfaces so they satisfy FrameParams
export type TransferParams = {
    isSweep: number;
    timeStep: number;
    sourceVoltage: number;
    drainVoltage: number;
    gateVoltageStart: number;
    gateVoltageEnd: number;
    gateVoltageStep: number;
};

export type TransientParams = {
    timeStep: number;
    sourceVoltage: number;
    drainVoltage: number;
    bottomTime: number;
    topTime: number;
    gateVoltageBottom: number;
    gateVoltageTop: number;
    cycles: number;
    // 9-byte packets also carry the gate voltage
    packetSize?: 7 | 9;
};

export type OutputParams = {
    isSweep: number;
    timeStep: number;
    sourceVoltage: number;
    drainVoltageStart: number;
    drainVoltageEnd: number;
    drainVoltageStep: number;
    gateVoltageList: number[];
};

/** One output scan, i.e. OutputParams pinned to a single gate voltage. */
export type OutputScanParams = Omit<OutputParams, 'gateVoltageList'> & { gateVoltage: number };

/** Loosely typed parameters as they arrive from callers; validated on encode. */
export type FrameParams = Readonly<Record<string, unknown>>;

/**
 * One decoded sample. `x` is the time in seconds for transient data and the
 * swept voltage in volts for transfer/output data.
 */
export interface PhysicalSample {
    x: number;
    current: number;
    gateVoltage?: number;
}

export interface DecodeOptions {
    transimpedanceOhms?: number;
    biasCurrent?: number;
}

export interface StepProtocol {
    id: StepType;
    name: string;
    description: string;

    // Wire details
    terminator: string;
    packetSizes: readonly number[];
    fields: readonly string[];
    frameType?: number;

    encode(params: FrameParams, commandId?: number): Buffer;
    decode(bytes: Buffer, packetSize: number, options?: DecodeOptions): PhysicalSample[];
    csvHeader(packetSize: number): string;
}
