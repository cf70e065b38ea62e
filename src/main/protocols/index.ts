import { type DecodeOptions, type FrameParams, type PhysicalSample, type StepProtocol, type StepType } from './types';
import { Transfer } from './transfer';
import { Transient } from './transient';
import { Output } from './output';
import { ProtocolError } from '../errors';

export const PROTOCOLS: Record<StepType, StepProtocol> = {
    transfer: Transfer,
    transient: Transient,
    output: Output
};

export function isStepType(value: unknown): value is StepType {
    return value === 'transfer' || value === 'transient' || value === 'output';
}

export const getProtocol = (id: string): StepProtocol => {
    if (!isStepType(id)) {
        throw new ProtocolError(`Unknown step type "${id}"`, { stepType: id }, 'UNKNOWN_STEP_TYPE');
    }
    return PROTOCOLS[id];
};

/**
 * Encodes a step command. Output frames carry `commandId` as their type byte.
 */
export function encode(stepType: StepType, params: FrameParams, commandId?: number): Buffer {
    return PROTOCOLS[stepType].encode(params, commandId);
}

export function decodeSamples(bytes: Buffer, packetSize: number, mode: StepType, options?: DecodeOptions): PhysicalSample[] {
    return PROTOCOLS[mode].decode(bytes, packetSize, options);
}

export { TERMINATORS, TERMINATOR_LENGTH, adcToVoltage, stripTerminator, bytesToHex, hexToBytes, parseFrame } from './codec';
export { TRANSFER_FIELDS } from './transfer';
export { TRANSIENT_FIELDS, normalizeTransientPacketSize } from './transient';
export { OUTPUT_FIELDS } from './output';
export { STOP_COMMAND, IDENTITY_TERMINATORS, encodeIdentityQuery, decodeIdentity, decodeIdentityStrict } from './identity';
export type { DecodeOptions, FrameParams, PhysicalSample, StepProtocol, StepType };
export type { TransferParams, TransientParams, OutputParams, OutputScanParams } from './types';
