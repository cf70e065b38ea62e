import { ProtocolError } from '../errors';
import { type FrameParams, type StepProtocol } from './types';
import { buildFrame, decodeVoltagePackets, TERMINATORS } from './codec';

// Output sweep: drain voltage is swept at one gate voltage. The type byte is
// the step's command id; one frame is sent per gate voltage of the step.
// Request:  00 x16 FF [cmd] 0E [isSweep][timeStep][Vs][Vg][VdStart][VdEnd][VdStep] FE  (34 bytes)
// Response: 5-byte packets [Vd mV LE16][ADC BE24] ... CDABEFCDABEFCDAB

export const OUTPUT_FIELDS = [
    'isSweep',
    'timeStep',
    'sourceVoltage',
    'gateVoltage',
    'drainVoltageStart',
    'drainVoltageEnd',
    'drainVoltageStep'
] as const;

function encodeOutput(params: FrameParams, commandId?: number): Buffer {
    if (commandId === undefined) {
        throw new ProtocolError('Output commands need a command id', { stepType: 'output' }, 'MISSING_PARAMETER');
    }
    if (!Number.isInteger(commandId) || commandId < 0 || commandId > 0xFF) {
        throw new ProtocolError(`Output command id must fit in one byte, got ${commandId}`, { commandId }, 'PARAMETER_RANGE');
    }
    return buildFrame('output', commandId, OUTPUT_FIELDS, params);
}

export const Output: StepProtocol = {
    id: 'output',
    name: 'Output',
    description: 'Id versus drain voltage, repeated per gate voltage',
    terminator: TERMINATORS.output,
    packetSizes: [5],
    fields: OUTPUT_FIELDS,

    encode: encodeOutput,

    decode: (bytes, _packetSize, options) => decodeVoltagePackets(bytes, options),

    csvHeader: () => 'Vd,Id'
};
