import { type StepProtocol } from './types';
import { buildFrame, decodeVoltagePackets, TERMINATORS } from './codec';

// Transfer sweep: gate voltage is swept at a fixed drain voltage.
// Request:  00 x16 FF 01 0E [isSweep][timeStep][Vs][Vd][VgStart][VgEnd][VgStep] FE  (34 bytes)
// Response: 5-byte packets [Vg mV LE16][ADC BE24] ... FF x8

export const TRANSFER_FIELDS = [
    'isSweep',
    'timeStep',
    'sourceVoltage',
    'drainVoltage',
    'gateVoltageStart',
    'gateVoltageEnd',
    'gateVoltageStep'
] as const;

export const Transfer: StepProtocol = {
    id: 'transfer',
    name: 'Transfer',
    description: 'Id versus gate voltage at a fixed drain voltage',
    terminator: TERMINATORS.transfer,
    packetSizes: [5],
    fields: TRANSFER_FIELDS,
    frameType: 0x01,

    encode: (params) => buildFrame('transfer', 0x01, TRANSFER_FIELDS, params),

    decode: (bytes, _packetSize, options) => decodeVoltagePackets(bytes, options),

    csvHeader: () => 'Vg,Id'
};
