import { type PhysicalSample, type StepProtocol } from './types';
import { adcToVoltage, buildFrame, packets, readAdc24, TERMINATORS, toCurrent } from './codec';

// Transient: gate voltage toggles between bottom and top levels for N cycles.
// Request:  00 x16 FF 02 10 [timeStep][Vs][Vd][bottomTime][topTime][VgBottom][VgTop][cycles] FE  (36 bytes)
// Response: 7-byte packets [t ms LE32][ADC BE24]
//        or 9-byte packets [t ms LE32][Vg mV LE16][ADC BE24], then FE x8

export const TRANSIENT_FIELDS = [
    'timeStep',
    'sourceVoltage',
    'drainVoltage',
    'bottomTime',
    'topTime',
    'gateVoltageBottom',
    'gateVoltageTop',
    'cycles'
] as const;

export function normalizeTransientPacketSize(value: unknown): 7 | 9 {
    return value === 9 ? 9 : 7;
}

export const Transient: StepProtocol = {
    id: 'transient',
    name: 'Transient',
    description: 'Id versus time under a square gate voltage',
    terminator: TERMINATORS.transient,
    packetSizes: [7, 9],
    fields: TRANSIENT_FIELDS,
    frameType: 0x02,

    encode: (params) => buildFrame('transient', 0x02, TRANSIENT_FIELDS, params),

    decode: (bytes, packetSize, options) => {
        const size = normalizeTransientPacketSize(packetSize);
        const samples: PhysicalSample[] = [];
        for (const packet of packets(bytes, size)) {
            const time = packet.readInt32LE(0) / 1000;
            if (size === 9) {
                samples.push({
                    x: time,
                    gateVoltage: packet.readInt16LE(4) / 1000,
                    current: toCurrent(adcToVoltage(readAdc24(packet, 6)), options)
                });
            } else {
                samples.push({
                    x: time,
                    current: toCurrent(adcToVoltage(readAdc24(packet, 4)), options)
                });
            }
        }
        return samples;
    },

    csvHeader: (packetSize) => (packetSize === 9 ? 'Time,Id,Vg' : 'Time,Id')
};
