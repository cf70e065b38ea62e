import { MissingParameterError, ParameterRangeError } from '../errors';
import log from '../logger';
import type { DecodeOptions, FrameParams, PhysicalSample } from './types';

// Frame: 00 x16 | FF | type | length | payload (LE16 fields) | FE
export const FRAME_PAD_LENGTH = 16;
export const FRAME_HEADER = 0xFF;
export const FRAME_FOOTER = 0xFE;

export const TERMINATORS = {
    transfer: 'FFFFFFFFFFFFFFFF',
    transient: 'FEFEFEFEFEFEFEFE',
    output: 'CDABEFCDABEFCDAB',
    identity: 'DEADBEEFC0FFEE00'
} as const;

export const TERMINATOR_LENGTH = 8;

const DATA_TERMINATORS: readonly Buffer[] = Object.values(TERMINATORS).map(hex => Buffer.from(hex, 'hex'));

const ADC_FULL_SCALE_VOLTAGE = 2.048;
const DEFAULT_TRANSIMPEDANCE_OHMS = 100;

// Durations, counts and flags go out unsigned; voltages and step sizes signed
const UNSIGNED_FIELDS: ReadonlySet<string> = new Set(['isSweep', 'timeStep', 'bottomTime', 'topTime', 'cycles']);

export function fieldRange(name: string): readonly [number, number] {
    return UNSIGNED_FIELDS.has(name) ? [0, 0xFFFF] : [-0x8000, 0x7FFF];
}

/**
 * Packs a field as a little-endian 16-bit word, unsigned or two's complement
 * depending on the field. Values outside the field's range are rejected.
 */
export function writeField(buffer: Buffer, offset: number, name: string, value: number): void {
    const [min, max] = fieldRange(name);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ParameterRangeError(name, value, min, max);
    }
    if (min < 0) {
        buffer.writeInt16LE(value, offset);
    } else {
        buffer.writeUInt16LE(value, offset);
    }
}

export function readField(buffer: Buffer, offset: number, name: string): number {
    return fieldRange(name)[0] < 0 ? buffer.readInt16LE(offset) : buffer.readUInt16LE(offset);
}

export function requireNumber(stepType: string, params: FrameParams, name: string): number {
    const value = params[name];
    if (value === undefined || value === null) {
        throw new MissingParameterError(stepType, name);
    }
    if (typeof value !== 'number') {
        const [min, max] = fieldRange(name);
        throw new ParameterRangeError(name, value, min, max);
    }
    return value;
}

/**
 * Builds a complete frame from the named fields of `params`. Every field is
 * checked before any byte is written, so a bad parameter never yields a
 * partially built command.
 */
export function buildFrame(stepType: string, type: number, fields: readonly string[], params: FrameParams): Buffer {
    const values = fields.map(name => requireNumber(stepType, params, name));
    const payloadLength = fields.length * 2;
    const frame = Buffer.alloc(FRAME_PAD_LENGTH + 3 + payloadLength + 1);

    let offset = FRAME_PAD_LENGTH;
    frame[offset++] = FRAME_HEADER;
    frame[offset++] = type;
    frame[offset++] = payloadLength;
    values.forEach((value, i) => {
        writeField(frame, offset, fields[i], value);
        offset += 2;
    });
    frame[offset] = FRAME_FOOTER;
    return frame;
}

/**
 * Reads the payload of a frame back into named fields, each with the
 * signedness it was written with.
 */
export function parseFrame(frame: Buffer, fields: readonly string[]): { type: number; values: Record<string, number> } {
    const start = FRAME_PAD_LENGTH;
    const type = frame[start + 1];
    const values: Record<string, number> = {};
    fields.forEach((name, i) => {
        values[name] = readField(frame, start + 3 + i * 2, name);
    });
    return { type, values };
}

export function bytesToHex(bytes: Buffer): string {
    return bytes.toString('hex').toUpperCase();
}

export function hexToBytes(hex: string): Buffer {
    return Buffer.from(hex.replace(/\s+/g, ''), 'hex');
}

/**
 * Removes one trailing data terminator, if present.
 */
export function stripTerminator(bytes: Buffer): Buffer {
    if (bytes.length < TERMINATOR_LENGTH) {
        return bytes;
    }
    const tail = bytes.subarray(bytes.length - TERMINATOR_LENGTH);
    for (const terminator of DATA_TERMINATORS) {
        if (tail.equals(terminator)) {
            return bytes.subarray(0, bytes.length - TERMINATOR_LENGTH);
        }
    }
    return bytes;
}

/**
 * Converts a 24-bit ADC reading (MSB = sign) into volts.
 */
export function adcToVoltage(raw: number): number {
    if (raw & 0x800000) {
        return -((((~raw) & 0x7FFFFF) + 1) / 8388608) * ADC_FULL_SCALE_VOLTAGE;
    }
    return (raw / 8388607) * ADC_FULL_SCALE_VOLTAGE;
}

export function readAdc24(packet: Buffer, offset: number): number {
    return packet.readUIntBE(offset, 3);
}

export function toCurrent(adcVoltage: number, options: DecodeOptions = {}): number {
    const ohms = options.transimpedanceOhms !== undefined && Number.isFinite(options.transimpedanceOhms) && options.transimpedanceOhms > 0
        ? options.transimpedanceOhms
        : DEFAULT_TRANSIMPEDANCE_OHMS;
    return -(adcVoltage / ohms) - (options.biasCurrent ?? 0);
}

/**
 * Strips the terminator and yields whole packets. Trailing bytes that do not
 * fill a packet are dropped.
 */
export function* packets(bytes: Buffer, packetSize: number): Generator<Buffer> {
    const body = stripTerminator(bytes);
    const whole = Math.floor(body.length / packetSize) * packetSize;
    if (whole !== body.length) {
        log.debug(`[Codec] Discarding ${body.length - whole} trailing byte(s) that do not fill a ${packetSize}-byte packet`);
    }
    for (let offset = 0; offset < whole; offset += packetSize) {
        yield body.subarray(offset, offset + packetSize);
    }
}

/**
 * Decodes voltage-swept data (transfer and output): LE16 mV + ADC24.
 */
export function decodeVoltagePackets(bytes: Buffer, options?: DecodeOptions): PhysicalSample[] {
    const samples: PhysicalSample[] = [];
    for (const packet of packets(bytes, 5)) {
        samples.push({
            x: packet.readInt16LE(0) / 1000,
            current: toCurrent(adcToVoltage(readAdc24(packet, 2)), options)
        });
    }
    return samples;
}
