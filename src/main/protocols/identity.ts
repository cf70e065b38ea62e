import { DecodeError, getErrorMessage } from '../errors';
import log from '../logger';
import { bytesToHex, FRAME_FOOTER, FRAME_HEADER, FRAME_PAD_LENGTH, TERMINATORS } from './codec';

export const IDENTITY_FRAME_TYPE = 0x04;

// FF 03 01 00 FE: halts whatever the device is streaming
export const STOP_COMMAND = Buffer.from([0xFF, 0x03, 0x01, 0x00, 0xFE]);

export const IDENTITY_TERMINATORS: Record<string, string> = {
    identity: TERMINATORS.identity,
    done: Buffer.from('DONE!!!', 'utf-8').toString('hex').toUpperCase(),
    transient: TERMINATORS.transient,
    transfer: TERMINATORS.transfer
};

const IDENTITY_SUFFIXES: readonly Buffer[] = Object.values(IDENTITY_TERMINATORS).map(hex => Buffer.from(hex, 'hex'));

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function encodeIdentityQuery(): Buffer {
    const frame = Buffer.alloc(FRAME_PAD_LENGTH + 4);
    frame[FRAME_PAD_LENGTH] = FRAME_HEADER;
    frame[FRAME_PAD_LENGTH + 1] = IDENTITY_FRAME_TYPE;
    frame[FRAME_PAD_LENGTH + 2] = 0x00;
    frame[FRAME_PAD_LENGTH + 3] = FRAME_FOOTER;
    return frame;
}

export function stripIdentityTerminator(bytes: Buffer): Buffer {
    for (const suffix of IDENTITY_SUFFIXES) {
        if (bytes.length >= suffix.length && bytes.subarray(bytes.length - suffix.length).equals(suffix)) {
            return bytes.subarray(0, bytes.length - suffix.length);
        }
    }
    return bytes;
}

/**
 * Strict variant: throws DecodeError when the reply is not valid UTF-8.
 */
export function decodeIdentityStrict(bytes: Buffer): string {
    const body = stripIdentityTerminator(bytes);
    try {
        return utf8.decode(body).replace(/\0+/g, '').trim();
    } catch (error) {
        throw new DecodeError(`Identity reply is not valid UTF-8: ${getErrorMessage(error)}`, { hex: bytesToHex(body) });
    }
}

/**
 * Decodes a device identity reply. Malformed replies yield a placeholder of
 * the form `unknown:<hex>` instead of throwing.
 */
export function decodeIdentity(bytes: Buffer): string {
    try {
        return decodeIdentityStrict(bytes);
    } catch (error) {
        log.warn('[Identity]', getErrorMessage(error));
        return `unknown:${bytesToHex(stripIdentityTerminator(bytes))}`;
    }
}
