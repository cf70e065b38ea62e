import { describe, expect, it } from 'vitest';
import { createPortResolver, listDevices, queryIdentity } from '../../src/main/device/discovery';
import { createFakeBus, frameType, hex } from '../helpers/fakeLink';

const IDENTITY_END = hex('DEADBEEFC0FFEE00');

const identities: Record<string, string> = {
    '/dev/ttyUSB0': 'bench-A',
    '/dev/ttyUSB1': 'bench-B'
};

function bus() {
    return createFakeBus((frame, link) => {
        const identity = identities[link.options.path];
        if (frameType(frame) !== 4 || !identity) return undefined;
        return [Buffer.from(identity, 'utf-8'), IDENTITY_END];
    });
}

const list = async () => [{ path: '/dev/ttyUSB0' }, { path: '/dev/ttyUSB1' }, { path: '/dev/ttyS0' }];

describe('discovery', () => {
    it('queries the identity of one port and closes it', async () => {
        const fake = bus();
        const identity = await queryIdentity('/dev/ttyUSB1', { linkFactory: fake.factory, pollIntervalMs: 5 });
        expect(identity).toBe('bench-B');
        expect(fake.links[0].isOpen()).toBe(false);
    });

    it('returns null when nothing answers', async () => {
        const fake = bus();
        expect(await queryIdentity('/dev/ttyS0', { linkFactory: fake.factory, pollIntervalMs: 5, timeoutMs: 30 })).toBeNull();
    });

    it('lists ports with the identity behind each', async () => {
        const fake = bus();
        const devices = await listDevices({ linkFactory: fake.factory, pollIntervalMs: 5, timeoutMs: 30, list });
        expect(devices).toEqual([
            { path: '/dev/ttyUSB0', identity: 'bench-A' },
            { path: '/dev/ttyUSB1', identity: 'bench-B' },
            { path: '/dev/ttyS0', identity: null }
        ]);
    });

    it('resolves a device id to its current port', async () => {
        const fake = bus();
        const resolve = createPortResolver({ linkFactory: fake.factory, pollIntervalMs: 5, timeoutMs: 30, list });
        expect(await resolve('bench-B')).toBe('/dev/ttyUSB1');
        expect(await resolve('bench-Z')).toBeNull();
    });
});
