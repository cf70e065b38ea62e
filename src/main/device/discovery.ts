import { SerialPort } from 'serialport';
import { getErrorMessage } from '../errors';
import log from '../logger';
import { IDENTITY_TERMINATORS, decodeIdentity, encodeIdentityQuery } from '../protocols';
import { SerialDevice } from './SerialDevice';
import type { DeviceInfo, LinkFactory, PortInfo, PortResolver } from './types';

export interface DiscoveryOptions {
    baudRate?: number;
    timeoutMs?: number;
    pollIntervalMs?: number;
    linkFactory?: LinkFactory;
    // Defaults to SerialPort.list()
    list?: () => Promise<PortInfo[]>;
}

const DEFAULT_IDENTITY_TIMEOUT_MS = 3000;

export async function listPorts(): Promise<PortInfo[]> {
    const startTime = Date.now();
    log.info('[Discovery] listPorts started');
    try {
        const ports = await SerialPort.list();
        log.info(`[Discovery] listPorts finished. Found ${ports.length} ports:`);
        ports.forEach(p => {
            log.info(`  - ${p.path}: ${p.manufacturer || 'Unknown'} (${p.pnpId || ''})`);
        });
        return ports.map(p => ({
            path: p.path,
            manufacturer: p.manufacturer,
            serialNumber: p.serialNumber,
            pnpId: p.pnpId,
            vendorId: p.vendorId,
            productId: p.productId
        }));
    } catch (e) {
        log.error(`[Discovery] listPorts FAILED in ${Date.now() - startTime}ms:`, e);
        throw e;
    }
}

/**
 * Sends the identity query to `path` and returns the decoded identity, or
 * null when the port cannot be opened or nothing identity-like comes back.
 */
export async function queryIdentity(path: string, options: DiscoveryOptions = {}): Promise<string | null> {
    const device = new SerialDevice({
        deviceId: path,
        port: path,
        baudRate: options.baudRate,
        pollIntervalMs: options.pollIntervalMs,
        linkFactory: options.linkFactory
    });
    try {
        const result = await device.sendAndReceiveUntil(encodeIdentityQuery(), IDENTITY_TERMINATORS, {
            timeoutMs: options.timeoutMs || DEFAULT_IDENTITY_TIMEOUT_MS
        });
        if (!result.data || !(result.reason in IDENTITY_TERMINATORS)) {
            log.warn(`[Discovery] ${path}: no identity reply (${result.reason})`);
            return null;
        }
        return decodeIdentity(result.data);
    } catch (error) {
        log.warn(`[Discovery] ${path}: identity query failed:`, getErrorMessage(error));
        return null;
    } finally {
        await device.disconnect();
    }
}

export async function listDevices(options: DiscoveryOptions = {}): Promise<DeviceInfo[]> {
    const ports = await (options.list || listPorts)();
    return Promise.all(ports.map(async (port) => ({
        ...port,
        identity: await queryIdentity(port.path, options)
    })));
}

/**
 * Resolver used by SerialDevice when its port disappeared, e.g. after the
 * adapter was re-plugged and enumerated under another name.
 */
export function createPortResolver(options: DiscoveryOptions = {}): PortResolver {
    return async (deviceId: string) => {
        const ports = await (options.list || listPorts)();
        for (const port of ports) {
            const identity = await queryIdentity(port.path, options);
            if (identity === deviceId) {
                return port.path;
            }
        }
        return null;
    };
}
