import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    DEFAULT_CORE_CONFIG,
    effectiveBiasCurrent,
    effectiveTransimpedance,
    loadCoreConfig,
    resolveCoreConfig,
    saveCoreConfig
} from '../src/main/config';

let dir: string;

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'oect-config-'));
});

afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
});

describe('config', () => {
    it('has the documented defaults', () => {
        expect(DEFAULT_CORE_CONFIG.serial).toEqual({ baudRate: 512000, readChunkSize: 4096, pollIntervalMs: 100, identityTimeoutMs: 3000 });
        expect(DEFAULT_CORE_CONFIG.buffer).toEqual({ flushPacketCount: 15, flushIntervalMs: 80 });
        expect(DEFAULT_CORE_CONFIG.save).toEqual({ rootDir: path.join('UserData', 'AutoSave'), workers: 4, incrementalIntervalMs: 2000 });
        expect(DEFAULT_CORE_CONFIG.sync.timeoutMs).toBe(0);
        expect(effectiveBiasCurrent(DEFAULT_CORE_CONFIG)).toBe(-1.2868e-6);
    });

    it('fills partial overrides with defaults', () => {
        const config = resolveCoreConfig({ serial: { baudRate: 115200 }, biasCurrent: { enabled: false } });
        expect(config.serial.baudRate).toBe(115200);
        expect(config.serial.pollIntervalMs).toBe(100);
        expect(effectiveBiasCurrent(config)).toBe(0);
    });

    it('round-trips through a file', () => {
        const file = path.join(dir, 'oect-config.json');
        const config = resolveCoreConfig({ queue: { capacity: 50 } });
        saveCoreConfig(config, file);
        expect(loadCoreConfig(file)).toEqual(config);
    });

    it('falls back to defaults for missing or invalid files', () => {
        expect(loadCoreConfig(path.join(dir, 'absent.json'))).toEqual(DEFAULT_CORE_CONFIG);

        const file = path.join(dir, 'bad.json');
        fs.writeFileSync(file, JSON.stringify({ serial: { baudRate: -1 } }));
        expect(loadCoreConfig(file)).toEqual(DEFAULT_CORE_CONFIG);

        fs.writeFileSync(file, '{');
        expect(loadCoreConfig(file)).toEqual(DEFAULT_CORE_CONFIG);
    });

    it('uses 100 ohm when the transimpedance is unusable', () => {
        expect(effectiveTransimpedance(undefined)).toBe(100);
        expect(effectiveTransimpedance(0)).toBe(100);
        expect(effectiveTransimpedance(-5)).toBe(100);
        expect(effectiveTransimpedance(Number.NaN)).toBe(100);
        expect(effectiveTransimpedance(1000)).toBe(1000);
    });
});
