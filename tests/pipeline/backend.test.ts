import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveCoreConfig } from '../../src/main/config';
import { TestHistory } from '../../src/main/history/database';
import { Backend } from '../../src/main/pipeline/backend';
import type { ResultMessage } from '../../src/main/pipeline/messages';
import { TRANSFER_END, createFakeBus, frameType, voltagePacket } from '../helpers/fakeLink';

let root: string;

beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'oect-backend-'));
});

afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
});

describe('Backend', () => {
    it('runs a test end to end and leaves its files on disk', async () => {
        const bus = createFakeBus((frame) => (frameType(frame) === 1
            ? [Buffer.concat([voltagePacket(500, 0x400000), voltagePacket(-300, 0xC00000), TRANSFER_END])]
            : undefined));
        const config = resolveCoreConfig({
            biasCurrent: { enabled: false },
            serial: { pollIntervalMs: 5 },
            save: { rootDir: root, workers: 2 }
        });
        const history = new TestHistory(':memory:');
        const backend = new Backend(config, { linkFactory: bus.factory, history, clock: () => new Date(2024, 0, 2, 3, 4, 5) });

        const devices: string[] = [];
        backend.events.on('device', (m) => devices.push(m.status));
        const result = new Promise<ResultMessage>((resolve) => backend.events.on('result', resolve));

        backend.start();
        expect(backend.isRunning()).toBe(true);
        const started = await backend.startWorkflow({
            testId: 't-1',
            deviceId: 'dev-1',
            port: '/dev/fake0',
            steps: [{
                type: 'transfer',
                params: { isSweep: 0, timeStep: 10, sourceVoltage: 0, drainVoltage: 100, gateVoltageStart: -300, gateVoltageEnd: 500, gateVoltageStep: 800 }
            }]
        });
        const message = await result;
        await backend.manager.waitForTest(started.testId);
        await backend.shutdown();

        const dir = path.join(root, 'dev-1', '20240102-030405_transfer_t-1');
        expect(started.directory).toBe(dir);
        expect(message.status).toBe('completed');
        expect(devices).toEqual(['connected', 'disconnected']);
        expect(fs.readFileSync(path.join(dir, '1_transfer.csv'), 'utf-8')).toBe('Vg,Id\n0.500,-0.01024\n-0.300,0.01024\n');
        const info: unknown = JSON.parse(fs.readFileSync(path.join(dir, 'test_info.json'), 'utf-8'));
        expect(info).toMatchObject({ test_id: 't-1', status: 'completed', summary: { completed_steps: 1, total_steps: 1 } });
        expect(fs.existsSync(path.join(dir, 'workflow.json'))).toBe(true);
        expect(history.get('t-1')).toMatchObject({ status: 'completed', directory: dir, completedSteps: 1 });
        expect(backend.isRunning()).toBe(false);
        history.close();
    });
});
