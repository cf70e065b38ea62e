import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SaveResultMessage, SaveTask } from '../../src/main/pipeline/messages';
import { DataSaveManager } from '../../src/main/pipeline/persistence';
import { BoundedQueue } from '../../src/main/pipeline/queue';
import { bytesToHex } from '../../src/main/protocols';
import { OUTPUT_END, TRANSFER_END, TRANSIENT_END, transientPacket, voltagePacket } from '../helpers/fakeLink';

let root: string;

beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'oect-save-'));
});

afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
});

function manager(biasCurrent = 0) {
    const tasks = new BoundedQueue<SaveTask>(100);
    const results = new BoundedQueue<SaveResultMessage>(100);
    const saver = new DataSaveManager(tasks, results, { workers: 2, biasCurrent, pollIntervalMs: 5, now: () => 42 });
    return { tasks, results, saver };
}

const read = (file: string) => fs.readFileSync(file, 'utf-8');

describe('DataSaveManager', () => {
    it('decodes transfer data into CSV', async () => {
        const { saver } = manager();
        const file = path.join(root, 'dev-1', 'run', '1_transfer.csv');
        const result = await saver.process({
            kind: 'samples',
            testId: 't-1',
            filePath: file,
            mode: 'transfer',
            packetSize: 5,
            data: bytesToHex(Buffer.concat([voltagePacket(500, 0x400000), voltagePacket(-300, 0xC00000), TRANSFER_END])),
            append: false,
            transimpedanceOhms: 100
        });

        expect(result).toEqual({ type: 'save_result', testId: 't-1', filePath: file, status: 'ok', timestamp: 42 });
        expect(read(file)).toBe('Vg,Id\n0.500,-0.01024\n-0.300,0.01024\n');
    });

    it('applies the bias current', async () => {
        const { saver } = manager(-1.2868e-6);
        const file = path.join(root, 'bias.csv');
        await saver.process({
            kind: 'samples',
            testId: 't-1',
            filePath: file,
            mode: 'transfer',
            packetSize: 5,
            data: bytesToHex(voltagePacket(500, 0x400000)),
            append: false,
            transimpedanceOhms: 100
        });
        expect(read(file)).toBe('Vg,Id\n0.500,-0.0102387\n');
    });

    it('appends streamed chunks under one header', async () => {
        const { saver } = manager();
        const file = path.join(root, '1_transient.csv');
        const task = (data: Buffer): SaveTask => ({
            kind: 'samples',
            testId: 't-1',
            filePath: file,
            mode: 'transient',
            packetSize: 7,
            data: bytesToHex(data),
            append: true,
            transimpedanceOhms: 100
        });

        await Promise.all([
            saver.processInOrder(task(transientPacket(0, 0))),
            saver.processInOrder(task(transientPacket(1000, 0xC00000))),
            saver.processInOrder(task(Buffer.concat([transientPacket(2000, 0x400000), TRANSIENT_END])))
        ]);

        expect(read(file)).toBe('Time,Id\n0.000,0\n1.000,0.01024\n2.000,-0.01024\n');
        expect(saver.trackedFiles()).toEqual([file]);
    });

    it('forgets appended files once the test info is written', async () => {
        const { saver } = manager();
        const dir = path.join(root, 'run');
        const csv = path.join(dir, '1_transient.csv');
        await saver.process({
            kind: 'samples', testId: 't-1', filePath: csv, mode: 'transient', packetSize: 7,
            data: bytesToHex(transientPacket(0, 0)), append: true, transimpedanceOhms: 100
        });
        await saver.process({ kind: 'json', testId: 't-1', filePath: path.join(dir, 'test_info_temp.json'), content: { status: 'running' } });
        expect(saver.trackedFiles()).toEqual([csv]);

        await saver.process({ kind: 'json', testId: 't-1', filePath: path.join(dir, 'test_info.json'), content: { status: 'completed' } });
        expect(saver.trackedFiles()).toEqual([]);
        expect(JSON.parse(read(path.join(dir, 'test_info.json')))).toEqual({ status: 'completed' });
        expect(fs.readdirSync(dir).sort()).toEqual(['1_transient.csv', 'test_info.json', 'test_info_temp.json']);
    });

    it('keeps appending while the test info is written by another worker', async () => {
        // Sample writes start late, so the test info finishes first
        class LateSaver extends DataSaveManager {
            public override async process(task: SaveTask): Promise<SaveResultMessage> {
                if (task.kind === 'samples') {
                    await new Promise(resolve => setTimeout(resolve, 30));
                }
                return super.process(task);
            }
        }
        const saver = new LateSaver(new BoundedQueue<SaveTask>(10), new BoundedQueue<SaveResultMessage>(10), { workers: 2, biasCurrent: 0 });
        const dir = path.join(root, 'run');
        const csv = path.join(dir, '1_transient.csv');
        const append = (data: Buffer): SaveTask => ({
            kind: 'samples', testId: 't-1', filePath: csv, mode: 'transient', packetSize: 7,
            data: bytesToHex(data), append: true, transimpedanceOhms: 100
        });

        await saver.processInOrder(append(transientPacket(0, 0)));
        const results = await Promise.all([
            saver.processInOrder(append(transientPacket(1000, 0xC00000))),
            saver.processInOrder({ kind: 'json', testId: 't-1', filePath: path.join(dir, 'test_info.json'), content: { status: 'completed' } })
        ]);

        expect(results.map(r => r.status)).toEqual(['ok', 'ok']);
        expect(read(csv)).toBe('Time,Id\n0.000,0\n1.000,0.01024\n');
        expect(saver.trackedFiles()).toEqual([]);
    });

    it('writes output curves as one table', async () => {
        const { saver } = manager();
        const file = path.join(root, '2_output.csv');
        await saver.process({
            kind: 'output',
            testId: 't-1',
            filePath: file,
            curves: [
                { gateVoltage: -100, data: bytesToHex(Buffer.concat([voltagePacket(0, 0), voltagePacket(100, 0x400000), OUTPUT_END])) },
                { gateVoltage: 200, data: bytesToHex(voltagePacket(0, 0xC00000)) }
            ],
            transimpedanceOhms: 100
        });
        expect(read(file)).toBe('Vd,Id(Vg=-100mV),Id(Vg=200mV)\n0.000,0,0.01024\n0.100,-0.01024,\n');
    });

    it('reports write failures instead of throwing', async () => {
        const { saver } = manager();
        const blocker = path.join(root, 'not-a-dir');
        fs.writeFileSync(blocker, 'x');
        const result = await saver.process({ kind: 'json', testId: 't-1', filePath: path.join(blocker, 'test_info.json'), content: {} });

        expect(result.status).toBe('error');
        expect(result.error).toBeTruthy();
        expect(saver.getStats()).toMatchObject({ processed: 0, failed: 1 });
    });

    it('works through the task queue until aborted', async () => {
        const { tasks, results, saver } = manager();
        const controller = new AbortController();
        const running = saver.run(controller.signal);

        const files = ['a.json', 'b.json', 'c.json'].map(name => path.join(root, name));
        for (const filePath of files) {
            await tasks.put({ kind: 'json', testId: 't-1', filePath, content: { name: path.basename(filePath) } });
        }
        const acknowledged: string[] = [];
        while (acknowledged.length < files.length) {
            const result = await results.get(1000);
            if (result) acknowledged.push(result.filePath);
        }
        controller.abort();
        await running;

        expect(acknowledged.sort()).toEqual(files);
        expect(saver.getStats().processed).toBe(3);
        expect(JSON.parse(read(files[1]))).toEqual({ name: 'b.json' });
    });
});
