import { describe, expect, it } from 'vitest';
import { SerialDevice } from '../../src/main/device/SerialDevice';
import { OUTPUT_FIELDS, parseFrame } from '../../src/main/protocols';
import { StepEngine, isCompletedReason, type StepProgress } from '../../src/main/workflow/StepEngine';
import { buildSteps } from '../../src/main/workflow/builder';
import { OUTPUT_END, TRANSFER_END, createFakeBus, frameType, voltagePacket } from '../helpers/fakeLink';

const [output] = buildSteps([{
    type: 'output',
    commandId: 3,
    params: { isSweep: 0, timeStep: 10, sourceVoltage: 0, drainVoltageStart: 0, drainVoltageEnd: 100, drainVoltageStep: 100, gateVoltageList: [-100, 200] }
}], { maxLoopIterations: 10 });

// Echoes the gate voltage of each output scan as the ADC word
function outputBus() {
    return createFakeBus((frame) => {
        if (frameType(frame) !== 3) return undefined;
        const gate = frame.readInt16LE(16 + 3 + 3 * 2);
        return [Buffer.concat([voltagePacket(0, gate & 0xFFFFFF), voltagePacket(100, gate & 0xFFFFFF), OUTPUT_END])];
    });
}

describe('StepEngine', () => {
    it('runs one scan per gate voltage', async () => {
        const bus = outputBus();
        const device = new SerialDevice({ deviceId: 'dev-1', port: '/dev/fake0', pollIntervalMs: 5, linkFactory: bus.factory });
        const progress: StepProgress[] = [];
        const chunks: Buffer[] = [];
        const engine = new StepEngine(device, {
            onProgress: (_step, p) => {
                progress.push(p);
            },
            onData: (_step, chunk) => {
                chunks.push(Buffer.from(chunk));
            }
        });

        const result = await engine.execute(output);

        expect(result.reason).toBe('output');
        expect(isCompletedReason(output, result.reason)).toBe(true);
        expect(bus.writes().map(w => parseFrame(w, OUTPUT_FIELDS).values.gateVoltage)).toEqual([-100, 200]);
        expect(result.curves?.map(c => c.gateVoltage)).toEqual([-100, 200]);
        expect(result.curves?.map(c => c.data.length)).toEqual([10, 10]);
        expect(result.curves?.[1].data).toEqual(Buffer.concat([voltagePacket(0, 200), voltagePacket(100, 200)]));
        expect(result.data.length).toBe(20);
        expect(chunks).toHaveLength(4);
        expect(progress[progress.length - 1]).toEqual({ bytes: 36, expectedBytes: 20, fraction: 1 });
    });

    it('ends an output step when a scan does not complete', async () => {
        const bus = createFakeBus((frame) => (frameType(frame) === 3 ? [Buffer.concat([voltagePacket(0, 1), TRANSFER_END])] : undefined));
        const device = new SerialDevice({ deviceId: 'dev-1', port: '/dev/fake0', pollIntervalMs: 5, linkFactory: bus.factory });
        const engine = new StepEngine(device, {
            onProgress: (_step, p) => {
                if (p.bytes >= 13) device.stop();
            }
        });

        const result = await engine.execute(output);

        expect(result.reason).toBe('stopped');
        expect(result.curves).toHaveLength(1);
        expect(result.curves?.[0].reason).toBe('stopped');
        expect(result.curves?.[0].data).toEqual(voltagePacket(0, 1));
        // One scan frame, then STOP
        expect(bus.writes()).toHaveLength(2);
    });

    it('stamps start and end times from its clock', async () => {
        const bus = outputBus();
        const device = new SerialDevice({ deviceId: 'dev-1', port: '/dev/fake0', pollIntervalMs: 5, linkFactory: bus.factory });
        const times = [new Date('2024-05-01T10:00:00.000Z'), new Date('2024-05-01T10:00:02.500Z')];
        let call = 0;
        const engine = new StepEngine(device, {}, () => times[Math.min(call++, 1)]);

        const result = await engine.execute(output);
        expect(result.startedAt).toBe('2024-05-01T10:00:00.000Z');
        expect(result.endedAt).toBe('2024-05-01T10:00:02.500Z');
    });
});
