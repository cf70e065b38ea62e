import type { SerialDevice } from '../device/SerialDevice';
import type { ReceiveResult } from '../device/types';
import { stripTerminator } from '../protocols';
import { buildCommand, expectedTotalBytes, packetSizeOf, scanCount, terminatorOf } from './steps';
import type { OutputStep, Step } from './types';

export interface StepProgress {
    bytes: number;
    expectedBytes: number;
    // 0..1, capped
    fraction: number;
}

/**
 * Hooks the engine calls while a step streams. Supplied once per engine,
 * so every step run by it reports the same way.
 */
export interface StepCallbacks {
    onProgress?(step: Step, progress: StepProgress): void | Promise<void>;
    onData?(step: Step, chunk: Buffer): void | Promise<void>;
}

export interface OutputCurve {
    gateVoltage: number;
    // Terminator already removed
    data: Buffer;
    reason: string;
}

export interface StepResult {
    data: Buffer;
    reason: string;
    startedAt: string;
    endedAt: string;
    curves?: OutputCurve[];
}

/**
 * A step's run ended normally when it stopped on its own terminator.
 */
export function isCompletedReason(step: Step, reason: string): boolean {
    return reason === step.type;
}

export class StepEngine {
    constructor(
        private readonly device: SerialDevice,
        private readonly callbacks: StepCallbacks = {},
        private readonly clock: () => Date = () => new Date()
    ) {}

    public async execute(step: Step): Promise<StepResult> {
        const startedAt = this.clock().toISOString();
        switch (step.type) {
            case 'transfer':
            case 'transient': {
                const result = await this.scan(step, buildCommand(step), 0);
                return {
                    data: result.data ?? Buffer.alloc(0),
                    reason: result.reason,
                    startedAt,
                    endedAt: this.clock().toISOString()
                };
            }
            case 'output':
                return this.executeOutput(step, startedAt);
        }
    }

    // One output scan per gate voltage; a scan that does not end on the
    // output terminator ends the step.
    private async executeOutput(step: OutputStep, startedAt: string): Promise<StepResult> {
        const curves: OutputCurve[] = [];
        let offset = 0;
        let reason: string = step.type;

        for (let i = 0; i < scanCount(step); i++) {
            if (this.device.isStopRequested()) {
                reason = 'stopped';
                break;
            }
            const result = await this.scan(step, buildCommand(step, i), offset);
            const raw = result.data ?? Buffer.alloc(0);
            offset += raw.length;
            curves.push({
                gateVoltage: step.params.gateVoltageList[i],
                data: stripTerminator(raw),
                reason: result.reason
            });
            if (!isCompletedReason(step, result.reason)) {
                reason = result.reason;
                break;
            }
        }

        return {
            data: Buffer.concat(curves.map(c => c.data)),
            reason,
            startedAt,
            endedAt: this.clock().toISOString(),
            curves
        };
    }

    private scan(step: Step, command: Buffer, offset: number): Promise<ReceiveResult> {
        const expectedBytes = expectedTotalBytes(step);
        const { onProgress, onData } = this.callbacks;
        return this.device.sendAndReceiveUntil(command, { [step.type]: terminatorOf(step) }, {
            packetSize: packetSizeOf(step),
            onProgress: onProgress
                ? (bytes) => onProgress(step, {
                    bytes: offset + bytes,
                    expectedBytes,
                    fraction: expectedBytes > 0 ? Math.min((offset + bytes) / expectedBytes, 1) : 0
                })
                : undefined,
            onData: onData ? (chunk) => onData(step, chunk) : undefined
        });
    }
}
