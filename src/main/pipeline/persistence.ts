import fs from 'fs';
import path from 'path';
import { SaveError, getErrorMessage } from '../errors';
import log from '../logger';
import { decodeSamples } from '../protocols';
import { csvHeader, outputTable, sampleRows } from './csv';
import type { BoundedQueue } from './queue';
import type { JsonSaveTask, OutputSaveTask, SamplesSaveTask, SaveResultMessage, SaveTask } from './messages';

export interface SaveManagerOptions {
    workers: number;
    biasCurrent: number;
    pollIntervalMs?: number;
    now?: () => number;
}

interface FileState {
    header: string;
    rows: number;
}

export interface SaveStats {
    processed: number;
    failed: number;
    bytesWritten: number;
}

/**
 * Stage C: a pool of workers writing save tasks to disk.
 *
 * Tasks for one path are written in the order they were queued even when
 * several workers pick them up; tasks for different paths run in parallel.
 */
export class DataSaveManager {
    // Files opened for appending: header already on disk, rows so far
    private files = new Map<string, FileState>();
    private lanes = new Map<string, Promise<SaveResultMessage>>();
    private stats: SaveStats = { processed: 0, failed: 0, bytesWritten: 0 };
    private readonly now: () => number;

    constructor(
        private readonly tasks: BoundedQueue<SaveTask>,
        private readonly results: BoundedQueue<SaveResultMessage>,
        private readonly options: SaveManagerOptions
    ) {
        this.now = options.now || Date.now;
    }

    public getStats(): SaveStats {
        return { ...this.stats };
    }

    public async run(signal: AbortSignal): Promise<void> {
        log.info(`[Saver] Starting ${this.options.workers} worker(s)`);
        const workers = Array.from({ length: this.options.workers }, (_, i) => this.worker(i, signal));
        await Promise.all(workers);
        log.info(`[Saver] Stopped. processed=${this.stats.processed} failed=${this.stats.failed}`);
    }

    private async worker(id: number, signal: AbortSignal): Promise<void> {
        const poll = this.options.pollIntervalMs || 50;
        while (!signal.aborted || this.tasks.size > 0) {
            const task = await this.tasks.get(signal.aborted ? 0 : poll);
            if (!task) {
                continue;
            }
            const result = await this.processInOrder(task);
            await this.results.put(result);
        }
        log.debug(`[Saver] worker ${id} exited`);
    }

    public processInOrder(task: SaveTask): Promise<SaveResultMessage> {
        const previous = this.lanes.get(task.filePath);
        const current = previous ? previous.then(() => this.process(task)) : this.process(task);
        this.lanes.set(task.filePath, current);
        return current.then((result) => {
            if (this.lanes.get(task.filePath) === current) {
                this.lanes.delete(task.filePath);
            }
            return result;
        });
    }

    /** Writes one task; never rejects. */
    public async process(task: SaveTask): Promise<SaveResultMessage> {
        try {
            await fs.promises.mkdir(path.dirname(task.filePath), { recursive: true });
            switch (task.kind) {
                case 'samples':
                    await this.writeSamples(task);
                    break;
                case 'output':
                    await this.writeOutput(task);
                    break;
                case 'json':
                    await this.writeJson(task);
                    break;
            }
            this.stats.processed++;
            return { type: 'save_result', testId: task.testId, filePath: task.filePath, status: 'ok', timestamp: this.now() };
        } catch (error) {
            const saveError = error instanceof SaveError ? error : new SaveError(getErrorMessage(error), task.filePath);
            this.stats.failed++;
            log.error(`[Saver] Failed to write ${task.filePath}: ${saveError.message}`);
            return {
                type: 'save_result',
                testId: task.testId,
                filePath: task.filePath,
                status: 'error',
                error: saveError.message,
                timestamp: this.now()
            };
        }
    }

    private async writeSamples(task: SamplesSaveTask): Promise<void> {
        const samples = decodeSamples(Buffer.from(task.data, 'hex'), task.packetSize, task.mode, {
            transimpedanceOhms: task.transimpedanceOhms,
            biasCurrent: this.options.biasCurrent
        });
        const rows = sampleRows(samples);
        const state = task.append ? this.files.get(task.filePath) : undefined;

        if (state) {
            if (rows.length > 0) {
                await this.write(task.filePath, rows.join('\n') + '\n', true);
                state.rows += rows.length;
            }
            return;
        }

        const header = csvHeader(task.mode, task.packetSize);
        await this.write(task.filePath, [header, ...rows].join('\n') + '\n', false);
        if (task.append) {
            this.files.set(task.filePath, { header, rows: rows.length });
        }
    }

    private async writeOutput(task: OutputSaveTask): Promise<void> {
        const curves = task.curves.map(curve => ({
            gateVoltage: curve.gateVoltage,
            samples: decodeSamples(Buffer.from(curve.data, 'hex'), 5, 'output', {
                transimpedanceOhms: task.transimpedanceOhms,
                biasCurrent: this.options.biasCurrent
            })
        }));
        await this.write(task.filePath, outputTable(curves).join('\n') + '\n', false);
    }

    // Written through a temp file so a crash never leaves half a JSON document
    private async writeJson(task: JsonSaveTask): Promise<void> {
        const temp = `${task.filePath}.tmp`;
        await this.write(temp, JSON.stringify(task.content, null, 2), false);
        await fs.promises.rename(temp, task.filePath);

        if (path.basename(task.filePath) === 'test_info.json') {
            const directory = path.dirname(task.filePath);
            await this.settle(directory, task.filePath);
            this.forgetDirectory(directory);
        }
    }

    // Waits for tasks other workers are still writing into `directory`
    private async settle(directory: string, except: string): Promise<void> {
        const pending = [...this.lanes.entries()]
            .filter(([filePath]) => filePath !== except && path.dirname(filePath) === directory)
            .map(([, lane]) => lane);
        await Promise.all(pending);
    }

    private async write(filePath: string, text: string, append: boolean): Promise<void> {
        if (append) {
            await fs.promises.appendFile(filePath, text, 'utf-8');
        } else {
            await fs.promises.writeFile(filePath, text, 'utf-8');
        }
        this.stats.bytesWritten += Buffer.byteLength(text);
    }

    // A finished test will not append again
    private forgetDirectory(directory: string): void {
        for (const filePath of this.files.keys()) {
            if (path.dirname(filePath) === directory) {
                this.files.delete(filePath);
            }
        }
    }

    public trackedFiles(): string[] {
        return [...this.files.keys()];
    }
}
