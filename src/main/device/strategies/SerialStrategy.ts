import fs from 'fs';
import { SerialPort } from 'serialport';
import type { ISerialLink, LinkOptions } from '../types';

export class SerialStrategy implements ISerialLink {
    private port: SerialPort | null = null;
    private dataListeners: Array<(chunk: Buffer) => void> = [];
    private errorListeners: Array<(error: Error) => void> = [];

    constructor(private readonly options: LinkOptions) {}

    async open(): Promise<void> {
        if (this.port && this.port.isOpen) {
            return;
        }
        await this.checkAccess();

        return new Promise((resolve, reject) => {
            const port = new SerialPort({
                path: this.options.path,
                baudRate: this.options.baudRate,
                highWaterMark: this.options.readChunkSize,
                autoOpen: false
            });

            port.on('data', (chunk: Buffer) => {
                this.dataListeners.forEach(listener => listener(chunk));
            });
            port.on('error', (err: Error) => {
                this.errorListeners.forEach(listener => listener(err));
            });

            port.open((err) => {
                if (err) {
                    reject(err);
                } else {
                    this.port = port;
                    resolve();
                }
            });
        });
    }

    async close(): Promise<void> {
        const port = this.port;
        this.port = null;
        return new Promise((resolve, reject) => {
            if (port && port.isOpen) {
                port.close((err) => {
                    if (err) reject(err);
                    else resolve();
                });
            } else {
                resolve();
            }
        });
    }

    async write(data: Buffer): Promise<void> {
        const port = this.port;
        return new Promise((resolve, reject) => {
            if (!port || !port.isOpen) {
                return reject(new Error('Serial port not open'));
            }
            port.write(data, (err) => {
                if (err) reject(err);
                else {
                    port.drain((drainErr) => {
                        if (drainErr) reject(drainErr);
                        else resolve();
                    });
                }
            });
        });
    }

    isOpen(): boolean {
        return !!this.port && this.port.isOpen;
    }

    onData(listener: (chunk: Buffer) => void): void {
        this.dataListeners.push(listener);
    }

    onError(listener: (error: Error) => void): void {
        this.errorListeners.push(listener);
    }

    // COM ports are not files; on POSIX a missing device node or missing
    // dialout membership surfaces here as ENOENT / EACCES.
    private async checkAccess(): Promise<void> {
        if (process.platform === 'win32') {
            return;
        }
        await fs.promises.access(this.options.path, fs.constants.R_OK | fs.constants.W_OK);
    }
}

export const createSerialLink = (options: LinkOptions): ISerialLink => new SerialStrategy(options);
