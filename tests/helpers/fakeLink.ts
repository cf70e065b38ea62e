import type { ISerialLink, LinkFactory, LinkOptions } from '../../src/main/device/types';

/**
 * Reply to one written frame: chunks emitted one by one on later ticks, or
 * nothing.
 */
export type Responder = (frame: Buffer, link: FakeLink) => Buffer[] | void;

export class FakeLink implements ISerialLink {
    public writes: Buffer[] = [];
    public closed = 0;
    private open_ = false;
    private dataListeners: Array<(chunk: Buffer) => void> = [];
    private errorListeners: Array<(error: Error) => void> = [];

    constructor(
        readonly options: LinkOptions,
        private readonly responder?: Responder,
        private readonly openError?: Error
    ) {}

    async open(): Promise<void> {
        if (this.openError) {
            throw this.openError;
        }
        this.open_ = true;
    }

    async close(): Promise<void> {
        this.open_ = false;
        this.closed++;
    }

    async write(data: Buffer): Promise<void> {
        if (!this.open_) {
            throw new Error('Port is not open');
        }
        this.writes.push(Buffer.from(data));
        const chunks = this.responder ? this.responder(data, this) : undefined;
        if (chunks && chunks.length > 0) {
            this.emitLater(chunks);
        }
    }

    isOpen(): boolean {
        return this.open_;
    }

    onData(listener: (chunk: Buffer) => void): void {
        this.dataListeners.push(listener);
    }

    onError(listener: (error: Error) => void): void {
        this.errorListeners.push(listener);
    }

    emit(chunk: Buffer): void {
        this.dataListeners.forEach(l => l(chunk));
    }

    fail(error: Error): void {
        this.errorListeners.forEach(l => l(error));
    }

    emitLater(chunks: Buffer[]): void {
        const [first, ...rest] = chunks;
        setImmediate(() => {
            this.emit(first);
            if (rest.length > 0) this.emitLater(rest);
        });
    }
}

export interface FakeBus {
    factory: LinkFactory;
    links: FakeLink[];
    // Every frame written to any link, in order
    writes(): Buffer[];
}

/**
 * Link factory over in-process fakes. `openErrors` makes opening the named
 * paths fail with the given error.
 */
export function createFakeBus(responder?: Responder, openErrors: Record<string, Error> = {}): FakeBus {
    const links: FakeLink[] = [];
    return {
        links,
        factory: (options) => {
            const link = new FakeLink(options, responder, openErrors[options.path]);
            links.push(link);
            return link;
        },
        writes: () => links.flatMap(l => l.writes)
    };
}

export function systemError(message: string, code: string): Error {
    return Object.assign(new Error(message), { code });
}

/** Frame type byte of a command frame (after the 16-byte pad and FF header). */
export function frameType(frame: Buffer): number {
    return frame.length > 17 ? frame[17] : -1;
}

export function isStopFrame(frame: Buffer): boolean {
    return frame.equals(Buffer.from([0xFF, 0x03, 0x01, 0x00, 0xFE]));
}

export const hex = (text: string): Buffer => Buffer.from(text.replace(/\s+/g, ''), 'hex');

/** 5-byte voltage packet: LE16 mV followed by a big-endian 24-bit ADC word. */
export function voltagePacket(mv: number, adc: number): Buffer {
    const packet = Buffer.alloc(5);
    packet.writeInt16LE(mv, 0);
    packet.writeUIntBE(adc, 2, 3);
    return packet;
}

/** 7-byte transient packet: LE32 ms followed by the ADC word. */
export function transientPacket(ms: number, adc: number): Buffer {
    const packet = Buffer.alloc(7);
    packet.writeInt32LE(ms, 0);
    packet.writeUIntBE(adc, 4, 3);
    return packet;
}

export const TRANSFER_END = hex('FFFFFFFFFFFFFFFF');
export const TRANSIENT_END = hex('FEFEFEFEFEFEFEFE');
export const OUTPUT_END = hex('CDABEFCDABEFCDAB');
