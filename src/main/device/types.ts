export interface LinkOptions {
    path: string;
    baudRate: number;
    readChunkSize?: number;
}

/**
 * Byte pipe to one device. The serialport implementation lives in
 * strategies/SerialStrategy; tests plug in an in-process fake.
 */
export interface ISerialLink {
    open(): Promise<void>;
    close(): Promise<void>;
    write(data: Buffer): Promise<void>;
    isOpen(): boolean;
    onData(listener: (chunk: Buffer) => void): void;
    onError(listener: (error: Error) => void): void;
}

export type LinkFactory = (options: LinkOptions) => ISerialLink;

/** Looks up the current port of a device by its identity string. */
export type PortResolver = (deviceId: string) => Promise<string | null>;

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface DeviceStatus {
    deviceId: string;
    port: string;
    baudRate: number;
    state: ConnectionState;
    busy: boolean;
}

export interface ReceiveOptions {
    // Omitted or 0: wait until a terminator or a stop
    timeoutMs?: number;
    packetSize?: number;
    onProgress?: (totalBytes: number, deviceId: string) => void | Promise<void>;
    onData?: (chunk: Buffer, deviceId: string) => void | Promise<void>;
}

/**
 * `reason` is the name of the terminator that ended the response, or one of
 * `timeout`, `stopped`, `error:<message>`.
 */
export interface ReceiveResult {
    data: Buffer | null;
    reason: string;
}

export interface PortInfo {
    path: string;
    manufacturer?: string;
    serialNumber?: string;
    pnpId?: string;
    vendorId?: string;
    productId?: string;
}

export interface DeviceInfo extends PortInfo {
    identity: string | null;
}
