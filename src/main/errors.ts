// Error classes shared by the transport, workflow and pipeline layers.
// Every class carries a stable `code` so stage loops can report failures
// over the message queues without shipping the Error object itself.

export class OectError extends Error {
    readonly code: string;
    readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'OectError';
        this.code = code;
        if (context !== undefined) {
            this.context = context;
        }
        if (typeof Error.captureStackTrace === 'function') {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

// --- Connection ---

export class ConnectionError extends OectError {
    readonly port?: string;

    constructor(message: string, port?: string, code = 'CONNECTION_ERROR') {
        super(message, code, { port });
        this.name = 'ConnectionError';
        if (port !== undefined) {
            this.port = port;
        }
    }

    static permissionDenied(port: string): ConnectionError {
        const hint = process.platform === 'win32'
            ? 'close any other program using the port'
            : 'add the current user to the dialout (or uucp) group, or run: sudo chmod a+rw ' + port;
        return new ConnectionError(`Permission denied for ${port}: ${hint}`, port, 'PERMISSION_DENIED');
    }

    static portNotFound(port: string): ConnectionError {
        return new ConnectionError(`Serial port ${port} not found`, port, 'PORT_NOT_FOUND');
    }
}

export class NotConnectedError extends ConnectionError {
    constructor(deviceId: string) {
        super(`Device ${deviceId} is not connected`, undefined, 'NOT_CONNECTED');
        this.name = 'NotConnectedError';
    }
}

/**
 * Raised when a command is issued while another one is still in flight on the
 * same device. Callers back off; commands are never queued.
 */
export class DeviceBusyError extends OectError {
    readonly deviceId: string;

    constructor(deviceId: string) {
        super(`Device ${deviceId} is busy`, 'DEVICE_BUSY', { deviceId });
        this.name = 'DeviceBusyError';
        this.deviceId = deviceId;
    }
}

// --- Protocol ---

export class ProtocolError extends OectError {
    constructor(message: string, context?: Record<string, unknown>, code = 'PROTOCOL_ERROR') {
        super(message, code, context);
        this.name = 'ProtocolError';
    }
}

export class MissingParameterError extends ProtocolError {
    readonly parameter: string;

    constructor(stepType: string, parameter: string) {
        super(`Missing required parameter "${parameter}" for ${stepType} command`, { stepType, parameter }, 'MISSING_PARAMETER');
        this.name = 'MissingParameterError';
        this.parameter = parameter;
    }
}

export class ParameterRangeError extends ProtocolError {
    readonly parameter: string;
    readonly value: unknown;

    constructor(parameter: string, value: unknown, min = -32768, max = 32767) {
        super(
            `Parameter "${parameter}" must be an integer in [${min}, ${max}], got ${String(value)}`,
            { parameter, value, min, max },
            'PARAMETER_RANGE'
        );
        this.name = 'ParameterRangeError';
        this.parameter = parameter;
        this.value = value;
    }
}

export class DecodeError extends OectError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'DECODE_ERROR', context);
        this.name = 'DecodeError';
    }
}

// --- Persistence ---

export class SaveError extends OectError {
    readonly filePath: string;

    constructor(message: string, filePath: string) {
        super(message, 'SAVE_ERROR', { filePath });
        this.name = 'SaveError';
        this.filePath = filePath;
    }
}

// --- Synchronisation ---

export class SyncError extends OectError {
    constructor(message: string, context?: Record<string, unknown>, code = 'SYNC_ERROR') {
        super(message, code, context);
        this.name = 'SyncError';
    }
}

export class SyncTimeoutError extends SyncError {
    readonly batchId: string;
    readonly key: string;

    constructor(batchId: string, key: string, timeoutMs: number) {
        super(`Batch ${batchId} did not reach "${key}" within ${timeoutMs}ms`, { batchId, key, timeoutMs }, 'SYNC_TIMEOUT');
        this.name = 'SyncTimeoutError';
        this.batchId = batchId;
        this.key = key;
    }
}

// --- Configuration ---

export class ConfigurationError extends OectError {
    constructor(message: string, context?: Record<string, unknown>, code = 'CONFIG_ERROR') {
        super(message, code, context);
        this.name = 'ConfigurationError';
    }
}

export class WorkflowValidationError extends ConfigurationError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid workflow: ${issues.join('; ')}`, { issues }, 'WORKFLOW_INVALID');
        this.name = 'WorkflowValidationError';
        this.issues = issues;
    }
}

// --- Guards & helpers ---

export function isOectError(error: unknown): error is OectError {
    return error instanceof OectError;
}

export function isConnectionError(error: unknown): error is ConnectionError {
    return error instanceof ConnectionError;
}

export function isProtocolError(error: unknown): error is ProtocolError {
    return error instanceof ProtocolError;
}

/**
 * Wraps an unknown thrown value in an OectError, keeping OectErrors as they are.
 */
export function wrapError(error: unknown, defaultMessage = 'An unknown error occurred'): OectError {
    if (isOectError(error)) {
        return error;
    }
    if (error instanceof Error) {
        return new OectError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
    }
    return new OectError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Reads the `code` property Node attaches to system errors (ENOENT, EACCES, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
