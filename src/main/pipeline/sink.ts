import type { BoundedQueue } from './queue';
import type {
    DataMessage,
    DeviceStatusMessage,
    DriverMessage,
    ErrorMessage,
    Payload,
    ProgressMessage,
    ResultMessage,
    SaveTask
} from './messages';

/**
 * Outbound side of the driver stage. Each call resolves once the message is
 * queued, so a full queue slows the producer down.
 */
export interface DataSink {
    sendProgress(message: Payload<ProgressMessage>): Promise<void>;
    sendData(message: Payload<DataMessage>): Promise<void>;
    sendResult(message: Payload<ResultMessage>): Promise<void>;
    sendError(message: Payload<ErrorMessage>): Promise<void>;
    sendDeviceStatus(message: Payload<DeviceStatusMessage>): Promise<void>;
    save(task: SaveTask): Promise<void>;
}

export class QueueDataSink implements DataSink {
    constructor(
        private readonly queue: BoundedQueue<DriverMessage>,
        private readonly now: () => number = Date.now
    ) {}

    sendProgress(message: Payload<ProgressMessage>): Promise<void> {
        return this.queue.put({ ...message, type: 'test_progress', timestamp: this.now() });
    }

    sendData(message: Payload<DataMessage>): Promise<void> {
        return this.queue.put({ ...message, type: 'test_data', timestamp: this.now() });
    }

    sendResult(message: Payload<ResultMessage>): Promise<void> {
        return this.queue.put({ ...message, type: 'test_result', timestamp: this.now() });
    }

    sendError(message: Payload<ErrorMessage>): Promise<void> {
        return this.queue.put({ ...message, type: 'test_error', timestamp: this.now() });
    }

    sendDeviceStatus(message: Payload<DeviceStatusMessage>): Promise<void> {
        return this.queue.put({ ...message, type: 'device_status', timestamp: this.now() });
    }

    save(task: SaveTask): Promise<void> {
        return this.queue.put({ type: 'save_data', task, timestamp: this.now() });
    }
}
