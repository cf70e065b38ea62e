import { SyncError, SyncTimeoutError } from '../errors';
import log from '../logger';

interface Waiter {
    resume: () => void;
    abandon: (error: Error) => void;
}

interface Barrier {
    ready: Set<string>;
    waiters: Map<string, Waiter>;
}

interface Batch {
    // testId -> deviceId
    participants: Map<string, string>;
    barriers: Map<string, Barrier>;
}

/**
 * Rendezvous barriers for tests that must run matching steps in lockstep.
 *
 * Every participant is expected to call `wait` for every key, in the same
 * order. A participant that never arrives holds the batch until it calls
 * `leave` or, when `timeoutMs` is set, until the wait times out.
 */
export class SyncCoordinator {
    private batches = new Map<string, Batch>();

    constructor(private readonly timeoutMs: number = 0) {}

    public register(batchId: string, testId: string, deviceId: string): void {
        let batch = this.batches.get(batchId);
        if (!batch) {
            batch = { participants: new Map(), barriers: new Map() };
            this.batches.set(batchId, batch);
        }
        batch.participants.set(testId, deviceId);
        log.info(`[Sync] ${testId} (${deviceId}) joined batch ${batchId} (${batch.participants.size} participant(s))`);
    }

    public participants(batchId: string): string[] {
        return [...(this.batches.get(batchId)?.participants.keys() ?? [])];
    }

    /**
     * Resolves once every registered participant of the batch has called
     * `wait` with this exact key.
     */
    public wait(batchId: string, testId: string, key: string): Promise<void> {
        const batch = this.batches.get(batchId);
        if (!batch || !batch.participants.has(testId)) {
            return Promise.reject(new SyncError(`${testId} is not registered in batch ${batchId}`, { batchId, testId, key }));
        }

        let barrier = batch.barriers.get(key);
        if (!barrier) {
            barrier = { ready: new Set(), waiters: new Map() };
            batch.barriers.set(key, barrier);
        }
        const current = barrier;

        return new Promise<void>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;
            current.ready.add(testId);
            current.waiters.set(testId, {
                resume: () => {
                    if (timer) clearTimeout(timer);
                    resolve();
                },
                abandon: (error) => {
                    if (timer) clearTimeout(timer);
                    reject(error);
                }
            });

            if (this.timeoutMs > 0) {
                timer = setTimeout(() => {
                    current.ready.delete(testId);
                    current.waiters.delete(testId);
                    log.error(`[Sync] ${testId} timed out waiting for "${key}" in batch ${batchId}`);
                    reject(new SyncTimeoutError(batchId, key, this.timeoutMs));
                }, this.timeoutMs);
            }

            this.release(batch, key);
        });
    }

    /**
     * Removes a participant (finished, stopped or failed) and releases any
     * barrier that was only waiting for it. A wait the participant itself
     * still has pending is rejected.
     */
    public leave(batchId: string, testId: string): void {
        const batch = this.batches.get(batchId);
        if (!batch || !batch.participants.delete(testId)) {
            return;
        }
        log.info(`[Sync] ${testId} left batch ${batchId}`);
        for (const [key, barrier] of batch.barriers) {
            const own = barrier.waiters.get(testId);
            barrier.ready.delete(testId);
            barrier.waiters.delete(testId);
            if (own) {
                own.abandon(new SyncError(`${testId} left batch ${batchId} while waiting for "${key}"`, { batchId, testId, key }));
            }
            this.release(batch, key);
        }
        if (batch.participants.size === 0) {
            this.batches.delete(batchId);
        }
    }

    private release(batch: Batch, key: string): void {
        const barrier = batch.barriers.get(key);
        if (!barrier || barrier.waiters.size === 0) {
            return;
        }
        for (const testId of batch.participants.keys()) {
            if (!barrier.ready.has(testId)) {
                return;
            }
        }
        batch.barriers.delete(key);
        barrier.waiters.forEach(waiter => waiter.resume());
    }
}
