/**
 * A store, queue or dispatch dependency was temporarily unavailable.
 * Never retried locally: the queue redelivers, the reaper requeues.
 */
export class TransientHostError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransientHostError';
    }
}
