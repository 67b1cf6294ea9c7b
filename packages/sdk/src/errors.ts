import { SerializedError } from './utils/serialization';

/**
 * Raised when a replayed orchestration takes a different path than the one
 * recorded in its history.
 */
export class NonDeterminismError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NonDeterminismError';
    }
}

/** Rejection value of an awaited activity task whose history entry is a failure. */
export class ActivityFailedError extends Error {
    constructor(
        public readonly taskId: number,
        public readonly activityName: string,
        public readonly failure: SerializedError,
    ) {
        super(`Activity "${activityName}" (task ${taskId}) failed: ${failure.message}`);
        this.name = 'ActivityFailedError';
    }
}
