export class ActivityTimeoutError extends Error {
    constructor(
        public readonly activityName: string,
        public readonly timeoutMs: number,
    ) {
        super(`Activity "${activityName}" timed out after ${timeoutMs}ms`);
        this.name = 'ActivityTimeoutError';
    }
}
