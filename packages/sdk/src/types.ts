import { ActivityOptions } from './history';
import { SerializedError } from './utils/serialization';

export type ActivityTaskResult<T = unknown> =
    | { taskId: number; ok: true; value: T }
    | { taskId: number; ok: false; error: SerializedError };

/**
 * Handle to one dispatched activity. Awaiting it resolves with the activity's
 * value or rejects with `ActivityFailedError`; while the activity has no
 * recorded completion the await never settles.
 */
export interface ActivityTask<T = unknown> extends PromiseLike<T> {
    readonly taskId: number;
    readonly name: string;
}

export interface OrchestrationContext {
    instanceId: string;
    name: string;
    input: unknown;
    /** Timestamp of the ExecutionStarted event, identical on every replay. */
    startedAt: Date;
    callActivity<T = unknown>(name: string, input?: unknown, options?: ActivityOptions): ActivityTask<T>;
    /** Fan-in: waits for every task, successful or not, and returns one result per task in order. */
    taskAll<T = unknown>(tasks: ActivityTask<T>[]): Promise<ActivityTaskResult<T>[]>;
    newGuid(): string;
}

export type OrchestratorHandler = (ctx: OrchestrationContext) => Promise<unknown>;

export interface ActivityInfo {
    instanceId: string;
    taskId: number;
    attempt: number;
}

export type ActivityHandler = (input: unknown, info: ActivityInfo) => Promise<unknown> | unknown;
