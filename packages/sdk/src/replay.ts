import { v5 as uuidv5 } from 'uuid';
import { ActivityFailedError, NonDeterminismError } from './errors';
import { ActivityOptions, HistoryEvent, TaskCompletionEvent, TaskScheduledEvent, isTaskCompletion } from './history';
import { ActivityTask, ActivityTaskResult, OrchestrationContext, OrchestratorHandler } from './types';
import { SerializedError, deserialize, serialize, serializeError } from './utils/serialization';

const GUID_NAMESPACE = '6f1c2a9e-3d4b-4e8a-9b7c-5a2d1e0f8c63';

export interface ReplayInfo {
    instanceId: string;
    name: string;
}

export interface ScheduleDecision {
    taskId: number;
    name: string;
    input: string;
    options: ActivityOptions;
}

export type ReplayOutcome =
    | { kind: 'blocked'; decisions: ScheduleDecision[]; pending: number[] }
    | { kind: 'completed'; decisions: ScheduleDecision[]; output: string }
    | { kind: 'failed'; decisions: ScheduleDecision[]; error: SerializedError };

type Settled = { ok: true; output: unknown } | { ok: false; error: unknown };

class ReplayTask<T> implements ActivityTask<T> {
    constructor(
        readonly taskId: number,
        readonly name: string,
        private readonly completion: TaskCompletionEvent | undefined,
    ) { }

    result(): ActivityTaskResult<T> | undefined {
        if (!this.completion) return undefined;
        if (this.completion.type === 'TaskCompleted') {
            return { taskId: this.taskId, ok: true, value: deserialize<T>(this.completion.result) };
        }
        return { taskId: this.taskId, ok: false, error: this.completion.error };
    }

    then<R1 = T, R2 = never>(
        onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
        onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
    ): PromiseLike<R1 | R2> {
        return this.settle().then(onfulfilled, onrejected);
    }

    private settle(): Promise<T> {
        const result = this.result();
        // no completion recorded yet: the orchestration stays suspended here
        if (!result) return new Promise<T>(() => { });
        if (result.ok) return Promise.resolve(result.value);
        return Promise.reject(new ActivityFailedError(this.taskId, this.name, result.error));
    }
}

const macrotaskBoundary = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Runs one episode of an orchestration against its recorded history.
 *
 * The handler is re-executed from the start. Calls whose slot already has a
 * TaskScheduled event are matched against it; calls past the end of the
 * history become new decisions. Orchestration code may only await activity
 * tasks, so once the microtask queue has drained the handler has either
 * settled or is suspended on a task with no completion.
 */
export async function replay(
    handler: OrchestratorHandler,
    info: ReplayInfo,
    history: HistoryEvent[],
): Promise<ReplayOutcome> {
    const started = history.find(e => e.type === 'ExecutionStarted');
    if (!started || started.type !== 'ExecutionStarted') {
        throw new Error(`history of instance ${info.instanceId} has no ExecutionStarted event`);
    }

    const scheduled = new Map<number, TaskScheduledEvent>();
    const completions = new Map<number, TaskCompletionEvent>();
    for (const event of history) {
        if (event.type === 'TaskScheduled') scheduled.set(event.taskId, event);
        else if (isTaskCompletion(event)) completions.set(event.taskId, event);
    }

    const decisions: ScheduleDecision[] = [];
    let violation: NonDeterminismError | undefined;
    let nextTaskId = 0;
    let guidCounter = 0;

    const ctx: OrchestrationContext = {
        instanceId: info.instanceId,
        name: info.name,
        input: deserialize<unknown>(started.input),
        startedAt: new Date(started.timestamp),

        callActivity<T>(name: string, input?: unknown, options?: ActivityOptions): ActivityTask<T> {
            const taskId = nextTaskId++;
            const serializedInput = serialize(input);
            const recorded = scheduled.get(taskId);

            if (recorded) {
                if (recorded.name !== name || recorded.input !== serializedInput) {
                    violation ??= new NonDeterminismError(
                        `task ${taskId} was recorded as "${recorded.name}" with input ${recorded.input}, replay asked for "${name}" with input ${serializedInput}`,
                    );
                }
            } else {
                decisions.push({ taskId, name, input: serializedInput, options: options ?? {} });
            }

            return new ReplayTask<T>(taskId, name, completions.get(taskId));
        },

        taskAll<T>(tasks: ActivityTask<T>[]): Promise<ActivityTaskResult<T>[]> {
            const results: ActivityTaskResult<T>[] = [];
            for (const task of tasks) {
                if (!(task instanceof ReplayTask)) {
                    return Promise.reject(new TypeError('taskAll only accepts tasks returned by callActivity'));
                }
                const result: ActivityTaskResult<T> | undefined = task.result();
                if (!result) return new Promise<ActivityTaskResult<T>[]>(() => { });
                results.push(result);
            }
            return Promise.resolve(results);
        },

        newGuid(): string {
            return uuidv5(`${info.instanceId}:${guidCounter++}`, GUID_NAMESPACE);
        },
    };

    const state: { settled?: Settled } = {};
    const execution = Promise.resolve()
        .then(() => handler(ctx))
        .then(
            output => { state.settled = { ok: true, output }; },
            error => { state.settled = { ok: false, error }; },
        );

    await Promise.race([execution, macrotaskBoundary()]);

    for (const taskId of scheduled.keys()) {
        if (taskId >= nextTaskId) {
            violation ??= new NonDeterminismError(
                `history has task ${taskId} ("${scheduled.get(taskId)?.name}") but replay only reached ${nextTaskId} tasks`,
            );
        }
    }
    if (violation) {
        return { kind: 'failed', decisions, error: serializeError(violation) };
    }

    const settled = state.settled;
    if (settled && settled.ok) {
        try {
            return { kind: 'completed', decisions, output: serialize(settled.output) };
        } catch (err) {
            return { kind: 'failed', decisions, error: serializeError(err) };
        }
    }
    if (settled) {
        return { kind: 'failed', decisions, error: serializeError(settled.error) };
    }

    const pending: number[] = [];
    for (let taskId = 0; taskId < nextTaskId; taskId++) {
        if (!completions.has(taskId)) pending.push(taskId);
    }
    if (pending.length === 0) {
        const error = new NonDeterminismError('orchestration is suspended on something other than an activity task');
        return { kind: 'failed', decisions, error: serializeError(error) };
    }
    return { kind: 'blocked', decisions, pending };
}
