import { v7 as uuid } from 'uuid';
import type { Span } from '@opentelemetry/api';
import {
    HistoryEvent,
    Registry,
    SerializedError,
    TaskCompletionEvent,
    TaskScheduledEvent,
    deserialize,
    replay,
    serialize,
    serializeError,
} from '@fanflow/sdk';
import { ActivityTimeoutError, NotFoundError } from '../errors';
import { InstanceEntity, RuntimeStatus, isTerminal, runtimeStatus } from '../db/instance.entity';
import { InstanceStore } from '../repositories/instance.repository';
import { HistoryStore } from '../repositories/history.repository';
import { TraceContext, endSpan, startSpan, withSpan } from '../observability/tracing';
import { calculateBackOff } from '../utils/backoff';
import { ActivityDispatcher, ActivityRequest } from './activity-dispatcher';

const TAG = '[engine]';

export interface OrchestrationStatus {
    instanceId: string;
    name: string;
    runtimeStatus: RuntimeStatus;
    input: unknown;
    output: unknown;
    error: SerializedError | null;
    createdTime: Date;
    lastUpdatedTime: Date;
}

export type PurgeResult = 'deleted' | 'not_found' | 'not_terminal';

export interface EngineOptions {
    registry: Registry;
    /** Default per-attempt activity timeout when the call sets none. */
    activityTimeoutMs?: number;
    /** Delay before retry `attempt + 1`. */
    backoff?: (attempt: number) => number;
    sleep?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
const now = () => new Date().toISOString();

/**
 * Drives orchestration instances by replay.
 *
 * Each loop iteration re-runs the orchestration function against the
 * instance's history, appends the new TaskScheduled decisions, dispatches
 * every scheduled task that has no completion and is not yet in flight, then
 * waits for the next completion and appends it. The history is the only
 * state: a resumed instance re-dispatches exactly the tasks that never
 * completed.
 */
export class OrchestrationEngine {
    private readonly registry: Registry;
    private readonly activityTimeoutMs: number;
    private readonly backoff: (attempt: number) => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly active = new Set<string>();

    constructor(
        private readonly instances: InstanceStore,
        private readonly history: HistoryStore,
        private readonly dispatcher: ActivityDispatcher,
        options: EngineOptions,
    ) {
        this.registry = options.registry;
        this.activityTimeoutMs = options.activityTimeoutMs ?? 300_000;
        this.backoff = options.backoff ?? (attempt => calculateBackOff(attempt));
        this.sleep = options.sleep ?? sleep;
    }

    get activeInstances(): number {
        return this.active.size;
    }

    async start(name: string, input: unknown, trace: TraceContext): Promise<string> {
        return withSpan(trace, 'orchestration.start', async (span) => {
            if (!this.registry.getOrchestrator(name)) {
                throw new NotFoundError(
                    `Orchestrator "${name}" not found. Registered: [${this.registry.listOrchestrators().join(', ')}]`,
                );
            }

            const id = uuid();
            await this.instances.create(id, name, serialize(input));
            span.setAttribute('durable.instance_id', id);
            console.log(`${TAG} started instance ${id} (${name})`);
            return id;
        }, { 'function.name': name });
    }

    async status(instanceId: string): Promise<OrchestrationStatus | null> {
        const instance = await this.instances.findById(instanceId);
        if (!instance) return null;

        return {
            instanceId: instance.id,
            name: instance.name,
            runtimeStatus: runtimeStatus[instance.status],
            input: deserialize<unknown>(instance.input),
            output: instance.output === null ? null : deserialize<unknown>(instance.output),
            error: instance.error,
            createdTime: instance.created_at,
            lastUpdatedTime: instance.updated_at,
        };
    }

    /** Deletes a finished instance together with its history. */
    async purge(instanceId: string): Promise<PurgeResult> {
        const instance = await this.instances.findById(instanceId);
        if (!instance) return 'not_found';
        if (!isTerminal(instance.status)) return 'not_terminal';

        await this.instances.delete(instanceId);
        console.log(`${TAG} purged instance ${instanceId}`);
        return 'deleted';
    }

    /**
     * Runs a claimed instance until it completes or fails. Store errors
     * propagate and leave the instance running for the reaper to requeue.
     */
    async run(instance: InstanceEntity, trace: TraceContext): Promise<RuntimeStatus> {
        if (this.active.has(instance.id)) {
            console.warn(`${TAG} instance ${instance.id} is already being driven by this worker`);
            return 'Running';
        }

        this.active.add(instance.id);
        try {
            return await withSpan(
                trace,
                `orchestration ${instance.name}`,
                (span, child) => this.drive(instance, span, child),
                { 'durable.instance_id': instance.id, 'orchestration.name': instance.name, 'orchestration.attempt': instance.retry_count + 1 },
            );
        } finally {
            this.active.delete(instance.id);
        }
    }

    private async drive(instance: InstanceEntity, span: Span, trace: TraceContext): Promise<RuntimeStatus> {
        const { id, name } = instance;
        const orchestration = this.registry.getOrchestrator(name);
        if (!orchestration) {
            const error = serializeError(new NotFoundError(`Orchestrator "${name}" is not registered on this worker`));
            await this.instances.fail(id, error);
            console.error(`${TAG} instance ${id} failed: ${error.message}`);
            return 'Failed';
        }

        const history = await this.history.load(id);

        // finished before a crash, status row not yet updated
        const terminal = history.find(e => e.type === 'ExecutionCompleted' || e.type === 'ExecutionFailed');
        if (terminal?.type === 'ExecutionCompleted') {
            await this.instances.complete(id, terminal.output);
            return 'Completed';
        }
        if (terminal?.type === 'ExecutionFailed') {
            await this.instances.fail(id, terminal.error);
            return 'Failed';
        }

        if (history.length === 0) {
            await this.appendTo(id, history, [{ type: 'ExecutionStarted', name, input: instance.input, timestamp: now() }]);
        } else {
            console.log(`${TAG} resuming instance ${id} from ${history.length} history events`);
        }

        const inFlight = new Map<number, Promise<TaskCompletionEvent>>();

        for (;;) {
            const outcome = await replay(orchestration.handler, { instanceId: id, name }, history);

            if (outcome.decisions.length > 0) {
                const timestamp = now();
                await this.appendTo(id, history, outcome.decisions.map((d): HistoryEvent => ({
                    type: 'TaskScheduled',
                    taskId: d.taskId,
                    name: d.name,
                    input: d.input,
                    options: d.options,
                    timestamp,
                })));
            }

            if (outcome.kind === 'completed') {
                await this.appendTo(id, history, [{ type: 'ExecutionCompleted', output: outcome.output, timestamp: now() }]);
                await this.instances.complete(id, outcome.output);
                span.setAttribute('orchestration.task_count', countScheduled(history));
                span.setAttribute('orchestrator.results', outcome.output);
                console.log(`${TAG} instance ${id} (${name}) completed`);
                return 'Completed';
            }

            if (outcome.kind === 'failed') {
                await this.appendTo(id, history, [{ type: 'ExecutionFailed', error: outcome.error, timestamp: now() }]);
                await this.instances.fail(id, outcome.error);
                span.setAttribute('orchestration.task_count', countScheduled(history));
                console.error(`${TAG} instance ${id} (${name}) failed: ${outcome.error.name}: ${outcome.error.message}`);
                return 'Failed';
            }

            const scheduled = scheduledById(history);
            for (const taskId of outcome.pending) {
                const event = scheduled.get(taskId);
                if (!event) {
                    throw new Error(`instance ${id}: pending task ${taskId} has no TaskScheduled event`);
                }
                if (!inFlight.has(taskId)) {
                    inFlight.set(taskId, this.execute(id, event, trace));
                }
            }

            // fan-in happens inside the orchestration; here we only wait for the next completion
            const completion = await Promise.race(inFlight.values());
            inFlight.delete(completion.taskId);
            await this.appendTo(id, history, [completion]);
        }
    }

    /** Runs every attempt of one task. Never rejects: failures become TaskFailed. */
    private async execute(instanceId: string, event: TaskScheduledEvent, trace: TraceContext): Promise<TaskCompletionEvent> {
        const { span } = startSpan(trace, `activity ${event.name}`, {
            'durable.instance_id': instanceId,
            'activity.task_id': event.taskId,
        });
        const maxAttempts = (event.options.retries ?? 0) + 1;
        const timeoutMs = event.options.timeout ?? this.activityTimeoutMs;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                const result = await this.dispatch(
                    { instanceId, taskId: event.taskId, name: event.name, input: event.input, attempt },
                    timeoutMs,
                );
                span.setAttribute('activity.attempts', attempt);
                endSpan(span);
                return { type: 'TaskCompleted', taskId: event.taskId, result, timestamp: now() };
            } catch (err) {
                lastError = err;
                console.error(
                    `${TAG} instance ${instanceId} task ${event.taskId} (${event.name}) failed (attempt ${attempt}/${maxAttempts}):`,
                    err instanceof Error ? err.message : err,
                );
                if (attempt < maxAttempts) {
                    await this.sleep(this.backoff(attempt));
                }
            }
        }

        span.setAttribute('activity.attempts', maxAttempts);
        endSpan(span, lastError);
        return { type: 'TaskFailed', taskId: event.taskId, error: serializeError(lastError), timestamp: now() };
    }

    private dispatch(request: ActivityRequest, timeoutMs: number): Promise<string> {
        const controller = new AbortController();
        return new Promise<string>((resolve, reject) => {
            const timer = setTimeout(() => {
                controller.abort();
                reject(new ActivityTimeoutError(request.name, timeoutMs));
            }, timeoutMs);

            void this.dispatcher.run(request, controller.signal).then(
                value => {
                    clearTimeout(timer);
                    resolve(value);
                },
                err => {
                    clearTimeout(timer);
                    reject(err);
                },
            );
        });
    }

    private async appendTo(instanceId: string, history: HistoryEvent[], events: HistoryEvent[]): Promise<void> {
        await this.history.append(instanceId, events);
        history.push(...events);
    }
}

function scheduledById(history: HistoryEvent[]): Map<number, TaskScheduledEvent> {
    const scheduled = new Map<number, TaskScheduledEvent>();
    for (const event of history) {
        if (event.type === 'TaskScheduled') scheduled.set(event.taskId, event);
    }
    return scheduled;
}

function countScheduled(history: HistoryEvent[]): number {
    return history.filter(e => e.type === 'TaskScheduled').length;
}
