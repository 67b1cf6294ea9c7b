import { SerializedError } from './utils/serialization';

export interface ActivityOptions {
    /** Extra attempts after the first failure. */
    retries?: number;
    /** Milliseconds before the attempt is aborted. */
    timeout?: number;
}

// Inputs, results and outputs are superjson strings so that replay can
// compare them byte for byte.
export type HistoryEvent =
    | { type: 'ExecutionStarted'; name: string; input: string; timestamp: string }
    | { type: 'TaskScheduled'; taskId: number; name: string; input: string; options: ActivityOptions; timestamp: string }
    | { type: 'TaskCompleted'; taskId: number; result: string; timestamp: string }
    | { type: 'TaskFailed'; taskId: number; error: SerializedError; timestamp: string }
    | { type: 'ExecutionCompleted'; output: string; timestamp: string }
    | { type: 'ExecutionFailed'; error: SerializedError; timestamp: string };

export type HistoryEventType = HistoryEvent['type'];

export type TaskScheduledEvent = Extract<HistoryEvent, { type: 'TaskScheduled' }>;
export type TaskCompletionEvent = Extract<HistoryEvent, { type: 'TaskCompleted' | 'TaskFailed' }>;

export function isTaskCompletion(event: HistoryEvent): event is TaskCompletionEvent {
    return event.type === 'TaskCompleted' || event.type === 'TaskFailed';
}

/** Scheduled tasks that have no completion event yet, in dispatch order. */
export function pendingTasks(history: HistoryEvent[]): TaskScheduledEvent[] {
    const done = new Set<number>();
    for (const event of history) {
        if (isTaskCompletion(event)) done.add(event.taskId);
    }
    return history.filter((e): e is TaskScheduledEvent => e.type === 'TaskScheduled' && !done.has(e.taskId));
}
