import { SpanKind } from '@opentelemetry/api';
import { TraceContext, withSpan } from '../observability/tracing';
import { LeaderLock } from './leaderelector';
import { DurableQueueBridge } from './queue-bridge';
import { RandomWorkloadGenerator } from './workload-generator';

const TAG = '[scheduler]';

export interface ScheduledJobs {
    /** Absent when no text generator is configured. */
    generator: Pick<RandomWorkloadGenerator, 'runOnce'> | null;
    bridge: Pick<DurableQueueBridge, 'runOnce'>;
}

/** Per-job result of one tick: a count, or null when the job failed or did not run. */
export interface TickResult {
    created: number | null;
    sent: number | null;
}

/**
 * Fixed-interval timer trigger. Only the leader ticks, ticks never overlap,
 * and a failing job is logged without stopping the timer.
 */
export class Scheduler {
    private intervalHandle: NodeJS.Timeout | null = null;
    private ticking = false;

    constructor(
        private readonly jobs: ScheduledJobs,
        private readonly leader: LeaderLock,
        private readonly trace: TraceContext,
        private readonly intervalMs: number = 60_000,
    ) { }

    start(): void {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.intervalHandle = setInterval(() => void this.tick(), this.intervalMs);
        console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);
    }

    async stop(): Promise<void> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leader.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    /** Returns null when skipped: another tick is running or this worker is not the leader. */
    async tick(): Promise<TickResult | null> {
        if (this.ticking) {
            console.warn(`${TAG} previous tick still running, skipping`);
            return null;
        }
        this.ticking = true;

        try {
            let leader: boolean;
            try {
                leader = await this.leader.tryBecomeLeader();
            } catch (err) {
                console.error(`${TAG} leader election failed:`, err);
                return null;
            }
            if (!leader) return null;

            return await withSpan(this.trace, 'timer_trigger', async (span, trace) => {
                const { generator, bridge } = this.jobs;
                const created = generator ? await this.runJob('workload generator', () => generator.runOnce(trace)) : null;
                const sent = await this.runJob('queue bridge', () => bridge.runOnce(trace));
                span.setAttribute('timer.created', created ?? -1);
                span.setAttribute('timer.sent', sent ?? -1);
                return { created, sent };
            }, undefined, SpanKind.INTERNAL);
        } finally {
            this.ticking = false;
        }
    }

    private async runJob(name: string, job: () => Promise<number>): Promise<number | null> {
        try {
            return await job();
        } catch (err) {
            console.error(`${TAG} ${name} failed:`, err);
            return null;
        }
    }
}
