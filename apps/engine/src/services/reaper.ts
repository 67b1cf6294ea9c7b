import { InstanceStore, ReapedInstance } from '../repositories/instance.repository';
import { LeaderLock } from './leaderelector';

const TAG = '[reaper]';

// Recovers instances whose worker stopped heartbeating. Only the leader reaps,
// so the cluster can't double-requeue the same instance. Requeued instances
// resume by replaying their history.
export class Reaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly instances: Pick<InstanceStore, 'requeueStale' | 'failExhausted'>,
        private readonly leader: LeaderLock,
        private readonly staleThresholdSeconds = 300,
        private readonly intervalMs = 10_000,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);

        // Fire immediately, then on schedule
        void this.tick();
        this.intervalHandle = setInterval(() => void this.tick(), this.intervalMs);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        await this.leader.releaseLeadership();
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    /** Reaps when this worker holds (or wins) the leader lock. */
    async tick(): Promise<ReapedInstance[]> {
        try {
            if (!(await this.leader.tryBecomeLeader())) return [];
        } catch (err) {
            console.error(`${TAG} leader election failed:`, err);
            return [];
        }
        return this.reap();
    }

    async reap(): Promise<ReapedInstance[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        const reaped: ReapedInstance[] = [];

        try {
            reaped.push(...await this.instances.requeueStale(this.staleThresholdSeconds));
            reaped.push(...await this.instances.failExhausted(this.staleThresholdSeconds));

            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} instances: ${reaped.map(i => `${i.id}(${i.action})`).join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }

        return reaped;
    }
}
