import { InstanceStore } from '../repositories/instance.repository';

/**
 * Keeps heartbeat_at fresh for every instance this worker is driving, so the
 * reaper can tell live instances from ones whose worker died.
 */
export class HeartbeatService {
    private readonly tracked = new Set<string>();
    private intervalHandle: NodeJS.Timeout | null = null;

    constructor(
        private readonly instances: Pick<InstanceStore, 'updateHeartbeat'>,
        private readonly intervalMs: number = 5000,
    ) { }

    start(instanceId: string): void {
        this.tracked.add(instanceId);
        if (!this.intervalHandle) {
            this.intervalHandle = setInterval(() => void this.tick(), this.intervalMs);
            console.log(`[heartbeat] started (interval: ${this.intervalMs}ms)`);
        }
    }

    stop(instanceId: string): void {
        this.tracked.delete(instanceId);
        if (this.tracked.size === 0) this.clear();
    }

    stopAll(): void {
        this.tracked.clear();
        this.clear();
    }

    isTracking(instanceId: string): boolean {
        return this.tracked.has(instanceId);
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    async tick(): Promise<void> {
        if (this.tracked.size === 0) return;
        const ids = Array.from(this.tracked);

        try {
            await this.instances.updateHeartbeat(ids);
        } catch (err) {
            console.error(`[heartbeat] failed to update ${ids.length} instances:`, err);
        }
    }

    private clear(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
            console.log('[heartbeat] stopped');
        }
    }
}
