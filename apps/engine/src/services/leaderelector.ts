import { Redis } from 'ioredis';

export interface LeaderLock {
    tryBecomeLeader(): Promise<boolean>;
    releaseLeadership(): Promise<void>;
    isLeader(): Promise<boolean>;
}

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

export class LeaderElector implements LeaderLock {
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private readonly redis: Redis,
        private readonly key: string,
        private readonly workerId: string,
        private readonly ttlSeconds: number = 30,
    ) { }

    async tryBecomeLeader(): Promise<boolean> {
        // SET NX with TTL - atomic operation
        const result = await this.redis.set(this.key, this.workerId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // Already the leader (renewal keeps the key alive)
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.workerId;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.workerId);
    }

    async isLeader(): Promise<boolean> {
        const currentLeader = await this.redis.get(this.key);
        return currentLeader === this.workerId;
    }

    private startRenewal(): void {
        this.stopRenewal();
        // Renew at half the TTL
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => void this.renew(), renewalMs);
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renew(): Promise<void> {
        try {
            const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.workerId, this.ttlSeconds);
            if (result !== 1) {
                console.warn(`[leader] lost leadership of ${this.key}`);
                this.stopRenewal();
            }
        } catch (error) {
            console.error(`[leader] lock renewal failed for ${this.key}:`, error);
        }
    }
}
