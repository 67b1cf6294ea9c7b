import IORedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { LeaderElector } from '../../src/services/leaderelector';

describe('LeaderElector', () => {
    let redis: Redis;
    const key = 'fanflow:reaper:leader';
    const electors: LeaderElector[] = [];

    function elector(workerId: string): LeaderElector {
        const e = new LeaderElector(redis, key, workerId, 30);
        electors.push(e);
        return e;
    }

    beforeEach(async () => {
        redis = new IORedisMock() as unknown as Redis;
        await redis.flushall();
    });

    afterEach(async () => {
        for (const e of electors.splice(0)) await e.releaseLeadership();
        redis.disconnect();
    });

    it('elects a leader when key is empty', async () => {
        const won = await elector('worker-1').tryBecomeLeader();

        expect(won).toBe(true);
        expect(await redis.get(key)).toBe('worker-1');
    });

    it('denies leadership if key exists', async () => {
        await redis.set(key, 'other-worker');

        expect(await elector('worker-1').tryBecomeLeader()).toBe(false);
        expect(await redis.get(key)).toBe('other-worker');
    });

    it('stays leader on later attempts', async () => {
        const e = elector('worker-1');
        await e.tryBecomeLeader();

        expect(await e.tryBecomeLeader()).toBe(true);
        expect(await e.isLeader()).toBe(true);
    });

    it('sets a TTL on the lock', async () => {
        await elector('worker-1').tryBecomeLeader();

        const ttl = await redis.ttl(key);
        expect(ttl).toBeGreaterThan(0);
        expect(ttl).toBeLessThanOrEqual(30);
    });

    it('release only deletes its own lock', async () => {
        const mine = elector('worker-1');
        await mine.tryBecomeLeader();
        await mine.releaseLeadership();
        expect(await redis.get(key)).toBeNull();

        await redis.set(key, 'other-worker');
        await mine.releaseLeadership();
        expect(await redis.get(key)).toBe('other-worker');
    });
});
