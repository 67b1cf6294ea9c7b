import { Scheduler } from '../../src/services/scheduler';
import { LeaderLock } from '../../src/services/leaderelector';
import { TraceContext } from '../../src/observability/tracing';
import { testTrace } from '../helpers/memory-stores';

function fakeLeader(leader: boolean): jest.Mocked<LeaderLock> {
    return {
        tryBecomeLeader: jest.fn().mockResolvedValue(leader),
        releaseLeadership: jest.fn().mockResolvedValue(undefined),
        isLeader: jest.fn().mockResolvedValue(leader),
    };
}

describe('Scheduler', () => {
    let generator: { runOnce: jest.Mock<Promise<number>, [TraceContext]> };
    let bridge: { runOnce: jest.Mock<Promise<number>, [TraceContext]> };
    let error: jest.SpyInstance;

    beforeEach(() => {
        generator = { runOnce: jest.fn<Promise<number>, [TraceContext]>().mockResolvedValue(10) };
        bridge = { runOnce: jest.fn<Promise<number>, [TraceContext]>().mockResolvedValue(10) };
        error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        error.mockRestore();
    });

    it('runs the generator, then the bridge', async () => {
        const order: string[] = [];
        generator.runOnce.mockImplementation(async () => { order.push('generator'); return 3; });
        bridge.runOnce.mockImplementation(async () => { order.push('bridge'); return 3; });
        const scheduler = new Scheduler({ generator, bridge }, fakeLeader(true), testTrace());

        expect(await scheduler.tick()).toEqual({ created: 3, sent: 3 });
        expect(order).toEqual(['generator', 'bridge']);
    });

    it('skips the tick when not leader', async () => {
        const scheduler = new Scheduler({ generator, bridge }, fakeLeader(false), testTrace());

        expect(await scheduler.tick()).toBeNull();
        expect(generator.runOnce).not.toHaveBeenCalled();
        expect(bridge.runOnce).not.toHaveBeenCalled();
    });

    it('still runs the bridge when the generator fails', async () => {
        generator.runOnce.mockRejectedValueOnce(new Error('quota exceeded'));
        const scheduler = new Scheduler({ generator, bridge }, fakeLeader(true), testTrace());

        expect(await scheduler.tick()).toEqual({ created: null, sent: 10 });
        expect(error).toHaveBeenCalledWith('[scheduler] workload generator failed:', expect.any(Error));
    });

    it('keeps ticking after a failed bridge run', async () => {
        bridge.runOnce.mockRejectedValueOnce(new Error('redis down'));
        const scheduler = new Scheduler({ generator, bridge }, fakeLeader(true), testTrace());

        expect(await scheduler.tick()).toEqual({ created: 10, sent: null });
        expect(await scheduler.tick()).toEqual({ created: 10, sent: 10 });
    });

    it('runs only the bridge without a generator', async () => {
        const scheduler = new Scheduler({ generator: null, bridge }, fakeLeader(true), testTrace());

        expect(await scheduler.tick()).toEqual({ created: null, sent: 10 });
    });

    it('never overlaps ticks', async () => {
        let release: () => void = () => undefined;
        bridge.runOnce.mockImplementationOnce(() => new Promise<number>(resolve => {
            release = () => resolve(1);
        }));
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const scheduler = new Scheduler({ generator: null, bridge }, fakeLeader(true), testTrace());

        const first = scheduler.tick();
        await new Promise(resolve => setImmediate(resolve));
        expect(await scheduler.tick()).toBeNull();

        release();
        expect(await first).toEqual({ created: null, sent: 1 });
        expect(bridge.runOnce).toHaveBeenCalledTimes(1);
        warn.mockRestore();
    });

    it('ticks on its interval and releases leadership on stop', async () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const leader = fakeLeader(true);
        const scheduler = new Scheduler({ generator: null, bridge }, leader, testTrace(), 20);

        scheduler.start();
        await new Promise(resolve => setTimeout(resolve, 70));
        await scheduler.stop();

        expect(bridge.runOnce.mock.calls.length).toBeGreaterThanOrEqual(2);
        expect(leader.releaseLeadership).toHaveBeenCalled();
        log.mockRestore();
    });
});
