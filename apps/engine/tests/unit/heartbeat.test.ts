import { HeartbeatService } from '../../src/services/heartbeat.service';
import { sleep } from '../helpers/poll';

describe('HeartbeatService', () => {
    let updateHeartbeat: jest.Mock<Promise<void>, [string[]]>;
    let heartbeat: HeartbeatService;

    beforeEach(() => {
        updateHeartbeat = jest.fn<Promise<void>, [string[]]>().mockResolvedValue(undefined);
        heartbeat = new HeartbeatService({ updateHeartbeat }, 50);
    });

    afterEach(() => {
        heartbeat.stopAll();
    });

    it('refreshes every tracked instance in one call', async () => {
        heartbeat.start('i-1');
        heartbeat.start('i-2');
        await heartbeat.tick();

        expect(updateHeartbeat).toHaveBeenCalledWith(['i-1', 'i-2']);
    });

    it('ticks on its interval while something is tracked', async () => {
        heartbeat.start('i-1');
        expect(heartbeat.isRunning()).toBe(true);
        await sleep(130);

        expect(updateHeartbeat).toHaveBeenCalledWith(['i-1']);
        expect(updateHeartbeat.mock.calls.length).toBeGreaterThanOrEqual(1);
    });

    it('drops stopped instances and clears the interval when none remain', async () => {
        heartbeat.start('i-1');
        heartbeat.start('i-2');
        heartbeat.stop('i-1');
        expect(heartbeat.isTracking('i-1')).toBe(false);

        await heartbeat.tick();
        expect(updateHeartbeat).toHaveBeenLastCalledWith(['i-2']);

        heartbeat.stop('i-2');
        expect(heartbeat.isRunning()).toBe(false);
    });

    it('stopAll stops everything', async () => {
        heartbeat.start('t1');
        heartbeat.start('t2');
        heartbeat.stopAll();

        await sleep(100);
        expect(updateHeartbeat).not.toHaveBeenCalled();
        expect(heartbeat.isRunning()).toBe(false);
    });

    it('keeps going when the store write fails', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        updateHeartbeat.mockRejectedValueOnce(new Error('db down'));
        heartbeat.start('i-1');

        await expect(heartbeat.tick()).resolves.toBeUndefined();
        expect(error).toHaveBeenCalled();
        error.mockRestore();
    });
});
