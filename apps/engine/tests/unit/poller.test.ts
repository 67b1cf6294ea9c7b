import { Poller } from '../../src/services/poller';
import { sleep } from '../helpers/poll';

type Item = { id: string };

describe('Poller', () => {
    let fetch: jest.Mock<Promise<Item[]>, [number]>;
    let onReceived: jest.Mock<Promise<void>, [Item]>;
    let poller: Poller<Item>;

    beforeEach(() => {
        fetch = jest.fn<Promise<Item[]>, [number]>().mockResolvedValue([]);
        onReceived = jest.fn<Promise<void>, [Item]>().mockResolvedValue(undefined);
        poller = new Poller<Item>({ name: 'test', fetch, onReceived, batchSize: 2 });
    });

    afterEach(async () => {
        await poller.stop();
    });

    it('polls again right away when items are found', async () => {
        fetch
            .mockResolvedValueOnce([{ id: 't1' }, { id: 't2' }])
            .mockResolvedValue([]);

        poller.start();
        await sleep(150);

        // first fetch, then one after the 100ms minimum interval
        expect(fetch).toHaveBeenCalledTimes(2);
        expect(fetch).toHaveBeenCalledWith(2);
        expect(onReceived).toHaveBeenCalledWith({ id: 't1' });
        expect(onReceived).toHaveBeenCalledWith({ id: 't2' });
    });

    it('backs off while idle', async () => {
        poller.start();
        await sleep(350);

        // fetches at 0ms, +200ms, then +400ms lands after the window
        expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('respects backpressure', async () => {
        const checkBackpressure = jest.fn().mockReturnValue(true);
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        poller = new Poller<Item>({ name: 'test', fetch, onReceived, checkBackpressure });

        poller.start();
        await sleep(100);

        expect(checkBackpressure).toHaveBeenCalled();
        expect(fetch).not.toHaveBeenCalled();
        warn.mockRestore();
    });

    it('survives a failing fetch and a failing callback', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        fetch
            .mockRejectedValueOnce(new Error('db down'))
            .mockResolvedValueOnce([{ id: 't1' }])
            .mockResolvedValue([]);
        onReceived.mockRejectedValueOnce(new Error('boom'));

        poller.start();
        await sleep(650);

        expect(fetch.mock.calls.length).toBeGreaterThanOrEqual(2);
        expect(onReceived).toHaveBeenCalledWith({ id: 't1' });
        expect(poller.isRunning()).toBe(true);
        error.mockRestore();
    });
});
