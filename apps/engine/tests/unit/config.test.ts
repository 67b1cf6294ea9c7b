import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({ WORKER_ID: 'worker-test' });

        expect(config).toMatchObject({
            port: 7071,
            publicBaseUrl: null,
            redisUrl: 'redis://localhost:6379',
            workerId: 'worker-test',
            workItemsTable: 'work_items',
            queueName: 'work-items',
            maxDequeueCount: 5,
            messagesPerTick: 10,
            timerIntervalMs: 60_000,
            enrichmentEnabled: true,
            activityMode: 'workers',
            activityTimeoutMs: 300_000,
            modules: [],
            reaperStale: 300,
            reaperInterval: 10_000,
            leaderTtlSeconds: 30,
        });
        expect(config.openai).toEqual({
            endpoint: undefined,
            deployment: 'gpt-4o-mini',
            apiVersion: '2024-06-01',
            apiKey: undefined,
        });
    });

    it('generates a worker id when none is set', () => {
        expect(loadConfig({}).workerId).toMatch(/^worker-[0-9a-f]{8}$/);
    });

    it('reads overrides', () => {
        const config = loadConfig({
            PORT: '8080',
            PUBLIC_BASE_URL: 'https://flows.example.test//',
            MESSAGES_PER_TICK: '3',
            ENRICHMENT_ENABLED: 'false',
            ACTIVITY_MODE: 'inline',
            FANFLOW_MODULES: ' ./a.js , ,./b.js',
            AZURE_OPENAI_API_KEY: 'test-secret',
        });

        expect(config.port).toBe(8080);
        expect(config.publicBaseUrl).toBe('https://flows.example.test');
        expect(config.messagesPerTick).toBe(3);
        expect(config.enrichmentEnabled).toBe(false);
        expect(config.activityMode).toBe('inline');
        expect(config.modules).toEqual(['./a.js', './b.js']);
        expect(config.openai.apiKey).toBe('test-secret');
    });

    it('rejects a non-integer number', () => {
        expect(() => loadConfig({ MAX_DEQUEUE_COUNT: 'five' })).toThrow('MAX_DEQUEUE_COUNT: expected an integer, got "five"');
    });

    it('rejects trailing garbage after the digits', () => {
        expect(() => loadConfig({ MESSAGES_PER_TICK: '10abc' })).toThrow('MESSAGES_PER_TICK: expected an integer, got "10abc"');
        expect(() => loadConfig({ PORT: '7071.5' })).toThrow('PORT: expected an integer, got "7071.5"');
    });

    it('rejects negative counts and non-positive intervals', () => {
        expect(() => loadConfig({ MESSAGES_PER_TICK: '-1' })).toThrow('MESSAGES_PER_TICK must be at least 0, got -1');
        expect(() => loadConfig({ TIMER_INTERVAL_MS: '-60000' })).toThrow('TIMER_INTERVAL_MS must be at least 1, got -60000');
        expect(() => loadConfig({ TIMER_INTERVAL_MS: '0' })).toThrow('TIMER_INTERVAL_MS must be at least 1, got 0');
        expect(() => loadConfig({ MAX_DEQUEUE_COUNT: '0' })).toThrow('MAX_DEQUEUE_COUNT must be at least 1, got 0');
    });

    it('accepts zero messages per tick and surrounding whitespace', () => {
        const config = loadConfig({ MESSAGES_PER_TICK: '0', TIMER_INTERVAL_MS: ' 500 ' });

        expect(config.messagesPerTick).toBe(0);
        expect(config.timerIntervalMs).toBe(500);
    });

    it('rejects an unsafe table name', () => {
        expect(() => loadConfig({ WORK_ITEMS_TABLE: 'items; drop table x' }))
            .toThrow('WORK_ITEMS_TABLE "items; drop table x" is not a valid table name');
    });

    it('rejects an unknown activity mode', () => {
        expect(() => loadConfig({ ACTIVITY_MODE: 'threads' })).toThrow('ACTIVITY_MODE must be "workers" or "inline", got "threads"');
    });
});
