import { globalRegistry } from '@fanflow/sdk';
import '../../src/orchestrations';
import { OrchestrationEngine } from '../../src/services/orchestration-engine';
import { InlineActivityDispatcher } from '../../src/services/activity-dispatcher';
import { MemoryHistoryStore, MemoryInstanceStore, testTrace } from '../helpers/memory-stores';

describe('built-in orchestrations', () => {
    let instances: MemoryInstanceStore;
    let engine: OrchestrationEngine;
    let log: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        instances = new MemoryInstanceStore();
        engine = new OrchestrationEngine(instances, new MemoryHistoryStore(), new InlineActivityDispatcher(globalRegistry), {
            registry: globalRegistry,
        });
    });

    afterEach(() => {
        log.mockRestore();
    });

    async function run(name: string, input: unknown): Promise<unknown> {
        const id = await engine.start(name, input, testTrace());
        const [claimed] = await instances.dequeue(1, 'worker-1');
        expect(await engine.run(claimed, testTrace())).toBe('Completed');
        return (await engine.status(id))?.output;
    }

    it('registers every built-in', () => {
        expect(globalRegistry.listOrchestrators()).toEqual(['hello_orchestrator', 'hello_cities', 'prime_counts']);
        expect(globalRegistry.listActivities()).toEqual(['heavy_computation', 'hello', 'calculate_primes']);
    });

    it('hello_orchestrator returns one successful result per task', async () => {
        const output = await run('hello_orchestrator', { tasks: 4, size: 2 });

        expect(Array.isArray(output)).toBe(true);
        expect(output).toHaveLength(4);
        expect(output).toEqual([0, 1, 2, 3].map(taskId => expect.objectContaining({ taskId, ok: true, value: expect.any(Number) })));
    });

    it('hello_cities greets every city in order', async () => {
        expect(await run('hello_cities', { cities: 3 })).toEqual(['Hello City 1', 'Hello City 2', 'Hello City 3']);
    });

    it.each([
        ['hello_orchestrator', { tasks: 1_000_000 }, 'tasks must be an integer between 0 and 1000, got 1000000'],
        ['hello_orchestrator', { tasks: 2, size: 50_000 }, 'size must be an integer between 0 and 1000, got 50000'],
        ['hello_cities', { cities: -3 }, 'cities must be an integer between 0 and 1000, got -3'],
    ])('%s fails without scheduling work for %j', async (name, input, message) => {
        const id = await engine.start(name, input, testTrace());
        const [claimed] = await instances.dequeue(1, 'worker-1');

        expect(await engine.run(claimed, testTrace())).toBe('Failed');
        expect((await engine.status(id))?.error).toEqual(expect.objectContaining({ name: 'RangeError', message }));
    });

    it('prime_counts counts primes per limit', async () => {
        expect(await run('prime_counts', null)).toEqual([
            { limit: 1_000, count: 168 },
            { limit: 10_000, count: 1_229 },
            { limit: 100_000, count: 9_592 },
        ]);
    });
});
