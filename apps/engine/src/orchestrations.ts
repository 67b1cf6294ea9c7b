import { activity, orchestrator } from '@fanflow/sdk';
import { heavyComputation, DEFAULT_MATRIX_SIZE, MAX_MATRIX_SIZE } from './activities/heavy-computation';
import { hello } from './activities/hello';
import { calculatePrimes } from './activities/calculate-primes';

// upper bound on tasks scheduled by one orchestration run; inputs come from HTTP bodies
export const MAX_FAN_OUT = 1000;

function readCount(input: unknown, key: string, fallback: number, max: number): number {
    if (typeof input !== 'object' || input === null) return fallback;
    const value: unknown = Reflect.get(input, key);
    if (typeof value !== 'number') return fallback;
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new RangeError(`${key} must be an integer between 0 and ${max}, got ${value}`);
    }
    return value;
}

export const heavyComputationActivity = activity('heavy_computation', (input) => heavyComputation(input));
export const helloActivity = activity('hello', (city) => hello(city));
export const calculatePrimesActivity = activity('calculate_primes', (limit) => calculatePrimes(limit));

// Fans out `tasks` heavy computations (default 20) and returns every result,
// failures included.
export const helloOrchestrator = orchestrator('hello_orchestrator', async (ctx) => {
    const count = readCount(ctx.input, 'tasks', 20, MAX_FAN_OUT);
    const size = readCount(ctx.input, 'size', DEFAULT_MATRIX_SIZE, MAX_MATRIX_SIZE);

    const tasks = Array.from({ length: count }, () => ctx.callActivity<number>('heavy_computation', { size }));
    return ctx.taskAll(tasks);
});

export const helloCities = orchestrator('hello_cities', async (ctx) => {
    const count = readCount(ctx.input, 'cities', 10, MAX_FAN_OUT);
    const tasks = Array.from({ length: count }, (_, i) => ctx.callActivity<string>('hello', `City ${i + 1}`));
    const results = await ctx.taskAll(tasks);
    return results.map(r => (r.ok ? r.value : `failed: ${r.error.message}`));
});

export const primeCounts = orchestrator('prime_counts', async (ctx) => {
    const limits = [1_000, 10_000, 100_000];
    const tasks = limits.map(limit => ctx.callActivity<number[]>('calculate_primes', limit, { retries: 1 }));
    const results = await ctx.taskAll(tasks);
    return results.map((r, i) => ({ limit: limits[i], count: r.ok ? r.value.length : null }));
});
