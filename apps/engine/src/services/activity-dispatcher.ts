import path from 'path';
import os from 'os';
import Piscina from 'piscina';
import { Registry, deserialize, serialize } from '@fanflow/sdk';
import { NotFoundError } from '../errors';

export interface ActivityRequest {
    instanceId: string;
    taskId: number;
    name: string;
    /** superjson-encoded input */
    input: string;
    attempt: number;
}

/** Runs one activity attempt and resolves with its superjson-encoded result. */
export interface ActivityDispatcher {
    run(request: ActivityRequest, signal?: AbortSignal): Promise<string>;
    readonly queueSize: number;
    destroy(): Promise<void>;
}

export async function executeActivity(registry: Registry, request: ActivityRequest): Promise<string> {
    const activity = registry.getActivity(request.name);
    if (!activity) {
        throw new NotFoundError(`Activity "${request.name}" not found. Registered: [${registry.listActivities().join(', ')}]`);
    }
    const result = await activity.handler(deserialize<unknown>(request.input), {
        instanceId: request.instanceId,
        taskId: request.taskId,
        attempt: request.attempt,
    });
    return serialize(result);
}

/** Runs activities on the engine's own event loop. */
export class InlineActivityDispatcher implements ActivityDispatcher {
    private pending = 0;

    constructor(private readonly registry: Registry) { }

    async run(request: ActivityRequest): Promise<string> {
        this.pending++;
        try {
            return await executeActivity(this.registry, request);
        } finally {
            this.pending--;
        }
    }

    get queueSize(): number {
        return this.pending;
    }

    async destroy(): Promise<void> { }
}

export interface WorkerPoolOptions {
    /** Extra orchestration/activity modules each worker thread loads. */
    modules: string[];
    maxThreads?: number;
}

/** Runs activities on a piscina worker-thread pool. */
export class PiscinaActivityDispatcher implements ActivityDispatcher {
    private readonly pool: Piscina;

    constructor(options: WorkerPoolOptions) {
        const isTs = path.extname(__filename) === '.ts';
        const workerPath = path.resolve(__dirname, `../workers/activity.worker${isTs ? '.ts' : '.js'}`);
        const cpuCount = os.cpus().length;
        const maxThreads = options.maxThreads ?? Math.max(2, cpuCount - 1);

        this.pool = new Piscina({
            filename: workerPath,
            execArgv: isTs ? ['--import', 'tsx'] : [],
            maxThreads,
            minThreads: 1,
            maxQueue: 10000,
            idleTimeout: 30000,
            env: {
                ...process.env,
                FANFLOW_MODULES: options.modules.join(','),
            },
        });

        console.log(`[dispatcher] piscina pool: ${maxThreads} threads, maxQueue=10000`);
    }

    async run(request: ActivityRequest, signal?: AbortSignal): Promise<string> {
        const result: unknown = await this.pool.run(request, { signal });
        if (typeof result !== 'string') {
            throw new TypeError(`activity worker returned ${typeof result} instead of a serialized result`);
        }
        return result;
    }

    get queueSize(): number {
        return this.pool.queueSize;
    }

    async destroy(): Promise<void> {
        await this.pool.destroy();
        console.log('[dispatcher] pool destroyed');
    }
}
