import { v7 as uuid } from 'uuid';

export type ActivityMode = 'workers' | 'inline';

export interface EngineConfig {
    port: number;
    publicBaseUrl: string | null;
    databaseUrl: string | undefined;
    redisUrl: string;
    workerId: string;

    workItemsTable: string;
    queueName: string;
    maxDequeueCount: number;
    messagesPerTick: number;
    timerIntervalMs: number;
    enrichmentEnabled: boolean;

    openai: {
        endpoint: string | undefined;
        deployment: string;
        apiVersion: string;
        apiKey: string | undefined;
    };

    activityMode: ActivityMode;
    activityTimeoutMs: number;
    modules: string[];

    reaperStale: number;
    reaperInterval: number;
    leaderTtlSeconds: number;
    maxQueueSize: number;
    maxEventLoopLag: number;
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

// whole decimal numbers only; parseInt alone would take "10abc" as 10
function int(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
    const value = env[name];
    if (value === undefined || value.trim() === '') return fallback;
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) {
        throw new Error(`${name}: expected an integer, got "${value}"`);
    }
    const parsed = Number(trimmed);
    if (parsed < min) {
        throw new Error(`${name} must be at least ${min}, got ${parsed}`);
    }
    return parsed;
}

function bool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const workItemsTable = env.WORK_ITEMS_TABLE || 'work_items';
    if (!TABLE_NAME_PATTERN.test(workItemsTable)) {
        throw new Error(`WORK_ITEMS_TABLE "${workItemsTable}" is not a valid table name`);
    }

    const activityMode = env.ACTIVITY_MODE || 'workers';
    if (activityMode !== 'workers' && activityMode !== 'inline') {
        throw new Error(`ACTIVITY_MODE must be "workers" or "inline", got "${activityMode}"`);
    }

    return {
        port: int(env, 'PORT', 7071),
        publicBaseUrl: env.PUBLIC_BASE_URL?.replace(/\/+$/, '') || null,
        databaseUrl: env.DATABASE_URL,
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        workerId: env.WORKER_ID || `worker-${uuid().slice(0, 8)}`,

        workItemsTable,
        queueName: env.QUEUE_NAME || 'work-items',
        maxDequeueCount: int(env, 'MAX_DEQUEUE_COUNT', 5, 1),
        messagesPerTick: int(env, 'MESSAGES_PER_TICK', 10),
        timerIntervalMs: int(env, 'TIMER_INTERVAL_MS', 60_000, 1),
        enrichmentEnabled: bool(env.ENRICHMENT_ENABLED, true),

        openai: {
            endpoint: env.AZURE_OPENAI_ENDPOINT,
            deployment: env.AZURE_OPENAI_DEPLOYMENT || 'gpt-4o-mini',
            apiVersion: env.AZURE_OPENAI_API_VERSION || '2024-06-01',
            apiKey: env.AZURE_OPENAI_API_KEY,
        },

        activityMode,
        activityTimeoutMs: int(env, 'ACTIVITY_TIMEOUT_MS', 300_000, 1),
        modules: env.FANFLOW_MODULES?.split(',').map(p => p.trim()).filter(Boolean) || [],

        reaperStale: int(env, 'REAPER_STALE_THRESHOLD', 300, 1),
        reaperInterval: int(env, 'REAPER_INTERVAL', 10_000, 1),
        leaderTtlSeconds: int(env, 'LEADER_TTL_SECONDS', 30, 1),
        maxQueueSize: int(env, 'MAX_QUEUE_SIZE', 1000),
        maxEventLoopLag: int(env, 'MAX_EVENT_LOOP_LAG', 100),
    };
}
