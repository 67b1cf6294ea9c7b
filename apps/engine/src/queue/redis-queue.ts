import { Redis } from 'ioredis';
import { v7 as uuid } from 'uuid';

const TAG = '[queue]';

export interface QueuedMessage {
    id: string;
    body: string;
    dequeueCount: number;
    insertedAt: string;
}

export interface ReceivedMessage extends QueuedMessage {
    /** The exact envelope held in the processing list; needed to ack. */
    readonly receipt: string;
}

export type AbandonResult = 'requeued' | 'poisoned';

export interface MessageQueue {
    send(body: string): Promise<string>;
    receive(max: number): Promise<ReceivedMessage[]>;
    complete(message: ReceivedMessage): Promise<void>;
    abandon(message: ReceivedMessage): Promise<AbandonResult>;
    poison(message: ReceivedMessage): Promise<void>;
}

function parseEnvelope(raw: string): QueuedMessage | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof value !== 'object' || value === null) return null;
    const id: unknown = Reflect.get(value, 'id');
    const body: unknown = Reflect.get(value, 'body');
    const dequeueCount: unknown = Reflect.get(value, 'dequeueCount');
    const insertedAt: unknown = Reflect.get(value, 'insertedAt');
    if (typeof id !== 'string' || typeof body !== 'string' || typeof dequeueCount !== 'number' || typeof insertedAt !== 'string') {
        return null;
    }
    return { id, body, dequeueCount, insertedAt };
}

/**
 * Reliable queue on Redis lists. Receiving moves the envelope into a
 * per-worker processing list; it leaves that list only when completed,
 * abandoned or poisoned, so a crashed worker's messages can be recovered.
 * Delivery is at-least-once.
 */
export class RedisQueue implements MessageQueue {
    private readonly key: string;
    private readonly processingKey: string;
    private readonly poisonKey: string;

    constructor(
        private readonly redis: Redis,
        readonly name: string,
        workerId: string,
        private readonly maxDequeueCount: number = 5,
    ) {
        this.key = `queue:${name}`;
        this.processingKey = `queue:${name}:processing:${workerId}`;
        this.poisonKey = `queue:${name}-poison`;
    }

    async send(body: string): Promise<string> {
        const envelope: QueuedMessage = { id: uuid(), body, dequeueCount: 0, insertedAt: new Date().toISOString() };
        await this.redis.lpush(this.key, JSON.stringify(envelope));
        return envelope.id;
    }

    async receive(max: number): Promise<ReceivedMessage[]> {
        const received: ReceivedMessage[] = [];

        while (received.length < max) {
            const raw = await this.redis.rpoplpush(this.key, this.processingKey);
            if (raw === null) break;

            const envelope = parseEnvelope(raw);
            if (!envelope) {
                console.error(`${TAG} ${this.name}: unreadable envelope moved to poison queue`);
                await this.redis.multi().lrem(this.processingKey, 1, raw).lpush(this.poisonKey, raw).exec();
                continue;
            }

            // delivered max times without being settled: the worker died on it each time
            if (envelope.dequeueCount >= this.maxDequeueCount) {
                await this.redis.multi().lrem(this.processingKey, 1, raw).lpush(this.poisonKey, raw).exec();
                console.warn(`${TAG} ${this.name}: message ${envelope.id} moved to poison queue after ${envelope.dequeueCount} unsettled deliveries`);
                continue;
            }

            // the count lives in the stored envelope so that it survives a crash and recoverInFlight
            const delivered: QueuedMessage = { ...envelope, dequeueCount: envelope.dequeueCount + 1 };
            const receipt = JSON.stringify(delivered);
            await this.redis.multi().lrem(this.processingKey, 1, raw).lpush(this.processingKey, receipt).exec();

            received.push({ ...delivered, receipt });
        }

        return received;
    }

    async complete(message: ReceivedMessage): Promise<void> {
        await this.redis.lrem(this.processingKey, 1, message.receipt);
    }

    async abandon(message: ReceivedMessage): Promise<AbandonResult> {
        if (message.dequeueCount >= this.maxDequeueCount) {
            await this.poison(message);
            return 'poisoned';
        }
        await this.redis.multi()
            .lrem(this.processingKey, 1, message.receipt)
            .lpush(this.key, this.envelope(message))
            .exec();
        return 'requeued';
    }

    async poison(message: ReceivedMessage): Promise<void> {
        await this.redis.multi()
            .lrem(this.processingKey, 1, message.receipt)
            .lpush(this.poisonKey, this.envelope(message))
            .exec();
        console.warn(`${TAG} ${this.name}: message ${message.id} moved to poison queue after ${message.dequeueCount} deliveries`);
    }

    /** Moves messages a previous run of this worker left in flight back to the queue. */
    async recoverInFlight(): Promise<number> {
        let recovered = 0;
        while ((await this.redis.rpoplpush(this.processingKey, this.key)) !== null) {
            recovered++;
        }
        if (recovered > 0) {
            console.log(`${TAG} ${this.name}: recovered ${recovered} in-flight messages`);
        }
        return recovered;
    }

    async length(): Promise<number> {
        return this.redis.llen(this.key);
    }

    async poisonLength(): Promise<number> {
        return this.redis.llen(this.poisonKey);
    }

    async inFlight(): Promise<number> {
        return this.redis.llen(this.processingKey);
    }

    private envelope(message: ReceivedMessage): string {
        const { id, body, dequeueCount, insertedAt } = message;
        return JSON.stringify({ id, body, dequeueCount, insertedAt });
    }
}
