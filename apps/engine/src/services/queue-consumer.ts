import { NotFoundError, ValidationError } from '../errors';
import { MessageQueue, ReceivedMessage } from '../queue/redis-queue';
import { TraceContext } from '../observability/tracing';
import { Poller } from './poller';
import { RecordProcessor } from './record-processor';

const TAG = '[consumer]';

export type ConsumeResult = 'completed' | 'requeued' | 'poisoned';

export interface QueueConsumerOptions {
    name: string;
    batchSize?: number;
    maxInFlight?: number;
}

/**
 * Feeds queue messages to the RecordProcessor and settles each one:
 * acknowledged on success, poisoned at once when it can never succeed
 * (malformed or pointing at a missing record), otherwise handed back for
 * redelivery until the queue's dequeue limit poisons it.
 */
export class QueueConsumer {
    private readonly poller: Poller<ReceivedMessage>;
    private readonly maxInFlight: number;
    private inFlight = 0;

    constructor(
        private readonly queue: MessageQueue,
        private readonly processor: Pick<RecordProcessor, 'handle'>,
        private readonly trace: TraceContext,
        options: QueueConsumerOptions,
    ) {
        this.maxInFlight = options.maxInFlight ?? 32;
        this.poller = new Poller<ReceivedMessage>({
            name: options.name,
            batchSize: options.batchSize ?? 16,
            fetch: (n) => this.queue.receive(Math.min(n, this.maxInFlight - this.inFlight)),
            onReceived: async (message) => {
                await this.process(message);
            },
            checkBackpressure: () => this.inFlight >= this.maxInFlight,
        });
    }

    start(): void {
        this.poller.start();
    }

    async stop(): Promise<void> {
        await this.poller.stop();
    }

    async process(message: ReceivedMessage): Promise<ConsumeResult> {
        this.inFlight++;
        try {
            await this.processor.handle(message.body, this.trace);
            await this.queue.complete(message);
            return 'completed';
        } catch (err) {
            if (err instanceof ValidationError || err instanceof NotFoundError) {
                console.error(`${TAG} message ${message.id} rejected: ${err.name}: ${err.message}`);
                await this.queue.poison(message);
                return 'poisoned';
            }
            console.error(`${TAG} message ${message.id} failed (delivery ${message.dequeueCount}):`, err);
            return await this.queue.abandon(message);
        } finally {
            this.inFlight--;
        }
    }
}
