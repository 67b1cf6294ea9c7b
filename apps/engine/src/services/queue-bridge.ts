import { TransientHostError } from '../errors';
import { WorkItemEntity, workItemStatus } from '../db/work-item.entity';
import { WorkItemStore } from '../repositories/work-item.repository';
import { MessageQueue } from '../queue/redis-queue';
import { encodeMessage, toQueueMessage } from '../queue/messages';
import { TraceContext, withSpan } from '../observability/tracing';

const TAG = '[bridge]';

/**
 * Producer side of the pipeline: one queue message per New work item.
 *
 * Records are not marked in-flight, so an item still New at the next tick is
 * enqueued again. The consumer tolerates the duplicates.
 */
export class DurableQueueBridge {
    constructor(
        private readonly store: Pick<WorkItemStore, 'findByStatus'>,
        private readonly queue: Pick<MessageQueue, 'send'>,
    ) { }

    async runOnce(trace: TraceContext): Promise<number> {
        return withSpan(trace, 'queue_bridge.run_once', async (span) => {
            let items: WorkItemEntity[];
            try {
                items = await this.store.findByStatus(workItemStatus.NEW);
            } catch (err) {
                throw new TransientHostError('querying New work items failed', { cause: err });
            }
            span.setAttribute('queue_bridge.matched', items.length);

            let sent = 0;
            for (const item of items) {
                const body = encodeMessage(toQueueMessage(item));
                try {
                    await this.queue.send(body);
                } catch (err) {
                    throw new TransientHostError(
                        `enqueue of ${item.partition_key}/${item.row_key} failed after ${sent} of ${items.length} messages`,
                        { cause: err },
                    );
                }
                sent++;
            }

            span.setAttribute('queue_bridge.sent', sent);
            if (sent > 0) console.log(`${TAG} enqueued ${sent} work items`);
            return sent;
        });
    }
}
