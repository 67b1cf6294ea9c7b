import { randomInt } from 'crypto';
import { v7 as uuid } from 'uuid';
import { TransientHostError, ValidationError } from '../errors';
import { WorkItemEntity, workItemStatus } from '../db/work-item.entity';
import { WorkItemStore } from '../repositories/work-item.repository';
import { TraceContext, withSpan } from '../observability/tracing';
import { TextGenerator, generateText, prompts } from './text-generator';

const TAG = '[generator]';

export interface WorkloadGeneratorOptions {
    defaultCount: number;
    now?: () => Date;
}

/**
 * Writes a batch of synthetic New work items under one fresh partition key.
 * Every payload is generated before anything is written; one failed
 * generation fails the whole batch.
 */
export class RandomWorkloadGenerator {
    private readonly defaultCount: number;
    private readonly now: () => Date;

    constructor(
        private readonly store: Pick<WorkItemStore, 'insertBatch'>,
        private readonly textGenerator: TextGenerator,
        options: WorkloadGeneratorOptions,
    ) {
        this.defaultCount = options.defaultCount;
        this.now = options.now ?? (() => new Date());
    }

    async runOnce(trace: TraceContext, count: number = this.defaultCount): Promise<number> {
        if (!Number.isInteger(count) || count < 0) {
            throw new ValidationError(`count must be a non-negative integer, got ${count}`);
        }

        const partitionKey = `batch-${uuid()}`;
        return withSpan(trace, 'workload_generator.run_once', async (span) => {
            const payloads = await Promise.all(
                Array.from({ length: count }, (_, i) => generateText(this.textGenerator, prompts.workload(i), `workload item ${i + 1}/${count}`)),
            );

            const now = this.now();
            const items: WorkItemEntity[] = payloads.map(payload => ({
                partition_key: partitionKey,
                row_key: uuid(),
                bug_id: String(randomInt(1, 1_000_000)),
                status: workItemStatus.NEW,
                payload,
                enriched_payload: null,
                created_at: now,
                updated_at: now,
            }));

            try {
                await this.store.insertBatch(items);
            } catch (err) {
                throw new TransientHostError(`batch insert of ${items.length} items under ${partitionKey} failed`, { cause: err });
            }

            span.setAttribute('workload_generator.created', items.length);
            console.log(`${TAG} created ${items.length} work items under ${partitionKey}`);
            return items.length;
        }, { 'workload_generator.partition_key': partitionKey, 'workload_generator.count': count });
    }
}
