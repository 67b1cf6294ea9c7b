import { NotFoundError, TransientHostError } from '../errors';
import { WorkItemEntity, workItemStatus } from '../db/work-item.entity';
import { WorkItemStore } from '../repositories/work-item.repository';
import { decodeMessage } from '../queue/messages';
import { TraceContext, withSpan } from '../observability/tracing';
import { TextGenerator, generateText, prompts } from './text-generator';

const TAG = '[processor]';

export type ProcessResult = 'processed' | 'duplicate';

export interface RecordProcessorOptions {
    /** When set, each record is enriched before it is marked Processed. */
    enricher?: TextGenerator | null;
    now?: () => Date;
}

/**
 * Consumer side of the pipeline. Handles one message body: New → Processed,
 * optionally enriched, written back as a full replace.
 */
export class RecordProcessor {
    private readonly enricher: TextGenerator | null;
    private readonly now: () => Date;

    constructor(
        private readonly store: Pick<WorkItemStore, 'get' | 'replace'>,
        options: RecordProcessorOptions = {},
    ) {
        this.enricher = options.enricher ?? null;
        this.now = options.now ?? (() => new Date());
    }

    async handle(body: string, trace: TraceContext): Promise<ProcessResult> {
        return withSpan(trace, 'record_processor.handle', async (span) => {
            const message = decodeMessage(body);
            span.setAttribute('work_item.partition_key', message.partitionKey);
            span.setAttribute('work_item.row_key', message.rowKey);
            span.setAttribute('work_item.bug_id', message.bugId);

            const item = await this.read(message.partitionKey, message.rowKey);
            if (!item) {
                throw new NotFoundError(`work item ${message.partitionKey}/${message.rowKey} not found`);
            }

            if (item.status === workItemStatus.PROCESSED) {
                console.log(`${TAG} ${item.partition_key}/${item.row_key} already processed, skipping duplicate delivery`);
                return 'duplicate';
            }

            // enrichment runs before the write: a failure leaves the record New
            const enriched = this.enricher
                ? await generateText(this.enricher, prompts.enrichment(item.payload), `enrichment of ${item.partition_key}/${item.row_key}`)
                : item.enriched_payload;

            const updated: WorkItemEntity = {
                ...item,
                status: workItemStatus.PROCESSED,
                enriched_payload: enriched,
                updated_at: this.now(),
            };

            try {
                await this.store.replace(updated);
            } catch (err) {
                // deleted between read and write
                if (err instanceof NotFoundError) throw err;
                throw new TransientHostError(`writing work item ${item.partition_key}/${item.row_key} failed`, { cause: err });
            }

            console.log(`${TAG} ${item.partition_key}/${item.row_key} (bug ${item.bug_id}) processed`);
            return 'processed';
        });
    }

    private async read(partitionKey: string, rowKey: string): Promise<WorkItemEntity | null> {
        try {
            return await this.store.get(partitionKey, rowKey);
        } catch (err) {
            throw new TransientHostError(`reading work item ${partitionKey}/${rowKey} failed`, { cause: err });
        }
    }
}
