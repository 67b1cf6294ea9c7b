import { Pool } from 'pg';
import { NotFoundError } from '../errors';
import { TransactionManager } from '../db/transaction.manager';
import { WorkItemEntity, workItemStatus } from '../db/work-item.entity';

export interface WorkItemStore {
    findByStatus(status: workItemStatus): Promise<WorkItemEntity[]>;
    get(partitionKey: string, rowKey: string): Promise<WorkItemEntity | null>;
    /** Unconditional replace of the whole field set (last write wins); NotFoundError when the record is gone. */
    replace(item: WorkItemEntity): Promise<void>;
    /** All-or-nothing insert. */
    insertBatch(items: WorkItemEntity[]): Promise<void>;
}

const COLUMNS = 'partition_key, row_key, bug_id, status, payload, enriched_payload, created_at, updated_at';

function values(item: WorkItemEntity): unknown[] {
    return [
        item.partition_key, item.row_key, item.bug_id, item.status,
        item.payload, item.enriched_payload, item.created_at, item.updated_at,
    ];
}

export class WorkItemRepository implements WorkItemStore {
    private readonly tx: TransactionManager;

    // table is validated by loadConfig before it gets here
    constructor(private readonly pool: Pool, private readonly table: string = 'work_items') {
        this.tx = new TransactionManager(pool);
    }

    async findByStatus(status: workItemStatus): Promise<WorkItemEntity[]> {
        const res = await this.pool.query<WorkItemEntity>(
            `SELECT ${COLUMNS} FROM ${this.table} WHERE status = $1 ORDER BY created_at ASC, partition_key, row_key`,
            [status],
        );
        return res.rows;
    }

    async get(partitionKey: string, rowKey: string): Promise<WorkItemEntity | null> {
        const res = await this.pool.query<WorkItemEntity>(
            `SELECT ${COLUMNS} FROM ${this.table} WHERE partition_key = $1 AND row_key = $2`,
            [partitionKey, rowKey],
        );
        return res.rows[0] || null;
    }

    async replace(item: WorkItemEntity): Promise<void> {
        const res = await this.pool.query(
            `UPDATE ${this.table}
             SET bug_id = $3, status = $4, payload = $5, enriched_payload = $6, created_at = $7, updated_at = $8
             WHERE partition_key = $1 AND row_key = $2`,
            values(item),
        );
        if (res.rowCount === 0) {
            throw new NotFoundError(`work item ${item.partition_key}/${item.row_key} not found`);
        }
    }

    async insertBatch(items: WorkItemEntity[]): Promise<void> {
        if (items.length === 0) return;
        await this.tx.run(async (client) => {
            for (const item of items) {
                await client.query(
                    `INSERT INTO ${this.table} (${COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
                    values(item),
                );
            }
        });
    }
}
