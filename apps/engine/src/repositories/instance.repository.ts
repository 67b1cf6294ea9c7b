import { Pool } from 'pg';
import { validate as isUuid } from 'uuid';
import { SerializedError } from '@fanflow/sdk';
import { InstanceEntity, instanceStatus } from '../db/instance.entity';

export interface ReapedInstance {
    id: string;
    name: string;
    retry_count: number;
    action: 'requeued' | 'failed';
}

export interface InstanceStore {
    create(id: string, name: string, input: string): Promise<InstanceEntity>;
    findById(id: string): Promise<InstanceEntity | null>;
    dequeue(batchSize: number, workerId: string): Promise<InstanceEntity[]>;
    updateHeartbeat(ids: string[]): Promise<void>;
    complete(id: string, output: string): Promise<void>;
    fail(id: string, error: SerializedError): Promise<void>;
    requeueStale(staleThresholdSeconds: number): Promise<ReapedInstance[]>;
    failExhausted(staleThresholdSeconds: number): Promise<ReapedInstance[]>;
    delete(id: string): Promise<boolean>;
}

export class InstanceRepository implements InstanceStore {
    constructor(private readonly pool: Pool) { }

    async create(id: string, name: string, input: string): Promise<InstanceEntity> {
        const res = await this.pool.query<InstanceEntity>(
            'INSERT INTO orchestration_instances (id, name, input) VALUES ($1, $2, $3) RETURNING *',
            [id, name, input],
        );
        return res.rows[0];
    }

    // ids arrive from URLs; the uuid column rejects anything else with a 22P02 error
    async findById(id: string): Promise<InstanceEntity | null> {
        if (!isUuid(id)) return null;
        const res = await this.pool.query<InstanceEntity>('SELECT * FROM orchestration_instances WHERE id = $1', [id]);
        return res.rows[0] || null;
    }

    async dequeue(batchSize: number, workerId: string): Promise<InstanceEntity[]> {
        const query = `
            WITH next_instances AS (
                SELECT id FROM orchestration_instances
                WHERE status = $1
                ORDER BY created_at ASC
                LIMIT $2
                FOR UPDATE SKIP LOCKED
            )
            UPDATE orchestration_instances
            SET
                status = $3,
                worker_id = $4,
                heartbeat_at = NOW(),
                updated_at = NOW()
            FROM next_instances
            WHERE orchestration_instances.id = next_instances.id
            RETURNING orchestration_instances.*
        `;
        const res = await this.pool.query<InstanceEntity>(query, [instanceStatus.PENDING, batchSize, instanceStatus.RUNNING, workerId]);
        return res.rows;
    }

    async updateHeartbeat(ids: string[]): Promise<void> {
        if (ids.length === 0) return;
        await this.pool.query(
            'UPDATE orchestration_instances SET heartbeat_at = NOW() WHERE id = ANY($1::uuid[]) AND status = $2',
            [ids, instanceStatus.RUNNING],
        );
    }

    async complete(id: string, output: string): Promise<void> {
        await this.pool.query(
            'UPDATE orchestration_instances SET status = $1, output = $2, completed_at = NOW(), updated_at = NOW() WHERE id = $3',
            [instanceStatus.COMPLETED, output, id],
        );
    }

    async fail(id: string, error: SerializedError): Promise<void> {
        await this.pool.query(
            'UPDATE orchestration_instances SET status = $1, error = $2, completed_at = NOW(), updated_at = NOW() WHERE id = $3',
            [instanceStatus.FAILED, JSON.stringify(error), id],
        );
    }

    async requeueStale(staleThresholdSeconds: number): Promise<ReapedInstance[]> {
        const res = await this.pool.query<Omit<ReapedInstance, 'action'>>(
            `UPDATE orchestration_instances
             SET status = $1, worker_id = NULL, retry_count = retry_count + 1, updated_at = NOW()
             WHERE status = $2
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $3)
               AND retry_count < max_retries
             RETURNING id, name, retry_count`,
            [instanceStatus.PENDING, instanceStatus.RUNNING, staleThresholdSeconds],
        );
        return res.rows.map(row => ({ ...row, action: 'requeued' as const }));
    }

    async failExhausted(staleThresholdSeconds: number): Promise<ReapedInstance[]> {
        const res = await this.pool.query<Omit<ReapedInstance, 'action'>>(
            `UPDATE orchestration_instances
             SET status = $1,
                 error = jsonb_build_object('name', 'MaxRetriesExceeded', 'message', 'Instance exceeded max retries after worker failure'),
                 completed_at = NOW(),
                 updated_at = NOW()
             WHERE status = $2
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $3)
               AND retry_count >= max_retries
             RETURNING id, name, retry_count`,
            [instanceStatus.FAILED, instanceStatus.RUNNING, staleThresholdSeconds],
        );
        return res.rows.map(row => ({ ...row, action: 'failed' as const }));
    }

    async delete(id: string): Promise<boolean> {
        if (!isUuid(id)) return false;
        const res = await this.pool.query('DELETE FROM orchestration_instances WHERE id = $1', [id]);
        return (res.rowCount ?? 0) > 0;
    }
}
