import { Pool } from 'pg';
import { HistoryEvent } from '@fanflow/sdk';

export interface HistoryStore {
    load(instanceId: string): Promise<HistoryEvent[]>;
    append(instanceId: string, events: HistoryEvent[]): Promise<void>;
}

export class HistoryRepository implements HistoryStore {
    constructor(private readonly pool: Pool) { }

    async load(instanceId: string): Promise<HistoryEvent[]> {
        const res = await this.pool.query<{ event: HistoryEvent }>(
            'SELECT event FROM orchestration_history WHERE instance_id = $1 ORDER BY seq ASC',
            [instanceId],
        );
        return res.rows.map(row => row.event);
    }

    async append(instanceId: string, events: HistoryEvent[]): Promise<void> {
        if (events.length === 0) return;
        // Single statement: seq continues from the current tail, and the
        // (instance_id, seq) key rejects a concurrent writer.
        await this.pool.query(
            `INSERT INTO orchestration_history (instance_id, seq, event)
             SELECT $1, tail.seq + t.ord, t.event
             FROM (SELECT COALESCE(MAX(seq), 0) AS seq FROM orchestration_history WHERE instance_id = $1) tail,
                  unnest($2::jsonb[]) WITH ORDINALITY AS t(event, ord)`,
            [instanceId, events.map(e => JSON.stringify(e))],
        );
    }
}
