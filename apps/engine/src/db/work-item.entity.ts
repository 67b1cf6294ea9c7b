/**
 * Work items only ever move NEW → PROCESSED.
 */
export enum workItemStatus {
    NEW = 'New',
    PROCESSED = 'Processed',
}

/** A persisted record; identity is (partition_key, row_key). */
export type WorkItemEntity = {
    partition_key: string;
    row_key: string;
    bug_id: string;
    status: workItemStatus;
    payload: string;
    enriched_payload: string | null;
    created_at: Date;
    updated_at: Date;
};
