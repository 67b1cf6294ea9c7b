import { ValidationError } from '../errors';
import { WorkItemEntity } from '../db/work-item.entity';

/** Snapshot of a work item's identifying fields at enqueue time. */
export interface QueueMessage {
    partitionKey: string;
    rowKey: string;
    bugId: string;
    payload: string;
}

// wire form: base64 of JSON with these exact keys
interface WireMessage {
    PartitionKey: string;
    RowKey: string;
    BugId: string;
    Payload: string;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const REQUIRED_KEYS = ['PartitionKey', 'RowKey', 'BugId', 'Payload'] as const;

export function toQueueMessage(item: WorkItemEntity): QueueMessage {
    return {
        partitionKey: item.partition_key,
        rowKey: item.row_key,
        bugId: item.bug_id,
        payload: item.payload,
    };
}

export function encodeMessage(message: QueueMessage): string {
    const wire: WireMessage = {
        PartitionKey: message.partitionKey,
        RowKey: message.rowKey,
        BugId: message.bugId,
        Payload: message.payload,
    };
    return Buffer.from(JSON.stringify(wire), 'utf-8').toString('base64');
}

export function decodeMessage(body: string): QueueMessage {
    const trimmed = body.trim();
    if (trimmed.length === 0 || trimmed.length % 4 !== 0 || !BASE64_PATTERN.test(trimmed)) {
        throw new ValidationError('message body is not valid base64');
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(Buffer.from(trimmed, 'base64').toString('utf-8'));
    } catch (err) {
        throw new ValidationError(`message body is not JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ValidationError('message body must be a JSON object');
    }

    const fields: Record<string, string> = {};
    for (const key of REQUIRED_KEYS) {
        const value: unknown = Reflect.get(parsed, key);
        if (typeof value !== 'string') {
            throw new ValidationError(`message is missing required string field "${key}"`);
        }
        fields[key] = value;
    }
    if (fields.PartitionKey === '' || fields.RowKey === '') {
        throw new ValidationError('PartitionKey and RowKey must not be empty');
    }

    return {
        partitionKey: fields.PartitionKey,
        rowKey: fields.RowKey,
        bugId: fields.BugId,
        payload: fields.Payload,
    };
}
