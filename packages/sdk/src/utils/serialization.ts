import superjson from 'superjson';

/** Upper bound for one encoded input, result or output. */
export const MAX_PAYLOAD_BYTES = 1024 * 1024;

export class SerializationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SerializationError';
    }
}

/** Plain-object form of an error, as persisted in history events and instance rows. */
export interface SerializedError {
    name: string;
    message: string;
    stack?: string;
}

// superjson keeps Dates, Maps, Sets, BigInts and undefined intact, so a
// replayed orchestration sees the same values the activity returned.
export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_BYTES): string {
    let encoded: string;
    try {
        encoded = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`value cannot be serialized: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    const bytes = Buffer.byteLength(encoded);
    if (bytes > maxBytes) {
        throw new SerializationError(`payload of ${(bytes / 1024 / 1024).toFixed(2)}MB exceeds the ${(maxBytes / 1024 / 1024).toFixed(2)}MB limit`);
    }
    return encoded;
}

export function deserialize<T>(value: string): T {
    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`payload cannot be deserialized: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
}

export function serializeError(error: unknown): SerializedError {
    if (error instanceof Error) {
        return error.stack === undefined
            ? { name: error.name, message: error.message }
            : { name: error.name, message: error.message, stack: error.stack };
    }
    return { name: 'Error', message: String(error) };
}
