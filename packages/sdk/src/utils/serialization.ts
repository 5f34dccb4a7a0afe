import superjson from 'superjson';
import { Document } from '../types';

/** Upper bound for one serialized task payload, result or error document. */
export const MAX_DOCUMENT_BYTES = 1024 * 1024;

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

/**
 * superjson text of a task document, so dates, maps and sets survive the
 * trip between SDK and gateway. Empty for undefined.
 */
export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);
        const size = Buffer.byteLength(stringified);
        if (size > MAX_DOCUMENT_BYTES) {
            throw new SerializationError(`Task document of ${size} bytes exceeds the ${MAX_DOCUMENT_BYTES} byte limit`);
        }
        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

// gRPC carries payload, result and error documents as bytes
export function encodeDocument(value: unknown): Buffer {
    return Buffer.from(serialize(value), 'utf-8');
}

export function decodeDocument(bytes: Buffer | Uint8Array | null | undefined): Document | undefined {
    if (!bytes || bytes.length === 0) return undefined;
    const value = deserialize<unknown>(Buffer.from(bytes).toString('utf-8'));
    if (value === undefined) return undefined;
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new SerializationError('Expected an object document');
    }
    return Object.fromEntries(Object.entries(value));
}
