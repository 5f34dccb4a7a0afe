import { Document, TopicHandler } from './types';

/** Maps topic names to their handlers. One handler per topic. */
export class HandlerRegistry {
    private handlers = new Map<string, TopicHandler>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_.:-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    register(topic: string, handler: TopicHandler): TopicHandler {
        if (!topic || topic.length === 0) {
            throw new Error('Topic name cannot be empty');
        }
        if (topic.length > HandlerRegistry.MAX_NAME_LENGTH) {
            throw new Error(`Topic name exceeds maximum length of ${HandlerRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!HandlerRegistry.NAME_PATTERN.test(topic)) {
            throw new Error('Topic name must contain only alphanumeric characters, dots, colons, dashes, and underscores');
        }
        if (this.handlers.has(topic)) {
            throw new Error(`Topic "${topic}" is already registered.`);
        }
        this.handlers.set(topic, handler);
        return handler;
    }

    get(topic: string): TopicHandler | undefined {
        return this.handlers.get(topic);
    }

    has(topic: string): boolean {
        return this.handlers.has(topic);
    }

    list(): string[] {
        return Array.from(this.handlers.keys());
    }

    /** Required fields of `topic` that are absent from `payload`. */
    missingFields(topic: string, payload: Document): string[] {
        const handler = this.handlers.get(topic);
        return handler ? missingRequiredFields(handler.requiredFields ?? [], payload) : [];
    }
}

// Dotted paths reach into nested objects: "processo.numero".
export function missingRequiredFields(required: string[], payload: Document): string[] {
    return required.filter(field => isEmpty(readPath(payload, field)));
}

function readPath(doc: Document, path: string): unknown {
    let current: unknown = doc;
    for (const segment of path.split('.')) {
        if (typeof current !== 'object' || current === null || Array.isArray(current)) return undefined;
        current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    }
    return current;
}

function isEmpty(value: unknown): boolean {
    if (value === undefined || value === null) return true;
    if (typeof value === 'string') return value.trim() === '';
    if (Array.isArray(value)) return value.length === 0;
    return false;
}
