import {
    Document,
    ErrorCodes,
    HandlerContext,
    TopicHandler,
    ValidationError,
} from '@taskgate/sdk';
import { TopicRouteConfig } from '../config';

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Forwards a task payload to one endpoint of an external API.
 * `{field}` placeholders in the route path are filled from the payload;
 * the rest of the payload is the JSON body (or the query string for GET/DELETE).
 */
export class HttpTopicHandler implements TopicHandler {
    readonly requiredFields: string[];
    private readonly pathFields: string[];

    constructor(
        private readonly route: TopicRouteConfig,
        private readonly accountId: string,
    ) {
        this.pathFields = Array.from(route.path.matchAll(PLACEHOLDER), match => match[1] ?? '').filter(Boolean);
        this.requiredFields = Array.from(new Set([...route.requiredFields, ...this.pathFields]));
    }

    async handle(payload: Document, ctx: HandlerContext): Promise<Document> {
        const path = this.route.path.replace(PLACEHOLDER, (_match, field: string) => {
            const value = payload[field];
            if (typeof value !== 'string' && typeof value !== 'number') {
                throw new ValidationError(`Path field "${field}" missing from payload`, ErrorCodes.MISSING_REQUIRED_FIELD, { field });
            }
            return encodeURIComponent(String(value));
        });

        const rest: Document = {};
        for (const [key, value] of Object.entries(payload)) {
            if (!this.pathFields.includes(key)) rest[key] = value;
        }

        const withBody = this.route.method !== 'GET' && this.route.method !== 'DELETE';
        const response = await ctx.api.call(this.route.api, this.accountId, {
            method: this.route.method,
            path,
            body: withBody ? rest : undefined,
            query: withBody ? undefined : toQuery(rest),
            callClass: this.route.callClass,
        });

        return toResult(response.body);
    }
}

function toQuery(doc: Document): Record<string, string | number | boolean> {
    const query: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(doc)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') query[key] = value;
    }
    return query;
}

/** Object bodies are the result as-is; anything else is wrapped as `data`. */
export function toResult(body: unknown): Document {
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
        return Object.fromEntries(Object.entries(body));
    }
    return body === null || body === undefined ? {} : { data: body };
}
