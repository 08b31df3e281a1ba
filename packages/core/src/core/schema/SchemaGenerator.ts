/**
 * SchemaGenerator — JSON Schema Input Schema Strategy
 *
 * Produces MCP-compatible object `inputSchema` values from Zod objects
 * (through zod-to-json-schema) or from arbitrary JSON Schema input.
 *
 * Pure-function module: no state, no side effects.
 */
import { type ZodObject, type ZodRawShape } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { type InputSchema } from '../../domain/Component.js';

// ── Public API ───────────────────────────────────────────

/** Render a Zod object as an inlined JSON Schema 7 object schema. */
export function zodInputSchema(schema: ZodObject<ZodRawShape>): InputSchema {
    const json: unknown = zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' });
    return normalizeObjectSchema(json);
}

/**
 * Coerce any JSON Schema into the `{ type: 'object', properties, required }`
 * shape MCP requires. Unknown keywords other than `description` and
 * `additionalProperties` are dropped.
 */
export function normalizeObjectSchema(json: unknown): InputSchema {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    if (isRecord(json)) {
        if (isRecord(json['properties'])) Object.assign(properties, json['properties']);
        const req = json['required'];
        if (Array.isArray(req)) {
            for (const field of req) {
                if (typeof field === 'string') required.push(field);
            }
        }
    }

    const schema: InputSchema = { type: 'object', properties };
    if (required.length > 0) schema.required = required;
    if (isRecord(json)) {
        if (typeof json['description'] === 'string') schema['description'] = json['description'];
        if (json['additionalProperties'] !== undefined) schema['additionalProperties'] = json['additionalProperties'];
    }
    return schema;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
