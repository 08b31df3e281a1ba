/**
 * Response Helpers
 *
 * Builders for the MCP tool result shape. Handlers written with
 * {@link defineTool} may return a plain value; {@link toToolResponse}
 * normalizes it.
 *
 * @example
 * ```typescript
 * import { success, error } from '@tessera/core';
 *
 * return success('Project created');
 * return success({ id: '123', name: 'My Project' });
 * return error('Project not found');
 * ```
 *
 * @module
 */
import { type ToolResponse } from '../domain/Component.js';

// ============================================================================
// Response Builders
// ============================================================================

/**
 * Create a success response from text or a JSON-serializable value.
 *
 * - Strings are returned verbatim (empty strings become `"OK"`)
 * - Plain objects are serialized with `JSON.stringify(data, null, 2)`
 *   and also attached as `structuredContent`
 * - Arrays are serialized but carry no `structuredContent`, which MCP
 *   requires to be an object
 */
export function success(data: string | object): ToolResponse {
    if (typeof data === 'string') {
        return { content: [{ type: 'text', text: data || 'OK' }] };
    }
    const text = JSON.stringify(data, null, 2);
    if (isPlainRecord(data)) {
        return { content: [{ type: 'text', text }], structuredContent: data };
    }
    return { content: [{ type: 'text', text }] };
}

/**
 * Create an error response.
 *
 * Sets `isError: true` so the client recognizes the failure. Handlers
 * usually throw instead; this is for returning a soft failure.
 */
export function error(message: string): ToolResponse {
    return { content: [{ type: 'text', text: message }], isError: true };
}

// ============================================================================
// Normalization
// ============================================================================

/** Structural check for an already-built tool result. */
export function isToolResponse(value: unknown): value is ToolResponse {
    return typeof value === 'object'
        && value !== null
        && 'content' in value
        && Array.isArray(value.content);
}

/**
 * Turn whatever a handler returned into a {@link ToolResponse}.
 *
 * `undefined`/`null` become an empty result; numbers and booleans are
 * stringified.
 */
export function toToolResponse(value: unknown): ToolResponse {
    if (isToolResponse(value)) return value;
    if (value === undefined || value === null) return { content: [] };
    if (typeof value === 'string' || typeof value === 'object') return success(value);
    return success(String(value));
}

/** Concatenate the text blocks of a response. */
export function textOf(response: ToolResponse): string {
    const parts: string[] = [];
    for (const block of response.content) {
        if (block.type === 'text') parts.push(block.text);
    }
    return parts.join('\n');
}

function isPlainRecord(value: object): value is Record<string, unknown> {
    if (Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
