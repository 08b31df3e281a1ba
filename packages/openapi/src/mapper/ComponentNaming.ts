/**
 * ComponentNaming — HTTP Operations → Component Names
 *
 * Applies the naming cascade:
 *   1. an explicit `names[operationId]` override
 *   2. the `operationId` itself
 *   3. fallback: `<verb>_<last static path segment>` (only without an operationId)
 *
 * Two operations resolving to the same name is a {@link ConflictError};
 * names are never silently suffixed.
 *
 * Also infers MCP tool annotations from HTTP methods.
 *
 * @module
 */
import { ConflictError, type ToolAnnotations } from '@tessera/core';
import { type HttpMethod, type HttpOperation } from '../parser/types.js';

// ── Naming Cascade ───────────────────────────────────────

export function resolveComponentName(
    operation: HttpOperation,
    names: Readonly<Record<string, string>> = {},
): string {
    const { operationId } = operation;
    if (operationId !== undefined) {
        return names[operationId] ?? operationId;
    }
    return inferFromMethodAndPath(operation.method, operation.path);
}

/**
 * Name every operation, rejecting collisions.
 *
 * @throws {ConflictError} with kind `'operation'` when two operations share a name
 */
export function assignComponentNames(
    operations: readonly HttpOperation[],
    names: Readonly<Record<string, string>> = {},
): Map<HttpOperation, string> {
    const owners = new Map<string, HttpOperation>();
    const assigned = new Map<HttpOperation, string>();

    for (const operation of operations) {
        const name = resolveComponentName(operation, names);
        const owner = owners.get(name);
        if (owner) {
            throw new ConflictError('operation', name,
                `Operations "${describe(owner)}" and "${describe(operation)}" both map to component name "${name}".`);
        }
        owners.set(name, operation);
        assigned.set(operation, name);
    }
    return assigned;
}

/**
 * Infer a name from HTTP method and path.
 *
 * @example
 * ('GET', '/pets')            → 'list_pets'
 * ('GET', '/pets/{petId}')    → 'get_pets'
 * ('POST', '/pets')           → 'create_pets'
 * ('PUT', '/pets/{petId}')    → 'update_pets'
 * ('DELETE', '/pets/{petId}') → 'delete_pets'
 */
export function inferFromMethodAndPath(method: HttpMethod, path: string): string {
    const segments = path.split('/').filter(s => s.length > 0);
    const statics = segments.filter(s => !s.startsWith('{'));
    const entity = statics[statics.length - 1] ?? 'root';
    const endsWithParam = segments[segments.length - 1]?.startsWith('{') ?? false;

    const verb = method === 'GET'
        ? (endsWithParam ? 'get' : 'list')
        : METHOD_TO_VERB[method];
    return `${verb}_${sanitize(entity)}`;
}

const METHOD_TO_VERB: Record<HttpMethod, string> = {
    GET:     'list',
    POST:    'create',
    PUT:     'update',
    PATCH:   'update',
    DELETE:  'delete',
    HEAD:    'head',
    OPTIONS: 'options',
    TRACE:   'trace',
};

function sanitize(segment: string): string {
    return segment.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'root';
}

function describe(operation: HttpOperation): string {
    return `${operation.method} ${operation.path}`;
}

// ── Annotation Inference ─────────────────────────────────

/** MCP tool hints implied by the HTTP method. */
export function inferAnnotations(method: HttpMethod): ToolAnnotations {
    switch (method) {
        case 'GET':
        case 'HEAD':
        case 'OPTIONS':
            return { readOnlyHint: true };
        case 'DELETE':
            return { destructiveHint: true };
        case 'PUT':
            return { idempotentHint: true };
        default:
            return {};
    }
}
