/**
 * InputSchemaBuilder — HTTP Operation → Component Arguments
 *
 * Produces the JSON Schema a component exposes for an operation, plus the
 * bindings the HTTP handler uses to route each argument back to its place
 * in the request.
 *
 * Rules, applied identically to every operation:
 * - path parameters are required
 * - query parameters are always optional; header and cookie parameters
 *   are optional unless declared required
 * - an object request body (one with `properties`) is flattened into
 *   top-level arguments; its `required` list counts only when the body
 *   itself is required
 * - any other request body becomes a single `body` argument
 * - an argument name already taken (by a body property or an earlier
 *   parameter) renames the parameter to `<name>__<source>`
 *
 * @module
 */
import { isRecord, type InputSchema } from '@tessera/core';
import { type HttpOperation, type HttpParam, type ParamSource, type SchemaNode } from '../parser/types.js';

// ── Types ────────────────────────────────────────────────

/** Where one component argument goes in the HTTP request */
export interface ArgumentBinding {
    /** Name of the component argument */
    readonly argument: string;
    readonly source: ParamSource | 'body';
    /** Name on the wire: parameter name or body property name */
    readonly name: string;
}

/** How the request body is assembled from arguments */
export type BodyMode = 'none' | 'flat' | 'whole';

export interface OperationInput {
    readonly schema: InputSchema;
    readonly bindings: readonly ArgumentBinding[];
    readonly bodyMode: BodyMode;
}

/** Argument name used for a non-object request body */
export const BODY_ARGUMENT = 'body';

// ── Builder ──────────────────────────────────────────────

export function buildOperationInput(operation: HttpOperation): OperationInput {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];
    const bindings: ArgumentBinding[] = [];
    const taken = new Set<string>();

    const { requestBody } = operation;
    const bodyProps = requestBody ? objectProperties(requestBody.schema) : undefined;
    const bodyMode: BodyMode = !requestBody ? 'none' : bodyProps ? 'flat' : 'whole';

    // Body names are reserved first so parameters yield on collision.
    const bodyNames = bodyProps ? Object.keys(bodyProps) : requestBody ? [BODY_ARGUMENT] : [];
    for (const name of bodyNames) taken.add(name);

    for (const param of operation.params) {
        const argument = taken.has(param.name) ? `${param.name}__${param.source}` : param.name;
        taken.add(argument);
        properties[argument] = paramSchema(param);
        if (isRequiredArgument(param)) required.push(argument);
        bindings.push({ argument, source: param.source, name: param.name });
    }

    if (requestBody && bodyProps) {
        const bodyRequired = requestBody.required ? requiredList(requestBody.schema) : [];
        for (const [name, schema] of Object.entries(bodyProps)) {
            properties[name] = schema;
            if (bodyRequired.includes(name)) required.push(name);
            bindings.push({ argument: name, source: 'body', name });
        }
    } else if (requestBody) {
        properties[BODY_ARGUMENT] = withDescription(requestBody.schema, requestBody.description);
        if (requestBody.required) required.push(BODY_ARGUMENT);
        bindings.push({ argument: BODY_ARGUMENT, source: 'body', name: BODY_ARGUMENT });
    }

    const schema: InputSchema = { type: 'object', properties };
    if (required.length > 0) schema.required = required;
    return { schema, bindings, bodyMode };
}

/** Bindings for path parameters only, ordered by where they appear in `path`. */
export function pathBindings(input: OperationInput, path: string): ArgumentBinding[] {
    const position = (b: ArgumentBinding): number => {
        const index = path.indexOf(`{${b.name}}`);
        return index === -1 ? Number.MAX_SAFE_INTEGER : index;
    };
    return input.bindings
        .filter(b => b.source === 'path')
        .sort((a, b) => position(a) - position(b));
}

// ── Helpers ──────────────────────────────────────────────

function objectProperties(schema: SchemaNode): Record<string, unknown> | undefined {
    const props = schema['properties'];
    if (!isRecord(props)) return undefined;
    if (schema['type'] !== undefined && schema['type'] !== 'object') return undefined;
    return props;
}

function requiredList(schema: SchemaNode): string[] {
    const req = schema['required'];
    return Array.isArray(req) ? req.filter((r): r is string => typeof r === 'string') : [];
}

function paramSchema(param: HttpParam): SchemaNode {
    return withDescription(param.schema, param.description);
}

function withDescription(schema: SchemaNode, description: string | undefined): SchemaNode {
    if (description === undefined || typeof schema['description'] === 'string') return schema;
    return { ...schema, description };
}

/**
 * Path parameters are always required and query parameters never are;
 * headers and cookies follow their declaration.
 */
function isRequiredArgument(param: HttpParam): boolean {
    switch (param.source) {
        case 'path': return true;
        case 'query': return false;
        default: return param.required;
    }
}
