/**
 * OpenApiParser — OpenAPI 3.x → IR Converter
 *
 * Accepts YAML or JSON input (string or pre-parsed object) and produces
 * a normalized {@link ApiDocument}. Resolves all `$ref` pointers and
 * flattens every path + method pair into one {@link HttpOperation}.
 *
 * @module
 */
import { parse as parseYaml } from 'yaml';
import { isRecord } from '@tessera/core';
import { resolveRefs } from './RefResolver.js';
import {
    HTTP_METHODS,
    type ApiDocument,
    type ApiServer,
    type HttpMethod,
    type HttpOperation,
    type HttpParam,
    type HttpRequestBody,
    type ParamSource,
    type SchemaNode,
} from './types.js';

const PARAM_SOURCES: readonly ParamSource[] = ['path', 'query', 'header', 'cookie'];

// ── Parser ───────────────────────────────────────────────

/**
 * Parse an OpenAPI 3.x document into the normalized IR.
 *
 * @param input - YAML string, JSON string, or pre-parsed object
 * @throws If the input is not an object or not an OpenAPI 3.x document
 */
export function parseOpenApi(input: string | object): ApiDocument {
    const raw: unknown = typeof input === 'string' ? parseYaml(input) : input;
    if (!isRecord(raw)) {
        throw new Error('OpenAPI input must be a YAML or JSON object.');
    }

    const version = raw['openapi'];
    if (typeof version !== 'string' || !version.startsWith('3.')) {
        throw new Error(
            `Unsupported OpenAPI version: "${typeof version === 'string' ? version : 'missing'}". OpenAPI 3.x required.`,
        );
    }

    const doc = resolveRefs(raw);
    const info = isRecord(doc['info']) ? doc['info'] : {};
    const description = stringField(info, 'description');

    return {
        title: stringField(info, 'title') ?? 'Untitled API',
        version: stringField(info, 'version') ?? '0.0.0',
        ...(description ? { description } : {}),
        servers: extractServers(doc['servers']),
        operations: extractOperations(doc['paths']),
    };
}

// ── Operations ───────────────────────────────────────────

function extractOperations(paths: unknown): HttpOperation[] {
    if (!isRecord(paths)) return [];

    const operations: HttpOperation[] = [];
    for (const [path, pathItem] of Object.entries(paths)) {
        if (!isRecord(pathItem)) continue;
        const pathParams = extractParams(pathItem['parameters']);

        for (const [key, rawOp] of Object.entries(pathItem)) {
            const method = toMethod(key);
            if (!method || !isRecord(rawOp)) continue;

            const operationId = stringField(rawOp, 'operationId');
            const summary = stringField(rawOp, 'summary');
            const description = stringField(rawOp, 'description');
            const requestBody = extractRequestBody(rawOp['requestBody']);

            operations.push({
                method,
                path,
                ...(operationId ? { operationId } : {}),
                tags: stringList(rawOp['tags']),
                ...(summary ? { summary } : {}),
                ...(description ? { description } : {}),
                params: mergeParams(pathParams, extractParams(rawOp['parameters'])),
                ...(requestBody ? { requestBody } : {}),
                deprecated: rawOp['deprecated'] === true,
            });
        }
    }
    return operations;
}

function toMethod(key: string): HttpMethod | undefined {
    const upper = key.toUpperCase();
    return HTTP_METHODS.find(m => m === upper);
}

// ── Parameters ───────────────────────────────────────────

function extractParams(raw: unknown): HttpParam[] {
    if (!Array.isArray(raw)) return [];

    const params: HttpParam[] = [];
    for (const entry of raw) {
        if (!isRecord(entry)) continue;
        const name = stringField(entry, 'name');
        const source = PARAM_SOURCES.find(s => s === entry['in']);
        if (!name || !source) continue;

        const description = stringField(entry, 'description');
        params.push({
            name,
            source,
            required: source === 'path' || entry['required'] === true,
            schema: schemaOf(entry['schema']) ?? { type: 'string' },
            ...(description ? { description } : {}),
        });
    }
    return params;
}

/** Operation params override path-level params by source + name. */
function mergeParams(pathParams: HttpParam[], opParams: HttpParam[]): HttpParam[] {
    const opKeys = new Set(opParams.map(p => `${p.source}:${p.name}`));
    const inherited = pathParams.filter(p => !opKeys.has(`${p.source}:${p.name}`));
    return [...inherited, ...opParams];
}

// ── Request Body ─────────────────────────────────────────

function extractRequestBody(raw: unknown): HttpRequestBody | undefined {
    if (!isRecord(raw) || !isRecord(raw['content'])) return undefined;

    const content = raw['content'];
    const contentType = 'application/json' in content ? 'application/json' : Object.keys(content)[0];
    if (contentType === undefined) return undefined;

    const media = content[contentType];
    const schema = isRecord(media) ? schemaOf(media['schema']) : undefined;
    if (!schema) return undefined;

    const description = stringField(raw, 'description');
    return {
        schema,
        required: raw['required'] === true,
        contentType,
        ...(description ? { description } : {}),
    };
}

// ── Helpers ──────────────────────────────────────────────

function extractServers(raw: unknown): ApiServer[] {
    if (!Array.isArray(raw)) return [];

    const servers: ApiServer[] = [];
    for (const entry of raw) {
        if (!isRecord(entry)) continue;
        const url = stringField(entry, 'url');
        if (!url) continue;
        const description = stringField(entry, 'description');
        servers.push({ url, ...(description ? { description } : {}) });
    }
    return servers;
}

function schemaOf(value: unknown): SchemaNode | undefined {
    return isRecord(value) ? value : undefined;
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
    const value = obj[key];
    return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
