/**
 * buildComponents — Classified Operations → Components
 *
 * The synthesis half of the route mapping engine. Every operation the
 * route maps keep becomes exactly one component:
 *
 * | mcpType             | Component                | Identifier                         |
 * |---------------------|--------------------------|------------------------------------|
 * | `tool`              | {@link ToolComponent}    | `<name>`                           |
 * | `resource`          | {@link ResourceComponent}| `resource://<name>`                |
 * | `resource_template` | template                 | `resource://<name>/{p1}/{p2}...`   |
 *
 * A `resource_template` operation without path parameters has nothing to
 * template over and is built as a plain resource.
 *
 * @module
 */
import {
    defineResource,
    defineResourceTemplate,
    defineTool,
    createToolAnnotations,
    success,
    type Component,
    type InputSchema,
    type ResourceBody,
    type ToolResponse,
} from '@tessera/core';
import { type HttpOperation } from '../parser/types.js';
import { classifyOperation, type McpType, type RouteMap } from '../mapper/RouteMap.js';
import { assignComponentNames, inferAnnotations } from '../mapper/ComponentNaming.js';
import { buildOperationInput, pathBindings, type OperationInput } from '../schema/InputSchemaBuilder.js';
import { buildHandler, type HttpContext, type HttpResult } from './HttpHandlerFactory.js';

// ── Types ────────────────────────────────────────────────

/** Override the kind chosen by the route maps; `undefined` keeps it. */
export type RouteMapFn = (operation: HttpOperation, mcpType: McpType) => McpType | undefined;

/** Post-process a synthesized component; `undefined` keeps it. */
export type ComponentFn = (operation: HttpOperation, component: Component) => Component | undefined;

export interface BuildOptions {
    readonly http: HttpContext;
    readonly routeMaps?: readonly RouteMap[];
    readonly routeMapFn?: RouteMapFn;
    readonly componentFn?: ComponentFn;
    /** operationId → component name */
    readonly names?: Readonly<Record<string, string>>;
    /** Added to every component, after the operation's own tags */
    readonly tags?: readonly string[];
    readonly deprecated?: 'include' | 'skip';
}

type BuiltType = Exclude<McpType, 'exclude'>;

export const RESOURCE_SCHEME = 'resource://';

// ── Pipeline ─────────────────────────────────────────────

/**
 * Classify, name, and synthesize components for `operations`, in
 * document order.
 *
 * @throws {ConflictError} when two kept operations resolve to one name
 */
export function buildComponents(operations: readonly HttpOperation[], options: BuildOptions): Component[] {
    const candidates = options.deprecated === 'skip'
        ? operations.filter(op => !op.deprecated)
        : operations;

    const kept: { operation: HttpOperation; mcpType: BuiltType }[] = [];
    // The hook sees every classification, `exclude` included.
    for (const operation of candidates) {
        const mcpType = classifyOperation(operation, options.routeMaps);
        const finalType = options.routeMapFn?.(operation, mcpType) ?? mcpType;
        if (finalType !== 'exclude') kept.push({ operation, mcpType: finalType });
    }

    const names = assignComponentNames(kept.map(k => k.operation), options.names);

    const components: Component[] = [];
    for (const { operation, mcpType } of kept) {
        const name = names.get(operation) ?? operation.path;
        const synthesized = synthesize(operation, mcpType, name, options);
        components.push(options.componentFn?.(operation, synthesized) ?? synthesized);
    }
    return components;
}

// ── Synthesis ────────────────────────────────────────────

function synthesize(operation: HttpOperation, mcpType: BuiltType, name: string, options: BuildOptions): Component {
    const input = buildOperationInput(operation);
    const handler = buildHandler(operation, input, options.http, name);
    const common = {
        name,
        ...(operation.summary !== undefined ? { title: operation.summary } : {}),
        description: operation.description ?? operation.summary,
        tags: mergeTags(operation.tags, options.tags),
        meta: { method: operation.method, path: operation.path },
    };

    const params = pathBindings(input, operation.path);
    if (mcpType === 'tool') {
        return defineTool({
            ...common,
            input: input.schema,
            annotations: createToolAnnotations({ ...inferAnnotations(operation.method), openWorldHint: true }),
            handler: async (args, ctx) => toolBody(await handler(args, ctx)),
        });
    }

    if (mcpType === 'resource_template' && params.length > 0) {
        const uriTemplate = `${RESOURCE_SCHEME}${name}/${params.map(p => `{${p.argument}}`).join('/')}`;
        return defineResourceTemplate({
            ...common,
            uriTemplate,
            parameters: templateParameters(input, params.map(p => p.argument)),
            read: async (values, ctx) => resourceBody(await handler(values, ctx)),
        });
    }

    return defineResource({
        ...common,
        uri: `${RESOURCE_SCHEME}${name}`,
        mimeType: 'application/json',
        read: async (ctx) => resourceBody(await handler({}, ctx)),
    });
}

// ── Results ──────────────────────────────────────────────

function toolBody(result: HttpResult): ToolResponse {
    const { body } = result;
    if (typeof body === 'object' && body !== null) return success(body);
    return success(typeof body === 'string' ? body : String(body ?? ''));
}

function resourceBody(result: HttpResult): ResourceBody {
    const { body, contentType } = result;
    if (typeof body === 'string') {
        return { text: body, mimeType: contentType.split(';')[0]?.trim() || 'text/plain' };
    }
    return { text: JSON.stringify(body, null, 2), mimeType: 'application/json' };
}

// ── Helpers ──────────────────────────────────────────────

function templateParameters(input: OperationInput, variables: readonly string[]): InputSchema {
    const all: Record<string, unknown> = input.schema.properties ?? {};
    const properties: Record<string, unknown> = {};
    for (const variable of variables) properties[variable] = all[variable] ?? { type: 'string' };
    return { type: 'object' as const, properties, required: [...variables] };
}

function mergeTags(own: readonly string[], extra: readonly string[] = []): string[] {
    return [...new Set([...own, ...extra])];
}
