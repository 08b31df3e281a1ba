/**
 * fromOpenApi() — Runtime OpenAPI → ToolServer
 *
 * Parses an OpenAPI 3.x document, classifies its operations through the
 * route maps, synthesizes one HTTP-backed component per kept operation,
 * and registers them into a new {@link ToolServer}. No code is
 * generated; handlers call the API at run time.
 *
 * @example
 * ```typescript
 * import { fromOpenApi } from '@tessera/openapi';
 * import { ToolServer } from '@tessera/core';
 *
 * const petstore = fromOpenApi(yamlText, {
 *     baseUrl: 'https://petstore.example.test/v1',
 *     routeMaps: [{ methods: ['GET'], pattern: '/pets', mcpType: 'resource' }],
 * });
 *
 * const gateway = new ToolServer({ name: 'gateway' });
 * gateway.mount(petstore, { prefix: 'pets' });
 * ```
 *
 * @module
 */
import { ToolServer, type ToolServerOptions } from '@tessera/core';
import { parseOpenApi } from '../parser/OpenApiParser.js';
import { mergeOpenApiConfig, type PartialOpenApiConfig } from '../config/OpenApiConfig.js';
import { buildComponents, type ComponentFn, type RouteMapFn } from './buildComponents.js';
import { type HttpRequester } from './HttpHandlerFactory.js';

// ── Types ────────────────────────────────────────────────

export interface FromOpenApiOptions extends PartialOpenApiConfig {
    readonly routeMapFn?: RouteMapFn;
    readonly componentFn?: ComponentFn;
    /** Defaults to `fetch` */
    readonly requester?: HttpRequester;
    /** Extra options for the created server; `name`/`version` fall back to config, then the document */
    readonly serverOptions?: Partial<ToolServerOptions>;
}

// ── Public API ───────────────────────────────────────────

/**
 * @param input - YAML string, JSON string, or pre-parsed document
 * @throws If the document is not OpenAPI 3.x or no base URL is known
 * @throws {ConflictError} when two operations map to one component name
 */
export function fromOpenApi(input: string | object, options: FromOpenApiOptions = {}): ToolServer {
    const doc = parseOpenApi(input);
    const config = mergeOpenApiConfig(options);

    const baseUrl = config.baseUrl ?? doc.servers[0]?.url;
    if (baseUrl === undefined) {
        throw new Error(`No base URL for "${doc.title}": set "baseUrl" or declare "servers" in the document.`);
    }

    const components = buildComponents(doc.operations, {
        http: {
            baseUrl,
            headers: config.headers,
            ...(options.requester ? { requester: options.requester } : {}),
            ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
        },
        routeMaps: config.routeMaps,
        names: config.names,
        tags: config.tags,
        deprecated: config.deprecated,
        ...(options.routeMapFn ? { routeMapFn: options.routeMapFn } : {}),
        ...(options.componentFn ? { componentFn: options.componentFn } : {}),
    });

    const server = new ToolServer({
        ...options.serverOptions,
        name: options.serverOptions?.name ?? config.server.name ?? doc.title,
        version: options.serverOptions?.version ?? config.server.version ?? doc.version,
        ...(doc.description !== undefined && options.serverOptions?.instructions === undefined
            ? { instructions: doc.description }
            : {}),
    });
    server.registerAll(...components);
    return server;
}
