/**
 * OpenApiConfig — Configuration for OpenAPI-Derived Servers
 *
 * Controls where derived components send their requests, how operations
 * are classified and named, and how the resulting {@link ToolServer} is
 * identified.
 *
 * Can be loaded from a file (`tessera-openapi.yaml`) or passed
 * programmatically. All fields have defaults; see {@link DEFAULT_OPENAPI_CONFIG}.
 *
 * @module
 */
import { type RouteMap } from '../mapper/RouteMap.js';

// ── Server Config ────────────────────────────────────────

export interface OpenApiServerConfig {
    /** Defaults to the document's `info.title` */
    readonly name?: string;
    /** Defaults to the document's `info.version` */
    readonly version?: string;
}

// ── Full Config ──────────────────────────────────────────

export interface OpenApiConfig {
    /** Request base URL; defaults to the document's first `servers` entry */
    readonly baseUrl?: string;
    /** Sent with every request, e.g. an `authorization` header */
    readonly headers: Readonly<Record<string, string>>;
    /** Checked in order before {@link DEFAULT_ROUTE_MAPS} */
    readonly routeMaps: readonly RouteMap[];
    /** operationId → component name */
    readonly names: Readonly<Record<string, string>>;
    /** Added to every derived component */
    readonly tags: readonly string[];
    readonly deprecated: 'include' | 'skip';
    /** Per-request timeout; unset means no timeout */
    readonly timeoutMs?: number;
    readonly server: OpenApiServerConfig;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_OPENAPI_CONFIG: OpenApiConfig = {
    headers: {},
    routeMaps: [],
    names: {},
    tags: [],
    deprecated: 'include',
    server: {},
};

// ── Merge Helper ─────────────────────────────────────────

/** Partial config shape for merging */
export interface PartialOpenApiConfig {
    readonly baseUrl?: string;
    readonly headers?: Readonly<Record<string, string>>;
    readonly routeMaps?: readonly RouteMap[];
    readonly names?: Readonly<Record<string, string>>;
    readonly tags?: readonly string[];
    readonly deprecated?: 'include' | 'skip';
    readonly timeoutMs?: number;
    readonly server?: OpenApiServerConfig;
}

/**
 * Merge a partial config over `base` (the defaults unless given).
 * Headers, names, and server fields merge key by key; lists replace.
 */
export function mergeOpenApiConfig(
    partial: PartialOpenApiConfig,
    base: OpenApiConfig = DEFAULT_OPENAPI_CONFIG,
): OpenApiConfig {
    const baseUrl = partial.baseUrl ?? base.baseUrl;
    const timeoutMs = partial.timeoutMs ?? base.timeoutMs;
    return {
        ...(baseUrl !== undefined ? { baseUrl } : {}),
        headers: { ...base.headers, ...partial.headers },
        routeMaps: partial.routeMaps ?? base.routeMaps,
        names: { ...base.names, ...partial.names },
        tags: partial.tags ?? base.tags,
        deprecated: partial.deprecated ?? base.deprecated,
        ...(timeoutMs !== undefined ? { timeoutMs } : {}),
        server: {
            ...base.server,
            ...(partial.server?.name !== undefined ? { name: partial.server.name } : {}),
            ...(partial.server?.version !== undefined ? { version: partial.server.version } : {}),
        },
    };
}
