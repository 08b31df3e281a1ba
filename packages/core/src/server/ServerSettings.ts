/**
 * ServerSettings — Resolved Configuration of a ToolServer
 *
 * {@link ToolServerOptions} carries the programmatic options; the subset
 * with defaults is merged into a {@link ServerSettings} record once, at
 * construction.
 *
 * @module
 */
import { type DuplicatePolicy } from '../core/registry/ComponentRegistry.js';
import { type ComponentFilter } from '../core/registry/ComponentFilterEngine.js';
import { type ResourcePrefixFormat } from '../naming/ResourcePrefix.js';
import { type CallContext } from '../domain/Component.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type TesseraTracer } from '../observability/Tracing.js';

// ── Lifespan ─────────────────────────────────────────────

/**
 * Startup/teardown hooks. A server with a lifespan is mounted in PROXY
 * mode by default, so its hooks run when a parent first dispatches to it.
 */
export interface Lifespan {
    readonly onStart?: () => Promise<void> | void;
    readonly onStop?: () => Promise<void> | void;
}

// ── Options ──────────────────────────────────────────────

export interface ToolServerOptions {
    /** Server name shown to MCP clients and in debug output */
    readonly name: string;
    readonly version?: string;
    /** Sent to clients in the initialize result */
    readonly instructions?: string;
    /** Duplicate-key policy of the server's own registry (default `'error'`) */
    readonly onDuplicate?: DuplicatePolicy;
    /** How mount prefixes are applied to resource URIs (default `'path'`) */
    readonly resourcePrefixFormat?: ResourcePrefixFormat;
    readonly lifespan?: Lifespan;
    /**
     * Whether a parent must preserve this server's lifecycle when mounting
     * it. Defaults to `true` when a lifespan is given.
     */
    readonly observableLifecycle?: boolean;
    /** Tag filter deciding which components are exposed */
    readonly filter?: ComponentFilter;
    readonly debug?: DebugObserverFn;
    readonly tracing?: TesseraTracer;
}

/** Everything in {@link ToolServerOptions} that has a default */
export interface ServerSettings {
    readonly version: string;
    readonly onDuplicate: DuplicatePolicy;
    readonly resourcePrefixFormat: ResourcePrefixFormat;
    readonly filter: ComponentFilter;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_SETTINGS: ServerSettings = {
    version: '1.0.0',
    onDuplicate: 'error',
    resourcePrefixFormat: 'path',
    filter: {},
};

// ── Merge Helper ─────────────────────────────────────────

/** Override defaults with whatever the options set. */
export function mergeSettings(partial: Partial<ServerSettings> = {}): ServerSettings {
    return {
        version: partial.version ?? DEFAULT_SETTINGS.version,
        onDuplicate: partial.onDuplicate ?? DEFAULT_SETTINGS.onDuplicate,
        resourcePrefixFormat: partial.resourcePrefixFormat ?? DEFAULT_SETTINGS.resourcePrefixFormat,
        filter: {
            ...(partial.filter?.tags !== undefined ? { tags: [...partial.filter.tags] } : {}),
            ...(partial.filter?.anyTag !== undefined ? { anyTag: [...partial.filter.anyTag] } : {}),
            ...(partial.filter?.exclude !== undefined ? { exclude: [...partial.filter.exclude] } : {}),
        },
    };
}

/** Options accepted by every public call entry point */
export type CallOptions = CallContext;
