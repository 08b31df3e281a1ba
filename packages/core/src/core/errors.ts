/**
 * Errors — Typed Failure Taxonomy
 *
 * Every failure raised by the registry, the prefixing utility, the
 * composition engine, the router, or an HTTP-backed component is one of
 * these classes. Callers branch on `instanceof` or on `code`.
 *
 * ```
 * TesseraError
 * ├── FormatError          malformed resource identifier
 * ├── ConflictError        duplicate key at registration / mount time
 * ├── NotFoundError        lookup failure at call time
 * │   └── RoutingError     a prefix matched but the child could not resolve
 * └── ToolExecutionError   a component ran and failed
 *     ├── ValidationError  arguments rejected before the handler ran
 *     └── UpstreamCallError non-2xx response from an HTTP-backed component
 * ```
 *
 * @module
 */
import { type ComponentKind } from '../domain/Component.js';

// ── Codes ────────────────────────────────────────────────

export type ErrorCode =
    | 'FORMAT_ERROR'
    | 'CONFLICT'
    | 'NOT_FOUND'
    | 'ROUTING_ERROR'
    | 'TOOL_EXECUTION'
    | 'VALIDATION'
    | 'UPSTREAM_CALL';

/**
 * Kind label used in lookup errors. `resource` covers both static
 * resources and resource templates, since a read request names a URI.
 */
export type LookupKind = 'tool' | 'resource' | 'prompt';

// ── Base ─────────────────────────────────────────────────

export class TesseraError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TesseraError';
        this.code = code;
    }
}

// ── Setup-time ───────────────────────────────────────────

/** A resource URI does not have the `scheme://path` shape, or lacks the expected prefix. */
export class FormatError extends TesseraError {
    readonly uri: string;

    constructor(uri: string, message: string) {
        super('FORMAT_ERROR', message);
        this.name = 'FormatError';
        this.uri = uri;
    }
}

/**
 * Registration collided with an existing key.
 *
 * `kind` is a component kind for registry collisions, `'operation'` for
 * two HTTP operations mapping to one name, and `'mount'` for self or
 * cyclic mounts.
 */
export class ConflictError extends TesseraError {
    readonly kind: ComponentKind | 'operation' | 'mount';
    readonly key: string;

    constructor(kind: ComponentKind | 'operation' | 'mount', key: string, message?: string) {
        super('CONFLICT', message ?? `${kindLabel(kind)} "${key}" is already registered.`);
        this.name = 'ConflictError';
        this.kind = kind;
        this.key = key;
    }
}

// ── Call-time ────────────────────────────────────────────

export class NotFoundError extends TesseraError {
    readonly kind: LookupKind;
    readonly identifier: string;

    constructor(kind: LookupKind, identifier: string, message?: string, code: ErrorCode = 'NOT_FOUND') {
        super(code, message ?? `Unknown ${kind}: "${identifier}".`);
        this.name = 'NotFoundError';
        this.kind = kind;
        this.identifier = identifier;
    }
}

/**
 * The identifier carried a mount prefix, but the mounted server (or one
 * of its own prefixed mounts) had nothing under the remaining name.
 *
 * `prefixChain` lists every prefix that was stripped, outermost first.
 */
export class RoutingError extends NotFoundError {
    readonly prefixChain: readonly string[];

    constructor(kind: LookupKind, identifier: string, prefixChain: readonly string[]) {
        super(
            kind,
            identifier,
            `Cannot route ${kind} "${identifier}": no match below prefix chain [${prefixChain.join(' > ')}].`,
            'ROUTING_ERROR',
        );
        this.name = 'RoutingError';
        this.prefixChain = Object.freeze([...prefixChain]);
    }
}

export class ToolExecutionError extends TesseraError {
    constructor(message: string, options?: { cause?: unknown }, code: ErrorCode = 'TOOL_EXECUTION') {
        super(code, message, options);
        this.name = 'ToolExecutionError';
    }
}

export class ValidationError extends ToolExecutionError {
    /** Flattened issue list, one `path: message` entry per problem */
    readonly issues: readonly string[];

    constructor(target: string, issues: readonly string[]) {
        super(`Invalid arguments for "${target}": ${issues.join('; ')}`, undefined, 'VALIDATION');
        this.name = 'ValidationError';
        this.issues = Object.freeze([...issues]);
    }
}

/** An HTTP-backed component received a non-2xx response. */
export class UpstreamCallError extends ToolExecutionError {
    readonly status: number;
    readonly statusText: string;
    readonly body: unknown;
    readonly method: string;
    readonly url: string;

    constructor(init: {
        status: number;
        statusText: string;
        body: unknown;
        method: string;
        url: string;
    }) {
        const detail = typeof init.body === 'string' ? init.body : JSON.stringify(init.body);
        super(`HTTP ${init.status} ${init.statusText} from ${init.method} ${init.url}: ${detail}`, undefined, 'UPSTREAM_CALL');
        this.name = 'UpstreamCallError';
        this.status = init.status;
        this.statusText = init.statusText;
        this.body = init.body;
        this.method = init.method;
        this.url = init.url;
    }
}

// ── Helpers ──────────────────────────────────────────────

function kindLabel(kind: ComponentKind | 'operation' | 'mount'): string {
    switch (kind) {
        case 'tool': return 'Tool';
        case 'resource': return 'Resource';
        case 'resource_template': return 'Resource template';
        case 'prompt': return 'Prompt';
        case 'operation': return 'Operation';
        case 'mount': return 'Mount';
    }
}

/** Extract a printable message from any thrown value. */
export function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
