/**
 * HttpHandlerFactory — Runtime HTTP Proxy Builder
 *
 * Builds the function behind every OpenAPI-derived component: it turns
 * component arguments into an HTTP request, sends it through an
 * {@link HttpRequester}, and decodes the response.
 *
 * The handler:
 * 1. Substitutes path arguments (URL-encoded) into the path pattern
 * 2. Appends query arguments
 * 3. Sends header and cookie arguments, on top of the configured headers
 * 4. Sends a JSON body, except for GET, HEAD, and DELETE
 * 5. Decodes JSON when the response says so, text otherwise
 *
 * Non-2xx responses raise {@link UpstreamCallError} with the decoded body.
 *
 * @module
 */
import { UpstreamCallError, ValidationError, type CallContext } from '@tessera/core';
import { type HttpMethod, type HttpOperation } from '../parser/types.js';
import { BODY_ARGUMENT, type ArgumentBinding, type OperationInput } from '../schema/InputSchemaBuilder.js';

// ── Types ────────────────────────────────────────────────

export interface HttpRequest {
    readonly method: HttpMethod;
    readonly url: string;
    readonly headers: Readonly<Record<string, string>>;
    readonly body?: string;
    readonly signal?: AbortSignal;
}

export interface HttpResponse {
    readonly status: number;
    readonly statusText: string;
    /** `content-type` header value, `''` when absent */
    readonly contentType: string;
    readonly text: string;
}

/** The only way components reach the network; tests pass a stub. */
export type HttpRequester = (request: HttpRequest) => Promise<HttpResponse>;

/** Runtime context shared by every handler of one document */
export interface HttpContext {
    readonly baseUrl: string;
    readonly headers?: Readonly<Record<string, string>>;
    /** Defaults to {@link fetchRequester} */
    readonly requester?: HttpRequester;
    /** Abort the request after this many milliseconds */
    readonly timeoutMs?: number;
}

export interface HttpResult {
    readonly status: number;
    readonly contentType: string;
    /** Parsed JSON, or the raw text */
    readonly body: unknown;
}

export type OperationHandler = (args: Record<string, unknown>, ctx: CallContext) => Promise<HttpResult>;

// ── Default Requester ────────────────────────────────────

export const fetchRequester: HttpRequester = async (request) => {
    const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
    });
    return {
        status: response.status,
        statusText: response.statusText,
        contentType: response.headers.get('content-type') ?? '',
        text: await response.text(),
    };
};

// ── Factory ──────────────────────────────────────────────

/**
 * Build the handler for one operation.
 *
 * @param label - Component name, used in validation messages
 */
export function buildHandler(
    operation: HttpOperation,
    input: OperationInput,
    http: HttpContext,
    label: string,
): OperationHandler {
    const requester = http.requester ?? fetchRequester;

    return async (args, ctx) => {
        const request = buildRequest(operation, input, http, label, args);
        const response = await withTimeout(http.timeoutMs, ctx.signal, signal =>
            requester(signal ? { ...request, signal } : request));

        const body = decodeBody(response);
        if (response.status < 200 || response.status >= 300) {
            throw new UpstreamCallError({
                status: response.status,
                statusText: response.statusText,
                body,
                method: request.method,
                url: request.url,
            });
        }
        return { status: response.status, contentType: response.contentType, body };
    };
}

/** Assemble the request for one call, without sending it. */
export function buildRequest(
    operation: HttpOperation,
    input: OperationInput,
    http: HttpContext,
    label: string,
    args: Record<string, unknown>,
): HttpRequest {
    const byArgument = (source: ArgumentBinding['source']) =>
        input.bindings.filter(b => b.source === source && args[b.argument] !== undefined);

    // ── Path ──
    const pathValues = new Map<string, unknown>();
    for (const b of byArgument('path')) pathValues.set(b.name, args[b.argument]);
    const missing: string[] = [];
    const path = operation.path.replace(/\{([^}]+)\}/g, (_match, name: string) => {
        const value = pathValues.get(name);
        if (value === undefined) {
            missing.push(`${name}: Required`);
            return '';
        }
        return encodeURIComponent(String(value));
    });
    if (missing.length > 0) throw new ValidationError(label, missing);

    // ── Query ──
    const query = new URLSearchParams();
    for (const b of byArgument('query')) {
        const value = args[b.argument];
        for (const item of Array.isArray(value) ? value : [value]) {
            query.append(b.name, stringify(item));
        }
    }
    const qs = query.toString();
    const url = `${http.baseUrl.replace(/\/+$/, '')}${path}${qs ? `?${qs}` : ''}`;

    // ── Headers ──
    const headers: Record<string, string> = { accept: 'application/json', ...http.headers };
    for (const b of byArgument('header')) headers[b.name] = stringify(args[b.argument]);
    const cookies = byArgument('cookie').map(b => `${b.name}=${encodeURIComponent(stringify(args[b.argument]))}`);
    if (cookies.length > 0) headers['cookie'] = cookies.join('; ');

    // ── Body ──
    const body = sendsBody(operation.method) ? encodeBody(input, args) : undefined;
    if (body !== undefined) headers['content-type'] = 'application/json';

    return {
        method: operation.method,
        url,
        headers,
        ...(body !== undefined ? { body } : {}),
    };
}

// ── Helpers ──────────────────────────────────────────────

function sendsBody(method: HttpMethod): boolean {
    return method !== 'GET' && method !== 'HEAD' && method !== 'DELETE';
}

function encodeBody(input: OperationInput, args: Record<string, unknown>): string | undefined {
    switch (input.bodyMode) {
        case 'none':
            return undefined;
        case 'whole': {
            const value = args[BODY_ARGUMENT];
            return value === undefined ? undefined : JSON.stringify(value);
        }
        case 'flat': {
            const body: Record<string, unknown> = {};
            for (const b of input.bindings) {
                if (b.source === 'body' && args[b.argument] !== undefined) body[b.name] = args[b.argument];
            }
            return Object.keys(body).length > 0 ? JSON.stringify(body) : undefined;
        }
    }
}

function stringify(value: unknown): string {
    return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Decode a response body. JSON content types are parsed; a body that
 * claims JSON but does not parse is kept as text.
 */
export function decodeBody(response: HttpResponse): unknown {
    if (!/\bjson\b/i.test(response.contentType) || response.text.length === 0) {
        return response.text;
    }
    try {
        const parsed: unknown = JSON.parse(response.text);
        return parsed;
    } catch {
        return response.text;
    }
}

/**
 * Run `send` with a signal that fires on the caller's abort or after
 * `timeoutMs`, whichever comes first.
 */
async function withTimeout<T>(
    timeoutMs: number | undefined,
    outer: AbortSignal | undefined,
    send: (signal: AbortSignal | undefined) => Promise<T>,
): Promise<T> {
    if (timeoutMs === undefined) return send(outer);

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(outer?.reason);
    if (outer?.aborted) onAbort();
    outer?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(
        () => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)),
        timeoutMs,
    );
    try {
        return await send(controller.signal);
    } finally {
        clearTimeout(timer);
        outer?.removeEventListener('abort', onAbort);
    }
}
