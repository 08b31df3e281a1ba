/**
 * MiddlewareCompiler — Invocation Middleware Chain
 *
 * Wraps middlewares right-to-left around an invocation, so the first
 * registered middleware is the outermost. A middleware may inspect the
 * request, refuse it by throwing, or transform the result of `next()`.
 *
 * Pure-function module: no state, no side effects.
 */
import { type ComponentKind } from '../../domain/Component.js';

// ── Public API ───────────────────────────────────────────

/** What is being invoked, as seen by middleware */
export interface InvocationRequest {
    readonly kind: Exclude<ComponentKind, 'resource_template'>;
    /** Tool/prompt name or resource URI, as the caller addressed it */
    readonly identifier: string;
    readonly args: Readonly<Record<string, unknown>>;
    readonly signal?: AbortSignal | undefined;
}

export type InvocationMiddleware = <R>(
    request: InvocationRequest,
    next: () => Promise<R>,
) => Promise<R>;

/**
 * Wrap an invocation with a middleware stack (right-to-left composition).
 *
 * @param invoke - The innermost call
 * @param middlewares - Middleware stack, outermost first
 */
export function wrapChain<R>(
    request: InvocationRequest,
    invoke: () => Promise<R>,
    middlewares: readonly InvocationMiddleware[],
): () => Promise<R> {
    let chain = invoke;

    for (let i = middlewares.length - 1; i >= 0; i--) {
        const mw = middlewares[i];
        if (!mw) continue;
        const nextFn = chain;
        chain = () => mw(request, nextFn);
    }

    return chain;
}
