/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('tessera')` can be passed
 * directly without an `@opentelemetry/*` dependency.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const server = new ToolServer({ name: 'gateway', tracing: trace.getTracer('tessera') });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0) — lookup misses and argument validation failures
 * - `OK` (1) — successful execution
 * - `ERROR` (2) — the component threw
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/** Matches OpenTelemetry's `SpanAttributeValue`. */
export type TesseraAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Structural subtype of OTel's `Span`. */
export interface TesseraSpan {
    setAttribute(key: string, value: TesseraAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Optional: not all tracer implementations support events */
    addEvent?(name: string, attributes?: Record<string, TesseraAttributeValue>): void;
    /** Called exactly once, in a `finally` block */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Structural subtype of OTel's `Tracer`. */
export interface TesseraTracer {
    startSpan(name: string, options?: { attributes?: Record<string, TesseraAttributeValue> }): TesseraSpan;
}
