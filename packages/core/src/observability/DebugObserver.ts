/**
 * DebugObserver — Opt-In Structured Debug Events
 *
 * Typed events emitted while components are registered, servers are
 * mounted, and calls are routed and executed. When no observer is
 * configured nothing is emitted.
 *
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { ToolServer, createDebugObserver } from '@tessera/core';
 *
 * // Default: compact console.debug output
 * const server = new ToolServer({ name: 'gateway', debug: createDebugObserver() });
 *
 * // Custom handler (e.g. send to telemetry)
 * const server = new ToolServer({
 *     name: 'gateway',
 *     debug: createDebugObserver((event) => telemetry.track(event.type, event)),
 * });
 * ```
 *
 * @module
 */
import { type ComponentKind } from '../domain/Component.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** A component was added to a server's own registry. */
export interface RegisterEvent {
    readonly type: 'register';
    readonly server: string;
    readonly kind: ComponentKind;
    readonly key: string;
    readonly outcome: 'added' | 'replaced' | 'ignored';
    readonly timestamp: number;
}

/** A child server was mounted, unmounted, or imported. */
export interface MountEvent {
    readonly type: 'mount';
    readonly server: string;
    readonly child: string;
    readonly action: 'mount' | 'unmount' | 'import';
    readonly prefix?: string | undefined;
    readonly mode?: 'direct' | 'proxy' | undefined;
    readonly timestamp: number;
}

/** A call was resolved to its owner. */
export interface RouteEvent {
    readonly type: 'route';
    readonly server: string;
    readonly kind: ComponentKind;
    readonly identifier: string;
    /** `'local'`, or the prefix (or `'*'` when unprefixed) of the owning mount */
    readonly target: string;
    readonly mode?: 'direct' | 'proxy' | undefined;
    readonly timestamp: number;
}

/** A local component finished executing. */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly server: string;
    readonly kind: ComponentKind;
    readonly identifier: string;
    readonly durationMs: number;
    /** Whether a tool returned an `isError` result */
    readonly isError: boolean;
    readonly timestamp: number;
}

/** A call failed. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly server: string;
    readonly kind: ComponentKind;
    readonly identifier: string;
    readonly error: string;
    readonly step: 'route' | 'execute';
    readonly timestamp: number;
}

export type DebugEvent =
    | RegisterEvent
    | MountEvent
    | RouteEvent
    | ExecuteEvent
    | ErrorEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead:
 *
 * ```
 * [tessera] register  gateway tool ping (added)
 * [tessera] route     gateway tool analytics_report → analytics (proxy)
 * [tessera] execute   analytics tool report ✓ 12.0ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[tessera]';

        switch (event.type) {
            case 'register':
                console.debug(`${prefix} register  ${event.server} ${event.kind} ${event.key} (${event.outcome})`);
                break;

            case 'mount': {
                const as = event.prefix ? ` as ${event.prefix}` : '';
                const mode = event.mode ? ` (${event.mode})` : '';
                console.debug(`${prefix} ${event.action.padEnd(9)} ${event.server} ← ${event.child}${as}${mode}`);
                break;
            }

            case 'route': {
                const mode = event.mode ? ` (${event.mode})` : '';
                console.debug(`${prefix} route     ${event.server} ${event.kind} ${event.identifier} → ${event.target}${mode}`);
                break;
            }

            case 'execute': {
                const icon = event.isError ? '✗' : '✓';
                console.debug(`${prefix} execute   ${event.server} ${event.kind} ${event.identifier} ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${prefix} error     ${event.server} ${event.kind} ${event.identifier} [${event.step}] ${event.error}`);
                break;
        }
    };
}
