/**
 * MCP Tool Annotations — behavioral hints for clients.
 *
 * Forwarded verbatim in `tools/list`. HTTP-derived tools get these
 * inferred from the request method.
 *
 * @example
 * ```typescript
 * import { createToolAnnotations } from '@tessera/core';
 *
 * const annotations = createToolAnnotations({
 *     title: 'Delete Order',
 *     destructiveHint: true,
 * });
 * ```
 */
export interface ToolAnnotations {
    /** Human-readable display title for the tool */
    readonly title?: string;
    /** Hint that this tool only reads data (no side effects) */
    readonly readOnlyHint?: boolean;
    /** Hint that this tool may cause irreversible changes */
    readonly destructiveHint?: boolean;
    /** Hint that calling this tool multiple times has the same effect */
    readonly idempotentHint?: boolean;
    /** Hint that the tool may access external/uncontrolled systems */
    readonly openWorldHint?: boolean;
}

/**
 * Create ToolAnnotations from partial properties, dropping unset hints.
 */
export function createToolAnnotations(props: ToolAnnotations = {}): ToolAnnotations {
    const out: { -readonly [K in keyof ToolAnnotations]: ToolAnnotations[K] } = {};
    if (props.title !== undefined) out.title = props.title;
    if (props.readOnlyHint !== undefined) out.readOnlyHint = props.readOnlyHint;
    if (props.destructiveHint !== undefined) out.destructiveHint = props.destructiveHint;
    if (props.idempotentHint !== undefined) out.idempotentHint = props.idempotentHint;
    if (props.openWorldHint !== undefined) out.openWorldHint = props.openWorldHint;
    return out;
}
