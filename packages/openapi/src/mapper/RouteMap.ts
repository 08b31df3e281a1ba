/**
 * RouteMap — Ordered Operation Classification Rules
 *
 * Decides which kind of component each HTTP operation becomes. Rules are
 * scanned in order and the first match wins; {@link DEFAULT_ROUTE_MAPS}
 * are always appended after the caller's rules.
 *
 * A rule matches an operation when all of these hold:
 * - its `methods` contain the operation's method, or are `'*'`
 * - its `pattern` matches the **whole** path
 * - it lists no `tags`, or the operation has at least one of them
 *
 * @example
 * ```typescript
 * const rules: RouteMap[] = [
 *     { methods: ['GET'], pattern: '/admin/.*', mcpType: 'exclude' },
 *     { methods: ['GET'], pattern: /\/reports\/[^/]+/, tags: ['public'], mcpType: 'resource' },
 * ];
 * classifyOperations(doc.operations, rules);
 * ```
 *
 * @module
 */
import { type HttpMethod, type HttpOperation } from '../parser/types.js';

// ── Types ────────────────────────────────────────────────

export type McpType = 'tool' | 'resource' | 'resource_template' | 'exclude';

export const MCP_TYPES: readonly McpType[] = ['tool', 'resource', 'resource_template', 'exclude'];

export interface RouteMap {
    readonly methods: readonly HttpMethod[] | '*';
    /** Regular expression over the path pattern, anchored at both ends when matched */
    readonly pattern: RegExp | string;
    readonly tags?: readonly string[];
    readonly mcpType: McpType;
}

export interface ClassifiedOperation {
    readonly operation: HttpOperation;
    readonly mcpType: Exclude<McpType, 'exclude'>;
}

// ── Defaults ─────────────────────────────────────────────

/** Parameterized paths become resource templates; everything else a tool. */
export const DEFAULT_ROUTE_MAPS: readonly RouteMap[] = Object.freeze([
    { methods: '*', pattern: '.*\\{[^}]+\\}.*', mcpType: 'resource_template' },
    { methods: '*', pattern: '.*', mcpType: 'tool' },
]);

// ── Matching ─────────────────────────────────────────────

/**
 * The kind assigned to one operation. Unreachable fallback is `'tool'`,
 * since the default rules end with a catch-all.
 */
export function classifyOperation(operation: HttpOperation, rules: readonly RouteMap[] = []): McpType {
    for (const rule of [...rules, ...DEFAULT_ROUTE_MAPS]) {
        if (matchesRule(rule, operation)) return rule.mcpType;
    }
    return 'tool';
}

/**
 * Classify every operation, in input order. Excluded operations are
 * dropped without error.
 */
export function classifyOperations(
    operations: readonly HttpOperation[],
    rules: readonly RouteMap[] = [],
): ClassifiedOperation[] {
    const out: ClassifiedOperation[] = [];
    for (const operation of operations) {
        const mcpType = classifyOperation(operation, rules);
        if (mcpType !== 'exclude') out.push({ operation, mcpType });
    }
    return out;
}

export function matchesRule(rule: RouteMap, operation: HttpOperation): boolean {
    if (rule.methods !== '*' && !rule.methods.includes(operation.method)) return false;
    if (!fullMatch(rule.pattern, operation.path)) return false;
    if (rule.tags && rule.tags.length > 0) {
        return rule.tags.some(tag => operation.tags.includes(tag));
    }
    return true;
}

function fullMatch(pattern: RegExp | string, path: string): boolean {
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
    return new RegExp(`^(?:${source})$`, flags).test(path);
}
