/**
 * RefResolver — JSON $ref Pointer Resolution
 *
 * Inlines local `$ref` pointers (`#/components/schemas/Pet`) throughout
 * an OpenAPI document. Nested references are followed; circular chains
 * are broken with a placeholder schema.
 *
 * @module
 */
import { isRecord } from '@tessera/core';

// ── Resolver ─────────────────────────────────────────────

/**
 * Return a copy of `doc` with every resolvable `$ref` replaced by its
 * target. The input is not modified.
 *
 * - A reference back into a chain that is still being resolved becomes
 *   `{ type: 'object', description: '[Circular: <ref>]' }`.
 * - A reference that points nowhere (or outside the document) becomes
 *   `{ type: 'string', description: '[Unresolved: <ref>]' }`.
 */
export function resolveRefs(doc: Record<string, unknown>): Record<string, unknown> {
    const resolved = resolveNode(doc, doc, new Set<string>());
    return isRecord(resolved) ? resolved : doc;
}

/**
 * Look up a JSON pointer in the document. `~1` and `~0` escapes are
 * decoded per RFC 6901.
 */
export function lookupRef(root: Record<string, unknown>, ref: string): unknown {
    if (!ref.startsWith('#/')) return undefined;

    let current: unknown = root;
    for (const raw of ref.slice(2).split('/')) {
        const part = raw.replace(/~1/g, '/').replace(/~0/g, '~');
        if (Array.isArray(current)) {
            current = current[Number(part)];
        } else if (isRecord(current)) {
            current = current[part];
        } else {
            return undefined;
        }
    }
    return current;
}

// ── Internal ─────────────────────────────────────────────

function resolveNode(node: unknown, root: Record<string, unknown>, resolving: Set<string>): unknown {
    if (Array.isArray(node)) {
        return node.map(item => resolveNode(item, root, resolving));
    }
    if (!isRecord(node)) return node;

    const ref = node['$ref'];
    if (typeof ref === 'string') {
        if (resolving.has(ref)) {
            return { type: 'object', description: `[Circular: ${ref}]` };
        }
        const target = lookupRef(root, ref);
        if (typeof target !== 'object' || target === null) {
            return { type: 'string', description: `[Unresolved: ${ref}]` };
        }
        resolving.add(ref);
        try {
            return resolveNode(target, root, resolving);
        } finally {
            resolving.delete(ref);
        }
    }

    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node)) {
        out[key] = resolveNode(value, root, resolving);
    }
    return out;
}
