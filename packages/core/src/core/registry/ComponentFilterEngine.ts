/**
 * ComponentFilterEngine — Tag-Based Visibility Strategy
 *
 * Decides whether a component is exposed, by tag criteria with AND, OR,
 * and exclusion logic. Disabled components are never visible.
 *
 * Pure-function module: no state, no side effects.
 */
import { type ComponentBase } from '../../domain/Component.js';

// ── Types ────────────────────────────────────────────────

/** Filter options for selective component exposure */
export interface ComponentFilter {
    /** Only include components that have ALL these tags (AND logic) */
    readonly tags?: readonly string[] | undefined;
    /** Only include components that have at least ONE of these tags (OR logic) */
    readonly anyTag?: readonly string[] | undefined;
    /** Exclude components that have ANY of these tags */
    readonly exclude?: readonly string[] | undefined;
}

export type VisibilityPredicate = (component: ComponentBase) => boolean;

// ── Filter Engine ────────────────────────────────────────

/**
 * Compile a filter into a predicate.
 *
 * Filter arrays are converted to Sets once, so the returned predicate
 * does O(1) tag lookups.
 */
export function compileFilter(filter: ComponentFilter = {}): VisibilityPredicate {
    const requiredTags = filter.tags && filter.tags.length > 0
        ? new Set(filter.tags) : undefined;
    const anyTags = filter.anyTag && filter.anyTag.length > 0
        ? new Set(filter.anyTag) : undefined;
    const excludeTags = filter.exclude && filter.exclude.length > 0
        ? new Set(filter.exclude) : undefined;

    return (component) => {
        if (!component.enabled) return false;
        const tags = component.tags;

        if (requiredTags && !Array.from(requiredTags).every(t => tags.includes(t))) {
            return false;
        }
        if (anyTags && !tags.some(t => anyTags.has(t))) {
            return false;
        }
        if (excludeTags && tags.some(t => excludeTags.has(t))) {
            return false;
        }
        return true;
    };
}

/** Keep the visible components, preserving order. */
export function filterComponents<T extends ComponentBase>(
    components: Iterable<T>,
    filter: ComponentFilter,
): T[] {
    const visible = compileFilter(filter);
    const out: T[] = [];
    for (const component of components) {
        if (visible(component)) out.push(component);
    }
    return out;
}
