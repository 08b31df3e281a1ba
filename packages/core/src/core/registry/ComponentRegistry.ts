/**
 * ComponentRegistry — Per-Kind Component Collections
 *
 * Holds one {@link ComponentCollection} per component kind. Tools and
 * prompts are keyed by name, resources by URI, resource templates by URI
 * template. Within one kind a key is unique; what happens on a second
 * registration under the same key is the registry's {@link DuplicatePolicy},
 * fixed when the registry is built.
 *
 * @example
 * ```typescript
 * import { ComponentRegistry, defineTool } from '@tessera/core';
 *
 * const registry = new ComponentRegistry('warn');
 * registry.add(defineTool({ name: 'ping', handler: async () => 'pong' }));
 *
 * registry.tools.has('ping');  // true
 * registry.size;               // 1
 * ```
 *
 * @module
 */
import {
    type Component,
    type ComponentKind,
    type ToolComponent,
    type ResourceComponent,
    type ResourceTemplateComponent,
    type PromptComponent,
    componentKey,
} from '../../domain/Component.js';
import { ConflictError } from '../errors.js';

// ── Types ────────────────────────────────────────────────

/**
 * What a registry does when a key is registered twice within one kind.
 *
 * - `'error'`   — throw {@link ConflictError} (default)
 * - `'replace'` — the new component wins silently
 * - `'warn'`    — the new component wins, a warning is printed
 * - `'ignore'`  — the existing component is kept
 */
export type DuplicatePolicy = 'error' | 'replace' | 'warn' | 'ignore';

/** Outcome of {@link ComponentCollection.add} */
export type AddOutcome = 'added' | 'replaced' | 'ignored';

// ============================================================================
// ComponentCollection
// ============================================================================

/**
 * Insertion-ordered map of components of one kind.
 *
 * A replaced component keeps its original position, so enumeration order
 * only changes when a key is removed and added again.
 */
export class ComponentCollection<T extends Component> {
    private readonly _items = new Map<string, T>();

    constructor(
        readonly kind: ComponentKind,
        private readonly _policy: DuplicatePolicy,
    ) {}

    add(component: T): AddOutcome {
        const key = componentKey(component);
        if (!this._items.has(key)) {
            this._items.set(key, component);
            return 'added';
        }
        switch (this._policy) {
            case 'error':
                throw new ConflictError(this.kind, key);
            case 'ignore':
                return 'ignored';
            case 'warn':
                console.warn(`[tessera] Duplicate ${this.kind} "${key}": replacing the existing registration.`);
                this._items.set(key, component);
                return 'replaced';
            case 'replace':
                this._items.set(key, component);
                return 'replaced';
        }
    }

    /**
     * Swap an existing entry in place, bypassing the duplicate policy.
     * Returns `false` when the key is absent.
     */
    replace(component: T): boolean {
        const key = componentKey(component);
        if (!this._items.has(key)) return false;
        this._items.set(key, component);
        return true;
    }

    get(key: string): T | undefined {
        return this._items.get(key);
    }

    has(key: string): boolean {
        return this._items.has(key);
    }

    remove(key: string): boolean {
        return this._items.delete(key);
    }

    values(): IterableIterator<T> {
        return this._items.values();
    }

    get size(): number {
        return this._items.size;
    }

    clear(): void {
        this._items.clear();
    }
}

// ============================================================================
// ComponentRegistry
// ============================================================================

export class ComponentRegistry {
    readonly tools: ComponentCollection<ToolComponent>;
    readonly resources: ComponentCollection<ResourceComponent>;
    readonly templates: ComponentCollection<ResourceTemplateComponent>;
    readonly prompts: ComponentCollection<PromptComponent>;

    constructor(readonly policy: DuplicatePolicy = 'error') {
        this.tools = new ComponentCollection('tool', policy);
        this.resources = new ComponentCollection('resource', policy);
        this.templates = new ComponentCollection('resource_template', policy);
        this.prompts = new ComponentCollection('prompt', policy);
    }

    /** Route a component to the collection of its kind. */
    add(component: Component): AddOutcome {
        switch (component.kind) {
            case 'tool': return this.tools.add(component);
            case 'resource': return this.resources.add(component);
            case 'resource_template': return this.templates.add(component);
            case 'prompt': return this.prompts.add(component);
        }
    }

    /**
     * Add several components in order. Components before a failing one
     * stay registered.
     */
    addAll(components: Iterable<Component>): void {
        for (const component of components) this.add(component);
    }

    /** Remove a component by kind and key. */
    remove(kind: ComponentKind, key: string): boolean {
        return this._collection(kind).remove(key);
    }

    get size(): number {
        return this.tools.size + this.resources.size + this.templates.size + this.prompts.size;
    }

    clear(): void {
        this.tools.clear();
        this.resources.clear();
        this.templates.clear();
        this.prompts.clear();
    }

    private _collection(kind: ComponentKind): ComponentCollection<Component> {
        switch (kind) {
            case 'tool': return this.tools;
            case 'resource': return this.resources;
            case 'resource_template': return this.templates;
            case 'prompt': return this.prompts;
        }
    }
}
