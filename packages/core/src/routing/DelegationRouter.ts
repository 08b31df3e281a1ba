/**
 * DelegationRouter — Call-Time Resolution Across Mounts
 *
 * Resolves a possibly-prefixed identifier to its owner, in this order:
 *
 * ```
 * 1. own registry         exact key (resources: then own templates by match)
 * 2. prefixed mounts      the FIRST mount whose prefix matches is the only
 *                         one tried; the rest must resolve in that child,
 *                         else RoutingError with the prefix chain
 * 3. unprefixed mounts    in mount order, recursively
 * ```
 *
 * Resolution reads the registries and mount lists only; nothing is
 * cached, so a mount sees changes in its child on the next call.
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import {
    type ComponentBase,
    type PromptComponent,
    type ResourceComponent,
    type ResourceTemplateComponent,
    type ToolComponent,
} from '../domain/Component.js';
import { type LookupKind } from '../core/errors.js';
import { stripNamePrefix } from '../naming/NamePrefix.js';
import { stripResourcePrefix, type ResourcePrefixFormat } from '../naming/ResourcePrefix.js';
import { matchTemplate } from '../naming/UriTemplateMatcher.js';
import { type MountedServer } from '../composition/MountedServer.js';
import { type ComponentRegistry } from '../core/registry/ComponentRegistry.js';

// ── Types ────────────────────────────────────────────────

/** The parts of a server the router reads */
export interface RoutableServer {
    readonly registry: ComponentRegistry;
    readonly mounts: readonly MountedServer[];
    readonly resourcePrefixFormat: ResourcePrefixFormat;
    isVisible(component: ComponentBase): boolean;
}

/** How one lookup kind finds, inspects, and unprefixes its identifiers */
export interface Lookup<M> {
    readonly kind: LookupKind;
    findLocal(server: RoutableServer, identifier: string): M | undefined;
    componentOf(match: M): ComponentBase;
    strip(identifier: string, prefix: string, format: ResourcePrefixFormat): string | undefined;
}

export type Resolution<M> =
    | { readonly status: 'local'; readonly match: M }
    | {
        readonly status: 'mounted';
        readonly mount: MountedServer;
        /** The identifier relative to the mounted child */
        readonly identifier: string;
        /** The deepest owner's match, for visibility checks */
        readonly match: M;
    }
    | { readonly status: 'missing' }
    | { readonly status: 'broken'; readonly prefixChain: readonly string[] };

export type ResourceMatch =
    | { readonly kind: 'resource'; readonly component: ResourceComponent }
    | { readonly kind: 'template'; readonly component: ResourceTemplateComponent; readonly params: Record<string, string> };

// ── Lookups ──────────────────────────────────────────────

export const toolLookup: Lookup<ToolComponent> = {
    kind: 'tool',
    findLocal: (server, name) => visibleOrUndefined(server, server.registry.tools.get(name)),
    componentOf: tool => tool,
    strip: (name, prefix) => stripNamePrefix(name, prefix),
};

export const promptLookup: Lookup<PromptComponent> = {
    kind: 'prompt',
    findLocal: (server, name) => visibleOrUndefined(server, server.registry.prompts.get(name)),
    componentOf: prompt => prompt,
    strip: (name, prefix) => stripNamePrefix(name, prefix),
};

export const resourceLookup: Lookup<ResourceMatch> = {
    kind: 'resource',
    findLocal(server, uri) {
        const resource = visibleOrUndefined(server, server.registry.resources.get(uri));
        if (resource) return { kind: 'resource', component: resource };
        for (const template of server.registry.templates.values()) {
            if (!server.isVisible(template)) continue;
            const params = matchTemplate(template.uriTemplate, uri);
            if (params) return { kind: 'template', component: template, params };
        }
        return undefined;
    },
    componentOf: match => match.component,
    strip: stripResourcePrefix,
};

// ── Resolution ───────────────────────────────────────────

export function locate<M>(server: RoutableServer, identifier: string, lookup: Lookup<M>): Resolution<M> {
    const local = lookup.findLocal(server, identifier);
    if (local !== undefined) return { status: 'local', match: local };

    for (const mount of server.mounts) {
        if (!mount.prefix) continue;
        const stripped = lookup.strip(identifier, mount.prefix, server.resourcePrefixFormat);
        if (stripped === undefined) continue;

        const inner = locate(mount.server, stripped, lookup);
        switch (inner.status) {
            case 'local':
            case 'mounted':
                if (server.isVisible(lookup.componentOf(inner.match))) {
                    return { status: 'mounted', mount, identifier: stripped, match: inner.match };
                }
                return { status: 'broken', prefixChain: [mount.prefix] };
            case 'broken':
                return { status: 'broken', prefixChain: [mount.prefix, ...inner.prefixChain] };
            case 'missing':
                return { status: 'broken', prefixChain: [mount.prefix] };
        }
    }

    let broken: Resolution<M> | undefined;
    for (const mount of server.mounts) {
        if (mount.prefix) continue;
        const inner = locate(mount.server, identifier, lookup);
        if (inner.status === 'local' || inner.status === 'mounted') {
            if (server.isVisible(lookup.componentOf(inner.match))) {
                return { status: 'mounted', mount, identifier, match: inner.match };
            }
            continue;
        }
        if (inner.status === 'broken' && !broken) broken = inner;
    }

    return broken ?? { status: 'missing' };
}

function visibleOrUndefined<C extends ComponentBase>(server: RoutableServer, component: C | undefined): C | undefined {
    return component && server.isVisible(component) ? component : undefined;
}
