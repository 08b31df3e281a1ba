/**
 * prefixComponent — Child Components in the Parent's Namespace
 *
 * Derives the record a parent exposes for a component owned by a mounted
 * or imported child: the key is prefixed, and for PROXY mounts the
 * callable is replaced by one that forwards through the mount's session.
 * The child's records are never mutated.
 *
 * @module
 */
import {
    type CallContext,
    type Component,
    type PromptComponent,
    type ResourceBody,
    type ResourceComponent,
    type ResourceReadResult,
    type ResourceTemplateComponent,
    type ToolComponent,
} from '../domain/Component.js';
import { addNamePrefix } from '../naming/NamePrefix.js';
import { addResourcePrefix, type ResourcePrefixFormat } from '../naming/ResourcePrefix.js';
import { expandTemplate } from '../naming/UriTemplateMatcher.js';
import { ToolExecutionError } from '../core/errors.js';
import { type MountedServer } from './MountedServer.js';

// ── Prefixing ────────────────────────────────────────────

export function prefixComponent<C extends Component>(component: C, prefix: string, format: ResourcePrefixFormat): C;
export function prefixComponent(component: Component, prefix: string, format: ResourcePrefixFormat): Component {
    if (!prefix) return component;
    switch (component.kind) {
        case 'tool':
        case 'prompt':
            return Object.freeze({ ...component, name: addNamePrefix(component.name, prefix) });
        case 'resource':
            return Object.freeze({ ...component, uri: addResourcePrefix(component.uri, prefix, format) });
        case 'resource_template':
            return Object.freeze({ ...component, uriTemplate: addResourcePrefix(component.uriTemplate, prefix, format) });
    }
}

// ── Proxy Forwarding ─────────────────────────────────────

/**
 * Replace a child component's callable with one that dispatches through
 * `mount`'s session. Keys stay child-relative; prefix afterwards.
 */
export function proxyComponent<C extends Component>(component: C, mount: MountedServer): C;
export function proxyComponent(component: Component, mount: MountedServer): Component {
    switch (component.kind) {
        case 'tool':
            return proxyTool(component, mount);
        case 'resource':
            return proxyResource(component, mount);
        case 'resource_template':
            return proxyTemplate(component, mount);
        case 'prompt':
            return proxyPrompt(component, mount);
    }
}

function proxyTool(tool: ToolComponent, mount: MountedServer): ToolComponent {
    return Object.freeze({
        ...tool,
        handler: (args: Record<string, unknown>, ctx: CallContext) => mount.run(s => s.callTool(tool.name, args, ctx.signal)),
    });
}

function proxyResource(resource: ResourceComponent, mount: MountedServer): ResourceComponent {
    return Object.freeze({
        ...resource,
        read: async (ctx: CallContext) => firstBody(resource.uri, await mount.run(s => s.readResource(resource.uri, ctx.signal))),
    });
}

function proxyTemplate(template: ResourceTemplateComponent, mount: MountedServer): ResourceTemplateComponent {
    return Object.freeze({
        ...template,
        read: async (params: Record<string, string>, ctx: CallContext) => {
            const uri = expandTemplate(template.uriTemplate, params);
            return firstBody(uri, await mount.run(s => s.readResource(uri, ctx.signal)));
        },
    });
}

function proxyPrompt(prompt: PromptComponent, mount: MountedServer): PromptComponent {
    return Object.freeze({
        ...prompt,
        render: (args: Record<string, string>, ctx: CallContext) => mount.run(s => s.getPrompt(prompt.name, args, ctx.signal)),
    });
}

/** Reduce a read result to the body of its first entry. */
export function firstBody(uri: string, result: ResourceReadResult): ResourceBody {
    const [first] = result.contents;
    if (!first) throw new ToolExecutionError(`Resource "${uri}" returned no contents.`);
    if ('text' in first && typeof first.text === 'string') return { text: first.text, mimeType: first.mimeType };
    if ('blob' in first && typeof first.blob === 'string') return { blob: first.blob, mimeType: first.mimeType };
    throw new ToolExecutionError(`Resource "${uri}" returned neither text nor blob contents.`);
}
