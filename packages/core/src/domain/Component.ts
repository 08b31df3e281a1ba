/**
 * Component — The Four Kinds a Server Exposes
 *
 * A component is a named, callable or readable unit. The model is a
 * tagged union on `kind`, with kind-specific fields in each variant:
 *
 * - {@link ToolComponent}              — input schema + async handler
 * - {@link ResourceComponent}          — fixed URI + zero-argument read
 * - {@link ResourceTemplateComponent}  — URI template + parameterized read
 * - {@link PromptComponent}            — argument list + message renderer
 *
 * Components are plain immutable records. Prefixing, importing and
 * mounting derive new records instead of mutating existing ones.
 *
 * @module
 */
import {
    type Tool as McpTool,
    type CallToolResult,
    type GetPromptResult,
    type ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';
import { type ToolAnnotations } from './ToolAnnotations.js';

// ── Shared ───────────────────────────────────────────────

export type ComponentKind = 'tool' | 'resource' | 'resource_template' | 'prompt';

/**
 * Per-call context handed to every handler.
 *
 * `signal` fires when the caller gives up, including when a proxied
 * parent relays an MCP cancellation.
 */
export interface CallContext {
    readonly signal?: AbortSignal | undefined;
}

/** Attributes every component carries regardless of kind */
export interface ComponentBase {
    readonly name: string;
    readonly title?: string | undefined;
    readonly description?: string | undefined;
    readonly tags: readonly string[];
    /** Disabled components are neither listed nor callable */
    readonly enabled: boolean;
    /** Opaque key/value bag, forwarded as MCP `_meta` */
    readonly meta: Readonly<Record<string, unknown>>;
}

// ── Tool ─────────────────────────────────────────────────

/** One MCP content block (text, image, audio, resource link, embedded resource) */
export type ContentBlock = CallToolResult['content'][number];

/** JSON Schema of a tool's arguments; always an object schema */
export type InputSchema = McpTool['inputSchema'];

/**
 * Result of a tool call.
 *
 * Kept as a type alias (not an interface) so it stays assignable to the
 * SDK's passthrough result types.
 */
export type ToolResponse = {
    readonly content: ContentBlock[];
    readonly structuredContent?: Record<string, unknown> | undefined;
    readonly isError?: boolean | undefined;
};

export type ToolHandler = (args: Record<string, unknown>, ctx: CallContext) => Promise<ToolResponse>;

export interface ToolComponent extends ComponentBase {
    readonly kind: 'tool';
    readonly inputSchema: InputSchema;
    readonly outputSchema?: McpTool['outputSchema'] | undefined;
    readonly annotations?: ToolAnnotations | undefined;
    readonly handler: ToolHandler;
}

// ── Resource / Template ──────────────────────────────────

/** Body returned by a resource read, before the URI is attached */
export type ResourceBody =
    | { readonly text: string; readonly mimeType?: string | undefined }
    | { readonly blob: string; readonly mimeType?: string | undefined };

/** One entry of a `resources/read` result, URI attached */
export type ResourceContent = ReadResourceResult['contents'][number];

export type ResourceReadResult = {
    readonly contents: ResourceContent[];
};

export interface ResourceComponent extends ComponentBase {
    readonly kind: 'resource';
    readonly uri: string;
    readonly mimeType?: string | undefined;
    readonly read: (ctx: CallContext) => Promise<string | ResourceBody>;
}

export interface ResourceTemplateComponent extends ComponentBase {
    readonly kind: 'resource_template';
    /** RFC 6570 template, e.g. `weather://{city}/current` */
    readonly uriTemplate: string;
    readonly mimeType?: string | undefined;
    /** JSON Schema describing the template variables */
    readonly parameters: InputSchema;
    readonly read: (params: Record<string, string>, ctx: CallContext) => Promise<string | ResourceBody>;
}

// ── Prompt ───────────────────────────────────────────────

export interface PromptArgumentDef {
    readonly name: string;
    readonly description?: string | undefined;
    readonly required?: boolean | undefined;
}

export type PromptMessage = GetPromptResult['messages'][number];

export type PromptResult = {
    readonly description?: string | undefined;
    readonly messages: PromptMessage[];
};

export interface PromptComponent extends ComponentBase {
    readonly kind: 'prompt';
    readonly arguments: readonly PromptArgumentDef[];
    readonly render: (args: Record<string, string>, ctx: CallContext) => Promise<PromptResult>;
}

// ── Union ────────────────────────────────────────────────

export type Component =
    | ToolComponent
    | ResourceComponent
    | ResourceTemplateComponent
    | PromptComponent;

/**
 * Registry key of a component: tools and prompts by name, resources by
 * URI, templates by URI template.
 */
export function componentKey(component: Component): string {
    switch (component.kind) {
        case 'tool':
        case 'prompt':
            return component.name;
        case 'resource':
            return component.uri;
        case 'resource_template':
            return component.uriTemplate;
    }
}
