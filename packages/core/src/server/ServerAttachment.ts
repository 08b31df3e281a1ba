/**
 * ServerAttachment — MCP Server Integration Strategy
 *
 * Serves a {@link ToolServer} through an SDK `Server` (or `McpServer`) by
 * registering request handlers for tools, resources, resource templates,
 * and prompts. The request's abort signal is forwarded to every call.
 *
 * Error mapping:
 * - {@link NotFoundError} (and {@link RoutingError}) → `McpError(InvalidParams)`
 * - any other error from a tool → `CallToolResult` with `isError: true`
 * - any other error from a resource or prompt → `McpError(InternalError)`
 *
 * Pure-function module: receives dependencies, returns detach function.
 */
import {
    CallToolRequestSchema,
    ErrorCode,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourcesRequestSchema,
    ListResourceTemplatesRequestSchema,
    ListToolsRequestSchema,
    McpError,
    ReadResourceRequestSchema,
    type Prompt as McpPrompt,
    type Resource as McpResource,
    type ResourceTemplate as McpResourceTemplate,
    type Tool as McpTool,
} from '@modelcontextprotocol/sdk/types.js';
import {
    type ComponentBase,
    type PromptComponent,
    type ResourceComponent,
    type ResourceTemplateComponent,
    type ToolComponent,
} from '../domain/Component.js';
import { error } from '../core/response.js';
import { NotFoundError, messageOf, type LookupKind } from '../core/errors.js';
import { compileFilter, type ComponentFilter, type VisibilityPredicate } from '../core/registry/ComponentFilterEngine.js';
import { matchTemplate } from '../naming/UriTemplateMatcher.js';
import { resolveServer } from './ServerResolver.js';
import { type ToolServer } from './ToolServer.js';

// ── Types ────────────────────────────────────────────────

/** Options for attaching to an MCP Server */
export interface AttachOptions {
    /**
     * Narrow what this attachment exposes, on top of the server's own
     * filter. Hidden components are neither listed nor callable.
     */
    readonly filter?: ComponentFilter;
}

/** Function to detach the server's handlers */
export type DetachFn = () => void;

// ── Public API ───────────────────────────────────────────

/**
 * Attach a ToolServer to an MCP server.
 *
 * Capabilities for tools, resources, and prompts are declared on the SDK
 * server when it is not yet connected.
 */
export function attachToServer(server: unknown, tools: ToolServer, options: AttachOptions = {}): DetachFn {
    const resolved = resolveServer(server);
    if (!resolved.transport) {
        resolved.registerCapabilities({ tools: {}, resources: {}, prompts: {} });
    }
    const visible = options.filter ? compileFilter(options.filter) : undefined;

    resolved.setRequestHandler(ListToolsRequestSchema, () => ({
        tools: exposed(tools.listTools(), visible).map(toMcpTool),
    }));

    resolved.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
        const { name, arguments: args = {} } = request.params;
        try {
            if (visible) guardName('tool', name, tools.listTools(), visible);
            return await tools.callTool(name, args, { signal: extra.signal });
        } catch (err) {
            if (err instanceof NotFoundError) throw new McpError(ErrorCode.InvalidParams, err.message);
            return error(messageOf(err));
        }
    });

    resolved.setRequestHandler(ListResourcesRequestSchema, () => ({
        resources: exposed(tools.listResources(), visible).map(toMcpResource),
    }));

    resolved.setRequestHandler(ListResourceTemplatesRequestSchema, () => ({
        resourceTemplates: exposed(tools.listResourceTemplates(), visible).map(toMcpResourceTemplate),
    }));

    resolved.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
        const { uri } = request.params;
        try {
            if (visible) guardUri(uri, tools, visible);
            return await tools.readResource(uri, { signal: extra.signal });
        } catch (err) {
            throw toMcpError(err);
        }
    });

    resolved.setRequestHandler(ListPromptsRequestSchema, () => ({
        prompts: exposed(tools.listPrompts(), visible).map(toMcpPrompt),
    }));

    resolved.setRequestHandler(GetPromptRequestSchema, async (request, extra) => {
        const { name, arguments: args = {} } = request.params;
        try {
            if (visible) guardName('prompt', name, tools.listPrompts(), visible);
            return await tools.getPrompt(name, args, { signal: extra.signal });
        } catch (err) {
            throw toMcpError(err);
        }
    });

    return createDetachFn(resolved);
}

// ── Detach ───────────────────────────────────────────────

function createDetachFn(resolved: ReturnType<typeof resolveServer>): DetachFn {
    return () => {
        const detached = (): never => {
            throw new McpError(ErrorCode.MethodNotFound, 'Handlers have been detached');
        };
        resolved.setRequestHandler(ListToolsRequestSchema, () => ({ tools: [] }));
        resolved.setRequestHandler(CallToolRequestSchema, () => error('Tool handlers have been detached'));
        resolved.setRequestHandler(ListResourcesRequestSchema, () => ({ resources: [] }));
        resolved.setRequestHandler(ListResourceTemplatesRequestSchema, () => ({ resourceTemplates: [] }));
        resolved.setRequestHandler(ReadResourceRequestSchema, detached);
        resolved.setRequestHandler(ListPromptsRequestSchema, () => ({ prompts: [] }));
        resolved.setRequestHandler(GetPromptRequestSchema, detached);
    };
}

// ── Filtering ────────────────────────────────────────────

function exposed<C extends ComponentBase>(components: C[], visible: VisibilityPredicate | undefined): C[] {
    return visible ? components.filter(visible) : components;
}

function guardName(kind: LookupKind, name: string, listed: readonly (ToolComponent | PromptComponent)[], visible: VisibilityPredicate): void {
    const component = listed.find(c => c.name === name);
    if (component && !visible(component)) throw new NotFoundError(kind, name);
}

function guardUri(uri: string, tools: ToolServer, visible: VisibilityPredicate): void {
    const resource = tools.listResources().find(r => r.uri === uri);
    if (resource) {
        if (!visible(resource)) throw new NotFoundError('resource', uri);
        return;
    }
    const template = tools.listResourceTemplates().find(t => matchTemplate(t.uriTemplate, uri) !== undefined);
    if (template && !visible(template)) throw new NotFoundError('resource', uri);
}

// ── Mapping ──────────────────────────────────────────────

function toMcpError(err: unknown): McpError {
    if (err instanceof McpError) return err;
    if (err instanceof NotFoundError) return new McpError(ErrorCode.InvalidParams, err.message);
    return new McpError(ErrorCode.InternalError, messageOf(err));
}

function metaOf(component: ComponentBase): { _meta?: Record<string, unknown> } {
    return Object.keys(component.meta).length > 0 ? { _meta: { ...component.meta } } : {};
}

export function toMcpTool(tool: ToolComponent): McpTool {
    return {
        name: tool.name,
        ...(tool.title !== undefined ? { title: tool.title } : {}),
        ...(tool.description !== undefined ? { description: tool.description } : {}),
        inputSchema: tool.inputSchema,
        ...(tool.outputSchema !== undefined ? { outputSchema: tool.outputSchema } : {}),
        ...(tool.annotations !== undefined ? { annotations: { ...tool.annotations } } : {}),
        ...metaOf(tool),
    };
}

export function toMcpResource(resource: ResourceComponent): McpResource {
    return {
        uri: resource.uri,
        name: resource.name,
        ...(resource.title !== undefined ? { title: resource.title } : {}),
        ...(resource.description !== undefined ? { description: resource.description } : {}),
        ...(resource.mimeType !== undefined ? { mimeType: resource.mimeType } : {}),
        ...metaOf(resource),
    };
}

export function toMcpResourceTemplate(template: ResourceTemplateComponent): McpResourceTemplate {
    return {
        uriTemplate: template.uriTemplate,
        name: template.name,
        ...(template.title !== undefined ? { title: template.title } : {}),
        ...(template.description !== undefined ? { description: template.description } : {}),
        ...(template.mimeType !== undefined ? { mimeType: template.mimeType } : {}),
        ...metaOf(template),
    };
}

export function toMcpPrompt(prompt: PromptComponent): McpPrompt {
    return {
        name: prompt.name,
        ...(prompt.title !== undefined ? { title: prompt.title } : {}),
        ...(prompt.description !== undefined ? { description: prompt.description } : {}),
        arguments: prompt.arguments.map(a => ({
            name: a.name,
            ...(a.description !== undefined ? { description: a.description } : {}),
            ...(a.required !== undefined ? { required: a.required } : {}),
        })),
        ...metaOf(prompt),
    };
}
