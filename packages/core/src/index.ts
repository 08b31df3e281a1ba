/**
 * @tessera/core — Composable MCP Tool Servers
 *
 * Component model, registry, namespace prefixing, mount/import
 * composition, delegation routing, proxy sessions, and MCP server
 * attachment.
 *
 * @module
 */

// ── Domain ───────────────────────────────────────────────
export { componentKey } from './domain/Component.js';
export type {
    Component, ComponentKind, ComponentBase, CallContext,
    ToolComponent, ToolHandler, ToolResponse, ContentBlock, InputSchema,
    ResourceComponent, ResourceTemplateComponent, ResourceBody, ResourceContent, ResourceReadResult,
    PromptComponent, PromptArgumentDef, PromptMessage, PromptResult,
} from './domain/Component.js';
export { createToolAnnotations } from './domain/ToolAnnotations.js';
export type { ToolAnnotations } from './domain/ToolAnnotations.js';
export { defineTool } from './domain/defineTool.js';
export type { ZodToolConfig, JsonToolConfig } from './domain/defineTool.js';
export { defineResource, defineResourceTemplate } from './domain/defineResource.js';
export type { ResourceConfig, ResourceTemplateConfig } from './domain/defineResource.js';
export { definePrompt } from './domain/definePrompt.js';
export type { PromptConfig } from './domain/definePrompt.js';

// ── Core ─────────────────────────────────────────────────
export { success, error, toToolResponse, isToolResponse, textOf } from './core/response.js';
export {
    TesseraError, FormatError, ConflictError, NotFoundError, RoutingError,
    ToolExecutionError, ValidationError, UpstreamCallError, messageOf,
} from './core/errors.js';
export type { ErrorCode, LookupKind } from './core/errors.js';
export { ComponentRegistry, ComponentCollection } from './core/registry/ComponentRegistry.js';
export type { DuplicatePolicy, AddOutcome } from './core/registry/ComponentRegistry.js';
export { compileFilter, filterComponents } from './core/registry/ComponentFilterEngine.js';
export type { ComponentFilter, VisibilityPredicate } from './core/registry/ComponentFilterEngine.js';
export type { InvocationMiddleware, InvocationRequest } from './core/execution/MiddlewareCompiler.js';
export { zodInputSchema, normalizeObjectSchema, isRecord } from './core/schema/SchemaGenerator.js';

// ── Naming ───────────────────────────────────────────────
export {
    addResourcePrefix, removeResourcePrefix, hasResourcePrefix,
    stripResourcePrefix, parseResourceUri, tryParseResourceUri,
} from './naming/ResourcePrefix.js';
export type { ResourcePrefixFormat, ParsedResourceUri } from './naming/ResourcePrefix.js';
export { addNamePrefix, removeNamePrefix, hasNamePrefix, stripNamePrefix } from './naming/NamePrefix.js';
export { templateVariables, matchTemplate, expandTemplate } from './naming/UriTemplateMatcher.js';

// ── Composition & Routing ────────────────────────────────
export { MountedServer, selectMountMode } from './composition/MountedServer.js';
export type { MountMode } from './composition/MountedServer.js';
export { locate, toolLookup, resourceLookup, promptLookup } from './routing/DelegationRouter.js';
export type { Lookup, Resolution, ResourceMatch, RoutableServer } from './routing/DelegationRouter.js';

// ── Sessions ─────────────────────────────────────────────
export { connectInMemory } from './client/InMemorySession.js';
export type { RemoteSession, SessionFactory } from './client/RemoteSession.js';

// ── Server ───────────────────────────────────────────────
export { ToolServer } from './server/ToolServer.js';
export type { MountOptions, ImportOptions } from './server/ToolServer.js';
export { DEFAULT_SETTINGS, mergeSettings } from './server/ServerSettings.js';
export type { ToolServerOptions, ServerSettings, Lifespan, CallOptions } from './server/ServerSettings.js';
export { attachToServer, toMcpTool, toMcpResource, toMcpResourceTemplate, toMcpPrompt } from './server/ServerAttachment.js';
export type { AttachOptions, DetachFn } from './server/ServerAttachment.js';
export { resolveServer } from './server/ServerResolver.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn,
    RegisterEvent, MountEvent, RouteEvent, ExecuteEvent, ErrorEvent,
} from './observability/DebugObserver.js';
export { SpanStatusCode } from './observability/Tracing.js';
export type { TesseraSpan, TesseraTracer, TesseraAttributeValue } from './observability/Tracing.js';
