/**
 * @tessera/openapi — OpenAPI Operations as Components
 *
 * @example
 * ```typescript
 * import { fromOpenApi, loadOpenApiConfig } from '@tessera/openapi';
 *
 * const server = fromOpenApi(yamlString, loadOpenApiConfig());
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeOpenApiConfig, DEFAULT_OPENAPI_CONFIG } from './config/OpenApiConfig.js';
export type { OpenApiConfig, PartialOpenApiConfig, OpenApiServerConfig } from './config/OpenApiConfig.js';
export { loadOpenApiConfig, validateConfig, CONFIG_FILENAMES } from './config/ConfigLoader.js';

// ── Parser ───────────────────────────────────────────────
export { parseOpenApi } from './parser/OpenApiParser.js';
export { resolveRefs, lookupRef } from './parser/RefResolver.js';
export { HTTP_METHODS } from './parser/types.js';
export type {
    ApiDocument, ApiServer, HttpMethod, HttpOperation,
    HttpParam, HttpRequestBody, ParamSource, SchemaNode,
} from './parser/types.js';

// ── Route Mapping ────────────────────────────────────────
export {
    DEFAULT_ROUTE_MAPS, MCP_TYPES,
    classifyOperation, classifyOperations, matchesRule,
} from './mapper/RouteMap.js';
export type { RouteMap, McpType, ClassifiedOperation } from './mapper/RouteMap.js';
export {
    resolveComponentName, assignComponentNames,
    inferFromMethodAndPath, inferAnnotations,
} from './mapper/ComponentNaming.js';

// ── Input Schema ─────────────────────────────────────────
export { buildOperationInput, pathBindings, BODY_ARGUMENT } from './schema/InputSchemaBuilder.js';
export type { OperationInput, ArgumentBinding, BodyMode } from './schema/InputSchemaBuilder.js';

// ── Runtime ──────────────────────────────────────────────
export { buildHandler, buildRequest, decodeBody, fetchRequester } from './runtime/HttpHandlerFactory.js';
export type {
    HttpContext, HttpRequest, HttpResponse, HttpRequester,
    HttpResult, OperationHandler,
} from './runtime/HttpHandlerFactory.js';
export { buildComponents, RESOURCE_SCHEME } from './runtime/buildComponents.js';
export type { BuildOptions, RouteMapFn, ComponentFn } from './runtime/buildComponents.js';
export { fromOpenApi } from './runtime/fromOpenApi.js';
export type { FromOpenApiOptions } from './runtime/fromOpenApi.js';
