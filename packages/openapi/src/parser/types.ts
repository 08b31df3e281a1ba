/**
 * Intermediate Representation Types
 *
 * Normalized data structures produced by the OpenAPI parser. These are
 * the single contract between the parser, the route mapper, the input
 * schema builder, and the HTTP handler factory: no raw OpenAPI shapes
 * leak past this boundary.
 *
 * @module
 */

// ── HTTP ─────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'TRACE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS', 'TRACE'];

/** Where a parameter is carried in the HTTP request */
export type ParamSource = 'path' | 'query' | 'header' | 'cookie';

// ── Schema Node ──────────────────────────────────────────

/**
 * A JSON Schema object from the document, with every `$ref` already
 * inlined by the parser. Forwarded as-is into component input schemas.
 */
export type SchemaNode = Readonly<Record<string, unknown>>;

// ── Operation ────────────────────────────────────────────

/** A single parameter of an operation */
export interface HttpParam {
    readonly name: string;
    readonly source: ParamSource;
    /** Always `true` for path parameters */
    readonly required: boolean;
    readonly schema: SchemaNode;
    readonly description?: string;
}

export interface HttpRequestBody {
    readonly schema: SchemaNode;
    readonly required: boolean;
    /** Media type the schema was taken from, `application/json` when present */
    readonly contentType: string;
    readonly description?: string;
}

/** One HTTP endpoint: a path + method pair of the document */
export interface HttpOperation {
    readonly method: HttpMethod;
    /** Path pattern with `{param}` placeholders, e.g. `/pets/{petId}` */
    readonly path: string;
    readonly operationId?: string;
    readonly tags: readonly string[];
    readonly summary?: string;
    readonly description?: string;
    /** Path-level and operation-level parameters, operation-level winning */
    readonly params: readonly HttpParam[];
    readonly requestBody?: HttpRequestBody;
    readonly deprecated: boolean;
}

// ── Document ─────────────────────────────────────────────

export interface ApiServer {
    readonly url: string;
    readonly description?: string;
}

/** Normalized representation of the entire OpenAPI document */
export interface ApiDocument {
    readonly title: string;
    readonly version: string;
    readonly description?: string;
    readonly servers: readonly ApiServer[];
    /** In document order: paths first, then methods within a path */
    readonly operations: readonly HttpOperation[];
}
