import { describe, it, expect } from 'vitest';
import { parseOpenApi } from '../../src/parser/OpenApiParser.js';
import { resolveRefs, lookupRef } from '../../src/parser/RefResolver.js';

// ============================================================================
// Fixtures
// ============================================================================

const SHOP_YAML = `
openapi: 3.0.3
info:
  title: Shop
  version: 2.1.0
  description: Product catalog
servers:
  - url: https://shop.test/v1
    description: staging
paths:
  /products:
    get:
      operationId: listProducts
      tags: [catalog]
      summary: List products
      parameters:
        - name: limit
          in: query
          schema: { type: integer }
    post:
      operationId: createProduct
      requestBody:
        required: true
        content:
          application/json:
            schema:
              $ref: '#/components/schemas/Product'
  /products/{id}:
    parameters:
      - name: id
        in: path
        schema: { type: string }
      - name: x-trace
        in: header
        description: inherited
    get:
      operationId: getProduct
      deprecated: true
      parameters:
        - name: x-trace
          in: header
          required: true
          description: overridden
components:
  schemas:
    Product:
      type: object
      required: [name]
      properties:
        name: { type: string }
        price: { type: number }
`;

// ============================================================================
// parseOpenApi
// ============================================================================

describe('parseOpenApi', () => {
    const doc = parseOpenApi(SHOP_YAML);

    it('should read document metadata and servers', () => {
        expect(doc.title).toBe('Shop');
        expect(doc.version).toBe('2.1.0');
        expect(doc.description).toBe('Product catalog');
        expect(doc.servers).toEqual([{ url: 'https://shop.test/v1', description: 'staging' }]);
    });

    it('should flatten operations in document order', () => {
        expect(doc.operations.map(o => `${o.method} ${o.path}`)).toEqual([
            'GET /products',
            'POST /products',
            'GET /products/{id}',
        ]);
    });

    it('should keep operation metadata', () => {
        expect(doc.operations[0]).toMatchObject({
            operationId: 'listProducts',
            tags: ['catalog'],
            summary: 'List products',
            deprecated: false,
        });
        expect(doc.operations[2]?.deprecated).toBe(true);
    });

    it('should leave query parameters optional unless required', () => {
        expect(doc.operations[0]?.params).toEqual([
            { name: 'limit', source: 'query', required: false, schema: { type: 'integer' } },
        ]);
    });

    it('should merge path-level parameters and let the operation override them', () => {
        expect(doc.operations[2]?.params).toEqual([
            { name: 'id', source: 'path', required: true, schema: { type: 'string' } },
            { name: 'x-trace', source: 'header', required: true, schema: { type: 'string' }, description: 'overridden' },
        ]);
    });

    it('should inline referenced request body schemas', () => {
        expect(doc.operations[1]?.requestBody).toEqual({
            required: true,
            contentType: 'application/json',
            schema: {
                type: 'object',
                required: ['name'],
                properties: { name: { type: 'string' }, price: { type: 'number' } },
            },
        });
    });

    it('should prefer JSON bodies and fall back to the first media type', () => {
        const parsed = parseOpenApi({
            openapi: '3.1.0',
            paths: {
                '/upload': {
                    post: {
                        requestBody: { content: { 'text/plain': { schema: { type: 'string' } } } },
                    },
                },
            },
        });
        expect(parsed.operations[0]?.requestBody).toEqual({
            schema: { type: 'string' },
            required: false,
            contentType: 'text/plain',
        });
    });

    it('should default title and version', () => {
        const parsed = parseOpenApi({ openapi: '3.0.0' });
        expect(parsed).toEqual({ title: 'Untitled API', version: '0.0.0', servers: [], operations: [] });
    });

    it('should ignore keys that are not HTTP methods', () => {
        const parsed = parseOpenApi({
            openapi: '3.0.0',
            paths: { '/x': { summary: 'path summary', get: { operationId: 'getX' } } },
        });
        expect(parsed.operations.map(o => o.operationId)).toEqual(['getX']);
    });

    // ── Errors ──

    it('should reject non-object input', () => {
        expect(() => parseOpenApi('just text')).toThrow('OpenAPI input must be a YAML or JSON object.');
    });

    it('should reject Swagger 2 and unversioned documents', () => {
        expect(() => parseOpenApi({ swagger: '2.0' })).toThrow(
            'Unsupported OpenAPI version: "missing". OpenAPI 3.x required.',
        );
        expect(() => parseOpenApi({ openapi: '2.0' })).toThrow(
            'Unsupported OpenAPI version: "2.0". OpenAPI 3.x required.',
        );
    });
});

// ============================================================================
// RefResolver
// ============================================================================

describe('resolveRefs', () => {
    it('should break circular references with a placeholder', () => {
        const doc = {
            components: {
                schemas: {
                    Node: {
                        type: 'object',
                        properties: { next: { $ref: '#/components/schemas/Node' } },
                    },
                },
            },
            root: { $ref: '#/components/schemas/Node' },
        };
        expect(resolveRefs(doc)['root']).toEqual({
            type: 'object',
            properties: { next: { type: 'object', description: '[Circular: #/components/schemas/Node]' } },
        });
    });

    it('should mark unresolvable references', () => {
        const resolved = resolveRefs({ a: { $ref: '#/missing' }, b: { $ref: 'other.yaml#/x' } });
        expect(resolved).toEqual({
            a: { type: 'string', description: '[Unresolved: #/missing]' },
            b: { type: 'string', description: '[Unresolved: other.yaml#/x]' },
        });
    });

    it('should not modify its input', () => {
        const doc = { defs: { s: { type: 'string' } }, use: { $ref: '#/defs/s' } };
        resolveRefs(doc);
        expect(doc.use).toEqual({ $ref: '#/defs/s' });
    });

    it('should decode escaped pointer segments', () => {
        const doc = { paths: { '/a/{b}': { get: { operationId: 'x' } } } };
        expect(lookupRef(doc, '#/paths/~1a~1{b}/get')).toEqual({ operationId: 'x' });
    });
});
