import { describe, it, expect } from 'vitest';
import { buildOperationInput, pathBindings } from '../../src/schema/InputSchemaBuilder.js';
import { type HttpOperation, type HttpParam } from '../../src/parser/types.js';

function param(name: string, source: HttpParam['source'], required = source === 'path'): HttpParam {
    return { name, source, required, schema: { type: 'string' } };
}

function op(extra: Partial<HttpOperation>): HttpOperation {
    return { method: 'POST', path: '/items', tags: [], params: [], deprecated: false, ...extra };
}

describe('buildOperationInput', () => {
    it('should require path params and leave optional ones out of required', () => {
        const input = buildOperationInput(op({
            method: 'GET',
            path: '/items/{id}',
            params: [param('id', 'path'), param('expand', 'query')],
        }));
        expect(input.schema).toEqual({
            type: 'object',
            properties: { id: { type: 'string' }, expand: { type: 'string' } },
            required: ['id'],
        });
        expect(input.bodyMode).toBe('none');
    });

    it('should keep query params optional even when declared required', () => {
        const input = buildOperationInput(op({
            method: 'GET',
            params: [param('page', 'query', true), param('x-tenant', 'header', true), param('trace', 'cookie')],
        }));
        expect(input.schema.required).toEqual(['x-tenant']);
    });

    it('should flatten an object body into top-level arguments', () => {
        const input = buildOperationInput(op({
            requestBody: {
                required: true,
                contentType: 'application/json',
                schema: {
                    type: 'object',
                    required: ['name'],
                    properties: { name: { type: 'string' }, price: { type: 'number' } },
                },
            },
        }));
        expect(input.bodyMode).toBe('flat');
        expect(input.schema.required).toEqual(['name']);
        expect(input.bindings).toEqual([
            { argument: 'name', source: 'body', name: 'name' },
            { argument: 'price', source: 'body', name: 'price' },
        ]);
    });

    it('should ignore body required fields when the body is optional', () => {
        const input = buildOperationInput(op({
            requestBody: {
                required: false,
                contentType: 'application/json',
                schema: { type: 'object', required: ['name'], properties: { name: { type: 'string' } } },
            },
        }));
        expect(input.schema.required).toBeUndefined();
    });

    it('should pass a non-object body as a single body argument', () => {
        const input = buildOperationInput(op({
            requestBody: {
                required: true,
                contentType: 'application/json',
                description: 'Tags to add',
                schema: { type: 'array', items: { type: 'string' } },
            },
        }));
        expect(input.bodyMode).toBe('whole');
        expect(input.schema).toEqual({
            type: 'object',
            properties: { body: { type: 'array', items: { type: 'string' }, description: 'Tags to add' } },
            required: ['body'],
        });
    });

    it('should rename a parameter that collides with a body property', () => {
        const input = buildOperationInput(op({
            path: '/items/{name}',
            params: [param('name', 'path')],
            requestBody: {
                required: true,
                contentType: 'application/json',
                schema: { type: 'object', properties: { name: { type: 'string' } } },
            },
        }));
        expect(Object.keys(input.schema.properties ?? {})).toEqual(['name__path', 'name']);
        expect(input.schema.required).toEqual(['name__path']);
        expect(input.bindings[0]).toEqual({ argument: 'name__path', source: 'path', name: 'name' });
    });

    it('should rename the second of two parameters sharing a name', () => {
        const input = buildOperationInput(op({ params: [param('id', 'query'), param('id', 'header')] }));
        expect(input.bindings.map(b => b.argument)).toEqual(['id', 'id__header']);
    });

    it('should carry parameter descriptions into the schema', () => {
        const input = buildOperationInput(op({
            params: [{ name: 'q', source: 'query', required: false, schema: { type: 'string' }, description: 'Search text' }],
        }));
        expect(input.schema.properties).toEqual({ q: { type: 'string', description: 'Search text' } });
    });
});

describe('pathBindings', () => {
    it('should order path bindings by position in the path', () => {
        const path = '/orgs/{org}/repos/{repo}';
        const input = buildOperationInput(op({ path, params: [param('repo', 'path'), param('org', 'path'), param('q', 'query')] }));
        expect(pathBindings(input, path).map(b => b.name)).toEqual(['org', 'repo']);
    });
});
