/**
 * Tests for loadOpenApiConfig() and mergeOpenApiConfig()
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadOpenApiConfig, validateConfig } from '../../src/config/ConfigLoader.js';
import { DEFAULT_OPENAPI_CONFIG, mergeOpenApiConfig } from '../../src/config/OpenApiConfig.js';

// ============================================================================
// mergeOpenApiConfig
// ============================================================================

describe('mergeOpenApiConfig', () => {
    it('should return the defaults for an empty partial', () => {
        expect(mergeOpenApiConfig({})).toEqual(DEFAULT_OPENAPI_CONFIG);
    });

    it('should merge maps key by key and replace lists', () => {
        const base = mergeOpenApiConfig({
            headers: { authorization: 'Bearer test-secret', accept: 'application/json' },
            tags: ['a'],
            names: { listPets: 'pets' },
        });
        const merged = mergeOpenApiConfig({ headers: { accept: 'text/plain' }, tags: ['b'] }, base);

        expect(merged.headers).toEqual({ authorization: 'Bearer test-secret', accept: 'text/plain' });
        expect(merged.tags).toEqual(['b']);
        expect(merged.names).toEqual({ listPets: 'pets' });
    });

    it('should keep server fields the partial does not set', () => {
        const base = mergeOpenApiConfig({ server: { name: 'pets', version: '1.0.0' } });
        expect(mergeOpenApiConfig({ server: { version: '2.0.0' } }, base).server).toEqual({ name: 'pets', version: '2.0.0' });
    });
});

// ============================================================================
// loadOpenApiConfig
// ============================================================================

describe('loadOpenApiConfig', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = join(tmpdir(), `tessera-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
        await fs.mkdir(tempDir, { recursive: true });
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should fall back to defaults when no file exists', () => {
        expect(loadOpenApiConfig(undefined, tempDir)).toEqual(DEFAULT_OPENAPI_CONFIG);
    });

    it('should auto-detect tessera-openapi.yaml', async () => {
        await fs.writeFile(join(tempDir, 'tessera-openapi.yaml'), [
            'baseUrl: https://pets.test',
            'headers:',
            '  authorization: Bearer test-secret',
            'deprecated: skip',
            'timeoutMs: 2500',
            'server:',
            '  name: pets',
            'routeMaps:',
            '  - methods: [get, Post]',
            '    pattern: /admin/.*',
            '    mcpType: exclude',
            '  - mcpType: tool',
            '    tags: [beta]',
        ].join('\n'));

        const config = loadOpenApiConfig(undefined, tempDir);
        expect(config).toEqual({
            baseUrl: 'https://pets.test',
            headers: { authorization: 'Bearer test-secret' },
            routeMaps: [
                { methods: ['GET', 'POST'], pattern: '/admin/.*', mcpType: 'exclude' },
                { methods: '*', pattern: '.*', mcpType: 'tool', tags: ['beta'] },
            ],
            names: {},
            tags: [],
            deprecated: 'skip',
            timeoutMs: 2500,
            server: { name: 'pets' },
        });
    });

    it('should load an explicit JSON file relative to cwd', async () => {
        await fs.writeFile(join(tempDir, 'custom.json'), JSON.stringify({ names: { listPets: 'pets' } }));
        expect(loadOpenApiConfig('custom.json', tempDir).names).toEqual({ listPets: 'pets' });
    });

    it('should treat an empty file as defaults', async () => {
        await fs.writeFile(join(tempDir, 'tessera-openapi.yml'), '');
        expect(loadOpenApiConfig(undefined, tempDir)).toEqual(DEFAULT_OPENAPI_CONFIG);
    });

    it('should reject a missing explicit file', () => {
        expect(() => loadOpenApiConfig('nope.yaml', tempDir)).toThrow(
            `Config file not found: "${join(tempDir, 'nope.yaml')}"`,
        );
    });

    it('should name the file and key of an invalid value', async () => {
        const file = join(tempDir, 'tessera-openapi.yaml');
        await fs.writeFile(file, 'deprecated: sometimes\n');
        expect(() => loadOpenApiConfig(undefined, tempDir)).toThrow(
            `Invalid config in "${file}": "deprecated" must be "include" or "skip".`,
        );
    });
});

// ============================================================================
// validateConfig
// ============================================================================

describe('validateConfig', () => {
    it('should reject a non-object root', () => {
        expect(() => validateConfig(['a'], 'inline')).toThrow('Invalid config in "inline": "(root)" must be an object.');
    });

    it('should reject non-string header values', () => {
        expect(() => validateConfig({ headers: { retries: 3 } }, 'inline')).toThrow(
            'Invalid config in "inline": "headers" must be a map of strings.',
        );
    });

    it('should point at the offending route map', () => {
        expect(() => validateConfig({ routeMaps: [{ mcpType: 'tool' }, { mcpType: 'widget' }] }, 'inline')).toThrow(
            'Invalid config in "inline": "routeMaps[1].mcpType" must be one of tool, resource, resource_template, exclude.',
        );
        expect(() => validateConfig({ routeMaps: [{ mcpType: 'tool', methods: ['FETCH'] }] }, 'inline')).toThrow(
            /"routeMaps\[0\]\.methods" must be a list of GET, POST/,
        );
    });

    it('should name nested keys and route map entries', () => {
        expect(() => validateConfig({ server: { name: 3 } }, 'inline')).toThrow(
            'Invalid config in "inline": "server.name" must be a string.',
        );
        expect(() => validateConfig({ routeMaps: ['exclude'] }, 'inline')).toThrow(
            'Invalid config in "inline": "routeMaps[0]" must be an object.',
        );
        expect(() => validateConfig({ tags: ['a', 1] }, 'inline')).toThrow(
            'Invalid config in "inline": "tags" must be a list of strings.',
        );
    });

    it('should drop unknown keys and fill route map defaults', () => {
        expect(validateConfig({ extra: true, routeMaps: [{ mcpType: 'resource' }] }, 'inline')).toEqual({
            routeMaps: [{ methods: '*', pattern: '.*', mcpType: 'resource' }],
        });
    });

    it('should reject a non-positive timeout', () => {
        expect(() => validateConfig({ timeoutMs: 0 }, 'inline')).toThrow(
            'Invalid config in "inline": "timeoutMs" must be a positive number.',
        );
    });
});
