/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `tessera-openapi.yaml` from cwd or a specified path, validates
 * its structure, and merges it with defaults.
 *
 * ```yaml
 * baseUrl: https://api.example.test
 * headers:
 *   authorization: Bearer test-secret
 * deprecated: skip
 * routeMaps:
 *   - methods: [GET]
 *     pattern: /admin/.*
 *     mcpType: exclude
 * ```
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HTTP_METHODS, type HttpMethod } from '../parser/types.js';
import { MCP_TYPES, type McpType } from '../mapper/RouteMap.js';
import { mergeOpenApiConfig, type OpenApiConfig, type PartialOpenApiConfig } from './OpenApiConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'tessera-openapi.yaml',
    'tessera-openapi.yml',
    'tessera-openapi.json',
];

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `tessera-openapi.yaml` (then `.yml`, `.json`) in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @throws If an explicit file is missing or any file has an invalid shape
 */
export function loadOpenApiConfig(configPath?: string, cwd?: string): OpenApiConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeOpenApiConfig({});
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): OpenApiConfig {
    const content = readFileSync(filePath, 'utf-8');
    const raw: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    // An empty YAML file parses to null.
    return mergeOpenApiConfig(raw === null || raw === undefined ? {} : validateConfig(raw, filePath));
}

// ── Schema ───────────────────────────────────────────────

const STRING_MAP = 'a map of strings';
const STRING_LIST = 'a list of strings';
const METHODS_EXPECTED = `a list of ${HTTP_METHODS.join(', ')} or "*"`;
const MCP_TYPE_EXPECTED = `one of ${MCP_TYPES.join(', ')}`;

const stringMap = () => z.record(z.string({ invalid_type_error: STRING_MAP }), { invalid_type_error: STRING_MAP });
const stringList = () => z.array(z.string({ invalid_type_error: STRING_LIST }), { invalid_type_error: STRING_LIST });

const httpMethodSchema = z.string({ invalid_type_error: METHODS_EXPECTED })
    .transform(value => value.toUpperCase())
    .refine((value): value is HttpMethod => HTTP_METHODS.some(m => m === value), { message: METHODS_EXPECTED });

const routeMapSchema = z.object({
    methods: z.union([z.literal('*'), z.array(httpMethodSchema)], {
        errorMap: () => ({ message: METHODS_EXPECTED }),
    }).default('*'),
    pattern: z.string({ invalid_type_error: 'a string' }).default('.*'),
    tags: stringList().optional(),
    mcpType: z.string({ required_error: MCP_TYPE_EXPECTED, invalid_type_error: MCP_TYPE_EXPECTED })
        .refine((value): value is McpType => MCP_TYPES.some(t => t === value), { message: MCP_TYPE_EXPECTED }),
}, { invalid_type_error: 'an object' });

const configSchema = z.object({
    baseUrl: z.string({ invalid_type_error: 'a string' }).optional(),
    headers: stringMap().optional(),
    routeMaps: z.array(routeMapSchema, { invalid_type_error: 'a list' }).optional(),
    names: stringMap().optional(),
    tags: stringList().optional(),
    deprecated: z.enum(['include', 'skip'], { errorMap: () => ({ message: '"include" or "skip"' }) }).optional(),
    timeoutMs: z.number({ invalid_type_error: 'a positive number' })
        .positive({ message: 'a positive number' })
        .optional(),
    server: z.object({
        name: z.string({ invalid_type_error: 'a string' }).optional(),
        version: z.string({ invalid_type_error: 'a string' }).optional(),
    }, { invalid_type_error: 'an object' }).optional(),
}, { invalid_type_error: 'an object' });

/**
 * Check a parsed file against the config shape. Unknown keys are dropped.
 *
 * @throws Error naming the file and the offending key
 */
export function validateConfig(raw: unknown, source: string): PartialOpenApiConfig {
    const result = configSchema.safeParse(raw);
    if (result.success) return result.data;

    const [issue] = result.error.issues;
    const key = issue ? configKey(issue.path) : '(root)';
    const expected = issue ? issue.message : 'valid';
    throw new Error(`Invalid config in "${source}": "${key}" must be ${expected}.`);
}

/**
 * The config key an issue belongs to: a top-level field, a `server`
 * field, or a field of one route map. Deeper positions (a single header,
 * a list item) report their containing key.
 */
function configKey(path: readonly (string | number)[]): string {
    const depth = path[0] === 'routeMaps' ? 3 : path[0] === 'server' ? 2 : 1;
    const kept = path.slice(0, depth);
    if (kept.length === 0) return '(root)';
    return kept.map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`)).join('');
}
