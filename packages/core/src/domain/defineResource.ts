/**
 * defineResource() / defineResourceTemplate() — Native Resource Definition
 *
 * @example
 * ```typescript
 * import { defineResource, defineResourceTemplate } from '@tessera/core';
 *
 * const readme = defineResource({
 *     name: 'readme',
 *     uri: 'docs://readme',
 *     read: async () => '# Hello',
 * });
 *
 * const forecast = defineResourceTemplate({
 *     name: 'forecast',
 *     uriTemplate: 'weather://{city}/current',
 *     read: async ({ city }) => ({ text: JSON.stringify({ city }), mimeType: 'application/json' }),
 * });
 * ```
 *
 * @module
 */
import {
    type CallContext,
    type InputSchema,
    type ResourceBody,
    type ResourceComponent,
    type ResourceTemplateComponent,
} from './Component.js';
import { templateVariables } from '../naming/UriTemplateMatcher.js';
import { FormatError } from '../core/errors.js';
import { parseResourceUri } from '../naming/ResourcePrefix.js';

interface ResourceConfigBase {
    readonly name: string;
    readonly title?: string;
    readonly description?: string;
    readonly mimeType?: string;
    readonly tags?: readonly string[];
    readonly enabled?: boolean;
    readonly meta?: Record<string, unknown>;
}

export interface ResourceConfig extends ResourceConfigBase {
    /** Must have the `scheme://path` shape */
    readonly uri: string;
    readonly read: (ctx: CallContext) => Promise<string | ResourceBody>;
}

export interface ResourceTemplateConfig extends ResourceConfigBase {
    readonly uriTemplate: string;
    /** Defaults to one required string property per template variable */
    readonly parameters?: InputSchema;
    readonly read: (params: Record<string, string>, ctx: CallContext) => Promise<string | ResourceBody>;
}

export function defineResource(config: ResourceConfig): ResourceComponent {
    parseResourceUri(config.uri);
    return Object.freeze({
        kind: 'resource' as const,
        ...baseOf(config),
        uri: config.uri,
        read: config.read,
    });
}

export function defineResourceTemplate(config: ResourceTemplateConfig): ResourceTemplateComponent {
    parseResourceUri(config.uriTemplate);
    const variables = templateVariables(config.uriTemplate);
    if (variables.length === 0) {
        throw new FormatError(config.uriTemplate, `Resource template "${config.uriTemplate}" declares no variables.`);
    }
    return Object.freeze({
        kind: 'resource_template' as const,
        ...baseOf(config),
        uriTemplate: config.uriTemplate,
        parameters: config.parameters ?? variablesSchema(variables),
        read: config.read,
    });
}

// ── Helpers ──────────────────────────────────────────────

function baseOf(config: ResourceConfigBase) {
    return {
        name: config.name,
        title: config.title,
        description: config.description,
        mimeType: config.mimeType,
        tags: Object.freeze([...(config.tags ?? [])]),
        enabled: config.enabled ?? true,
        meta: Object.freeze({ ...config.meta }),
    };
}

function variablesSchema(variables: readonly string[]): InputSchema {
    const properties: Record<string, unknown> = {};
    for (const name of variables) properties[name] = { type: 'string' };
    return { type: 'object', properties, required: [...variables] };
}
