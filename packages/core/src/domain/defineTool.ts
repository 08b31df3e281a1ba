/**
 * defineTool() — Native Tool Definition
 *
 * Builds a {@link ToolComponent} from a plain config object. Input can be
 * a Zod object (arguments are validated and typed) or a ready-made JSON
 * Schema (only required keys are checked). The handler may return a
 * {@link ToolResponse} or any plain value; plain values go through
 * {@link toToolResponse}.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { defineTool } from '@tessera/core';
 *
 * export const analyzePricing = defineTool({
 *     name: 'analyze_pricing',
 *     description: 'Compare a price against the category median',
 *     input: z.object({ sku: z.string(), price: z.number() }),
 *     handler: async ({ sku, price }) => ({ sku, delta: price - 10 }),
 * });
 * ```
 *
 * @module
 */
import { ZodObject, type ZodRawShape, type z } from 'zod';
import {
    type CallContext,
    type InputSchema,
    type ToolComponent,
} from './Component.js';
import { type ToolAnnotations, createToolAnnotations } from './ToolAnnotations.js';
import { toToolResponse } from '../core/response.js';
import { ValidationError } from '../core/errors.js';
import { normalizeObjectSchema, zodInputSchema } from '../core/schema/SchemaGenerator.js';

// ============================================================================
// Config Types
// ============================================================================

interface ToolConfigBase {
    readonly name: string;
    readonly title?: string;
    readonly description?: string;
    readonly tags?: readonly string[];
    /** Defaults to `true` */
    readonly enabled?: boolean;
    readonly meta?: Record<string, unknown>;
    readonly annotations?: ToolAnnotations;
    readonly outputSchema?: ToolComponent['outputSchema'];
}

export interface ZodToolConfig<S extends ZodObject<ZodRawShape>> extends ToolConfigBase {
    readonly input: S;
    readonly handler: (args: z.infer<S>, ctx: CallContext) => Promise<unknown>;
}

export interface JsonToolConfig extends ToolConfigBase {
    /** JSON Schema of the arguments; defaults to an empty object schema */
    readonly input?: InputSchema;
    readonly handler: (args: Record<string, unknown>, ctx: CallContext) => Promise<unknown>;
}

// ============================================================================
// Factory
// ============================================================================

export function defineTool<S extends ZodObject<ZodRawShape>>(config: ZodToolConfig<S>): ToolComponent;
export function defineTool(config: JsonToolConfig): ToolComponent;
export function defineTool<S extends ZodObject<ZodRawShape>>(
    config: ZodToolConfig<S> | JsonToolConfig,
): ToolComponent {
    const base = {
        kind: 'tool' as const,
        name: config.name,
        title: config.title,
        description: config.description,
        tags: Object.freeze([...(config.tags ?? [])]),
        enabled: config.enabled ?? true,
        meta: Object.freeze({ ...config.meta }),
        annotations: config.annotations ? createToolAnnotations(config.annotations) : undefined,
        outputSchema: config.outputSchema,
    };

    if (isZodConfig(config)) {
        const schema = config.input;
        return Object.freeze({
            ...base,
            inputSchema: zodInputSchema(schema),
            handler: async (args: Record<string, unknown>, ctx: CallContext) => {
                const parsed = schema.safeParse(args);
                if (!parsed.success) {
                    throw new ValidationError(
                        config.name,
                        parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
                    );
                }
                return toToolResponse(await config.handler(parsed.data, ctx));
            },
        });
    }

    const inputSchema = normalizeObjectSchema(config.input ?? {});
    const required = inputSchema.required ?? [];
    return Object.freeze({
        ...base,
        inputSchema,
        handler: async (args: Record<string, unknown>, ctx: CallContext) => {
            const missing = required.filter(field => args[field] === undefined);
            if (missing.length > 0) {
                throw new ValidationError(config.name, missing.map(field => `${field}: Required`));
            }
            return toToolResponse(await config.handler(args, ctx));
        },
    });
}

function isZodConfig<S extends ZodObject<ZodRawShape>>(
    config: ZodToolConfig<S> | JsonToolConfig,
): config is ZodToolConfig<S> {
    return config.input instanceof ZodObject;
}
