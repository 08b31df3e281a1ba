/**
 * definePrompt() — Native Prompt Definition
 *
 * The render function may return a single string (sent as one user
 * message), a message array, or a full {@link PromptResult}.
 *
 * @example
 * ```typescript
 * const review = definePrompt({
 *     name: 'code_review',
 *     arguments: [{ name: 'language', required: true }],
 *     render: async ({ language }) => `Review this ${language} snippet.`,
 * });
 * ```
 *
 * @module
 */
import {
    type CallContext,
    type PromptArgumentDef,
    type PromptComponent,
    type PromptMessage,
    type PromptResult,
} from './Component.js';
import { ValidationError } from '../core/errors.js';

export interface PromptConfig {
    readonly name: string;
    readonly title?: string;
    readonly description?: string;
    readonly arguments?: readonly PromptArgumentDef[];
    readonly tags?: readonly string[];
    readonly enabled?: boolean;
    readonly meta?: Record<string, unknown>;
    readonly render: (
        args: Record<string, string>,
        ctx: CallContext,
    ) => Promise<string | PromptMessage[] | PromptResult>;
}

export function definePrompt(config: PromptConfig): PromptComponent {
    const args = Object.freeze([...(config.arguments ?? [])]);
    const required = args.filter(a => a.required === true).map(a => a.name);

    return Object.freeze({
        kind: 'prompt' as const,
        name: config.name,
        title: config.title,
        description: config.description,
        tags: Object.freeze([...(config.tags ?? [])]),
        enabled: config.enabled ?? true,
        meta: Object.freeze({ ...config.meta }),
        arguments: args,
        render: async (values: Record<string, string>, ctx: CallContext): Promise<PromptResult> => {
            const missing = required.filter(name => values[name] === undefined);
            if (missing.length > 0) {
                throw new ValidationError(config.name, missing.map(name => `${name}: Required`));
            }
            return toPromptResult(await config.render(values, ctx), config.description);
        },
    });
}

function toPromptResult(
    value: string | PromptMessage[] | PromptResult,
    description: string | undefined,
): PromptResult {
    if (typeof value === 'string') {
        return { description, messages: [{ role: 'user', content: { type: 'text', text: value } }] };
    }
    if (Array.isArray(value)) return { description, messages: value };
    return value;
}
