/**
 * UriTemplateMatcher — RFC 6570 matching and expansion over the SDK's
 * `UriTemplate`, normalized to string-valued parameters.
 */
import { UriTemplate } from '@modelcontextprotocol/sdk/shared/uriTemplate.js';

const EXPRESSION = /\{([^}]+)\}/g;
const OPERATORS = new Set(['+', '#', '.', '/', ';', '?', '&']);

/** Variable names in declaration order, without operators or modifiers. */
export function templateVariables(template: string): string[] {
    const names: string[] = [];
    for (const m of template.matchAll(EXPRESSION)) {
        let body = m[1] ?? '';
        if (OPERATORS.has(body.charAt(0))) body = body.slice(1);
        for (const spec of body.split(',')) {
            const name = spec.replace(/\*$/, '').replace(/:\d+$/, '').trim();
            if (name && !names.includes(name)) names.push(name);
        }
    }
    return names;
}

/** Match `uri` against `template`; array captures are joined with commas. */
export function matchTemplate(template: string, uri: string): Record<string, string> | undefined {
    const vars = new UriTemplate(template).match(uri);
    if (!vars) return undefined;
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(vars)) {
        out[key] = Array.isArray(value) ? value.join(',') : value;
    }
    return out;
}

export function expandTemplate(template: string, params: Readonly<Record<string, string>>): string {
    return new UriTemplate(template).expand({ ...params });
}
