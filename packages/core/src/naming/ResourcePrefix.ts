/**
 * ResourcePrefix — Namespace Prefixing for Resource URIs
 *
 * Two encodings coexist:
 *
 * ```
 * 'path'      scheme://prefix/path    (current, default)
 * 'protocol'  prefix+scheme://path    (legacy)
 * ```
 *
 * All functions are pure. An empty prefix is the identity. A URI that
 * does not have the `scheme://path` shape raises {@link FormatError}.
 * Formats are never converted into each other: removing a `'protocol'`
 * prefix from a `'path'`-prefixed URI fails like any missing prefix.
 *
 * ```typescript
 * addResourcePrefix('weather://forecast', 'wx');              // 'weather://wx/forecast'
 * addResourcePrefix('file:///etc/hosts', 'fs');               // 'file://fs//etc/hosts'
 * addResourcePrefix('weather://forecast', 'wx', 'protocol');  // 'wx+weather://forecast'
 * ```
 *
 * @module
 */
import { FormatError } from '../core/errors.js';

export type ResourcePrefixFormat = 'path' | 'protocol';

export interface ParsedResourceUri {
    readonly scheme: string;
    /** Everything after `://`, possibly empty or itself starting with `/` */
    readonly path: string;
}

const URI_PATTERN = /^([^:]+):\/\/([\s\S]*)$/;

// ── Parsing ──────────────────────────────────────────────

/** Split a URI into scheme and path, or return `undefined` when malformed. */
export function tryParseResourceUri(uri: string): ParsedResourceUri | undefined {
    const m = URI_PATTERN.exec(uri);
    if (!m) return undefined;
    const [, scheme = '', path = ''] = m;
    return { scheme, path };
}

export function parseResourceUri(uri: string): ParsedResourceUri {
    const parsed = tryParseResourceUri(uri);
    if (!parsed) {
        throw new FormatError(uri, `Invalid resource URI "${uri}": expected "scheme://path".`);
    }
    return parsed;
}

// ── Public API ───────────────────────────────────────────

export function addResourcePrefix(uri: string, prefix: string, format: ResourcePrefixFormat = 'path'): string {
    const { scheme, path } = parseResourceUri(uri);
    if (!prefix) return uri;
    return format === 'protocol'
        ? `${prefix}+${uri}`
        : `${scheme}://${prefix}/${path}`;
}

export function removeResourcePrefix(uri: string, prefix: string, format: ResourcePrefixFormat = 'path'): string {
    parseResourceUri(uri);
    const stripped = stripResourcePrefix(uri, prefix, format);
    if (stripped === undefined) {
        const expected = format === 'protocol' ? `"${prefix}+scheme://path"` : `"scheme://${prefix}/path"`;
        throw new FormatError(uri, `Resource URI "${uri}" does not carry prefix "${prefix}" in ${format} format (expected ${expected}).`);
    }
    return stripped;
}

export function hasResourcePrefix(uri: string, prefix: string, format: ResourcePrefixFormat = 'path'): boolean {
    parseResourceUri(uri);
    return stripResourcePrefix(uri, prefix, format) !== undefined;
}

/**
 * Non-throwing removal used by the router: the unprefixed URI, or
 * `undefined` when `uri` is malformed or lacks the prefix.
 */
export function stripResourcePrefix(uri: string, prefix: string, format: ResourcePrefixFormat = 'path'): string | undefined {
    const parsed = tryParseResourceUri(uri);
    if (!parsed) return undefined;
    if (!prefix) return uri;

    if (format === 'protocol') {
        const marker = `${prefix}+`;
        if (!uri.startsWith(marker)) return undefined;
        const rest = uri.slice(marker.length);
        return tryParseResourceUri(rest) ? rest : undefined;
    }

    const marker = `${prefix}/`;
    if (!parsed.path.startsWith(marker)) return undefined;
    return `${parsed.scheme}://${parsed.path.slice(marker.length)}`;
}
