/**
 * NamePrefix — `prefix_name` namespacing for tools and prompts.
 *
 * An empty prefix is the identity.
 */
import { FormatError } from '../core/errors.js';

export const NAME_SEPARATOR = '_';

export function addNamePrefix(name: string, prefix: string): string {
    return prefix ? `${prefix}${NAME_SEPARATOR}${name}` : name;
}

export function hasNamePrefix(name: string, prefix: string): boolean {
    return stripNamePrefix(name, prefix) !== undefined;
}

export function removeNamePrefix(name: string, prefix: string): string {
    const stripped = stripNamePrefix(name, prefix);
    if (stripped === undefined) {
        throw new FormatError(name, `Name "${name}" does not start with "${prefix}${NAME_SEPARATOR}".`);
    }
    return stripped;
}

/** The unprefixed name, or `undefined` when `name` lacks the prefix. */
export function stripNamePrefix(name: string, prefix: string): string | undefined {
    if (!prefix) return name;
    const marker = `${prefix}${NAME_SEPARATOR}`;
    return name.startsWith(marker) ? name.slice(marker.length) : undefined;
}
