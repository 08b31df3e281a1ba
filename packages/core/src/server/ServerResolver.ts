/**
 * ServerResolver — locate the low-level SDK `Server` a ToolServer attaches to.
 *
 * Accepts the `Server` itself or any wrapper that exposes one as `.server`
 * (the SDK's `McpServer` does). Wrappers of wrappers are followed too.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';

const MAX_WRAPPER_DEPTH = 4;

function unwrap(input: unknown): unknown {
    return typeof input === 'object' && input !== null && 'server' in input ? input.server : undefined;
}

/**
 * Resolve `input` into the SDK `Server` whose request handlers
 * `attachToServer()` replaces.
 *
 * @throws Error when neither `input` nor anything it wraps is a `Server`
 */
export function resolveServer(input: unknown): Server {
    if (typeof input !== 'object' || input === null) {
        throw new Error('attachToServer() requires a Server or McpServer instance.');
    }

    let candidate: unknown = input;
    for (let depth = 0; depth <= MAX_WRAPPER_DEPTH && candidate !== undefined; depth++) {
        if (candidate instanceof Server) return candidate;
        candidate = unwrap(candidate);
    }

    throw new Error(
        'attachToServer() requires a Server or McpServer instance; ' +
        'the given object is neither and does not expose one as `.server`.',
    );
}
