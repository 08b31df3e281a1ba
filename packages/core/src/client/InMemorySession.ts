/**
 * InMemorySession — Default PROXY Session
 *
 * Serves the child through a fresh SDK `Server` and talks to it with an
 * SDK `Client` over `InMemoryTransport`, so the child sees a real MCP
 * session: its lifespan runs, the initialize handshake happens, and
 * aborting a call sends `notifications/cancelled`.
 *
 * @example
 * ```typescript
 * const session = await connectInMemory(child);
 * await session.callTool('ping', {});
 * await session.close();
 * ```
 *
 * @module
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import {
    CallToolResultSchema,
    ErrorCode,
    McpError,
} from '@modelcontextprotocol/sdk/types.js';
import {
    type PromptResult,
    type ResourceReadResult,
    type ToolResponse,
} from '../domain/Component.js';
import { NotFoundError, ToolExecutionError, type LookupKind } from '../core/errors.js';
import { type ToolServer } from '../server/ToolServer.js';
import { type RemoteSession } from './RemoteSession.js';

// ============================================================================
// Factory
// ============================================================================

/**
 * Start `child`, serve it on an in-memory link, and complete the MCP
 * initialize handshake. If connecting fails the child is stopped again.
 */
export async function connectInMemory(child: ToolServer): Promise<RemoteSession> {
    await child.start();

    const server = new Server(
        { name: child.name, version: child.version },
        {
            capabilities: { tools: {}, resources: {}, prompts: {} },
            ...(child.instructions !== undefined ? { instructions: child.instructions } : {}),
        },
    );
    child.attachToServer(server);

    const client = new Client({ name: `${child.name}-proxy`, version: child.version });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    try {
        await server.connect(serverTransport);
        await client.connect(clientTransport);
    } catch (err) {
        await server.close();
        await child.stop();
        throw err;
    }

    return new InMemorySession(client, server, child);
}

// ============================================================================
// Session
// ============================================================================

class InMemorySession implements RemoteSession {
    private _closed = false;

    constructor(
        private readonly _client: Client,
        private readonly _server: Server,
        private readonly _child: ToolServer,
    ) {}

    async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResponse> {
        const result = await this._request('tool', name, () => this._client.request(
            { method: 'tools/call', params: { name, arguments: args } },
            CallToolResultSchema,
            { signal },
        ));
        if (result.isError) {
            const text = result.content
                .map(block => (block.type === 'text' ? block.text : ''))
                .filter(Boolean)
                .join('\n');
            throw new ToolExecutionError(text || `Tool "${name}" failed in "${this._child.name}".`);
        }
        return result;
    }

    readResource(uri: string, signal?: AbortSignal): Promise<ResourceReadResult> {
        return this._request('resource', uri, () => this._client.readResource({ uri }, { signal }));
    }

    getPrompt(name: string, args: Record<string, string>, signal?: AbortSignal): Promise<PromptResult> {
        return this._request('prompt', name, () => this._client.getPrompt({ name, arguments: args }, { signal }));
    }

    /** Close the link and run the child's teardown. Idempotent. */
    async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;
        try {
            await this._client.close();
            await this._server.close();
        } finally {
            await this._child.stop();
        }
    }

    private async _request<T>(kind: LookupKind, identifier: string, send: () => Promise<T>): Promise<T> {
        try {
            return await send();
        } catch (err) {
            if (err instanceof McpError && err.code === ErrorCode.InvalidParams) {
                throw new NotFoundError(kind, identifier);
            }
            throw err;
        }
    }
}
