import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ToolServer } from '../../src/server/ToolServer.js';
import { type AttachOptions, type DetachFn } from '../../src/server/ServerAttachment.js';
import { resolveServer } from '../../src/server/ServerResolver.js';
import { defineTool } from '../../src/domain/defineTool.js';
import { defineResource } from '../../src/domain/defineResource.js';
import { definePrompt } from '../../src/domain/definePrompt.js';

// ============================================================================
// Helpers
// ============================================================================

const open: Array<{ client: Client; server: Server }> = [];

async function connect(tools: ToolServer, options?: AttachOptions): Promise<{ client: Client; detach: DetachFn }> {
    const server = new Server({ name: 'attached', version: '1.0.0' }, { capabilities: {} });
    const detach = tools.attachToServer(server, options);
    const client = new Client({ name: 'attached-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
    open.push({ client, server });
    return { client, detach };
}

function catalog(): ToolServer {
    const server = new ToolServer({ name: 'catalog' });
    server.registerAll(
        defineTool({
            name: 'echo',
            description: 'Echo the text back',
            input: z.object({ text: z.string() }),
            handler: async ({ text }) => text,
        }),
        defineTool({ name: 'crash', handler: async () => { throw new Error('kaput'); } }),
        defineTool({ name: 'audit', tags: ['internal'], handler: async () => 'audited' }),
        defineResource({ name: 'readme', uri: 'docs://readme', read: async () => '# hi' }),
        defineResource({ name: 'broken', uri: 'docs://broken', read: async () => { throw new Error('disk'); } }),
        definePrompt({ name: 'greet', arguments: [{ name: 'who', required: true }], render: async ({ who }) => `hello ${String(who)}` }),
    );
    return server;
}

afterEach(async () => {
    for (const { client, server } of open.splice(0)) {
        await client.close();
        await server.close();
    }
});

// ============================================================================
// ServerResolver
// ============================================================================

describe('resolveServer', () => {
    it('should accept a Server and an object exposing one', () => {
        const server = new Server({ name: 's', version: '1.0.0' }, { capabilities: {} });
        expect(resolveServer(server)).toBe(server);
        expect(resolveServer({ server })).toBe(server);
    });

    it('should reject anything else', () => {
        expect(() => resolveServer(undefined)).toThrow('attachToServer() requires a Server or McpServer instance.');
        expect(() => resolveServer({ server: 'nope' })).toThrow(/neither/);
    });
});

// ============================================================================
// attachToServer
// ============================================================================

describe('attachToServer', () => {
    // ── Tools ──

    it('should list tools with their schemas', async () => {
        const { client } = await connect(catalog());
        const { tools } = await client.listTools();

        expect(tools.map(t => t.name)).toEqual(['echo', 'crash', 'audit']);
        expect(tools[0]).toMatchObject({
            name: 'echo',
            description: 'Echo the text back',
            inputSchema: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
        });
    });

    it('should call a tool', async () => {
        const { client } = await connect(catalog());
        const result = await client.callTool({ name: 'echo', arguments: { text: 'hi' } });
        expect(result.content).toEqual([{ type: 'text', text: 'hi' }]);
    });

    it('should answer an unknown tool with InvalidParams', async () => {
        const { client } = await connect(catalog());
        await expect(client.callTool({ name: 'nope' })).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('should turn a thrown tool error into an isError result', async () => {
        const { client } = await connect(catalog());
        const result = await client.callTool({ name: 'crash' });
        expect(result).toMatchObject({ isError: true, content: [{ type: 'text', text: 'kaput' }] });
    });

    it('should report invalid arguments as an isError result', async () => {
        const { client } = await connect(catalog());
        const result = await client.callTool({ name: 'echo', arguments: {} });
        expect(result).toMatchObject({
            isError: true,
            content: [{ type: 'text', text: 'Invalid arguments for "echo": text: Required' }],
        });
    });

    // ── Resources and prompts ──

    it('should read a resource', async () => {
        const { client } = await connect(catalog());
        const result = await client.readResource({ uri: 'docs://readme' });
        expect(result.contents).toEqual([{ uri: 'docs://readme', mimeType: 'text/plain', text: '# hi' }]);
    });

    it('should map resource errors to MCP error codes', async () => {
        const { client } = await connect(catalog());
        await expect(client.readResource({ uri: 'docs://missing' })).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
        await expect(client.readResource({ uri: 'docs://broken' })).rejects.toMatchObject({ code: ErrorCode.InternalError });
    });

    it('should render a prompt', async () => {
        const { client } = await connect(catalog());
        const { prompts } = await client.listPrompts();
        expect(prompts).toEqual([{ name: 'greet', arguments: [{ name: 'who', required: true }] }]);

        const result = await client.getPrompt({ name: 'greet', arguments: { who: 'ada' } });
        expect(result.messages).toEqual([{ role: 'user', content: { type: 'text', text: 'hello ada' } }]);
    });

    // ── Filter and detach ──

    it('should hide filtered components from listing and calls', async () => {
        const { client } = await connect(catalog(), { filter: { exclude: ['internal'] } });
        const { tools } = await client.listTools();

        expect(tools.map(t => t.name)).toEqual(['echo', 'crash']);
        await expect(client.callTool({ name: 'audit' })).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('should stop serving after detach', async () => {
        const { client, detach } = await connect(catalog());
        detach();

        expect((await client.listTools()).tools).toEqual([]);
        const result = await client.callTool({ name: 'echo', arguments: { text: 'hi' } });
        expect(result).toMatchObject({ isError: true, content: [{ type: 'text', text: 'Tool handlers have been detached' }] });
    });
});
