import { describe, it, expect } from 'vitest';
import { ToolServer } from '../../src/server/ToolServer.js';
import { defineTool } from '../../src/domain/defineTool.js';
import { defineResource } from '../../src/domain/defineResource.js';
import { definePrompt } from '../../src/domain/definePrompt.js';
import { textOf } from '../../src/core/response.js';
import { ConflictError, NotFoundError } from '../../src/core/errors.js';
import { type ToolResponse } from '../../src/domain/Component.js';

// ============================================================================
// Helpers
// ============================================================================

function serverWith(name: string, ...tools: [string, string][]): ToolServer {
    const server = new ToolServer({ name });
    for (const [toolName, reply] of tools) {
        server.register(defineTool({ name: toolName, handler: async () => reply }));
    }
    return server;
}

async function call(server: ToolServer, name: string): Promise<string> {
    return textOf(await server.callTool(name));
}

// ============================================================================
// Mount
// ============================================================================

describe('ToolServer.mount', () => {
    it('should expose a child tool under prefix_name and return its exact result', async () => {
        const exact: ToolResponse = { content: [{ type: 'text', text: 'median 10' }], structuredContent: { median: 10 } };
        const analytics = new ToolServer({ name: 'analytics' });
        analytics.register(defineTool({ name: 'analyze_pricing', handler: async () => exact }));

        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(analytics, { prefix: 'analytics' });

        expect(await gateway.callTool('analytics_analyze_pricing')).toBe(exact);
        expect(gateway.listTools().map(t => t.name)).toEqual(['analytics_analyze_pricing']);
    });

    it('should not answer to the unprefixed name of a prefixed child', async () => {
        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(serverWith('analytics', ['report', 'r']), { prefix: 'analytics' });
        await expect(gateway.callTool('report')).rejects.toThrow('Unknown tool: "report".');
    });

    it('should try unprefixed mounts in mount order', async () => {
        const first = serverWith('first', ['ping', 'from first']);
        const second = serverWith('second', ['ping', 'from second']);
        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(first);
        gateway.mount(second);

        expect(await call(gateway, 'ping')).toBe('from first');
        expect(gateway.listTools()).toHaveLength(1);

        expect(await gateway.unmount(first)).toBe(true);
        expect(await call(gateway, 'ping')).toBe('from second');
    });

    it('should see later changes in a mounted child', async () => {
        const child = serverWith('child');
        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(child, { prefix: 'c' });

        child.register(defineTool({ name: 'late', handler: async () => 'arrived' }));

        expect(await call(gateway, 'c_late')).toBe('arrived');
    });

    it('should prefer own components over mounted ones', async () => {
        const gateway = serverWith('gateway', ['ping', 'own']);
        gateway.mount(serverWith('child', ['ping', 'child']));
        expect(await call(gateway, 'ping')).toBe('own');
    });

    it('should list own, then prefixed, then unprefixed components', () => {
        const gateway = serverWith('gateway', ['own', 'x']);
        gateway.mount(serverWith('plain', ['bare', 'x']));
        gateway.mount(serverWith('named', ['tool', 'x']), { prefix: 'named' });
        expect(gateway.listTools().map(t => t.name)).toEqual(['own', 'named_tool', 'bare']);
    });

    it('should prefix prompts like tools', async () => {
        const child = new ToolServer({ name: 'child' });
        child.register(definePrompt({ name: 'greet', render: async () => 'hello' }));
        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(child, { prefix: 'c' });

        const result = await gateway.getPrompt('c_greet');
        expect(result.messages).toEqual([{ role: 'user', content: { type: 'text', text: 'hello' } }]);
        expect(gateway.listPrompts().map(p => p.name)).toEqual(['c_greet']);
    });

    it('should treat an empty prefix as no prefix', async () => {
        const gateway = new ToolServer({ name: 'gateway' });
        const mount = gateway.mount(serverWith('child', ['ping', 'pong']), { prefix: '' });
        expect(mount.prefix).toBeUndefined();
        expect(await call(gateway, 'ping')).toBe('pong');
    });

    // ── Mode selection ──

    it('should mount a child with a lifespan in proxy mode by default', () => {
        const child = new ToolServer({ name: 'child', lifespan: { onStart: () => undefined } });
        expect(child.observableLifecycle).toBe(true);
        expect(new ToolServer({ name: 'p' }).mount(child).mode).toBe('proxy');
    });

    it('should honor an explicit observableLifecycle flag', () => {
        const child = new ToolServer({ name: 'child', lifespan: { onStart: () => undefined }, observableLifecycle: false });
        expect(new ToolServer({ name: 'p' }).mount(child).mode).toBe('direct');
    });

    it('should mount a plain child in direct mode', () => {
        expect(new ToolServer({ name: 'p' }).mount(serverWith('child')).mode).toBe('direct');
    });

    it('should run no child lifecycle hooks in direct mode', async () => {
        const events: string[] = [];
        const child = new ToolServer({
            name: 'child',
            lifespan: { onStart: () => { events.push('start'); }, onStop: () => { events.push('stop'); } },
        });
        child.register(defineTool({ name: 'ping', handler: async () => 'pong' }));
        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(child, { prefix: 'c', mode: 'direct' });

        expect(await call(gateway, 'c_ping')).toBe('pong');
        await gateway.close();
        expect(events).toEqual([]);
    });

    // ── Cycles ──

    it('should refuse to mount a server into itself', () => {
        const server = new ToolServer({ name: 'loop' });
        expect(() => server.mount(server)).toThrow(ConflictError);
    });

    it('should refuse a mount that closes a cycle', () => {
        const a = new ToolServer({ name: 'a' });
        const b = new ToolServer({ name: 'b' });
        const c = new ToolServer({ name: 'c' });
        a.mount(b);
        b.mount(c, { prefix: 'c' });
        expect(() => c.mount(a)).toThrow('Mounting "a" into "c" would create a cycle.');
    });
});

// ============================================================================
// Unmount
// ============================================================================

describe('ToolServer.unmount', () => {
    it('should make the child unreachable at once', async () => {
        const gateway = new ToolServer({ name: 'gateway' });
        const mount = gateway.mount(serverWith('child', ['ping', 'pong']), { prefix: 'c' });

        const removed = gateway.unmount(mount);
        await expect(gateway.callTool('c_ping')).rejects.toBeInstanceOf(NotFoundError);
        expect(await removed).toBe(true);
    });

    it('should return false for an unknown mount', async () => {
        const gateway = new ToolServer({ name: 'gateway' });
        expect(await gateway.unmount(serverWith('stranger'))).toBe(false);
    });

    it('should leave the child untouched', async () => {
        const child = serverWith('child', ['ping', 'pong']);
        const gateway = new ToolServer({ name: 'gateway' });
        gateway.mount(child, { prefix: 'c' });
        await gateway.unmount(child);
        expect(await call(child, 'ping')).toBe('pong');
    });
});

// ============================================================================
// Import
// ============================================================================

describe('ToolServer.importServer', () => {
    it('should copy current components with the prefix applied', async () => {
        const child = serverWith('child', ['ping', 'pong']);
        child.register(defineResource({ name: 'readme', uri: 'docs://readme', read: async () => '# hi' }));

        const gateway = new ToolServer({ name: 'gateway' });
        gateway.importServer(child, { prefix: 'c' });

        expect(gateway.registry.tools.has('c_ping')).toBe(true);
        expect(gateway.registry.resources.has('docs://c/readme')).toBe(true);
        expect(await call(gateway, 'c_ping')).toBe('pong');
    });

    it('should not reflect later changes in the child', async () => {
        const child = serverWith('child', ['ping', 'pong']);
        const imported = new ToolServer({ name: 'imported' });
        const mounted = new ToolServer({ name: 'mounted' });
        imported.importServer(child, { prefix: 'c' });
        mounted.mount(child, { prefix: 'c' });

        child.register(defineTool({ name: 'late', handler: async () => 'arrived' }));

        await expect(imported.callTool('c_late')).rejects.toBeInstanceOf(NotFoundError);
        expect(imported.listTools().map(t => t.name)).toEqual(['c_ping']);
        expect(await call(mounted, 'c_late')).toBe('arrived');
    });

    it('should include what the child exposes through its own mounts', () => {
        const leaf = serverWith('leaf', ['deep', 'x']);
        const child = serverWith('child', ['ping', 'x']);
        child.mount(leaf, { prefix: 'leaf' });

        const gateway = new ToolServer({ name: 'gateway' });
        gateway.importServer(child, { prefix: 'c' });
        expect(gateway.listTools().map(t => t.name)).toEqual(['c_ping', 'c_leaf_deep']);
    });

    it('should keep copies from a PROXY mount of the child working after the child unmounts it', async () => {
        const events: string[] = [];
        const leaf = new ToolServer({
            name: 'leaf',
            lifespan: {
                onStart: () => { events.push('start'); },
                onStop: () => { events.push('stop'); },
            },
        });
        leaf.register(defineTool({ name: 'deep', handler: async () => 'deep result' }));
        const child = new ToolServer({ name: 'child' });
        expect(child.mount(leaf, { prefix: 'leaf' }).mode).toBe('proxy');

        const gateway = new ToolServer({ name: 'gateway' });
        gateway.importServer(child, { prefix: 'c' });
        expect(await call(gateway, 'c_leaf_deep')).toBe('deep result');

        expect(await child.unmount(leaf)).toBe(true);
        expect(await call(gateway, 'c_leaf_deep')).toBe('deep result');
        expect(child.mounts).toEqual([]);
        expect(events).toEqual(['start']);

        await gateway.close();
        expect(events).toEqual(['start', 'stop']);
    });

    it('should apply the parent duplicate policy to collisions', () => {
        const child = serverWith('child', ['ping', 'child']);
        const strict = serverWith('strict', ['ping', 'own']);
        expect(() => strict.importServer(child)).toThrow(ConflictError);

        const lenient = new ToolServer({ name: 'lenient', onDuplicate: 'ignore' });
        lenient.register(defineTool({ name: 'ping', handler: async () => 'own' }));
        lenient.importServer(child);
        expect(lenient.registry.tools.size).toBe(1);
    });

    it('should refuse to import a server into itself', () => {
        const server = new ToolServer({ name: 'self' });
        expect(() => server.importServer(server)).toThrow(ConflictError);
    });
});
