/**
 * ToolServer — Composable Component Server
 *
 * Owns a {@link ComponentRegistry}, a list of mounted child servers, and
 * the invocation middleware. Every call resolves through the
 * {@link locate | delegation router}: own registry first, then prefixed
 * mounts, then unprefixed mounts in mount order.
 *
 * @example
 * ```typescript
 * import { ToolServer, defineTool } from '@tessera/core';
 *
 * const analytics = new ToolServer({ name: 'analytics' });
 * analytics.register(defineTool({
 *     name: 'analyze_pricing',
 *     handler: async () => ({ median: 10 }),
 * }));
 *
 * const gateway = new ToolServer({ name: 'gateway' });
 * gateway.mount(analytics, { prefix: 'analytics' });
 *
 * await gateway.callTool('analytics_analyze_pricing', {});
 *
 * // Serve over any MCP SDK server:
 * const detach = gateway.attachToServer(mcpServer);
 * ```
 *
 * @module
 */
import {
    type Component,
    type ComponentBase,
    type ComponentKind,
    type PromptComponent,
    type PromptResult,
    type ResourceBody,
    type ResourceComponent,
    type ResourceContent,
    type ResourceReadResult,
    type ResourceTemplateComponent,
    type ToolComponent,
    type ToolResponse,
    componentKey,
} from '../domain/Component.js';
import { ComponentRegistry, type AddOutcome } from '../core/registry/ComponentRegistry.js';
import { compileFilter, type VisibilityPredicate } from '../core/registry/ComponentFilterEngine.js';
import { wrapChain, type InvocationMiddleware, type InvocationRequest } from '../core/execution/MiddlewareCompiler.js';
import {
    ConflictError,
    NotFoundError,
    RoutingError,
    ValidationError,
    messageOf,
    type LookupKind,
} from '../core/errors.js';
import {
    locate,
    promptLookup,
    resourceLookup,
    toolLookup,
    type Lookup,
    type Resolution,
} from '../routing/DelegationRouter.js';
import { MountedServer, selectMountMode, type MountMode } from '../composition/MountedServer.js';
import { prefixComponent, proxyComponent } from '../composition/prefixComponent.js';
import { type SessionFactory } from '../client/RemoteSession.js';
import { connectInMemory } from '../client/InMemorySession.js';
import { type ResourcePrefixFormat } from '../naming/ResourcePrefix.js';
import { type DebugEvent, type DebugObserverFn } from '../observability/DebugObserver.js';
import { type TesseraSpan, type TesseraTracer, SpanStatusCode } from '../observability/Tracing.js';
import {
    attachToServer as attachToServerStrategy,
    type AttachOptions,
    type DetachFn,
} from './ServerAttachment.js';
import {
    mergeSettings,
    type CallOptions,
    type Lifespan,
    type ServerSettings,
    type ToolServerOptions,
} from './ServerSettings.js';

// ── Types ────────────────────────────────────────────────

export interface MountOptions {
    /** Namespace for the child's components; omitted means unprefixed */
    readonly prefix?: string;
    /** Defaults to {@link selectMountMode} on the child */
    readonly mode?: MountMode;
    /** How PROXY sessions are opened (default {@link connectInMemory}) */
    readonly sessionFactory?: SessionFactory;
}

export interface ImportOptions {
    readonly prefix?: string;
}

/** Chooses the mount a proxied record dispatches through */
type Rebind = (mount: MountedServer) => MountedServer;

const sameMount: Rebind = mount => mount;

type Resolved<M> = Extract<Resolution<M>, { status: 'local' | 'mounted' }>;

// ============================================================================
// ToolServer
// ============================================================================

export class ToolServer {
    readonly name: string;
    readonly version: string;
    readonly instructions: string | undefined;
    readonly registry: ComponentRegistry;
    readonly settings: ServerSettings;

    private readonly _mounts: MountedServer[] = [];
    /** Sessions backing imported components that came from PROXY mounts */
    private readonly _importLinks: MountedServer[] = [];
    private readonly _middlewares: InvocationMiddleware[] = [];
    private readonly _visible: VisibilityPredicate;
    private readonly _lifespan: Lifespan | undefined;
    private readonly _observableLifecycle: boolean;
    private _debug: DebugObserverFn | undefined;
    private _tracer: TesseraTracer | undefined;
    private _starts = 0;
    private _ready: Promise<void> | undefined;

    constructor(options: ToolServerOptions) {
        this.name = options.name;
        this.settings = mergeSettings(options);
        this.version = this.settings.version;
        this.instructions = options.instructions;
        this.registry = new ComponentRegistry(this.settings.onDuplicate);
        this._visible = compileFilter(this.settings.filter);
        this._lifespan = options.lifespan;
        this._observableLifecycle = options.observableLifecycle ?? options.lifespan !== undefined;
        if (options.debug) this.enableDebug(options.debug);
        if (options.tracing) this.enableTracing(options.tracing);
    }

    // ── Capabilities ─────────────────────────────────────

    /** Whether a parent must mount this server in PROXY mode by default */
    get observableLifecycle(): boolean {
        return this._observableLifecycle;
    }

    get resourcePrefixFormat(): ResourcePrefixFormat {
        return this.settings.resourcePrefixFormat;
    }

    get mounts(): readonly MountedServer[] {
        return this._mounts;
    }

    /** Whether a component passes this server's enabled flag and tag filter */
    isVisible(component: ComponentBase): boolean {
        return this._visible(component);
    }

    // ── Registration ─────────────────────────────────────

    /**
     * Add a component to the server's own registry, under its
     * duplicate policy.
     *
     * @throws {ConflictError} on a duplicate key under the `'error'` policy
     */
    register(component: Component): AddOutcome {
        const outcome = this.registry.add(component);
        this._emit({
            type: 'register',
            server: this.name,
            kind: component.kind,
            key: componentKey(component),
            outcome,
            timestamp: Date.now(),
        });
        return outcome;
    }

    /**
     * Register several components in order. A failure leaves the
     * components before it registered.
     */
    registerAll(...components: Component[]): void {
        for (const component of components) this.register(component);
    }

    /** Remove an own component by kind and key. */
    remove(kind: ComponentKind, key: string): boolean {
        return this.registry.remove(kind, key);
    }

    /**
     * Flip the `enabled` flag of an own component. Returns `false` when
     * no such component is registered.
     */
    setEnabled(kind: ComponentKind, key: string, enabled: boolean): boolean {
        switch (kind) {
            case 'tool': return toggle(this.registry.tools, key, enabled);
            case 'resource': return toggle(this.registry.resources, key, enabled);
            case 'resource_template': return toggle(this.registry.templates, key, enabled);
            case 'prompt': return toggle(this.registry.prompts, key, enabled);
        }
    }

    /** Append an invocation middleware. The first added is outermost. */
    use(middleware: InvocationMiddleware): this {
        this._middlewares.push(middleware);
        return this;
    }

    // ── Composition ──────────────────────────────────────

    /**
     * Link a child server into this server's namespace. The child is
     * not copied: later changes to it are visible on the next call.
     *
     * @throws {ConflictError} when the child is this server or already reaches it
     */
    mount(child: ToolServer, options: MountOptions = {}): MountedServer {
        if (child === this || child.reaches(this)) {
            throw new ConflictError('mount', child.name,
                `Mounting "${child.name}" into "${this.name}" would create a cycle.`);
        }
        const mode = options.mode ?? selectMountMode(child);
        const mounted = new MountedServer(
            child,
            options.prefix || undefined,
            mode,
            options.sessionFactory ?? connectInMemory,
        );
        this._mounts.push(mounted);
        this._emit({
            type: 'mount',
            server: this.name,
            child: child.name,
            action: 'mount',
            prefix: mounted.prefix,
            mode,
            timestamp: Date.now(),
        });
        return mounted;
    }

    /**
     * Remove a mount, by its record or by the child server (first match).
     *
     * The mount disappears from resolution before this returns its
     * promise. A PROXY session is closed once calls already dispatched to
     * it have settled.
     */
    async unmount(target: MountedServer | ToolServer): Promise<boolean> {
        const index = this._mounts.findIndex(m => m === target || m.server === target);
        const mounted = this._mounts[index];
        if (!mounted) return false;
        this._mounts.splice(index, 1);
        this._emit({
            type: 'mount',
            server: this.name,
            child: mounted.server.name,
            action: 'unmount',
            prefix: mounted.prefix,
            mode: mounted.mode,
            timestamp: Date.now(),
        });
        await mounted.detach();
        return true;
    }

    /**
     * Copy everything the child currently exposes into this server's
     * own registry, prefixed, through this server's duplicate policy.
     *
     * Components the child reaches through its own mounts are copied from
     * their owning server. Those behind a PROXY mount are bound to a
     * session this server opens and closes itself, so the copies keep
     * working after the child unmounts or closes anything.
     */
    importServer(child: ToolServer, options: ImportOptions = {}): void {
        if (child === this) {
            throw new ConflictError('mount', child.name, `Cannot import "${child.name}" into itself.`);
        }
        const prefix = options.prefix ?? '';
        const format = this.resourcePrefixFormat;
        const links = new Map<MountedServer, MountedServer>();
        const rebind: Rebind = (mount) => {
            let link = links.get(mount);
            if (!link) {
                link = new MountedServer(mount.server, undefined, 'proxy', mount.sessionFactory);
                links.set(mount, link);
                this._importLinks.push(link);
            }
            return link;
        };

        for (const c of child._exposed(s => s.registry.tools.values(), rebind)) this.register(prefixComponent(c, prefix, format));
        for (const c of child._exposed(s => s.registry.resources.values(), rebind)) this.register(prefixComponent(c, prefix, format));
        for (const c of child._exposed(s => s.registry.templates.values(), rebind)) this.register(prefixComponent(c, prefix, format));
        for (const c of child._exposed(s => s.registry.prompts.values(), rebind)) this.register(prefixComponent(c, prefix, format));
        this._emit({
            type: 'mount',
            server: this.name,
            child: child.name,
            action: 'import',
            prefix: prefix || undefined,
            timestamp: Date.now(),
        });
    }

    /** Whether `target` is reachable through this server's mounts. */
    reaches(target: ToolServer): boolean {
        return this._mounts.some(m => m.server === target || m.server.reaches(target));
    }

    // ── Enumeration ──────────────────────────────────────

    /**
     * Every tool exposed under this server's namespace, in resolution
     * order; the first component for a key wins.
     */
    listTools(): ToolComponent[] {
        return this._exposed(s => s.registry.tools.values(), sameMount);
    }

    listResources(): ResourceComponent[] {
        return this._exposed(s => s.registry.resources.values(), sameMount);
    }

    listResourceTemplates(): ResourceTemplateComponent[] {
        return this._exposed(s => s.registry.templates.values(), sameMount);
    }

    listPrompts(): PromptComponent[] {
        return this._exposed(s => s.registry.prompts.values(), sameMount);
    }

    // ── Invocation ───────────────────────────────────────

    /**
     * @throws {NotFoundError} when no owner resolves `name`
     * @throws {RoutingError} when a prefix matched but its child could not resolve the rest
     */
    async callTool(name: string, args: Record<string, unknown> = {}, options: CallOptions = {}): Promise<ToolResponse> {
        const request: InvocationRequest = { kind: 'tool', identifier: name, args, signal: options.signal };
        return wrapChain(request, () => this._traced<ToolResponse>('tool', name, async (span) => {
            const resolved = this._resolve(name, toolLookup, span);
            if (resolved.status === 'local') return resolved.match.handler(args, options);
            const { mount, identifier } = resolved;
            return mount.mode === 'proxy'
                ? mount.run(s => s.callTool(identifier, args, options.signal))
                : mount.server.callTool(identifier, args, options);
        }, r => r.isError === true), this._middlewares)();
    }

    /**
     * Read a resource by URI. Static resources are matched exactly
     * before templates are tried. Content entries for the resolved URI
     * carry the URI as requested here.
     */
    async readResource(uri: string, options: CallOptions = {}): Promise<ResourceReadResult> {
        const request: InvocationRequest = { kind: 'resource', identifier: uri, args: {}, signal: options.signal };
        return wrapChain(request, () => this._traced<ResourceReadResult>('resource', uri, async (span) => {
            const resolved = this._resolve(uri, resourceLookup, span);
            if (resolved.status === 'local') {
                const { match } = resolved;
                const body = match.kind === 'resource'
                    ? await match.component.read(options)
                    : await match.component.read(match.params, options);
                return { contents: [toContent(uri, body, match.component.mimeType)] };
            }
            const { mount, identifier } = resolved;
            const result = mount.mode === 'proxy'
                ? await mount.run(s => s.readResource(identifier, options.signal))
                : await mount.server.readResource(identifier, options);
            return {
                contents: result.contents.map(c => (c.uri === identifier ? { ...c, uri } : c)),
            };
        }, () => false), this._middlewares)();
    }

    async getPrompt(name: string, args: Record<string, string> = {}, options: CallOptions = {}): Promise<PromptResult> {
        const request: InvocationRequest = { kind: 'prompt', identifier: name, args, signal: options.signal };
        return wrapChain(request, () => this._traced<PromptResult>('prompt', name, async (span) => {
            const resolved = this._resolve(name, promptLookup, span);
            if (resolved.status === 'local') return resolved.match.render(args, options);
            const { mount, identifier } = resolved;
            return mount.mode === 'proxy'
                ? mount.run(s => s.getPrompt(identifier, args, options.signal))
                : mount.server.getPrompt(identifier, args, options);
        }, () => false), this._middlewares)();
    }

    // ── Lifecycle ────────────────────────────────────────

    /**
     * Run the lifespan's `onStart` on the first start. Starts are
     * counted; concurrent callers wait for the same `onStart`.
     */
    async start(): Promise<void> {
        this._starts++;
        if (!this._ready) {
            const onStart = this._lifespan?.onStart;
            this._ready = (async () => { await onStart?.(); })();
        }
        try {
            await this._ready;
        } catch (err) {
            this._starts--;
            if (this._starts === 0) this._ready = undefined;
            throw err;
        }
    }

    /** Run the lifespan's `onStop` when the last start is balanced. */
    async stop(): Promise<void> {
        if (this._starts === 0) return;
        this._starts--;
        if (this._starts > 0) return;
        this._ready = undefined;
        await this._lifespan?.onStop?.();
    }

    get running(): boolean {
        return this._starts > 0;
    }

    /** Close every proxy session opened by this server's mounts and imports. */
    async close(): Promise<void> {
        await Promise.all([...this._mounts, ...this._importLinks].map(m => m.close()));
    }

    // ── Transport ────────────────────────────────────────

    /**
     * Register MCP request handlers for this server on an SDK `Server`
     * or `McpServer`.
     */
    attachToServer(server: unknown, options: AttachOptions = {}): DetachFn {
        return attachToServerStrategy(server, this, options);
    }

    // ── Observability ────────────────────────────────────

    enableDebug(observer: DebugObserverFn): void {
        if (this._tracer) {
            console.warn('[tessera] Both tracing and debug are enabled. Tracing takes precedence; call events will not be emitted.');
        }
        this._debug = observer;
    }

    enableTracing(tracer: TesseraTracer): void {
        if (this._debug) {
            console.warn('[tessera] Both tracing and debug are enabled. Tracing takes precedence; call events will not be emitted.');
        }
        this._tracer = tracer;
    }

    // ── Internals ────────────────────────────────────────

    /**
     * Components exposed under this server's namespace, in resolution
     * order; the first component for a key wins. `rebind` picks the
     * mount a PROXY-forwarding record dispatches through.
     */
    private _exposed<C extends Component>(own: (server: ToolServer) => Iterable<C>, rebind: Rebind): C[] {
        const out = new Map<string, C>();
        const put = (component: C): void => {
            const key = componentKey(component);
            if (!out.has(key) && this._visible(component)) out.set(key, component);
        };

        for (const component of own(this)) put(component);
        for (const mount of this._resolutionOrder()) {
            // Below a PROXY mount every call goes through that mount's
            // session, so deeper mounts need no binding of their own.
            const children = mount.server._exposed(own, mount.mode === 'proxy' ? sameMount : rebind);
            for (const child of children) {
                const exposed = mount.mode === 'proxy' ? proxyComponent(child, rebind(mount)) : child;
                put(prefixComponent(exposed, mount.prefix ?? '', this.resourcePrefixFormat));
            }
        }
        return [...out.values()];
    }

    private _resolutionOrder(): MountedServer[] {
        return [
            ...this._mounts.filter(m => m.prefix !== undefined),
            ...this._mounts.filter(m => m.prefix === undefined),
        ];
    }

    private _resolve<M>(identifier: string, lookup: Lookup<M>, span: TesseraSpan | undefined): Resolved<M> {
        const resolution = locate(this, identifier, lookup);
        switch (resolution.status) {
            case 'local':
                this._route(lookup.kind, identifier, 'local', undefined, span);
                return resolution;
            case 'mounted':
                this._route(lookup.kind, identifier, resolution.mount.prefix ?? '*', resolution.mount.mode, span);
                return resolution;
            case 'missing':
                throw new NotFoundError(lookup.kind, identifier);
            case 'broken':
                throw new RoutingError(lookup.kind, identifier, resolution.prefixChain);
        }
    }

    private _route(kind: LookupKind, identifier: string, target: string, mode: MountMode | undefined, span: TesseraSpan | undefined): void {
        span?.setAttribute('mcp.route', target);
        this._emitCall({ type: 'route', server: this.name, kind, identifier, target, mode, timestamp: Date.now() });
    }

    private async _traced<R>(
        kind: LookupKind,
        identifier: string,
        run: (span: TesseraSpan | undefined) => Promise<R>,
        isError: (result: R) => boolean,
    ): Promise<R> {
        const startedAt = performance.now();
        const span = this._tracer?.startSpan(`mcp.${kind}.${identifier}`, {
            attributes: {
                'mcp.system': 'tessera',
                'mcp.server': this.name,
                'mcp.kind': kind,
                'mcp.identifier': identifier,
            },
        });
        try {
            const result = await run(span);
            const failed = isError(result);
            span?.setStatus({ code: failed ? SpanStatusCode.UNSET : SpanStatusCode.OK });
            this._emitCall({
                type: 'execute',
                server: this.name,
                kind,
                identifier,
                durationMs: performance.now() - startedAt,
                isError: failed,
                timestamp: Date.now(),
            });
            return result;
        } catch (err) {
            const expected = err instanceof NotFoundError || err instanceof ValidationError;
            if (!expected) span?.recordException(err instanceof Error ? err : String(err));
            span?.setStatus({
                code: expected ? SpanStatusCode.UNSET : SpanStatusCode.ERROR,
                message: messageOf(err),
            });
            this._emitCall({
                type: 'error',
                server: this.name,
                kind,
                identifier,
                error: messageOf(err),
                step: err instanceof NotFoundError ? 'route' : 'execute',
                timestamp: Date.now(),
            });
            throw err;
        } finally {
            span?.end();
        }
    }

    private _emit(event: DebugEvent): void {
        this._debug?.(event);
    }

    /** Call events yield to tracing when both are enabled */
    private _emitCall(event: DebugEvent): void {
        if (!this._tracer) this._debug?.(event);
    }
}

// ── Helpers ──────────────────────────────────────────────

function toggle<C extends Component>(
    collection: { get(key: string): C | undefined; replace(component: C): boolean },
    key: string,
    enabled: boolean,
): boolean {
    const current = collection.get(key);
    if (!current) return false;
    return collection.replace(Object.freeze<C>({ ...current, enabled }));
}

function toContent(uri: string, body: string | ResourceBody, mimeType: string | undefined): ResourceContent {
    if (typeof body === 'string') return { uri, mimeType: mimeType ?? 'text/plain', text: body };
    if ('text' in body) return { uri, mimeType: body.mimeType ?? mimeType, text: body.text };
    return { uri, mimeType: body.mimeType ?? mimeType, blob: body.blob };
}
