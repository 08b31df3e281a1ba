/**
 * MountedServer — a non-owning link from a parent to a child server.
 *
 * The parent never starts, stops, or mutates the child. A PROXY mount
 * opens one {@link RemoteSession} lazily on first dispatch and reuses it
 * until the mount is closed.
 *
 * @module
 */
import { type RemoteSession, type SessionFactory } from '../client/RemoteSession.js';
import { type ToolServer } from '../server/ToolServer.js';
import { ToolExecutionError } from '../core/errors.js';

export type MountMode = 'direct' | 'proxy';

/**
 * Default mode for a child: PROXY when it declares an observable
 * lifecycle, DIRECT otherwise.
 */
export function selectMountMode(child: Pick<ToolServer, 'observableLifecycle'>): MountMode {
    return child.observableLifecycle ? 'proxy' : 'direct';
}

let nextMountId = 1;

export class MountedServer {
    readonly id: number;
    private _session: Promise<RemoteSession> | undefined;
    private _inFlight = 0;
    private readonly _drainWaiters: Array<() => void> = [];
    private _detached = false;

    constructor(
        readonly server: ToolServer,
        readonly prefix: string | undefined,
        readonly mode: MountMode,
        readonly sessionFactory: SessionFactory,
    ) {
        this.id = nextMountId++;
    }

    /** `true` once a session has been requested and not yet closed */
    get hasSession(): boolean {
        return this._session !== undefined;
    }

    /**
     * Run `work` on the mount's session, opening it if needed. A failed
     * open is not cached; the next dispatch retries.
     */
    async run<T>(work: (session: RemoteSession) => Promise<T>): Promise<T> {
        this._inFlight++;
        try {
            return await work(await this._open());
        } finally {
            this._inFlight--;
            if (this._inFlight === 0) {
                for (const resolve of this._drainWaiters.splice(0)) resolve();
            }
        }
    }

    /**
     * Close the session, if any, once in-flight calls have settled. The
     * next dispatch opens a fresh one.
     */
    async close(): Promise<void> {
        const pending = this._session;
        this._session = undefined;
        if (!pending) return;

        if (this._inFlight > 0) {
            await new Promise<void>(resolve => { this._drainWaiters.push(resolve); });
        }
        // A session that failed to open has nothing to release; its error
        // already reached the call that opened it.
        const session = await pending.then(s => s, () => undefined);
        await session?.close();
    }

    /** Close the session and refuse further dispatch. Used on unmount. */
    async detach(): Promise<void> {
        this._detached = true;
        await this.close();
    }

    private _open(): Promise<RemoteSession> {
        if (this._detached) {
            return Promise.reject(new ToolExecutionError(`Mount of "${this.server.name}" has been removed.`));
        }
        if (this._session) return this._session;
        const opening: Promise<RemoteSession> = this.sessionFactory(this.server).catch((err: unknown) => {
            if (this._session === opening) this._session = undefined;
            throw err;
        });
        this._session = opening;
        return opening;
    }
}
