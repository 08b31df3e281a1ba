/**
 * RemoteSession — the session-preserving call surface a PROXY mount
 * dispatches through.
 *
 * Implementations must forward `signal` so the remote side observes
 * cancellation, re-raise tool failures as {@link ToolExecutionError},
 * and report unknown identifiers as {@link NotFoundError}.
 *
 * @module
 */
import {
    type PromptResult,
    type ResourceReadResult,
    type ToolResponse,
} from '../domain/Component.js';
import { type ToolServer } from '../server/ToolServer.js';

export interface RemoteSession {
    callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResponse>;
    readResource(uri: string, signal?: AbortSignal): Promise<ResourceReadResult>;
    getPrompt(name: string, args: Record<string, string>, signal?: AbortSignal): Promise<PromptResult>;
    close(): Promise<void>;
}

/** Opens a session against a mounted child. */
export type SessionFactory = (child: ToolServer) => Promise<RemoteSession>;
