import { stripCRLF } from './utils.js';
import type { ActionKind } from './types.js';

export type MailErrorCode =
    | 'AUTH'
    | 'NETWORK'
    | 'PROTOCOL'
    | 'CURSOR_EXPIRED'
    | 'CACHE_INVARIANT'
    | 'ACTION_CONFLICT'
    | 'MESSAGE_NOT_FOUND'
    | 'FOLDER_ROLE_MISSING'
    | 'CONFIG';

export abstract class MailError extends Error {
    abstract readonly code: MailErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Credential rejected or expired. Fatal to the session until re-authentication. */
export class AuthError extends MailError {
    readonly code = 'AUTH';
}

/** Transport failure, timeout, throttling or 5xx. Retried with backoff. */
export class NetworkError extends MailError {
    readonly code = 'NETWORK';
    readonly status: number | null;

    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.status = status;
    }
}

/** Malformed or unexpected server response. Logged, never retried automatically. */
export class ProtocolError extends MailError {
    readonly code: MailErrorCode = 'PROTOCOL';
}

/** The server can no longer compute changes since the cursor; answer with a full resync. */
export class CursorExpiredError extends ProtocolError {
    override readonly code = 'CURSOR_EXPIRED';
}

/** Folder index and message storage disagree. A programming error. */
export class CacheInvariantError extends MailError {
    readonly code = 'CACHE_INVARIANT';
}

/** An action was queued behind an unresolved action of a conflicting kind. Informational. */
export class ActionConflictError extends MailError {
    readonly code = 'ACTION_CONFLICT';

    constructor(
        readonly messageId: string,
        readonly kind: ActionKind,
        readonly blockedBy: ActionKind,
    ) {
        super(`${kind} on ${messageId} queued behind pending ${blockedBy}`);
    }
}

export class MessageNotFoundError extends MailError {
    readonly code = 'MESSAGE_NOT_FOUND';

    constructor(readonly messageId: string) {
        super(`Message not in cache: ${messageId}`);
    }
}

export class FolderRoleMissingError extends MailError {
    readonly code = 'FOLDER_ROLE_MISSING';

    constructor(readonly role: string) {
        super(`No ${role} folder on this account`);
    }
}

export class ConfigError extends MailError {
    readonly code = 'CONFIG';

    constructor(readonly key: string, detail: string) {
        super(`Invalid config "${key}": ${detail}`);
    }
}

/** One log-safe line for any thrown value */
export function describeError(err: unknown): string {
    const raw = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    return stripCRLF(raw).slice(0, 500);
}

/** Errors a background cycle absorbs into a `failed` status instead of halting */
export function isRecoverable(err: unknown): err is NetworkError | ProtocolError {
    return err instanceof NetworkError || err instanceof ProtocolError;
}
