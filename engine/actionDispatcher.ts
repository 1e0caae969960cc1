import {
    ActionConflictError,
    AuthError,
    CacheInvariantError,
    FolderRoleMissingError,
    MailError,
    MessageNotFoundError,
    NetworkError,
    ProtocolError,
    describeError,
} from './errors.js';
import { logDebug } from './logger.js';
import { backoffDelay, settleWithin, sleep } from './utils.js';
import type { CacheStore, MessagePatch } from './cacheStore.js';
import type { ChangeFeed } from './changeFeed.js';
import type { StatusStore } from '../src/stores/statusStore.js';
import type { ActionKind, Message, MessageFlags, MessageHeader, PendingAction, ProtocolClient } from './types.js';

/** Server state for a message that arrived while the message had unresolved actions */
export type DeferredUpdate =
    | { kind: 'upsert'; header: MessageHeader }
    | { kind: 'remove'; folderId: string };

/** What the sync coordinator needs to know about outstanding actions */
export interface PendingActionGate {
    hasPending(messageId: string): boolean;
    pendingIds(): Set<string>;
    defer(messageId: string, update: DeferredUpdate): void;
    /** Opaque marker for "now"; pass it to changedSince() later */
    actionMark(): number;
    /** Whether an action on the message was queued or settled after `mark` was taken */
    changedSince(messageId: string, mark: number): boolean;
}

export interface ActionDispatcherOptions {
    /** total attempts per action, first one included */
    maxRetries: number;
    retryBaseMs?: number;
    retryCapMs?: number;
    onAuthFailure?: (err: AuthError) => void;
}

interface Revert {
    flags: Partial<MessageFlags>;
    /** folder the message was in before an optimistic move */
    fromFolderId: string | null;
    /** folder the optimistic move put it in */
    toFolderId: string | null;
}

interface Ticket {
    action: PendingAction;
    revert: Revert;
    subject: string;
}

interface Deferred {
    update: DeferredUpdate;
    /** actions confirmed since the deferral, re-applied on top of the server state */
    confirmed: ActionKind[];
}

const RETRY_BASE_MS = 1_000;
const RETRY_CAP_MS = 30_000;

const FLAG_KEYS = ['read', 'starred', 'answered', 'draft'] as const satisfies ReadonlyArray<keyof MessageFlags>;

const OPPOSITES: Partial<Record<ActionKind, ActionKind>> = {
    star: 'unstar',
    unstar: 'star',
    'mark-read': 'mark-unread',
    'mark-unread': 'mark-read',
};

const LABELS: Record<ActionKind, string> = {
    archive: 'archive',
    delete: 'delete',
    star: 'star',
    unstar: 'unstar',
    'mark-read': 'mark as read',
    'mark-unread': 'mark as unread',
};

function conflictsWith(prior: ActionKind, next: ActionKind): boolean {
    if (prior === 'archive' || prior === 'delete') return true;
    return OPPOSITES[prior] === next;
}

function toMailError(err: unknown): MailError {
    return err instanceof MailError ? err : new ProtocolError(describeError(err), { cause: err });
}

/**
 * Applies user actions optimistically and confirms them with the server.
 *
 * Actions on one message run strictly one after another in submission
 * order; actions on different messages run independently. Transport
 * failures are retried with exponential backoff up to `maxRetries`
 * attempts. When an action gives up, only the fields it changed are
 * rolled back and a single notification is pushed.
 */
export class ActionDispatcher implements PendingActionGate {
    private tickets: Map<string, Ticket[]> = new Map();
    private chains: Map<string, Promise<void>> = new Map();
    private deferred: Map<string, Deferred> = new Map();
    private nextId = 1;
    private seq = 0;
    private lastChange: Map<string, number> = new Map();
    private closing = false;
    private readonly retryBaseMs: number;
    private readonly retryCapMs: number;

    constructor(
        private readonly client: ProtocolClient,
        private readonly store: CacheStore,
        private readonly feed: ChangeFeed,
        private readonly status: StatusStore,
        private readonly options: ActionDispatcherOptions,
    ) {
        this.retryBaseMs = options.retryBaseMs ?? RETRY_BASE_MS;
        this.retryCapMs = options.retryCapMs ?? RETRY_CAP_MS;
    }

    /**
     * Apply `kind` to the cache right away and queue it for the server.
     * Returns the queued action; its outcome arrives on the change feed.
     */
    performAction(messageId: string, kind: ActionKind): PendingAction {
        if (this.closing) throw new ProtocolError('Engine is shutting down');
        const message = this.store.getMessage(messageId);
        if (!message) throw new MessageNotFoundError(messageId);

        const { patch, revert } = this.plan(message, kind);
        const queue = this.tickets.get(messageId) ?? [];
        const blocker = queue.find(t => conflictsWith(t.action.kind, kind));

        const action: PendingAction = {
            id: this.nextId++,
            messageId,
            kind,
            createdAt: Date.now(),
            retryCount: 0,
            status: 'pending',
        };
        queue.push({ action, revert, subject: message.subject });
        this.tickets.set(messageId, queue);
        this.markChanged(messageId);

        if (patch.flags || patch.folderId) {
            this.store.patchMessage(messageId, patch);
            this.feed.publish({ type: 'message-updated', messageId });
        }
        logDebug(`[ACTIONS] Queued ${kind} #${action.id} on ${messageId}`);

        if (blocker) {
            const conflict = new ActionConflictError(messageId, kind, blocker.action.kind);
            logDebug(`[ACTIONS] ${conflict.message}`);
            this.feed.publish({ type: 'action-queued', action: { ...action }, conflict });
        }

        const previous = this.chains.get(messageId) ?? Promise.resolve();
        const run = previous.then(() => this.dispatch(action));
        this.chains.set(messageId, run);
        void run.then(() => {
            if (this.chains.get(messageId) === run) this.chains.delete(messageId);
        });
        return { ...action };
    }

    // ── PendingActionGate ────────────────────────────────────

    hasPending(messageId: string): boolean {
        return (this.tickets.get(messageId)?.length ?? 0) > 0;
    }

    pendingIds(): Set<string> {
        return new Set(this.tickets.keys());
    }

    /** Hold server state back until the message's actions resolve. The newest state wins. */
    defer(messageId: string, update: DeferredUpdate): void {
        const existing = this.deferred.get(messageId);
        this.deferred.set(messageId, { update, confirmed: existing?.confirmed ?? [] });
    }

    actionMark(): number {
        return this.seq;
    }

    changedSince(messageId: string, mark: number): boolean {
        return (this.lastChange.get(messageId) ?? 0) > mark;
    }

    // ── Introspection ────────────────────────────────────────

    pendingActions(messageId?: string): PendingAction[] {
        const tickets = messageId !== undefined
            ? this.tickets.get(messageId) ?? []
            : [...this.tickets.values()].flat();
        return tickets.map(t => ({ ...t.action }));
    }

    /** Resolves once every queued action has been confirmed or rolled back */
    async whenIdle(): Promise<void> {
        while (this.chains.size > 0) {
            await Promise.all(this.chains.values());
        }
    }

    /** Stop accepting actions and wait up to `timeoutMs` for queued ones. */
    async shutdown(timeoutMs: number): Promise<boolean> {
        this.closing = true;
        const settled = await settleWithin(this.whenIdle(), timeoutMs);
        if (!settled) logDebug(`[ACTIONS] Shutdown left ${this.pendingActions().length} action(s) unresolved`);
        return settled;
    }

    // ── Internals ────────────────────────────────────────────

    private plan(message: Message, kind: ActionKind): { patch: MessagePatch; revert: Revert } {
        const revert: Revert = { flags: {}, fromFolderId: null, toFolderId: null };
        switch (kind) {
            case 'star':
            case 'unstar':
                revert.flags.starred = message.flags.starred;
                return { patch: { flags: { starred: kind === 'star' } }, revert };
            case 'mark-read':
            case 'mark-unread':
                revert.flags.read = message.flags.read;
                return { patch: { flags: { read: kind === 'mark-read' } }, revert };
            case 'archive':
            case 'delete': {
                const role = kind === 'archive' ? 'archive' : 'trash';
                const target = this.store.findFolderByRole(role);
                if (!target) throw new FolderRoleMissingError(role);
                if (target.id === message.folderId) return { patch: {}, revert };
                revert.fromFolderId = message.folderId;
                revert.toFolderId = target.id;
                return { patch: { folderId: target.id }, revert };
            }
        }
    }

    private async dispatch(action: PendingAction): Promise<void> {
        const { maxRetries } = this.options;
        for (;;) {
            action.status = 'in-flight';
            try {
                await this.client.applyAction(action.messageId, action.kind);
                this.confirm(action);
                return;
            } catch (err) {
                if (err instanceof CacheInvariantError) throw err;
                const error = toMailError(err);
                if (error instanceof AuthError) this.options.onAuthFailure?.(error);

                const attempt = action.retryCount + 1;
                if (!(error instanceof NetworkError) || attempt >= maxRetries) {
                    this.giveUp(action, error);
                    return;
                }
                action.retryCount = attempt;
                action.status = 'failed';
                const delay = backoffDelay(this.retryBaseMs, attempt - 1, this.retryCapMs);
                logDebug(`[ACTIONS] ${action.kind} #${action.id} attempt ${attempt}/${maxRetries} failed, retrying in ${delay}ms: ${describeError(error)}`);
                await sleep(delay);
            }
        }
    }

    private confirm(action: PendingAction): void {
        this.dequeue(action);
        this.markChanged(action.messageId);
        this.deferred.get(action.messageId)?.confirmed.push(action.kind);
        logDebug(`[ACTIONS] Confirmed ${action.kind} #${action.id} on ${action.messageId}`);
        this.feed.publish({ type: 'action-confirmed', action: { ...action } });
        this.flushDeferred(action.messageId);
    }

    private giveUp(action: PendingAction, error: MailError): void {
        const ticket = this.dequeue(action);
        this.markChanged(action.messageId);
        action.status = 'failed';
        if (ticket) this.rollback(action.messageId, ticket.revert);

        const subject = ticket?.subject ?? action.messageId;
        this.status.getState().pushNotification({
            kind: 'action-failed',
            text: `Could not ${LABELS[action.kind]} "${subject}": ${describeError(error)}`,
            messageId: action.messageId,
            action: action.kind,
        });
        logDebug(`[ACTIONS] Gave up on ${action.kind} #${action.id} after ${action.retryCount + 1} attempt(s): ${describeError(error)}`);
        this.feed.publish({ type: 'action-failed', action: { ...action }, error });
        this.flushDeferred(action.messageId);
    }

    /**
     * Undo only the fields this action changed; later changes to other fields
     * stay. A field that a still-queued action also sets is left to that
     * action, which inherits the value to fall back to.
     */
    private rollback(messageId: string, revert: Revert): void {
        const current = this.store.getMessage(messageId);
        if (!current) return;
        const later = this.tickets.get(messageId) ?? [];
        const patch: MessagePatch = {};

        const flags: Partial<MessageFlags> = {};
        let flagsChanged = false;
        for (const key of FLAG_KEYS) {
            const original = revert.flags[key];
            if (original === undefined) continue;
            const heir = later.find(t => t.revert.flags[key] !== undefined);
            if (heir) {
                heir.revert.flags[key] = original;
            } else {
                flags[key] = original;
                flagsChanged = true;
            }
        }
        if (flagsChanged) patch.flags = flags;

        if (revert.fromFolderId) {
            const heir = later.find(t => t.revert.fromFolderId !== null);
            if (heir) heir.revert.fromFolderId = revert.fromFolderId;
            else if (current.folderId === revert.toFolderId) patch.folderId = revert.fromFolderId;
        }

        if (!patch.flags && !patch.folderId) return;
        this.store.patchMessage(messageId, patch);
        this.feed.publish({ type: 'message-updated', messageId });
    }

    private markChanged(messageId: string): void {
        this.seq += 1;
        this.lastChange.set(messageId, this.seq);
    }

    private dequeue(action: PendingAction): Ticket | undefined {
        const queue = this.tickets.get(action.messageId);
        if (!queue) return undefined;
        const idx = queue.findIndex(t => t.action.id === action.id);
        const [ticket] = idx >= 0 ? queue.splice(idx, 1) : [];
        if (queue.length === 0) this.tickets.delete(action.messageId);
        return ticket;
    }

    /** Once a message has no unresolved actions, apply held-back server state and replay confirmed actions on it. */
    private flushDeferred(messageId: string): void {
        if (this.hasPending(messageId)) return;
        const held = this.deferred.get(messageId);
        if (!held) return;
        this.deferred.delete(messageId);

        if (held.update.kind === 'remove') {
            // The removal may predate a confirmed move; the next sync settles it then
            const current = this.store.getMessage(messageId);
            if (held.confirmed.length > 0 || current?.folderId !== held.update.folderId) return;
            this.store.removeMessages([messageId]);
            logDebug(`[ACTIONS] Applied deferred removal of ${messageId}`);
            this.feed.publish({ type: 'message-updated', messageId });
            return;
        }

        const { header } = held.update;
        this.store.upsertMessages(header.folderId, [header]);
        for (const kind of held.confirmed) {
            const message = this.store.getMessage(messageId);
            if (!message) break;
            try {
                const { patch } = this.plan(message, kind);
                if (patch.flags || patch.folderId) this.store.patchMessage(messageId, patch);
            } catch (err) {
                if (!(err instanceof FolderRoleMissingError)) throw err;
                logDebug(`[ACTIONS] Could not replay ${kind} on ${messageId}: ${err.message}`);
            }
        }
        logDebug(`[ACTIONS] Applied deferred server state for ${messageId}`);
        this.feed.publish({ type: 'message-updated', messageId });
    }
}
