import { ActionDispatcher } from './actionDispatcher.js';
import { CacheStore } from './cacheStore.js';
import { ChangeFeed } from './changeFeed.js';
import type { ChangeSubscription } from './changeFeed.js';
import { resolveConfig } from './config.js';
import type { CoreConfig } from './config.js';
import { AuthError, CacheInvariantError, MessageNotFoundError, ProtocolError, describeError } from './errors.js';
import { JmapClient } from './jmapClient.js';
import { logDebug } from './logger.js';
import { MailQuery } from './mailQuery.js';
import { SessionContext } from './session.js';
import { SnapshotStore } from './snapshot.js';
import { SyncCoordinator } from './syncCoordinator.js';
import { settleWithin } from './utils.js';
import type { SyncOutcome } from './syncCoordinator.js';
import { createStatusStore } from '../src/stores/statusStore.js';
import type { StatusStore } from '../src/stores/statusStore.js';
import type {
    ActionKind,
    Folder,
    Message,
    MessageBody,
    PendingAction,
    ProtocolClient,
    SearchScope,
    SummaryProvider,
} from './types.js';

export interface MailCoreDeps {
    config: Readonly<CoreConfig>;
    session: SessionContext;
    client: ProtocolClient;
    summaryProvider?: SummaryProvider | null;
    snapshot?: SnapshotStore | null;
    /** dispatcher retry timing; defaults suit production */
    retryBaseMs?: number;
}

/**
 * The engine's single entry point for the presentation layer. Owns the
 * cache, the sync loop and the action queue for one signed-in account.
 */
export class MailCore {
    readonly store: CacheStore;
    readonly feed: ChangeFeed;
    readonly status: StatusStore;
    readonly query: MailQuery;
    readonly dispatcher: ActionDispatcher;
    readonly coordinator: SyncCoordinator;

    private readonly config: Readonly<CoreConfig>;
    private readonly session: SessionContext;
    private readonly client: ProtocolClient;
    private readonly summaryProvider: SummaryProvider | null;
    private readonly snapshot: SnapshotStore | null;
    private bodyLoads: Map<string, Promise<MessageBody>> = new Map();
    private started = false;
    private closing = false;

    constructor(deps: MailCoreDeps) {
        this.config = deps.config;
        this.session = deps.session;
        this.client = deps.client;
        this.summaryProvider = deps.summaryProvider ?? null;
        this.snapshot = deps.snapshot ?? null;

        this.store = new CacheStore(this.config.maxMessages);
        this.feed = new ChangeFeed();
        this.status = createStatusStore();
        this.query = new MailQuery(this.store);
        this.dispatcher = new ActionDispatcher(this.client, this.store, this.feed, this.status, {
            maxRetries: this.config.maxRetries,
            retryBaseMs: deps.retryBaseMs,
            retryCapMs: this.config.maxBackoffMs,
            onAuthFailure: err => this.coordinator.haltForAuth(err),
        });
        this.coordinator = new SyncCoordinator(this.client, this.store, this.feed, this.status, this.dispatcher, this.config);
    }

    /** Production wiring: validated config, a JMAP client and the optional snapshot file. */
    static create(rawConfig: unknown, token: string, summaryProvider?: SummaryProvider): MailCore {
        const config = resolveConfig(rawConfig);
        const session = new SessionContext(config.host, token);
        const client = new JmapClient(session, {
            pageSize: config.pageSize,
            syncWindow: config.syncWindow,
            requestTimeoutMs: config.requestTimeoutMs,
        });
        const snapshot = config.snapshotPath ? new SnapshotStore(config.snapshotPath) : null;
        return new MailCore({ config, session, client, summaryProvider, snapshot });
    }

    // ── Lifecycle ────────────────────────────────────────────

    /**
     * Load the snapshot if any, fetch the folder list, sync the inbox once and
     * start the background loop. Rejects with AuthError when the token is refused.
     */
    async start(): Promise<SyncOutcome | null> {
        if (this.started) return null;
        this.started = true;

        const saved = this.snapshot?.load() ?? null;
        if (saved) {
            this.store.restore(saved);
            logDebug(`[CORE] Restored ${saved.folders.length} folders, ${this.store.size} headers from snapshot`);
        }

        await this.coordinator.refreshFolderList();
        const inbox = this.store.findFolderByRole('inbox');
        let outcome: SyncOutcome | null = null;
        if (inbox) {
            this.coordinator.watch(inbox.id);
            if (this.session.activeFolderId === null) this.session.setActiveFolder(inbox.id);
            outcome = await this.coordinator.syncOnce(inbox.id, 'initial');
            if (!outcome.ok && outcome.error instanceof AuthError) throw outcome.error;
        } else {
            logDebug('[CORE] Account has no inbox folder');
        }
        this.coordinator.start();
        return outcome;
    }

    /** Stop background work, wait for in-flight calls up to the configured timeout and save the snapshot. */
    async shutdown(): Promise<boolean> {
        this.closing = true;
        const timeout = this.config.shutdownTimeoutMs;
        const [synced, dispatched, loaded] = await Promise.all([
            this.coordinator.shutdown(timeout),
            this.dispatcher.shutdown(timeout),
            settleWithin(Promise.allSettled([...this.bodyLoads.values()]), timeout),
        ]);
        if (this.snapshot) {
            try {
                this.snapshot.save(this.store.snapshot());
            } catch (err) {
                logDebug(`[CORE] Snapshot save failed: ${describeError(err)}`);
            }
            this.snapshot.close();
        }
        this.feed.closeAll();
        const settled = synced && dispatched && loaded;
        logDebug(`[CORE] Shut down${settled ? '' : ' with work still in flight'}`);
        return settled;
    }

    /** Swap in a new token after an auth failure. Rejects with AuthError if it is refused too. */
    async reauthenticate(token: string): Promise<void> {
        this.session.replaceCredential(token);
        this.client.resetSession?.();
        this.coordinator.resume();
        await this.coordinator.refreshFolderList();
    }

    // ── Sync ─────────────────────────────────────────────────

    refreshFolder(folderId: string): Promise<SyncOutcome> {
        return this.coordinator.refreshFolder(folderId);
    }

    /**
     * Make `folderId` the active folder: it is synced in the background from
     * now on, and right away if it has never been synced.
     */
    async selectFolder(folderId: string): Promise<SyncOutcome | null> {
        const previous = this.session.activeFolderId;
        const inboxId = this.store.findFolderByRole('inbox')?.id;
        if (previous && previous !== folderId && previous !== inboxId) {
            this.coordinator.unwatch(previous);
        }
        this.session.setActiveFolder(folderId);
        this.coordinator.watch(folderId);
        if (this.store.getCursor(folderId) !== null) return null;
        return this.coordinator.refreshFolder(folderId);
    }

    // ── Messages ─────────────────────────────────────────────

    /** Return the message with its body, fetching the body on first open. */
    async openMessage(messageId: string): Promise<Message> {
        await this.getMessageBody(messageId);
        const message = this.store.getMessage(messageId);
        if (!message) throw new MessageNotFoundError(messageId);
        return message;
    }

    /** Cached body, or one fetched from the server. Concurrent calls share one fetch. */
    async getMessageBody(messageId: string): Promise<MessageBody> {
        const cached = this.store.getMessage(messageId);
        if (!cached) throw new MessageNotFoundError(messageId);
        if (cached.bodyState === 'full-body-cached' && cached.body) {
            this.store.touch(messageId);
            return cached.body;
        }

        let load = this.bodyLoads.get(messageId);
        if (!load) {
            if (this.closing) throw new ProtocolError('Engine is shutting down');
            load = this.loadBody(messageId).finally(() => this.bodyLoads.delete(messageId));
            this.bodyLoads.set(messageId, load);
        }
        return load;
    }

    performAction(messageId: string, kind: ActionKind): PendingAction {
        return this.dispatcher.performAction(messageId, kind);
    }

    // ── Queries ──────────────────────────────────────────────

    listFolders(): Folder[] {
        return this.query.listFolders();
    }

    listFolder(folderId: string): Message[] {
        return this.query.listFolder(folderId);
    }

    getMessage(messageId: string): Message | undefined {
        return this.query.getMessage(messageId);
    }

    search(query: string, scope: SearchScope = 'all'): Message[] {
        return this.query.searchMessages(query, scope);
    }

    listThread(threadId: string): Message[] {
        return this.query.listThread(threadId);
    }

    // ── Summaries ────────────────────────────────────────────

    /** Attach a summary produced elsewhere. Returns false if the message is not cached. */
    attachSummary(messageId: string, summary: string): boolean {
        const attached = this.store.setSummary(messageId, summary);
        if (attached) this.feed.publish({ type: 'message-updated', messageId });
        return attached;
    }

    /**
     * Ask the summary provider for a summary and attach it. Failures are
     * logged and yield null; they never touch sync or cache state.
     */
    async summarizeMessage(messageId: string): Promise<string | null> {
        if (!this.summaryProvider) return null;
        try {
            const body = await this.getMessageBody(messageId);
            const message = this.store.getMessage(messageId);
            if (!message) return null;
            const summary = await this.summaryProvider.summarize(message, body);
            this.attachSummary(messageId, summary);
            return summary;
        } catch (err) {
            if (err instanceof CacheInvariantError) throw err;
            logDebug(`[CORE] Summary for ${messageId} failed: ${describeError(err)}`);
            return null;
        }
    }

    // ── Presentation ─────────────────────────────────────────

    subscribe(): ChangeSubscription {
        return this.feed.subscribe();
    }

    dismissNotification(id: number): void {
        this.status.getState().dismissNotification(id);
    }

    private async loadBody(messageId: string): Promise<MessageBody> {
        try {
            const body = await this.client.fetchMessageBody(messageId);
            const evicted = this.store.admitBody(messageId, body);
            if (evicted.length > 0) this.feed.publish({ type: 'messages-evicted', messageIds: evicted });
            this.feed.publish({ type: 'message-updated', messageId });
            return body;
        } catch (err) {
            if (err instanceof AuthError) this.coordinator.haltForAuth(err);
            throw err;
        }
    }
}
