import {
    AuthError,
    CursorExpiredError,
    MailError,
    ProtocolError,
    describeError,
    isRecoverable,
} from './errors.js';
import { logDebug } from './logger.js';
import { settleWithin } from './utils.js';
import type { PendingActionGate } from './actionDispatcher.js';
import type { CacheStore, MergeResult } from './cacheStore.js';
import type { ChangeFeed } from './changeFeed.js';
import type { CoreConfig } from './config.js';
import type { StatusStore } from '../src/stores/statusStore.js';
import type { FetchResult, MessageHeader, ProtocolClient } from './types.js';

export type SyncTrigger = 'timer' | 'manual' | 'initial';

export type SyncOutcome =
    | { ok: true; folderId: string; full: boolean; added: string[]; updated: string[]; removed: string[] }
    | { ok: false; folderId: string; error: MailError };

interface FolderSyncState {
    inFlight: Promise<SyncOutcome> | null;
    failures: number;
    /** epoch ms; automatic syncs before this are skipped */
    nextAttemptAt: number;
}

interface FetchedBatch {
    full: boolean;
    pages: FetchResult[];
    cursor: string;
}

/** Failures in a row before automatic syncs start backing off */
const BACKOFF_AFTER = 3;
/** Guard against a server that never stops reporting more pages */
const MAX_PAGES = 1_000;
/** A folder counts as due when its next attempt is at most this far away */
const TICK_SLACK_MS = 1_000;

/**
 * Keeps watched folders in step with the server.
 *
 * One timer drives every folder. Each folder has at most one sync in flight;
 * asking again while one runs returns the running one. A sync fetches all of
 * its pages first and merges them into the cache in one synchronous step, so
 * readers never see a half-applied sync and a failed sync leaves the cache
 * and cursor exactly as they were.
 */
export class SyncCoordinator {
    private intervalId: ReturnType<typeof setInterval> | null = null;
    private firstTickId: ReturnType<typeof setTimeout> | null = null;
    private running = false;
    private closed = false;
    private ticking: Promise<void> | null = null;
    private halted: AuthError | null = null;
    private states: Map<string, FolderSyncState> = new Map();
    private watched: Set<string> = new Set();

    constructor(
        private readonly client: ProtocolClient,
        private readonly store: CacheStore,
        private readonly feed: ChangeFeed,
        private readonly status: StatusStore,
        private readonly gate: PendingActionGate,
        private readonly config: Pick<CoreConfig, 'refreshIntervalMs' | 'maxBackoffMs'>,
    ) {}

    // ── Lifecycle ────────────────────────────────────────────

    start(): void {
        this.running = true;
        if (this.intervalId || this.halted) return;
        logDebug(`[SYNC] Background refresh every ${this.config.refreshIntervalMs}ms`);
        this.intervalId = setInterval(() => { void this.tick(); }, this.config.refreshIntervalMs);
    }

    stop(): void {
        this.running = false;
        this.clearTimers();
    }

    /** Stop the loop for good and wait up to `timeoutMs` for the tick and syncs in flight. */
    async shutdown(timeoutMs: number): Promise<boolean> {
        this.closed = true;
        this.stop();
        const inFlight: Promise<unknown>[] = [...this.states.values()].flatMap(s => (s.inFlight ? [s.inFlight] : []));
        if (this.ticking) inFlight.push(this.ticking);
        const settled = await settleWithin(Promise.all(inFlight), timeoutMs);
        logDebug(`[SYNC] Shutdown ${settled ? 'complete' : `timed out with ${inFlight.length} task(s) in flight`}`);
        return settled;
    }

    get isHalted(): boolean {
        return this.halted !== null;
    }

    /** Clear the auth halt after re-authentication and pick the loop back up. */
    resume(): void {
        if (!this.halted) return;
        this.halted = null;
        this.status.getState().setAuthRequired(false);
        logDebug('[SYNC] Resumed after re-authentication');
        if (this.running) {
            this.start();
            this.firstTickId = setTimeout(() => { void this.tick(); }, 0);
        }
    }

    /** Stop all background work until re-authentication. Safe to call repeatedly. */
    haltForAuth(err: AuthError): void {
        if (this.halted) return;
        this.halted = err;
        this.clearTimers();
        logDebug(`[SYNC] Halted: ${describeError(err)}`);
        const status = this.status.getState();
        status.setAuthRequired(true);
        status.pushNotification({
            kind: 'auth-required',
            text: 'Fastmail rejected the API token. Enter a new token to resume syncing.',
            messageId: null,
            action: null,
        });
        this.feed.publish({ type: 'auth-required', error: err });
    }

    // ── Watched folders ──────────────────────────────────────

    watch(folderId: string): void {
        this.watched.add(folderId);
    }

    unwatch(folderId: string): void {
        this.watched.delete(folderId);
    }

    watchedFolders(): string[] {
        return [...this.watched];
    }

    isSyncing(folderId: string): boolean {
        return this.states.get(folderId)?.inFlight != null;
    }

    // ── Entry points ─────────────────────────────────────────

    /**
     * User-triggered sync. Skips any backoff, joins a sync already in flight
     * and pushes the folder's next automatic sync a full interval out.
     * Rejects only with AuthError; other failures come back in the outcome.
     */
    async refreshFolder(folderId: string): Promise<SyncOutcome> {
        if (this.halted) throw this.halted;
        const outcome = await this.syncOnce(folderId, 'manual');
        if (!outcome.ok && outcome.error instanceof AuthError) throw outcome.error;
        return outcome;
    }

    /**
     * Fetch the folder list and merge it. The inbox is watched from the first
     * list that names one. AuthError halts and rejects; other failures are logged.
     */
    async refreshFolderList(): Promise<boolean> {
        if (this.halted) throw this.halted;
        try {
            const metas = await this.client.fetchFolderList();
            this.store.upsertFolders(metas);
            const inbox = this.store.findFolderByRole('inbox');
            if (inbox && !this.watched.has(inbox.id)) {
                this.watched.add(inbox.id);
                logDebug(`[SYNC] Watching inbox ${inbox.id}`);
            }
            this.feed.publish({ type: 'folders-updated', folderIds: metas.map(m => m.id) });
            return true;
        } catch (err) {
            if (err instanceof AuthError) {
                this.haltForAuth(err);
                throw err;
            }
            if (!isRecoverable(err)) throw err;
            logDebug(`[SYNC] Folder list refresh failed: ${describeError(err)}`);
            return false;
        }
    }

    /** One background pass: folder list, then every due watched folder. */
    tick(): Promise<void> {
        if (this.closed) return Promise.resolve();
        if (!this.ticking) {
            this.ticking = this.runTick().finally(() => { this.ticking = null; });
        }
        return this.ticking;
    }

    /** Start a sync unless one is already running for the folder, in which case that one is returned. */
    syncOnce(folderId: string, trigger: SyncTrigger): Promise<SyncOutcome> {
        const state = this.stateFor(folderId);
        if (state.inFlight) return state.inFlight;
        const run = this.syncFolder(folderId, trigger).finally(() => { state.inFlight = null; });
        state.inFlight = run;
        return run;
    }

    // ── Internals ────────────────────────────────────────────

    private async runTick(): Promise<void> {
        if (this.halted) return;
        try {
            await this.refreshFolderList();
        } catch (err) {
            if (err instanceof AuthError) return;
            throw err;
        }
        if (this.closed || this.halted) return;

        const now = Date.now();
        const due = [...this.watched].filter(id => this.stateFor(id).nextAttemptAt <= now + TICK_SLACK_MS);
        await Promise.all(due.map(id => this.syncOnce(id, 'timer')));
    }

    private async syncFolder(folderId: string, trigger: SyncTrigger): Promise<SyncOutcome> {
        const state = this.stateFor(folderId);
        const startedAt = Date.now();
        const mark = this.gate.actionMark();
        this.status.getState().setFolderStatus(folderId, { phase: 'syncing' });
        this.feed.publish({ type: 'folder-sync-started', folderId });
        logDebug(`[SYNC] ${folderId}: ${trigger} sync started`);

        try {
            const batch = await this.fetchAll(folderId, this.store.getCursor(folderId));
            const result = this.merge(folderId, batch, mark);

            state.failures = 0;
            state.nextAttemptAt = trigger === 'manual' ? startedAt + this.config.refreshIntervalMs : 0;
            this.status.getState().setFolderStatus(folderId, {
                phase: 'idle',
                error: null,
                consecutiveFailures: 0,
                lastSyncedAt: Date.now(),
                nextAttemptAt: state.nextAttemptAt || null,
            });
            logDebug(`[SYNC] ${folderId}: ${batch.full ? 'full' : 'incremental'} sync done, +${result.added.length} ~${result.updated.length} -${result.removed.length}`);
            this.feed.publish({ type: 'folder-synced', folderId, full: batch.full, ...result });
            return { ok: true, folderId, full: batch.full, ...result };
        } catch (err) {
            if (err instanceof AuthError) {
                this.status.getState().setFolderStatus(folderId, { phase: 'failed', error: describeError(err) });
                this.haltForAuth(err);
                return { ok: false, folderId, error: err };
            }
            if (!isRecoverable(err)) throw err;

            state.failures += 1;
            state.nextAttemptAt = state.failures >= BACKOFF_AFTER
                ? Date.now() + this.backoff(state.failures)
                : 0;
            this.status.getState().setFolderStatus(folderId, {
                phase: 'failed',
                error: describeError(err),
                consecutiveFailures: state.failures,
                nextAttemptAt: state.nextAttemptAt || null,
            });
            logDebug(`[SYNC] ${folderId}: sync failed (${state.failures} in a row): ${describeError(err)}`);
            this.feed.publish({ type: 'folder-sync-failed', folderId, error: err });
            return { ok: false, folderId, error: err };
        }
    }

    /** interval * 2^(failures - 2), so the third failure in a row waits two intervals */
    private backoff(failures: number): number {
        const { refreshIntervalMs, maxBackoffMs } = this.config;
        return Math.min(refreshIntervalMs * Math.pow(2, failures - 2), maxBackoffMs);
    }

    private async fetchAll(folderId: string, cursor: string | null): Promise<FetchedBatch> {
        let full = cursor === null;
        let pageCursor = cursor;
        let pages: FetchResult[] = [];

        for (;;) {
            let page: FetchResult;
            try {
                page = await this.client.fetchMessages(folderId, pageCursor);
            } catch (err) {
                if (err instanceof CursorExpiredError && !full) {
                    logDebug(`[SYNC] ${folderId}: cursor expired, falling back to full resync`);
                    full = true;
                    pageCursor = null;
                    pages = [];
                    continue;
                }
                throw err;
            }
            pages.push(page);
            pageCursor = page.newCursor;
            if (!page.hasMore) return { full, pages, cursor: page.newCursor };
            if (pages.length >= MAX_PAGES) {
                throw new ProtocolError(`${folderId}: server reported more than ${MAX_PAGES} pages`);
            }
        }
    }

    /**
     * Apply a fetched batch in one synchronous step. Messages with unresolved
     * actions are held back for the dispatcher. Messages whose actions settled
     * after `mark` are skipped: the batch predates them, and the next
     * incremental sync reports their current state.
     */
    private merge(folderId: string, batch: FetchedBatch, mark: number): MergeResult {
        const pending = this.gate.pendingIds();
        const stale = (id: string): boolean => !pending.has(id) && this.gate.changedSince(id, mark);
        const result: MergeResult = { added: [], updated: [], removed: [] };

        if (batch.full) {
            const seen = new Set<string>();
            const apply: MessageHeader[] = [];
            for (const header of batch.pages.flatMap(p => p.messages)) {
                if (seen.has(header.id)) continue;
                seen.add(header.id);
                if (pending.has(header.id)) this.gate.defer(header.id, { kind: 'upsert', header });
                else if (!stale(header.id)) apply.push(header);
            }
            const preserve = new Set(this.store.listFolder(folderId).filter(id => pending.has(id) || stale(id)));
            for (const id of preserve) {
                if (pending.has(id) && !seen.has(id)) this.gate.defer(id, { kind: 'remove', folderId });
            }
            Object.assign(result, this.store.replaceFolder(folderId, apply, preserve));
        } else {
            for (const page of batch.pages) {
                const apply = page.messages.filter(header => {
                    if (pending.has(header.id)) {
                        this.gate.defer(header.id, { kind: 'upsert', header });
                        return false;
                    }
                    return !stale(header.id);
                });
                const merged = this.store.upsertMessages(folderId, apply);
                result.added.push(...merged.added);
                result.updated.push(...merged.updated);

                // A message that moved on to another cached folder is not ours to delete
                const gone: string[] = [];
                for (const id of page.removed) {
                    if (pending.has(id)) this.gate.defer(id, { kind: 'remove', folderId });
                    else if (!stale(id) && this.store.getMessage(id)?.folderId === folderId) gone.push(id);
                }
                result.removed.push(...this.store.removeMessages(gone));
            }
        }

        this.store.setCursor(folderId, batch.cursor);
        return result;
    }

    private stateFor(folderId: string): FolderSyncState {
        let state = this.states.get(folderId);
        if (!state) {
            state = { inFlight: null, failures: 0, nextAttemptAt: 0 };
            this.states.set(folderId, state);
        }
        return state;
    }

    private clearTimers(): void {
        if (this.intervalId) {
            clearInterval(this.intervalId);
            this.intervalId = null;
        }
        if (this.firstTickId) {
            clearTimeout(this.firstTickId);
            this.firstTickId = null;
        }
    }
}
