import { CacheInvariantError } from './errors.js';
import { logDebug } from './logger.js';
import type {
    Folder,
    FolderMeta,
    FolderRole,
    Message,
    MessageBody,
    MessageFlags,
    MessageHeader,
} from './types.js';

interface FolderEntry {
    meta: FolderMeta;
    cursor: string | null;
    /** message ids, newest first */
    index: string[];
}

export interface MergeResult {
    added: string[];
    updated: string[];
    removed: string[];
}

export interface MessagePatch {
    flags?: Partial<MessageFlags>;
    folderId?: string;
}

/** Plain data for the on-disk snapshot. Bodies are never included. */
export interface CacheSnapshot {
    folders: Array<Folder & { index: string[] }>;
    messages: MessageHeader[];
}

function placeholderFolder(id: string): FolderMeta {
    return { id, name: id, role: null, parentId: null, sortOrder: 0, unreadCount: 0, totalCount: 0 };
}

/**
 * In-memory store of folders and messages.
 *
 * Every method is synchronous and does no I/O, so a caller that mutates the
 * store inside one call can never interleave with another writer. Stored
 * Message objects are replaced, never mutated, so references handed out by
 * getMessage() are stable snapshots.
 *
 * Only bodies are budgeted: at most `maxBodies` messages are in
 * `full-body-cached` state, and the least recently opened one is degraded
 * to `header-only` when an admission pushes the count over.
 */
export class CacheStore {
    private folders: Map<string, FolderEntry> = new Map();
    private messages: Map<string, Message> = new Map();
    // Map iteration order doubles as recency order: first key is least recently accessed
    private bodyLru: Map<string, true> = new Map();

    constructor(private readonly maxBodies: number) {
        if (!Number.isInteger(maxBodies) || maxBodies < 1) {
            throw new RangeError('maxBodies must be a positive integer');
        }
    }

    // ── Folders ──────────────────────────────────────────────

    /** Merge folder metadata from the server, keeping cursors and indices. Order follows `metas`. */
    upsertFolders(metas: FolderMeta[]): void {
        const next: Map<string, FolderEntry> = new Map();
        for (const meta of metas) {
            const existing = this.folders.get(meta.id);
            next.set(meta.id, existing
                ? { ...existing, meta: { ...meta } }
                : { meta: { ...meta }, cursor: null, index: [] });
        }
        // Folders are never dropped while the process runs
        for (const [id, entry] of this.folders) {
            if (!next.has(id)) next.set(id, entry);
        }
        this.folders = next;
    }

    getFolder(folderId: string): Folder | undefined {
        const entry = this.folders.get(folderId);
        return entry ? { ...entry.meta, cursor: entry.cursor } : undefined;
    }

    listFolders(): Folder[] {
        return [...this.folders.values()].map(e => ({ ...e.meta, cursor: e.cursor }));
    }

    findFolderByRole(role: FolderRole): Folder | undefined {
        for (const entry of this.folders.values()) {
            if (entry.meta.role === role) return { ...entry.meta, cursor: entry.cursor };
        }
        return undefined;
    }

    setCursor(folderId: string, cursor: string | null): void {
        this.ensureFolder(folderId).cursor = cursor;
    }

    getCursor(folderId: string): string | null {
        return this.folders.get(folderId)?.cursor ?? null;
    }

    private ensureFolder(folderId: string): FolderEntry {
        let entry = this.folders.get(folderId);
        if (!entry) {
            entry = { meta: placeholderFolder(folderId), cursor: null, index: [] };
            this.folders.set(folderId, entry);
        }
        return entry;
    }

    // ── Messages ─────────────────────────────────────────────

    getMessage(id: string): Message | undefined {
        return this.messages.get(id);
    }

    /** Ordered ids of a folder, newest first */
    listFolder(folderId: string): string[] {
        return [...(this.folders.get(folderId)?.index ?? [])];
    }

    /** Resolved messages of a folder in index order */
    folderMessages(folderId: string): Message[] {
        return this.listFolder(folderId).map(id => this.require(id));
    }

    allMessages(): Message[] {
        return [...this.messages.values()];
    }

    get size(): number {
        return this.messages.size;
    }

    bodyCount(): number {
        return this.bodyLru.size;
    }

    /**
     * Merge headers into a folder. Existing messages keep their cached body
     * and summary; new ones start as `not-fetched`. A message arriving from a
     * different folder is moved out of the old folder's index.
     */
    upsertMessages(folderId: string, headers: MessageHeader[]): MergeResult {
        const entry = this.ensureFolder(folderId);
        const result: MergeResult = { added: [], updated: [], removed: [] };

        for (const header of headers) {
            const existing = this.messages.get(header.id);
            // Re-inserted below so a changed received time moves it to its new place
            if (existing) this.detach(existing);

            this.messages.set(header.id, this.merge(existing, header, folderId));
            this.insertOrdered(entry, header.id);
            (existing ? result.updated : result.added).push(header.id);
        }
        return result;
    }

    /**
     * Full resync: the folder's index becomes exactly `headers` in the given
     * server order. Bodies survive for ids that are still listed. Ids that
     * vanished are removed, except those in `preserve` (messages with
     * unresolved pending actions), which keep their place by received time.
     */
    replaceFolder(folderId: string, headers: MessageHeader[], preserve: ReadonlySet<string> = new Set()): MergeResult {
        const entry = this.ensureFolder(folderId);
        const incoming = new Set(headers.map(h => h.id));
        const result: MergeResult = { added: [], updated: [], removed: [] };

        const kept: string[] = [];
        for (const id of entry.index) {
            if (incoming.has(id)) continue;
            if (preserve.has(id)) {
                kept.push(id);
            } else {
                this.removeOne(id);
                result.removed.push(id);
            }
        }

        for (const header of headers) {
            const existing = this.messages.get(header.id);
            if (existing && existing.folderId !== folderId) this.detach(existing);
            this.messages.set(header.id, this.merge(existing, header, folderId));
            (existing ? result.updated : result.added).push(header.id);
        }

        entry.index = [...incoming];
        for (const id of kept) this.insertOrdered(entry, id);
        return result;
    }

    /** Remove messages entirely (server-side deletion). Unknown ids are ignored. */
    removeMessages(ids: Iterable<string>): string[] {
        const removed: string[] = [];
        for (const id of ids) {
            if (this.removeOne(id)) removed.push(id);
        }
        return removed;
    }

    /**
     * Apply a local flag change or folder move. Folder unread/total counts
     * follow the change so list views stay plausible until the next
     * folder-list refresh replaces them with server numbers.
     */
    patchMessage(id: string, patch: MessagePatch): Message {
        const current = this.require(id);
        const flags = { ...current.flags, ...patch.flags };
        const targetFolderId = patch.folderId ?? current.folderId;
        const next: Message = { ...current, flags, folderId: targetFolderId };

        const from = this.ensureFolder(current.folderId);
        const wasUnread = current.flags.read ? 0 : 1;
        const isUnread = flags.read ? 0 : 1;

        if (targetFolderId !== current.folderId) {
            const to = this.ensureFolder(targetFolderId);
            from.index = from.index.filter(other => other !== id);
            from.meta.totalCount = Math.max(0, from.meta.totalCount - 1);
            from.meta.unreadCount = Math.max(0, from.meta.unreadCount - wasUnread);
            this.messages.set(id, next);
            this.insertOrdered(to, id);
            to.meta.totalCount += 1;
            to.meta.unreadCount += isUnread;
        } else {
            this.messages.set(id, next);
            from.meta.unreadCount = Math.max(0, from.meta.unreadCount + isUnread - wasUnread);
        }
        return next;
    }

    setSummary(id: string, summary: string | null): boolean {
        const current = this.messages.get(id);
        if (!current) return false;
        this.messages.set(id, { ...current, summary });
        return true;
    }

    // ── Bodies & eviction ────────────────────────────────────

    /**
     * Cache a body. Counts as an access. Returns the ids degraded to
     * `header-only` to stay within budget; an unknown id admits nothing.
     */
    admitBody(id: string, body: MessageBody): string[] {
        const current = this.messages.get(id);
        if (!current) return [];
        this.messages.set(id, { ...current, body, bodyState: 'full-body-cached' });
        this.bodyLru.delete(id);
        this.bodyLru.set(id, true);
        return this.evictOverBudget();
    }

    /** Record a view/open. Only cached bodies take part in recency. */
    touch(id: string): boolean {
        if (!this.bodyLru.has(id)) return false;
        this.bodyLru.delete(id);
        this.bodyLru.set(id, true);
        return true;
    }

    private evictOverBudget(): string[] {
        const evicted: string[] = [];
        while (this.bodyLru.size > this.maxBodies) {
            const oldest = this.bodyLru.keys().next();
            if (oldest.done) break;
            const id = oldest.value;
            this.bodyLru.delete(id);
            const message = this.require(id);
            this.messages.set(id, { ...message, body: null, bodyState: 'header-only' });
            evicted.push(id);
        }
        if (evicted.length > 0) {
            logDebug(`[CACHE] Evicted ${evicted.length} bod${evicted.length === 1 ? 'y' : 'ies'}, ${this.bodyLru.size}/${this.maxBodies} cached`);
        }
        return evicted;
    }

    // ── Snapshot ─────────────────────────────────────────────

    snapshot(): CacheSnapshot {
        return {
            folders: [...this.folders.values()].map(e => ({ ...e.meta, cursor: e.cursor, index: [...e.index] })),
            messages: [...this.messages.values()].map(toHeader),
        };
    }

    /**
     * Load a snapshot into an empty store. Index ids without a stored header
     * are dropped so a stale file can't break the index invariant.
     */
    restore(data: CacheSnapshot): void {
        if (this.folders.size > 0 || this.messages.size > 0) {
            throw new CacheInvariantError('restore() needs an empty store');
        }
        const headers = new Map(data.messages.map(m => [m.id, m]));
        for (const folder of data.folders) {
            const { cursor, index, ...meta } = folder;
            const entry: FolderEntry = { meta, cursor, index: [] };
            this.folders.set(meta.id, entry);
            for (const id of index) {
                const header = headers.get(id);
                if (!header || this.messages.has(id)) continue;
                this.messages.set(id, this.merge(undefined, header, meta.id));
                entry.index.push(id);
            }
        }
    }

    // ── Invariants ───────────────────────────────────────────

    /** Throws CacheInvariantError when index and storage disagree. */
    assertConsistent(): void {
        const indexed = new Set<string>();
        for (const [folderId, entry] of this.folders) {
            for (const id of entry.index) {
                const message = this.messages.get(id);
                if (!message) throw new CacheInvariantError(`Folder ${folderId} indexes missing message ${id}`);
                if (message.folderId !== folderId) {
                    throw new CacheInvariantError(`Message ${id} indexed in ${folderId} but stored under ${message.folderId}`);
                }
                if (indexed.has(id)) throw new CacheInvariantError(`Message ${id} indexed twice`);
                indexed.add(id);
            }
        }
        for (const id of this.messages.keys()) {
            if (!indexed.has(id)) throw new CacheInvariantError(`Message ${id} stored but not indexed`);
        }
        for (const id of this.bodyLru.keys()) {
            if (this.messages.get(id)?.bodyState !== 'full-body-cached') {
                throw new CacheInvariantError(`Body recency list holds ${id} without a cached body`);
            }
        }
        if (this.bodyLru.size > this.maxBodies) {
            throw new CacheInvariantError(`${this.bodyLru.size} bodies cached, budget is ${this.maxBodies}`);
        }
    }

    // ── Internals ────────────────────────────────────────────

    private require(id: string): Message {
        const message = this.messages.get(id);
        if (!message) throw new CacheInvariantError(`Message ${id} referenced but not stored`);
        return message;
    }

    private merge(existing: Message | undefined, header: MessageHeader, folderId: string): Message {
        return {
            ...toHeader(header),
            folderId,
            bodyState: existing?.bodyState ?? 'not-fetched',
            body: existing?.body ?? null,
            summary: existing?.summary ?? null,
        };
    }

    /** Take a message out of its folder's index without deleting it */
    private detach(message: Message): void {
        const entry = this.folders.get(message.folderId);
        if (entry) entry.index = entry.index.filter(id => id !== message.id);
    }

    private removeOne(id: string): boolean {
        const message = this.messages.get(id);
        if (!message) return false;
        this.detach(message);
        this.messages.delete(id);
        this.bodyLru.delete(id);
        return true;
    }

    /** Binary insert by received time, newest first; equal times keep arrival order */
    private insertOrdered(entry: FolderEntry, id: string): void {
        const receivedAt = this.require(id).receivedAt;
        let lo = 0;
        let hi = entry.index.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.require(entry.index[mid]).receivedAt >= receivedAt) lo = mid + 1;
            else hi = mid;
        }
        entry.index.splice(lo, 0, id);
    }
}

function toHeader(m: MessageHeader): MessageHeader {
    return {
        id: m.id,
        folderId: m.folderId,
        threadId: m.threadId,
        from: m.from,
        to: m.to,
        cc: m.cc,
        subject: m.subject,
        preview: m.preview,
        receivedAt: m.receivedAt,
        flags: { ...m.flags },
        hasAttachment: m.hasAttachment,
        size: m.size,
    };
}
