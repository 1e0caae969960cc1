import type { CacheStore } from './cacheStore.js';
import type { Folder, Message, SearchScope } from './types.js';

function matches(message: Message, needle: string): boolean {
    if (message.subject.toLowerCase().includes(needle)) return true;
    for (const addr of message.from) {
        if (addr.email.toLowerCase().includes(needle)) return true;
        if (addr.name?.toLowerCase().includes(needle)) return true;
    }
    const body = message.body;
    if (body?.text?.toLowerCase().includes(needle)) return true;
    if (body?.html?.toLowerCase().includes(needle)) return true;
    return false;
}

const newestFirst = (a: Message, b: Message): number => b.receivedAt - a.receivedAt;

/**
 * Read-only views over the cache. Everything here is synchronous and works
 * offline: it only ever sees what has already been synced or opened.
 */
export class MailQuery {
    constructor(private readonly store: CacheStore) {}

    listFolders(): Folder[] {
        return this.store.listFolders();
    }

    /** Messages of a folder, newest first. Throws CacheInvariantError if the index points at nothing. */
    listFolder(folderId: string): Message[] {
        return this.store.folderMessages(folderId);
    }

    getMessage(messageId: string): Message | undefined {
        return this.store.getMessage(messageId);
    }

    /**
     * Case-insensitive substring search over subject, sender and whatever
     * body text is cached. Messages without a cached body match on headers only.
     */
    searchMessages(query: string, scope: SearchScope = 'all'): Message[] {
        const needle = query.trim().toLowerCase();
        if (needle === '') return [];
        const candidates = scope === 'all'
            ? this.store.allMessages()
            : this.store.folderMessages(scope.folderId);
        return candidates.filter(m => matches(m, needle)).sort(newestFirst);
    }

    /** Cached messages of a thread across all folders, oldest first */
    listThread(threadId: string): Message[] {
        return this.store.allMessages()
            .filter(m => m.threadId === threadId)
            .sort((a, b) => a.receivedAt - b.receivedAt);
    }

    unreadCount(folderId: string): number {
        return this.store.folderMessages(folderId).filter(m => !m.flags.read).length;
    }
}
