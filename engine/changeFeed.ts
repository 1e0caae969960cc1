import type { ActionConflictError, MailError } from './errors.js';
import type { PendingAction } from './types.js';

export type ChangeEvent =
    | { type: 'folders-updated'; folderIds: string[] }
    | { type: 'folder-sync-started'; folderId: string }
    | { type: 'folder-synced'; folderId: string; full: boolean; added: string[]; updated: string[]; removed: string[] }
    | { type: 'folder-sync-failed'; folderId: string; error: MailError }
    | { type: 'auth-required'; error: MailError }
    | { type: 'message-updated'; messageId: string }
    | { type: 'messages-evicted'; messageIds: string[] }
    | { type: 'action-queued'; action: PendingAction; conflict: ActionConflictError }
    | { type: 'action-confirmed'; action: PendingAction }
    | { type: 'action-failed'; action: PendingAction; error: MailError };

export type ChangeEventType = ChangeEvent['type'];

/**
 * One reader's view of the feed. Events queue up until read, either in
 * bulk with drain() from a render loop or one at a time with for-await.
 */
export class ChangeSubscription implements AsyncIterable<ChangeEvent> {
    private queue: ChangeEvent[] = [];
    private waiter: ((result: IteratorResult<ChangeEvent>) => void) | null = null;
    private closed = false;

    constructor(private readonly detach: (sub: ChangeSubscription) => void) {}

    /** @internal called by the feed */
    push(event: ChangeEvent): void {
        if (this.closed) return;
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ value: event, done: false });
        } else {
            this.queue.push(event);
        }
    }

    /** Take everything queued so far without waiting */
    drain(): ChangeEvent[] {
        const events = this.queue;
        this.queue = [];
        return events;
    }

    get pending(): number {
        return this.queue.length;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.queue = [];
        this.detach(this);
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ value: undefined, done: true });
        }
    }

    next(): Promise<IteratorResult<ChangeEvent>> {
        const queued = this.queue.shift();
        if (queued) return Promise.resolve({ value: queued, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise(resolve => { this.waiter = resolve; });
    }

    [Symbol.asyncIterator](): AsyncIterator<ChangeEvent> {
        return {
            next: () => this.next(),
            return: () => {
                this.close();
                return Promise.resolve({ value: undefined, done: true });
            },
        };
    }
}

/**
 * Change-notification channel from the engine to the presentation layer.
 * Publishers never see who is listening; each subscription gets its own copy.
 */
export class ChangeFeed {
    private subscriptions: Set<ChangeSubscription> = new Set();

    publish(event: ChangeEvent): void {
        for (const sub of this.subscriptions) sub.push(event);
    }

    subscribe(): ChangeSubscription {
        const sub = new ChangeSubscription(s => this.subscriptions.delete(s));
        this.subscriptions.add(sub);
        return sub;
    }

    get subscriberCount(): number {
        return this.subscriptions.size;
    }

    closeAll(): void {
        for (const sub of [...this.subscriptions]) sub.close();
    }
}
