import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('./logger.js', () => ({
    logDebug: vi.fn(),
}));

import { JmapClient, decodeCursor, encodeCursor } from './jmapClient.js';
import { SessionContext } from './session.js';
import {
    AuthError,
    CursorExpiredError,
    FolderRoleMissingError,
    NetworkError,
    ProtocolError,
} from './errors.js';
import { FAKE_HOST, FAKE_TOKEN, FakeJmapServer, email, mailbox } from '../src/test-utils/fakeJmapServer.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function seedServer(server: FakeJmapServer, withArchive = true): void {
    const boxes = [
        mailbox('mb-work', 'Work', null),
        mailbox('mb-trash', 'Trash', 'trash'),
        mailbox('mb-inbox', 'Inbox', 'inbox'),
    ];
    if (withArchive) boxes.push(mailbox('mb-archive', 'Archive', 'archive'));
    server.seed(boxes, [
        email({ id: 'e1', mailbox: 'mb-inbox', receivedAt: '2026-01-05T10:00:00Z', text: 'Hello world' }),
        email({ id: 'e2', mailbox: 'mb-inbox', receivedAt: '2026-01-05T09:00:00Z', keywords: ['$seen'] }),
        email({ id: 'e3', mailbox: 'mb-inbox', receivedAt: '2026-01-05T08:00:00Z' }),
        email({ id: 'w1', mailbox: 'mb-work', receivedAt: '2026-01-04T08:00:00Z' }),
    ]);
}

function makeClient(overrides: { pageSize?: number; requestTimeoutMs?: number } = {}): JmapClient {
    return new JmapClient(new SessionContext(FAKE_HOST, FAKE_TOKEN), {
        pageSize: overrides.pageSize ?? 2,
        syncWindow: 10,
        requestTimeoutMs: overrides.requestTimeoutMs ?? 5_000,
    });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('cursor encoding', () => {
    it('decodes what it encodes', () => {
        expect(decodeCursor(encodeCursor({ kind: 'page', position: 4, state: 'abc' })))
            .toEqual({ kind: 'page', position: 4, state: 'abc' });
        expect(decodeCursor(encodeCursor({ kind: 'delta', state: 'x:y' })))
            .toEqual({ kind: 'delta', state: 'x:y' });
    });

    it('treats an unreadable cursor as expired', () => {
        expect(() => decodeCursor('nonsense')).toThrow(CursorExpiredError);
        expect(() => decodeCursor('delta:')).toThrow(CursorExpiredError);
    });
});

describe('JmapClient', () => {
    let server: FakeJmapServer;
    let client: JmapClient;

    beforeEach(() => {
        server = new FakeJmapServer();
        seedServer(server);
        vi.stubGlobal('fetch', server.fetch);
        client = makeClient();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    // -----------------------------------------------------------------------
    // Session
    // -----------------------------------------------------------------------

    describe('session', () => {
        it('discovers the session once and reuses it', async () => {
            await client.fetchFolderList();
            await client.fetchFolderList();

            expect(server.sessionRequests).toBe(1);
            expect(client.username).toBe('me@example.com');
        });

        it('rediscovers after resetSession()', async () => {
            await client.fetchFolderList();
            client.resetSession();
            await client.fetchFolderList();

            expect(server.sessionRequests).toBe(2);
        });
    });

    // -----------------------------------------------------------------------
    // Folders
    // -----------------------------------------------------------------------

    describe('fetchFolderList', () => {
        it('returns role folders first, with server counts', async () => {
            const folders = await client.fetchFolderList();

            expect(folders.map(f => f.id)).toEqual(['mb-inbox', 'mb-archive', 'mb-trash', 'mb-work']);
            expect(folders[0]).toMatchObject({ name: 'Inbox', role: 'inbox', unreadCount: 2, totalCount: 3 });
            expect(folders[3].role).toBeNull();
        });
    });

    // -----------------------------------------------------------------------
    // Full fetch
    // -----------------------------------------------------------------------

    describe('fetchMessages without a cursor', () => {
        it('pages through the folder newest first and ends with a delta cursor', async () => {
            const first = await client.fetchMessages('mb-inbox', null);

            expect(first.messages.map(m => m.id)).toEqual(['e1', 'e2']);
            expect(first.hasMore).toBe(true);
            expect(first.full).toBe(true);
            expect(first.newCursor).toBe('page:2:1');

            const second = await client.fetchMessages('mb-inbox', first.newCursor);

            expect(second.messages.map(m => m.id)).toEqual(['e3']);
            expect(second.hasMore).toBe(false);
            expect(second.newCursor).toBe('delta:1');
        });

        it('translates keywords and dates into headers', async () => {
            const { messages } = await client.fetchMessages('mb-inbox', null);

            const e2 = messages[1];
            expect(e2.folderId).toBe('mb-inbox');
            expect(e2.flags).toEqual({ read: true, starred: false, answered: false, draft: false });
            expect(e2.receivedAt).toBe(Date.parse('2026-01-05T09:00:00Z'));
            expect(e2.subject).toBe('Subject e2');
        });

        it('sends one Email/query and Email/get per page', async () => {
            await client.fetchMessages('mb-inbox', null);

            expect(server.calls.at(-1)).toEqual(['Email/query', 'Email/get']);
        });
    });

    // -----------------------------------------------------------------------
    // Incremental fetch
    // -----------------------------------------------------------------------

    describe('fetchMessages with a delta cursor', () => {
        it('reports changed and destroyed messages, paging by maxChanges', async () => {
            server.updateEmail('e2', e => { e.keywords.$flagged = true; });
            server.destroyEmail('e3');
            server.addEmail(email({ id: 'e4', mailbox: 'mb-inbox', receivedAt: '2026-01-05T11:00:00Z' }));

            const first = await client.fetchMessages('mb-inbox', 'delta:1');

            expect(first.full).toBe(false);
            expect(first.messages.map(m => m.id)).toEqual(['e2']);
            expect(first.messages[0].flags.starred).toBe(true);
            expect(first.removed).toEqual(['e3']);
            expect(first.hasMore).toBe(true);
            expect(first.newCursor).toBe('delta:3');

            const second = await client.fetchMessages('mb-inbox', first.newCursor);

            expect(second.messages.map(m => m.id)).toEqual(['e4']);
            expect(second.removed).toEqual([]);
            expect(second.hasMore).toBe(false);
            expect(second.newCursor).toBe('delta:4');
        });

        it('reports a message moved to another mailbox as removed from this one', async () => {
            server.updateEmail('e1', e => { e.mailboxIds = { 'mb-archive': true }; });

            const result = await client.fetchMessages('mb-inbox', 'delta:1');

            expect(result.messages).toEqual([]);
            expect(result.removed).toEqual(['e1']);
        });

        it('ignores messages created in other mailboxes', async () => {
            server.addEmail(email({ id: 'w2', mailbox: 'mb-work', receivedAt: '2026-01-05T12:00:00Z' }));

            const result = await client.fetchMessages('mb-inbox', 'delta:1');

            expect(result.messages).toEqual([]);
            expect(result.removed).toEqual([]);
            expect(result.newCursor).toBe('delta:2');
        });

        it('throws CursorExpiredError when the server cannot calculate changes', async () => {
            server.addEmail(email({ id: 'e5', mailbox: 'mb-inbox', receivedAt: '2026-01-06T08:00:00Z' }));
            server.expireChanges();

            await expect(client.fetchMessages('mb-inbox', 'delta:1')).rejects.toThrow(CursorExpiredError);
        });

        it('throws CursorExpiredError for a cursor it cannot read', async () => {
            await expect(client.fetchMessages('mb-inbox', 'v0|whatever')).rejects.toThrow(CursorExpiredError);
        });
    });

    // -----------------------------------------------------------------------
    // Bodies
    // -----------------------------------------------------------------------

    describe('fetchMessageBody', () => {
        it('returns the text part', async () => {
            await expect(client.fetchMessageBody('e1')).resolves.toEqual({ text: 'Hello world', html: null });
        });

        it('throws ProtocolError for a message the server does not have', async () => {
            await expect(client.fetchMessageBody('ghost')).rejects.toThrow(ProtocolError);
        });
    });

    // -----------------------------------------------------------------------
    // Actions
    // -----------------------------------------------------------------------

    describe('applyAction', () => {
        it('sets and clears keywords', async () => {
            await client.applyAction('e1', 'star');
            await client.applyAction('e1', 'mark-read');
            expect(server.emails.get('e1')?.keywords).toEqual({ $flagged: true, $seen: true });

            await client.applyAction('e1', 'unstar');
            await client.applyAction('e1', 'mark-unread');
            expect(server.emails.get('e1')?.keywords).toEqual({});
        });

        it('archives idempotently', async () => {
            await client.applyAction('e1', 'archive');
            await client.applyAction('e1', 'archive');

            expect(server.emails.get('e1')?.mailboxIds).toEqual({ 'mb-archive': true });
        });

        it('deletes by moving to trash', async () => {
            await client.applyAction('e2', 'delete');

            expect(server.emails.get('e2')?.mailboxIds).toEqual({ 'mb-trash': true });
        });

        it('treats deleting an already destroyed message as done', async () => {
            server.destroyEmail('e3');

            await expect(client.applyAction('e3', 'delete')).resolves.toBeUndefined();
        });

        it('rejects with ProtocolError when the server refuses the update', async () => {
            server.rejectSet('e1', 'forbidden');

            await expect(client.applyAction('e1', 'star')).rejects.toThrow('rejected for e1: forbidden');
        });

        it('throws FolderRoleMissingError when the account has no archive', async () => {
            server = new FakeJmapServer();
            seedServer(server, false);
            vi.stubGlobal('fetch', server.fetch);
            client = makeClient();

            await expect(client.applyAction('e1', 'archive')).rejects.toThrow(FolderRoleMissingError);
        });
    });

    // -----------------------------------------------------------------------
    // Error classification
    // -----------------------------------------------------------------------

    describe('errors', () => {
        it('maps HTTP 401 to AuthError', async () => {
            server.token = 'some-other-token';

            await expect(client.fetchFolderList()).rejects.toThrow(AuthError);
        });

        it('maps HTTP 503 to NetworkError with the status', async () => {
            server.failNext(503);

            const err = await client.fetchFolderList().catch((e: unknown) => e);
            expect(err).toBeInstanceOf(NetworkError);
            expect(err instanceof NetworkError && err.status).toBe(503);
        });

        it('maps HTTP 429 to NetworkError', async () => {
            server.failNext(429);

            await expect(client.fetchFolderList()).rejects.toThrow(NetworkError);
        });

        it('maps a transport failure to NetworkError', async () => {
            server.failNext('network');

            await expect(client.fetchFolderList()).rejects.toThrow('Request failed: TypeError: fetch failed');
        });

        it('maps an unparseable body to ProtocolError', async () => {
            server.failNext('garbage');

            await expect(client.fetchFolderList()).rejects.toThrow(ProtocolError);
        });

        it('maps an unexpected 4xx to ProtocolError', async () => {
            server.failNext(404);

            await expect(client.fetchFolderList()).rejects.toThrow('Unexpected HTTP 404');
        });

        it('times out a request that never answers', async () => {
            client = makeClient({ requestTimeoutMs: 20 });
            server.failNext('hang');

            await expect(client.fetchFolderList()).rejects.toThrow('Request timed out after 20ms');
        });

        it('times out a response whose body never finishes', async () => {
            vi.useFakeTimers();
            client = makeClient({ requestTimeoutMs: 1_000 });
            server.failNext('stall');

            const result = client.fetchFolderList().catch((e: unknown) => e);
            await vi.advanceTimersByTimeAsync(1_000);
            const err = await result;
            vi.useRealTimers();

            expect(err).toBeInstanceOf(NetworkError);
            expect(err instanceof NetworkError && err.message).toBe('Request timed out after 1000ms');
        });

        it('drops the cached session after an auth failure', async () => {
            await client.fetchFolderList();
            server.failNext(401);
            await expect(client.fetchFolderList()).rejects.toThrow(AuthError);

            await client.fetchFolderList();
            expect(server.sessionRequests).toBe(2);
        });
    });
});
