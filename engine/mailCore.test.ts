import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

vi.mock('./logger.js', () => ({
    logDebug: vi.fn(),
}));

import { MailCore } from './mailCore.js';
import { resolveConfig } from './config.js';
import { JmapClient } from './jmapClient.js';
import { SessionContext } from './session.js';
import { SnapshotStore } from './snapshot.js';
import { AuthError, NetworkError } from './errors.js';
import type { ChangeEvent, ChangeSubscription } from './changeFeed.js';
import type { Message, MessageBody, SummaryProvider } from './types.js';
import { FAKE_HOST, FAKE_TOKEN, FakeJmapServer, email, mailbox } from '../src/test-utils/fakeJmapServer.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function seedServer(server: FakeJmapServer): void {
    server.seed([
        mailbox('mb-inbox', 'Inbox', 'inbox'),
        mailbox('mb-archive', 'Archive', 'archive'),
        mailbox('mb-trash', 'Trash', 'trash'),
    ], [
        email({ id: 'e1', mailbox: 'mb-inbox', receivedAt: '2026-01-05T10:00:00Z', subject: 'Budget', text: 'Hello world' }),
        email({ id: 'e2', mailbox: 'mb-inbox', receivedAt: '2026-01-05T09:00:00Z', text: 'Second' }),
        email({ id: 'e3', mailbox: 'mb-inbox', receivedAt: '2026-01-05T08:00:00Z', text: 'Third' }),
    ]);
}

function makeCore(
    extra: { snapshot?: SnapshotStore; summaryProvider?: SummaryProvider } = {},
    settings: Record<string, unknown> = {},
): MailCore {
    const config = resolveConfig({
        host: FAKE_HOST,
        max_messages: 2,
        page_size: 10,
        sync_window: 50,
        shutdown_timeout: 1,
        ...settings,
    });
    const session = new SessionContext(config.host, FAKE_TOKEN);
    const client = new JmapClient(session, {
        pageSize: config.pageSize,
        syncWindow: config.syncWindow,
        requestTimeoutMs: config.requestTimeoutMs,
    });
    return new MailCore({ config, session, client, retryBaseMs: 1, ...extra });
}

function eventsOf<T extends ChangeEvent['type']>(sub: ChangeSubscription, type: T): Array<Extract<ChangeEvent, { type: T }>> {
    return sub.drain().filter((e): e is Extract<ChangeEvent, { type: T }> => e.type === type);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('MailCore', () => {
    let server: FakeJmapServer;
    let core: MailCore;

    beforeEach(() => {
        server = new FakeJmapServer();
        seedServer(server);
        vi.stubGlobal('fetch', server.fetch);
        core = makeCore();
    });

    afterEach(async () => {
        await core.shutdown();
        vi.unstubAllGlobals();
    });

    // -----------------------------------------------------------------------
    // Startup
    // -----------------------------------------------------------------------

    describe('start', () => {
        it('loads folders and syncs the inbox', async () => {
            const outcome = await core.start();

            expect(outcome).toMatchObject({ ok: true, folderId: 'mb-inbox', full: true });
            expect(core.listFolders().map(f => f.id)).toEqual(['mb-inbox', 'mb-archive', 'mb-trash']);
            expect(core.listFolder('mb-inbox').map(m => m.id)).toEqual(['e1', 'e2', 'e3']);
            expect(core.store.getCursor('mb-inbox')).toMatch(/^delta:/);
        });

        it('picks the inbox up on a later tick after an offline start', async () => {
            server.failNext('network');

            await expect(core.start()).resolves.toBeNull();
            expect(core.coordinator.watchedFolders()).toEqual([]);

            await core.coordinator.tick();

            expect(core.coordinator.watchedFolders()).toEqual(['mb-inbox']);
            expect(core.listFolder('mb-inbox').map(m => m.id)).toEqual(['e1', 'e2', 'e3']);
        });

        it('rejects with AuthError when the token is refused', async () => {
            server.token = 'test-secret-other';

            await expect(core.start()).rejects.toBeInstanceOf(AuthError);
            expect(core.status.getState().authRequired).toBe(true);
        });
    });

    // -----------------------------------------------------------------------
    // Bodies
    // -----------------------------------------------------------------------

    describe('message bodies', () => {
        beforeEach(async () => {
            await core.start();
        });

        it('fetches a body on first open and serves it from cache afterwards', async () => {
            const before = server.methodCount('Email/get');

            const message = await core.openMessage('e1');
            await core.openMessage('e1');

            expect(message.body).toEqual({ text: 'Hello world', html: null });
            expect(message.bodyState).toBe('full-body-cached');
            expect(server.methodCount('Email/get') - before).toBe(1);
        });

        it('shares one fetch between concurrent requests', async () => {
            const before = server.methodCount('Email/get');

            const [a, b] = await Promise.all([core.getMessageBody('e2'), core.getMessageBody('e2')]);

            expect(a).toEqual(b);
            expect(server.methodCount('Email/get') - before).toBe(1);
        });

        it('evicts the least recently opened body past the budget', async () => {
            const events = core.subscribe();

            await core.openMessage('e1');
            await core.openMessage('e2');
            await core.openMessage('e3');

            expect(eventsOf(events, 'messages-evicted')).toEqual([{ type: 'messages-evicted', messageIds: ['e1'] }]);
            expect(core.getMessage('e1')).toMatchObject({ bodyState: 'header-only', body: null });
            expect(core.store.bodyCount()).toBe(2);
        });
    });

    describe('shutdown', () => {
        it('waits for a body still loading and refuses new loads', async () => {
            core = makeCore({}, { request_timeout: 2 });
            await core.start();
            server.failNext('hang');
            const load = core.getMessageBody('e1').catch((e: unknown) => e);

            await expect(core.shutdown()).resolves.toBe(false);
            await expect(core.getMessageBody('e2')).rejects.toThrow('Engine is shutting down');
            await expect(load).resolves.toBeInstanceOf(NetworkError);

            core = makeCore();
        });
    });

    // -----------------------------------------------------------------------
    // Actions
    // -----------------------------------------------------------------------

    describe('actions', () => {
        beforeEach(async () => {
            await core.start();
        });

        it('stars a message locally and on the server', async () => {
            core.performAction('e1', 'star');
            expect(core.getMessage('e1')?.flags.starred).toBe(true);

            await core.dispatcher.whenIdle();

            expect(server.emails.get('e1')?.keywords.$flagged).toBe(true);
        });

        it('keeps an archived message in the archive after the next inbox sync', async () => {
            core.performAction('e2', 'archive');
            await core.dispatcher.whenIdle();

            expect(server.emails.get('e2')?.mailboxIds).toEqual({ 'mb-archive': true });

            const outcome = await core.refreshFolder('mb-inbox');

            expect(outcome.ok).toBe(true);
            expect(core.listFolder('mb-inbox').map(m => m.id)).toEqual(['e1', 'e3']);
            expect(core.getMessage('e2')?.folderId).toBe('mb-archive');
        });

        it('rolls back and notifies when the server refuses', async () => {
            server.rejectSet('e3', 'forbidden');

            core.performAction('e3', 'mark-read');
            await core.dispatcher.whenIdle();

            expect(core.getMessage('e3')?.flags.read).toBe(false);
            expect(core.status.getState().notifications.map(n => n.kind)).toEqual(['action-failed']);
        });
    });

    // -----------------------------------------------------------------------
    // Queries and summaries
    // -----------------------------------------------------------------------

    it('searches subjects and cached bodies', async () => {
        await core.start();
        await core.openMessage('e1');

        expect(core.search('budget').map(m => m.id)).toEqual(['e1']);
        expect(core.search('hello world').map(m => m.id)).toEqual(['e1']);
        expect(core.search('hello world', { folderId: 'mb-archive' })).toEqual([]);
    });

    describe('summaries', () => {
        it('attaches the provider summary to the message', async () => {
            const summarize = vi.fn(async (_message: Message, _body: MessageBody) => 'A short greeting.');
            core = makeCore({ summaryProvider: { summarize } });
            await core.start();

            await expect(core.summarizeMessage('e1')).resolves.toBe('A short greeting.');

            expect(core.getMessage('e1')?.summary).toBe('A short greeting.');
            expect(summarize).toHaveBeenCalledWith(
                expect.objectContaining({ id: 'e1' }),
                { text: 'Hello world', html: null },
            );
        });

        it('yields null when the provider fails', async () => {
            core = makeCore({ summaryProvider: { summarize: vi.fn(async () => { throw new Error('model offline'); }) } });
            await core.start();

            await expect(core.summarizeMessage('e1')).resolves.toBeNull();
            expect(core.getMessage('e1')?.summary).toBeNull();
        });

        it('yields null without a provider', async () => {
            await core.start();

            await expect(core.summarizeMessage('e1')).resolves.toBeNull();
        });
    });

    // -----------------------------------------------------------------------
    // Re-authentication
    // -----------------------------------------------------------------------

    it('halts on a revoked token and resumes after reauthenticate', async () => {
        await core.start();
        server.token = 'test-secret-2';

        await expect(core.refreshFolder('mb-inbox')).rejects.toBeInstanceOf(AuthError);
        expect(core.status.getState().authRequired).toBe(true);
        expect(core.status.getState().notifications.map(n => n.kind)).toEqual(['auth-required']);

        await core.reauthenticate('test-secret-2');

        expect(core.status.getState().authRequired).toBe(false);
        await expect(core.refreshFolder('mb-inbox')).resolves.toMatchObject({ ok: true });
    });

    // -----------------------------------------------------------------------
    // Snapshot
    // -----------------------------------------------------------------------

    describe('snapshot', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fastmail-tui-core-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('saves on shutdown and restores headers before the first sync lands', async () => {
            const file = path.join(dir, 'cache.db');
            core = makeCore({ snapshot: new SnapshotStore(file) });
            await core.start();
            await expect(core.shutdown()).resolves.toBe(true);

            // Offline restart: both session discovery attempts fail
            server.failNext('network', 'network');
            core = makeCore({ snapshot: new SnapshotStore(file) });
            const outcome = await core.start();

            expect(outcome).toMatchObject({ ok: false });
            expect(core.listFolder('mb-inbox').map(m => m.id)).toEqual(['e1', 'e2', 'e3']);
            expect(core.getMessage('e1')?.body).toBeNull();

            // close the file before the directory goes away
            await core.shutdown();
            core = makeCore();
        });
    });
});
