import { describe, it, expect } from 'vitest';
import { parseBody, parseEmail, parseMailbox, sortFolders } from './jmapParse.js';
import { ProtocolError } from './errors.js';

describe('parseMailbox', () => {
    it('maps the spam role onto junk', () => {
        const folder = parseMailbox({ id: 'mb1', name: 'Spam', role: 'Spam', sortOrder: 3, totalEmails: 9, unreadEmails: 2 });

        expect(folder).toEqual({
            id: 'mb1', name: 'Spam', role: 'junk', parentId: null, sortOrder: 3, unreadCount: 2, totalCount: 9,
        });
    });

    it('drops roles it does not know', () => {
        expect(parseMailbox({ id: 'mb1', name: 'Odd', role: 'scheduled' }).role).toBeNull();
    });

    it('rejects a mailbox without a name', () => {
        expect(() => parseMailbox({ id: 'mb1' })).toThrow(ProtocolError);
    });
});

describe('sortFolders', () => {
    it('puts system folders first, then by sort order and name', () => {
        const sorted = sortFolders([
            parseMailbox({ id: 'b', name: 'beta', role: null, sortOrder: 1 }),
            parseMailbox({ id: 't', name: 'Trash', role: 'trash' }),
            parseMailbox({ id: 'a', name: 'Alpha', role: null, sortOrder: 1 }),
            parseMailbox({ id: 'z', name: 'zulu', role: null, sortOrder: 0 }),
            parseMailbox({ id: 'i', name: 'Inbox', role: 'inbox' }),
        ]);

        expect(sorted.map(f => f.id)).toEqual(['i', 't', 'z', 'a', 'b']);
    });
});

describe('parseEmail', () => {
    const base = { id: 'e1', receivedAt: '2026-03-01T08:30:00Z' };

    it('fills defaults for missing optional fields', () => {
        const msg = parseEmail(base, 'inbox');

        expect(msg).toMatchObject({
            id: 'e1',
            folderId: 'inbox',
            threadId: 'e1',
            subject: '(no subject)',
            preview: '',
            from: [],
            hasAttachment: false,
            size: 0,
        });
    });

    it('reads keywords into flags', () => {
        const msg = parseEmail({ ...base, keywords: { $seen: true, $flagged: true, $answered: true, $draft: false } }, 'inbox');

        expect(msg.flags).toEqual({ read: true, starred: true, answered: true, draft: false });
    });

    it('keeps well-formed addresses and turns empty names into null', () => {
        const msg = parseEmail({ ...base, from: [{ email: 'a@example.com', name: '' }, { name: 'no email' }] }, 'inbox');

        expect(msg.from).toEqual([{ email: 'a@example.com', name: null }]);
    });

    it('caps the preview at 200 characters', () => {
        const msg = parseEmail({ ...base, preview: 'x'.repeat(300) }, 'inbox');

        expect(msg.preview).toHaveLength(200);
    });

    it('rejects an unparseable received date', () => {
        expect(() => parseEmail({ id: 'e1', receivedAt: 'yesterday' }, 'inbox')).toThrow('Email e1: unparseable receivedAt');
    });
});

describe('parseBody', () => {
    it('picks the first text and html parts that have values', () => {
        const body = parseBody({
            bodyValues: { '2': { value: 'plain' }, '3': { value: '<p>rich</p>' } },
            textBody: [{ partId: '1' }, { partId: '2' }],
            htmlBody: [{ partId: '3' }],
        });

        expect(body).toEqual({ text: 'plain', html: '<p>rich</p>' });
    });

    it('returns nulls when there are no body values', () => {
        expect(parseBody({ textBody: [{ partId: '1' }] })).toEqual({ text: null, html: null });
    });
});
