import { ProtocolError } from './errors.js';
import { isRecord } from './utils.js';
import { isFolderRole } from './types.js';
import type { Address, FolderMeta, FolderRole, MessageBody, MessageHeader } from './types.js';

// System folders first, in the order a mail client lists them
const ROLE_ORDER: Partial<Record<FolderRole, number>> = {
    inbox: 0,
    drafts: 1,
    sent: 2,
    archive: 3,
    junk: 4,
    trash: 5,
};

const MAX_PREVIEW = 200;

function str(obj: Record<string, unknown>, key: string, what: string): string {
    const value = obj[key];
    if (typeof value !== 'string') throw new ProtocolError(`${what}: "${key}" is not a string`);
    return value;
}

function optStr(obj: Record<string, unknown>, key: string): string | null {
    const value = obj[key];
    return typeof value === 'string' ? value : null;
}

function num(obj: Record<string, unknown>, key: string): number {
    const value = obj[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function boolMap(value: unknown): Record<string, boolean> {
    if (!isRecord(value)) return {};
    const out: Record<string, boolean> = {};
    for (const [k, v] of Object.entries(value)) {
        if (v === true) out[k] = true;
    }
    return out;
}

function addresses(value: unknown): Address[] {
    if (!Array.isArray(value)) return [];
    const out: Address[] = [];
    for (const entry of value) {
        if (!isRecord(entry) || typeof entry.email !== 'string') continue;
        out.push({ email: entry.email, name: typeof entry.name === 'string' && entry.name !== '' ? entry.name : null });
    }
    return out;
}

function toRole(value: unknown): FolderRole | null {
    if (typeof value !== 'string') return null;
    const lower = value.toLowerCase();
    if (lower === 'spam') return 'junk';
    return isFolderRole(lower) ? lower : null;
}

export function parseMailbox(raw: unknown): FolderMeta {
    if (!isRecord(raw)) throw new ProtocolError('Mailbox is not an object');
    return {
        id: str(raw, 'id', 'Mailbox'),
        name: str(raw, 'name', 'Mailbox'),
        role: toRole(raw.role),
        parentId: optStr(raw, 'parentId'),
        sortOrder: num(raw, 'sortOrder'),
        unreadCount: num(raw, 'unreadEmails'),
        totalCount: num(raw, 'totalEmails'),
    };
}

/** Role folders first in fixed order, then by server sort order, then name */
export function sortFolders(folders: FolderMeta[]): FolderMeta[] {
    const rank = (f: FolderMeta): number => (f.role ? ROLE_ORDER[f.role] ?? 99 : 1000);
    return [...folders].sort((a, b) =>
        rank(a) - rank(b)
        || a.sortOrder - b.sortOrder
        || a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
}

export function mailboxIdsOf(raw: unknown): string[] {
    return isRecord(raw) ? Object.keys(boolMap(raw.mailboxIds)) : [];
}

/**
 * Translate a JMAP Email into a header. `folderId` is the folder the
 * message is being synced into; callers check membership beforehand.
 */
export function parseEmail(raw: unknown, folderId: string): MessageHeader {
    if (!isRecord(raw)) throw new ProtocolError('Email is not an object');
    const id = str(raw, 'id', 'Email');
    const receivedAt = Date.parse(str(raw, 'receivedAt', 'Email'));
    if (Number.isNaN(receivedAt)) throw new ProtocolError(`Email ${id}: unparseable receivedAt`);

    const keywords = boolMap(raw.keywords);
    const subject = optStr(raw, 'subject');
    return {
        id,
        folderId,
        threadId: optStr(raw, 'threadId') ?? id,
        from: addresses(raw.from),
        to: addresses(raw.to),
        cc: addresses(raw.cc),
        subject: subject && subject.trim() !== '' ? subject : '(no subject)',
        preview: (optStr(raw, 'preview') ?? '').slice(0, MAX_PREVIEW),
        receivedAt,
        flags: {
            read: keywords.$seen === true,
            starred: keywords.$flagged === true,
            answered: keywords.$answered === true,
            draft: keywords.$draft === true,
        },
        hasAttachment: raw.hasAttachment === true,
        size: num(raw, 'size'),
    };
}

function firstPartValue(parts: unknown, values: Record<string, unknown>): string | null {
    if (!Array.isArray(parts)) return null;
    for (const part of parts) {
        if (!isRecord(part) || typeof part.partId !== 'string') continue;
        const value = values[part.partId];
        if (isRecord(value) && typeof value.value === 'string') return value.value;
    }
    return null;
}

export function parseBody(raw: unknown): MessageBody {
    if (!isRecord(raw)) throw new ProtocolError('Email is not an object');
    const values = isRecord(raw.bodyValues) ? raw.bodyValues : {};
    return {
        text: firstPartValue(raw.textBody, values),
        html: firstPartValue(raw.htmlBody, values),
    };
}
