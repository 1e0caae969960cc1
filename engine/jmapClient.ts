/**
 * JMAP protocol client for Fastmail.
 * The only engine component that touches the network; owns nothing but the
 * discovered session and the role → mailbox map needed for archive/delete.
 */

import {
    AuthError,
    CursorExpiredError,
    FolderRoleMissingError,
    NetworkError,
    ProtocolError,
    describeError,
} from './errors.js';
import { mailboxIdsOf, parseBody, parseEmail, parseMailbox, sortFolders } from './jmapParse.js';
import {
    EMAIL_HEADER_PROPERTIES,
    JMAP_CORE,
    JMAP_MAIL,
    MAILBOX_PROPERTIES,
} from './jmapTypes.js';
import type { JmapMethodCall, JmapRequest } from './jmapTypes.js';
import { logDebug } from './logger.js';
import type { SessionContext } from './session.js';
import type {
    ActionKind,
    FetchResult,
    FolderMeta,
    FolderRole,
    MessageBody,
    MessageHeader,
    ProtocolClient,
} from './types.js';
import { isRecord, stripCRLF } from './utils.js';

export interface JmapClientOptions {
    pageSize: number;
    /** Upper bound on messages pulled by one full fetch sequence */
    syncWindow: number;
    requestTimeoutMs: number;
}

interface ResolvedSession {
    apiUrl: string;
    accountId: string;
    username: string;
}

type DecodedCursor =
    | { kind: 'page'; position: number; state: string }
    | { kind: 'delta'; state: string };

const MAX_BODY_VALUE_BYTES = 2 * 1024 * 1024;

/** Cursors are opaque to callers; only this module reads them. */
export function encodeCursor(cursor: DecodedCursor): string {
    return cursor.kind === 'page'
        ? `page:${cursor.position}:${cursor.state}`
        : `delta:${cursor.state}`;
}

export function decodeCursor(raw: string): DecodedCursor {
    if (raw.startsWith('delta:') && raw.length > 'delta:'.length) {
        return { kind: 'delta', state: raw.slice('delta:'.length) };
    }
    const page = /^page:(\d+):(.+)$/s.exec(raw);
    if (page) return { kind: 'page', position: Number(page[1]), state: page[2] };
    // A cursor we can't read is as good as an expired one
    throw new CursorExpiredError(`Unrecognized sync cursor "${stripCRLF(raw).slice(0, 40)}"`);
}

type KeywordAction = Exclude<ActionKind, 'archive' | 'delete'>;

/** JMAP patch syntax: a null value removes the keyword */
function keywordPatch(kind: KeywordAction): Record<string, true | null> {
    switch (kind) {
        case 'star': return { 'keywords/$flagged': true };
        case 'unstar': return { 'keywords/$flagged': null };
        case 'mark-read': return { 'keywords/$seen': true };
        case 'mark-unread': return { 'keywords/$seen': null };
    }
}

export class JmapClient implements ProtocolClient {
    private session: ResolvedSession | null = null;
    private roleMailboxes: Map<FolderRole, string> = new Map();

    constructor(
        private readonly ctx: SessionContext,
        private readonly options: JmapClientOptions,
    ) {}

    get username(): string | null {
        return this.session?.username ?? null;
    }

    /** Discover the JMAP session (API URL, mail account). Cached until resetSession(). */
    async connect(): Promise<ResolvedSession> {
        if (this.session) return this.session;

        const url = `${this.ctx.baseUrl}/jmap/session`;
        const body = await this.send(url, 'GET');
        if (!isRecord(body) || typeof body.apiUrl !== 'string' || !isRecord(body.primaryAccounts)) {
            throw new ProtocolError('Session object is missing apiUrl or primaryAccounts');
        }
        const accountId = body.primaryAccounts[JMAP_MAIL];
        if (typeof accountId !== 'string') {
            throw new AuthError('Token has no access to a mail account');
        }

        this.session = {
            apiUrl: body.apiUrl,
            accountId,
            username: typeof body.username === 'string' ? body.username : '',
        };
        logDebug(`[JMAP] Session ready for ${stripCRLF(this.session.username) || 'unknown user'}`);
        return this.session;
    }

    /** Forget the discovered session, e.g. after the credential changed. */
    resetSession(): void {
        this.session = null;
        this.roleMailboxes.clear();
    }

    async fetchFolderList(): Promise<FolderMeta[]> {
        const { accountId } = await this.connect();
        const responses = await this.call([
            ['Mailbox/get', { accountId, ids: null, properties: [...MAILBOX_PROPERTIES] }, 'm'],
        ]);
        const result = pick(responses, 'm', 'Mailbox/get');
        if (!Array.isArray(result.list)) throw new ProtocolError('Mailbox/get: list is not an array');

        const folders = sortFolders(result.list.map(parseMailbox));
        this.roleMailboxes.clear();
        for (const folder of folders) {
            if (folder.role && !this.roleMailboxes.has(folder.role)) {
                this.roleMailboxes.set(folder.role, folder.id);
            }
        }
        return folders;
    }

    async fetchMessages(folderId: string, cursor: string | null): Promise<FetchResult> {
        if (cursor === null) return this.fetchPage(folderId, 0, null);
        const decoded = decodeCursor(cursor);
        return decoded.kind === 'page'
            ? this.fetchPage(folderId, decoded.position, decoded.state)
            : this.fetchChanges(folderId, decoded.state);
    }

    /** One page of a full fetch. The state captured on the first page is carried to the end. */
    private async fetchPage(folderId: string, position: number, carriedState: string | null): Promise<FetchResult> {
        const { accountId } = await this.connect();
        const limit = Math.max(1, Math.min(this.options.pageSize, this.options.syncWindow - position));
        const responses = await this.call([
            ['Email/query', {
                accountId,
                filter: { inMailbox: folderId },
                sort: [{ property: 'receivedAt', isAscending: false }],
                position,
                limit,
                calculateTotal: true,
            }, 'q'],
            ['Email/get', {
                accountId,
                '#ids': { resultOf: 'q', name: 'Email/query', path: '/ids' },
                properties: [...EMAIL_HEADER_PROPERTIES],
            }, 'g'],
        ]);

        const query = pick(responses, 'q', 'Email/query');
        const get = pick(responses, 'g', 'Email/get');
        const ids = stringArray(query.ids, 'Email/query ids');
        const total = typeof query.total === 'number' ? query.total : position + ids.length;
        const state = carriedState ?? requireString(get.state, 'Email/get state');

        // Email/get does not promise query order; rebuild it from the id list
        const byId = new Map<string, MessageHeader>();
        for (const raw of listOf(get)) {
            const header = parseEmail(raw, folderId);
            byId.set(header.id, header);
        }
        const messages = ids.flatMap(id => byId.get(id) ?? []);

        const next = position + ids.length;
        const hasMore = ids.length > 0 && next < Math.min(total, this.options.syncWindow);
        return {
            messages,
            removed: [],
            newCursor: encodeCursor(hasMore ? { kind: 'page', position: next, state } : { kind: 'delta', state }),
            hasMore,
            full: true,
        };
    }

    /**
     * Changes since `sinceState`. Email/changes is account-wide, so messages
     * that changed but no longer sit in `folderId` are reported as removed
     * from it, alongside destroyed ids.
     */
    private async fetchChanges(folderId: string, sinceState: string): Promise<FetchResult> {
        const { accountId } = await this.connect();
        const properties = [...EMAIL_HEADER_PROPERTIES];
        const responses = await this.call([
            ['Email/changes', { accountId, sinceState, maxChanges: this.options.pageSize }, 'c'],
            ['Email/get', { accountId, '#ids': { resultOf: 'c', name: 'Email/changes', path: '/created' }, properties }, 'gc'],
            ['Email/get', { accountId, '#ids': { resultOf: 'c', name: 'Email/changes', path: '/updated' }, properties }, 'gu'],
        ]);

        const changes = pick(responses, 'c', 'Email/changes');
        const created = pick(responses, 'gc', 'Email/get');
        const updated = pick(responses, 'gu', 'Email/get');
        const newState = requireString(changes.newState, 'Email/changes newState');

        const messages: MessageHeader[] = [];
        const removed = new Set(stringArray(changes.destroyed ?? [], 'Email/changes destroyed'));
        for (const [get, wasUpdate] of [[created, false], [updated, true]] as const) {
            for (const raw of listOf(get)) {
                if (mailboxIdsOf(raw).includes(folderId)) {
                    messages.push(parseEmail(raw, folderId));
                } else if (wasUpdate && isRecord(raw) && typeof raw.id === 'string') {
                    removed.add(raw.id);
                }
            }
            for (const id of stringArray(get.notFound ?? [], 'Email/get notFound')) removed.add(id);
        }

        return {
            messages,
            removed: [...removed],
            newCursor: encodeCursor({ kind: 'delta', state: newState }),
            hasMore: changes.hasMoreChanges === true,
            full: false,
        };
    }

    async fetchMessageBody(messageId: string): Promise<MessageBody> {
        const { accountId } = await this.connect();
        const responses = await this.call([
            ['Email/get', {
                accountId,
                ids: [messageId],
                properties: ['id', 'bodyValues', 'textBody', 'htmlBody'],
                fetchTextBodyValues: true,
                fetchHTMLBodyValues: true,
                maxBodyValueBytes: MAX_BODY_VALUE_BYTES,
            }, 'b'],
        ]);
        const [email] = listOf(pick(responses, 'b', 'Email/get'));
        if (email === undefined) throw new ProtocolError(`Email ${messageId} not found on server`);
        return parseBody(email);
    }

    async applyAction(messageId: string, kind: ActionKind): Promise<void> {
        const { accountId } = await this.connect();
        // Moves replace mailboxIds wholesale, so repeating one lands in the same place
        const patch = kind === 'archive' || kind === 'delete'
            ? { mailboxIds: { [await this.mailboxForRole(kind === 'archive' ? 'archive' : 'trash')]: true } }
            : keywordPatch(kind);

        const responses = await this.call([
            ['Email/set', { accountId, update: { [messageId]: patch } }, 's'],
        ]);
        const result = pick(responses, 's', 'Email/set');
        const notUpdated = isRecord(result.notUpdated) ? result.notUpdated[messageId] : undefined;
        if (notUpdated === undefined) return;

        const type = isRecord(notUpdated) && typeof notUpdated.type === 'string' ? notUpdated.type : 'unknown';
        if (type === 'notFound' && kind === 'delete') {
            // Already gone: the end state a delete asks for
            logDebug(`[JMAP] delete of ${messageId}: already destroyed on server`);
            return;
        }
        throw new ProtocolError(`Email/set ${kind} rejected for ${messageId}: ${type}`);
    }

    private async mailboxForRole(role: FolderRole): Promise<string> {
        if (!this.roleMailboxes.has(role)) await this.fetchFolderList();
        const id = this.roleMailboxes.get(role);
        if (!id) throw new FolderRoleMissingError(role);
        return id;
    }

    // ── Transport ────────────────────────────────────────────

    private async call(methodCalls: JmapMethodCall[]): Promise<Map<string, [string, Record<string, unknown>]>> {
        const { apiUrl } = await this.connect();
        const request: JmapRequest = { using: [JMAP_CORE, JMAP_MAIL], methodCalls };
        const body = await this.send(apiUrl, 'POST', JSON.stringify(request));
        if (!isRecord(body) || !Array.isArray(body.methodResponses)) {
            throw new ProtocolError('Response has no methodResponses');
        }

        const byCallId = new Map<string, [string, Record<string, unknown>]>();
        const entries: unknown[] = body.methodResponses;
        for (const entry of entries) {
            if (!Array.isArray(entry) || entry.length !== 3) throw new ProtocolError('Malformed method response');
            const parts: unknown[] = entry;
            const [name, args, callId] = parts;
            if (typeof name !== 'string' || !isRecord(args) || typeof callId !== 'string') {
                throw new ProtocolError('Malformed method response');
            }
            // A later response for the same call id never replaces an error
            if (!byCallId.has(callId) || name === 'error') byCallId.set(callId, [name, args]);
        }
        return byCallId;
    }

    /**
     * HTTP round trip with timeout and error classification. Resolves to parsed JSON.
     * The timeout covers the whole exchange, body included.
     */
    private async send(url: string, method: 'GET' | 'POST', body?: string): Promise<unknown> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
        const headers: Record<string, string> = {
            'Authorization': `Bearer ${this.ctx.credential}`,
            'Accept': 'application/json',
        };
        if (body !== undefined) headers['Content-Type'] = 'application/json';

        try {
            let response: Response;
            try {
                response = await fetch(url, { method, headers, body, signal: controller.signal });
            } catch (err) {
                if (controller.signal.aborted) throw this.timedOut();
                throw new NetworkError(`Request failed: ${describeError(err)}`, null, { cause: err });
            }

            if (response.status === 401 || response.status === 403) {
                this.session = null;
                throw new AuthError(`Server rejected credential (HTTP ${response.status})`);
            }
            if (response.status === 429 || response.status >= 500) {
                throw new NetworkError(`Server unavailable (HTTP ${response.status})`, response.status);
            }
            if (!response.ok) {
                throw new ProtocolError(`Unexpected HTTP ${response.status}`);
            }
            return await this.readJson(response, controller.signal);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /** Parse the body, giving up when `signal` aborts even if the stream never ends */
    private readJson(response: Response, signal: AbortSignal): Promise<unknown> {
        return new Promise((resolve, reject) => {
            const onAbort = (): void => reject(this.timedOut());
            if (signal.aborted) {
                onAbort();
                return;
            }
            signal.addEventListener('abort', onAbort, { once: true });
            void response.json().then(
                (value: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(value);
                },
                (err: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(signal.aborted
                        ? this.timedOut()
                        : new ProtocolError(`Response is not JSON: ${describeError(err)}`));
                },
            );
        });
    }

    private timedOut(): NetworkError {
        return new NetworkError(`Request timed out after ${this.options.requestTimeoutMs}ms`);
    }
}

function pick(
    responses: Map<string, [string, Record<string, unknown>]>,
    callId: string,
    expected: string,
): Record<string, unknown> {
    const entry = responses.get(callId);
    if (!entry) throw new ProtocolError(`No response for ${expected}`);
    const [name, args] = entry;
    if (name === 'error') {
        const type = typeof args.type === 'string' ? args.type : 'unknown';
        if (type === 'cannotCalculateChanges') {
            throw new CursorExpiredError(`${expected}: server cannot calculate changes`);
        }
        throw new ProtocolError(`${expected} failed: ${stripCRLF(type)}`);
    }
    if (name !== expected) throw new ProtocolError(`Expected ${expected}, got ${stripCRLF(name)}`);
    return args;
}

function listOf(result: Record<string, unknown>): unknown[] {
    if (!Array.isArray(result.list)) throw new ProtocolError('Email/get: list is not an array');
    return result.list;
}

function stringArray(value: unknown, what: string): string[] {
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new ProtocolError(`${what} is not a string array`);
    }
    return value;
}

function requireString(value: unknown, what: string): string {
    if (typeof value !== 'string') throw new ProtocolError(`${what} is not a string`);
    return value;
}
