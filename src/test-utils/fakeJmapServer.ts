import type { JmapEmail, JmapMailbox, JmapMethodResponse } from '../../engine/jmapTypes.js';
import { JMAP_MAIL } from '../../engine/jmapTypes.js';
import { isRecord } from '../../engine/utils.js';

/**
 * In-process stand-in for a Fastmail JMAP endpoint. Hand its `fetch` to
 * vi.stubGlobal('fetch', ...) and drive the mailbox state from the test.
 *
 * Speaks just enough JMAP for the client: session discovery, Mailbox/get,
 * Email/query, Email/get (with #ids back-references), Email/changes and
 * Email/set updates. States are decimal counters.
 */

export const FAKE_HOST = 'jmap.test';
export const FAKE_TOKEN = 'test-secret';
export const FAKE_ACCOUNT = 'acc-1';
const API_URL = `https://${FAKE_HOST}/jmap/api/`;

type Failure =
    | { kind: 'http'; status: number }
    | { kind: 'network' }
    | { kind: 'hang' }
    | { kind: 'stall' }
    | { kind: 'garbage' };

interface ChangeEntry {
    state: number;
    created: string[];
    updated: string[];
    destroyed: string[];
}

export interface EmailSeed {
    id: string;
    mailbox: string;
    subject?: string | null;
    from?: string;
    receivedAt: string;
    keywords?: string[];
    threadId?: string;
    text?: string;
    html?: string;
}

export function mailbox(id: string, name: string, role: string | null, sortOrder = 0): JmapMailbox {
    return { id, name, parentId: null, role, sortOrder, totalEmails: 0, unreadEmails: 0 };
}

export function email(seed: EmailSeed): JmapEmail {
    const bodyValues: Record<string, { value: string }> = {};
    if (seed.text !== undefined) bodyValues.t = { value: seed.text };
    if (seed.html !== undefined) bodyValues.h = { value: seed.html };
    return {
        id: seed.id,
        threadId: seed.threadId ?? `t-${seed.id}`,
        mailboxIds: { [seed.mailbox]: true },
        keywords: Object.fromEntries((seed.keywords ?? []).map(k => [k, true])),
        size: 1024,
        receivedAt: seed.receivedAt,
        from: [{ name: null, email: seed.from ?? 'sender@example.com' }],
        to: [{ name: 'Me', email: 'me@example.com' }],
        cc: null,
        subject: seed.subject === undefined ? `Subject ${seed.id}` : seed.subject,
        preview: seed.text?.slice(0, 50) ?? '',
        hasAttachment: false,
        bodyValues,
        textBody: seed.text !== undefined ? [{ partId: 't', type: 'text/plain' }] : [],
        htmlBody: seed.html !== undefined ? [{ partId: 'h', type: 'text/html' }] : [],
    };
}

export class FakeJmapServer {
    token = FAKE_TOKEN;
    mailboxes: JmapMailbox[] = [];
    emails: Map<string, JmapEmail> = new Map();
    /** method names of every API request, in order */
    calls: string[][] = [];
    sessionRequests = 0;

    private state = 1;
    private log: ChangeEntry[] = [];
    /** Email/changes refuses any sinceState below this */
    private oldestState = 1;
    private failures: Failure[] = [];
    private setRejections: Map<string, string> = new Map();

    readonly fetch = (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
        return this.handle(url, init);
    };

    // ── Test controls ────────────────────────────────────────

    seed(mailboxes: JmapMailbox[], emails: JmapEmail[]): void {
        this.mailboxes = mailboxes;
        for (const e of emails) this.emails.set(e.id, e);
    }

    addEmail(e: JmapEmail): void {
        this.emails.set(e.id, e);
        this.record({ created: [e.id] });
    }

    updateEmail(id: string, change: (e: JmapEmail) => void): void {
        const current = this.emails.get(id);
        if (!current) throw new Error(`no email ${id}`);
        change(current);
        this.record({ updated: [id] });
    }

    destroyEmail(id: string): void {
        this.emails.delete(id);
        this.record({ destroyed: [id] });
    }

    /**
     * Queue failures for the next requests, consumed one per HTTP request.
     * 'hang' never answers; 'stall' sends headers and then a body that never ends.
     */
    failNext(...failures: Array<number | 'network' | 'hang' | 'stall' | 'garbage'>): void {
        for (const f of failures) {
            this.failures.push(typeof f === 'number' ? { kind: 'http', status: f } : { kind: f });
        }
    }

    /** Forget change history so every older state is refused */
    expireChanges(): void {
        this.oldestState = this.state;
    }

    /** Make Email/set refuse updates to `id` with the given SetError type */
    rejectSet(id: string, type: string): void {
        this.setRejections.set(id, type);
    }

    get currentState(): string {
        return String(this.state);
    }

    methodCount(name: string): number {
        return this.calls.flat().filter(n => n === name).length;
    }

    // ── HTTP ─────────────────────────────────────────────────

    private async handle(url: string, init?: RequestInit): Promise<Response> {
        const failure = this.failures.shift();
        if (failure?.kind === 'network') throw new TypeError('fetch failed');
        if (failure?.kind === 'hang') return this.hang(init?.signal ?? null);
        if (failure?.kind === 'http') return json({ type: 'urn:ietf:params:jmap:error:limit' }, failure.status);
        if (failure?.kind === 'stall') {
            return new Response(new ReadableStream({ start() { /* never enqueues */ } }), {
                status: 200,
                headers: { 'Content-Type': 'application/json' },
            });
        }
        if (failure?.kind === 'garbage') return new Response('<html>oops</html>', { status: 200 });

        const headers = new Headers(init?.headers);
        if (headers.get('Authorization') !== `Bearer ${this.token}`) return json({ error: 'unauthorized' }, 401);

        if (url === `https://${FAKE_HOST}/jmap/session`) {
            this.sessionRequests++;
            return json({
                apiUrl: API_URL,
                username: 'me@example.com',
                primaryAccounts: { [JMAP_MAIL]: FAKE_ACCOUNT },
                state: 'session-1',
            });
        }
        if (url !== API_URL || typeof init?.body !== 'string') return json({ error: 'not found' }, 404);

        const request: unknown = JSON.parse(init.body);
        if (!isRecord(request) || !Array.isArray(request.methodCalls)) return json({ error: 'bad request' }, 400);

        const responses: JmapMethodResponse[] = [];
        const names: string[] = [];
        const methodCalls: unknown[] = request.methodCalls;
        for (const call of methodCalls) {
            const parts: unknown[] = Array.isArray(call) ? call : [];
            const [name, args, callId] = parts;
            if (typeof name !== 'string' || !isRecord(args) || typeof callId !== 'string') {
                return json({ error: 'bad method call' }, 400);
            }
            names.push(name);
            responses.push(this.invoke(name, this.resolveRefs(args, responses), callId));
        }
        this.calls.push(names);
        return json({ methodResponses: responses, sessionState: 'session-1' });
    }

    private hang(signal: AbortSignal | null): Promise<Response> {
        return new Promise((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new DOMException('The operation was aborted.', 'AbortError')));
        });
    }

    private resolveRefs(args: Record<string, unknown>, previous: JmapMethodResponse[]): Record<string, unknown> {
        const ref = args['#ids'];
        if (!isRecord(ref)) return args;
        const source = previous.find(([, , id]) => id === ref.resultOf);
        const key = typeof ref.path === 'string' ? ref.path.replace(/^\//, '') : '';
        const rest = { ...args };
        delete rest['#ids'];
        return { ...rest, ids: source ? source[1][key] : [] };
    }

    // ── Methods ──────────────────────────────────────────────

    private invoke(name: string, args: Record<string, unknown>, callId: string): JmapMethodResponse {
        switch (name) {
            case 'Mailbox/get':
                return [name, { accountId: FAKE_ACCOUNT, state: this.currentState, list: this.mailboxList(), notFound: [] }, callId];
            case 'Email/query':
                return [name, this.query(args), callId];
            case 'Email/get':
                return [name, this.get(args), callId];
            case 'Email/changes':
                return this.changes(args, callId);
            case 'Email/set':
                return [name, this.set(args), callId];
            default:
                return ['error', { type: 'unknownMethod' }, callId];
        }
    }

    private mailboxList(): JmapMailbox[] {
        return this.mailboxes.map(mb => {
            const inBox = [...this.emails.values()].filter(e => e.mailboxIds[mb.id]);
            return {
                ...mb,
                totalEmails: inBox.length,
                unreadEmails: inBox.filter(e => !e.keywords.$seen).length,
            };
        });
    }

    private query(args: Record<string, unknown>): Record<string, unknown> {
        const filter = isRecord(args.filter) ? args.filter : {};
        const inMailbox = typeof filter.inMailbox === 'string' ? filter.inMailbox : null;
        const position = typeof args.position === 'number' ? args.position : 0;
        const limit = typeof args.limit === 'number' ? args.limit : 256;
        const matching = [...this.emails.values()]
            .filter(e => inMailbox === null || e.mailboxIds[inMailbox])
            .sort((a, b) => Date.parse(b.receivedAt) - Date.parse(a.receivedAt));
        return {
            accountId: FAKE_ACCOUNT,
            queryState: this.currentState,
            position,
            total: matching.length,
            ids: matching.slice(position, position + limit).map(e => e.id),
        };
    }

    private get(args: Record<string, unknown>): Record<string, unknown> {
        const ids = Array.isArray(args.ids) ? args.ids.filter((v): v is string => typeof v === 'string') : [];
        const list: JmapEmail[] = [];
        const notFound: string[] = [];
        for (const id of ids) {
            const found = this.emails.get(id);
            if (found) list.push(structuredClone(found));
            else notFound.push(id);
        }
        return { accountId: FAKE_ACCOUNT, state: this.currentState, list, notFound };
    }

    private changes(args: Record<string, unknown>, callId: string): JmapMethodResponse {
        const since = typeof args.sinceState === 'string' ? Number(args.sinceState) : NaN;
        if (!Number.isInteger(since) || since < this.oldestState || since > this.state) {
            return ['error', { type: 'cannotCalculateChanges' }, callId];
        }
        const maxChanges = typeof args.maxChanges === 'number' ? args.maxChanges : Infinity;

        const created = new Set<string>();
        const updated = new Set<string>();
        const destroyed = new Set<string>();
        let newState = since;
        const pending = this.log.filter(entry => entry.state > since);
        for (const entry of pending) {
            if (created.size + updated.size + destroyed.size >= maxChanges) break;
            for (const id of entry.created) created.add(id);
            for (const id of entry.updated) if (!created.has(id)) updated.add(id);
            for (const id of entry.destroyed) {
                if (created.delete(id)) continue;
                updated.delete(id);
                destroyed.add(id);
            }
            newState = entry.state;
        }
        return ['Email/changes', {
            accountId: FAKE_ACCOUNT,
            oldState: String(since),
            newState: String(newState),
            hasMoreChanges: newState < this.state,
            created: [...created],
            updated: [...updated],
            destroyed: [...destroyed],
        }, callId];
    }

    private set(args: Record<string, unknown>): Record<string, unknown> {
        const oldState = this.currentState;
        const update = isRecord(args.update) ? args.update : {};
        const updated: Record<string, null> = {};
        const notUpdated: Record<string, { type: string }> = {};
        for (const [id, patch] of Object.entries(update)) {
            const target = this.emails.get(id);
            const rejection = this.setRejections.get(id);
            if (rejection) {
                notUpdated[id] = { type: rejection };
                continue;
            }
            if (!target || !isRecord(patch)) {
                notUpdated[id] = { type: 'notFound' };
                continue;
            }
            for (const [path, value] of Object.entries(patch)) {
                if (path === 'mailboxIds' && isRecord(value)) {
                    target.mailboxIds = Object.fromEntries(Object.keys(value).map(k => [k, true]));
                } else if (path.startsWith('keywords/')) {
                    const keyword = path.slice('keywords/'.length);
                    if (value === true) target.keywords[keyword] = true;
                    else delete target.keywords[keyword];
                }
            }
            updated[id] = null;
            this.record({ updated: [id] });
        }
        return { accountId: FAKE_ACCOUNT, oldState, newState: this.currentState, updated, notUpdated };
    }

    private record(change: Partial<Omit<ChangeEntry, 'state'>>): void {
        this.state++;
        this.log.push({
            state: this.state,
            created: change.created ?? [],
            updated: change.updated ?? [],
            destroyed: change.destroyed ?? [],
        });
    }
}

function json(body: unknown, status = 200): Promise<Response> {
    return Promise.resolve(new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    }));
}
