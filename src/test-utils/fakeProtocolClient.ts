import { vi } from 'vitest';
import type { FetchResult, FolderMeta, MessageBody, MessageHeader } from '../../engine/types.js';

/**
 * A ProtocolClient whose methods are vi.fn() mocks with harmless defaults,
 * for exercising the coordinator and dispatcher without any JMAP.
 *
 * Usage in tests:
 *   const client = createFakeClient();
 *   client.fetchMessages.mockResolvedValueOnce(page([header('m1', 'inbox', 3)], 'delta:2'));
 */
export function createFakeClient(folders: FolderMeta[] = defaultFolders()) {
    return {
        fetchFolderList: vi.fn(async (): Promise<FolderMeta[]> => folders.map(f => ({ ...f }))),
        fetchMessages: vi.fn(async (_folderId: string, _cursor: string | null): Promise<FetchResult> =>
            page([], 'delta:1')),
        fetchMessageBody: vi.fn(async (messageId: string): Promise<MessageBody> =>
            ({ text: `body of ${messageId}`, html: null })),
        applyAction: vi.fn(async (_messageId: string, _kind: string): Promise<void> => undefined),
        resetSession: vi.fn(),
    };
}

export type FakeClient = ReturnType<typeof createFakeClient>;

export function folderMeta(id: string, role: FolderMeta['role'], name = id): FolderMeta {
    return { id, name, role, parentId: null, sortOrder: 0, unreadCount: 0, totalCount: 0 };
}

export function defaultFolders(): FolderMeta[] {
    return [
        folderMeta('inbox', 'inbox', 'Inbox'),
        folderMeta('archive', 'archive', 'Archive'),
        folderMeta('trash', 'trash', 'Trash'),
        folderMeta('work', null, 'Work'),
    ];
}

/** A header received `minutesAgo` minutes before a fixed reference time */
export function header(id: string, folderId: string, minutesAgo: number, overrides: Partial<MessageHeader> = {}): MessageHeader {
    return {
        id,
        folderId,
        threadId: `t-${id}`,
        from: [{ email: 'sender@example.com', name: 'Sender' }],
        to: [{ email: 'me@example.com', name: null }],
        cc: [],
        subject: `Subject ${id}`,
        preview: '',
        receivedAt: Date.UTC(2026, 0, 1, 12, 0) - minutesAgo * 60_000,
        flags: { read: false, starred: false, answered: false, draft: false },
        hasAttachment: false,
        size: 100,
        ...overrides,
    };
}

export function page(
    messages: MessageHeader[],
    newCursor: string,
    extra: Partial<Omit<FetchResult, 'messages' | 'newCursor'>> = {},
): FetchResult {
    return { messages, removed: [], newCursor, hasMore: false, full: true, ...extra };
}
