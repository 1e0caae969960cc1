export interface Address {
    email: string;
    name: string | null;
}

export interface MessageFlags {
    read: boolean;
    /** `$flagged` on the server; JMAP has no separate "starred" keyword */
    starred: boolean;
    answered: boolean;
    draft: boolean;
}

export type BodyState = 'header-only' | 'full-body-cached' | 'not-fetched';

export interface MessageBody {
    text: string | null;
    html: string | null;
}

/** Message metadata as the protocol client delivers it */
export interface MessageHeader {
    id: string;
    folderId: string;
    threadId: string;
    from: Address[];
    to: Address[];
    cc: Address[];
    subject: string;
    preview: string;
    /** epoch ms */
    receivedAt: number;
    flags: MessageFlags;
    hasAttachment: boolean;
    size: number;
}

export interface Message extends MessageHeader {
    bodyState: BodyState;
    body: MessageBody | null;
    summary: string | null;
}

export const FOLDER_ROLES = [
    'inbox', 'drafts', 'sent', 'archive', 'junk', 'trash', 'flagged', 'all', 'important', 'subscribed',
] as const;
export type FolderRole = (typeof FOLDER_ROLES)[number];

export function isFolderRole(value: unknown): value is FolderRole {
    return FOLDER_ROLES.some(role => role === value);
}

export interface FolderMeta {
    id: string;
    name: string;
    role: FolderRole | null;
    parentId: string | null;
    sortOrder: number;
    unreadCount: number;
    totalCount: number;
}

export interface Folder extends FolderMeta {
    cursor: string | null;
}

export const ACTION_KINDS = ['archive', 'delete', 'star', 'unstar', 'mark-read', 'mark-unread'] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

export type PendingActionStatus = 'pending' | 'in-flight' | 'failed';

export interface PendingAction {
    id: number;
    messageId: string;
    kind: ActionKind;
    createdAt: number;
    retryCount: number;
    status: PendingActionStatus;
}

export interface FetchResult {
    messages: MessageHeader[];
    /** ids deleted on the server or moved out of the folder */
    removed: string[];
    newCursor: string;
    hasMore: boolean;
    /** true when this page belongs to a full (cursor-less) fetch */
    full: boolean;
}

/** The remote side of the engine. All methods may reject with AuthError, NetworkError or ProtocolError. */
export interface ProtocolClient {
    fetchFolderList(): Promise<FolderMeta[]>;
    fetchMessages(folderId: string, cursor: string | null): Promise<FetchResult>;
    fetchMessageBody(messageId: string): Promise<MessageBody>;
    applyAction(messageId: string, kind: ActionKind): Promise<void>;
    /** Drop any discovered session state after the credential changed */
    resetSession?(): void;
}

export type SyncPhase = 'idle' | 'syncing' | 'failed';

export type SearchScope = { folderId: string } | 'all';

/** Derives a display summary from a message; supplied by the AI collaborator */
export interface SummaryProvider {
    summarize(message: Message, body: MessageBody): Promise<string>;
}
