// Wire shapes for the subset of JMAP (RFC 8620 core, RFC 8621 mail) the client speaks.

export const JMAP_CORE = 'urn:ietf:params:jmap:core';
export const JMAP_MAIL = 'urn:ietf:params:jmap:mail';

export interface JmapSession {
    apiUrl: string;
    username: string;
    primaryAccounts: Record<string, string>;
    state: string;
}

export interface ResultReference {
    resultOf: string;
    name: string;
    path: string;
}

export type JmapMethodCall = [string, Record<string, unknown>, string];

export interface JmapRequest {
    using: string[];
    methodCalls: JmapMethodCall[];
}

export type JmapMethodResponse = [string, Record<string, unknown>, string];

export interface JmapAddress {
    name: string | null;
    email: string;
}

export interface JmapEmailBodyPart {
    partId: string | null;
    type: string;
}

export interface JmapEmailBodyValue {
    value: string;
    isTruncated?: boolean;
}

export interface JmapEmail {
    id: string;
    threadId: string;
    mailboxIds: Record<string, boolean>;
    keywords: Record<string, boolean>;
    size: number;
    receivedAt: string;
    from: JmapAddress[] | null;
    to: JmapAddress[] | null;
    cc: JmapAddress[] | null;
    subject: string | null;
    preview: string;
    hasAttachment: boolean;
    bodyValues?: Record<string, JmapEmailBodyValue>;
    textBody?: JmapEmailBodyPart[];
    htmlBody?: JmapEmailBodyPart[];
}

export interface JmapMailbox {
    id: string;
    name: string;
    parentId: string | null;
    role: string | null;
    sortOrder: number;
    totalEmails: number;
    unreadEmails: number;
}

export const EMAIL_HEADER_PROPERTIES = [
    'id',
    'threadId',
    'mailboxIds',
    'keywords',
    'size',
    'receivedAt',
    'from',
    'to',
    'cc',
    'subject',
    'preview',
    'hasAttachment',
] as const;

export const MAILBOX_PROPERTIES = [
    'id',
    'name',
    'parentId',
    'role',
    'sortOrder',
    'totalEmails',
    'unreadEmails',
] as const;
