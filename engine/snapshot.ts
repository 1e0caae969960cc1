import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { logDebug } from './logger.js';
import { describeError } from './errors.js';
import { isFolderRole } from './types.js';
import { isRecord } from './utils.js';
import type { CacheSnapshot } from './cacheStore.js';
import type { Address, MessageHeader } from './types.js';

interface FolderRow {
    id: string;
    name: string;
    role: string | null;
    parent_id: string | null;
    sort_order: number;
    unread_count: number;
    total_count: number;
    cursor: string | null;
    position: number;
}

interface MessageRow {
    id: string;
    folder_id: string;
    position: number;
    header_json: string;
}

function setupSchema(db: DatabaseType): void {
    db.exec(`
    CREATE TABLE IF NOT EXISTS folders (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      role TEXT,
      parent_id TEXT,
      sort_order INTEGER NOT NULL DEFAULT 0,
      unread_count INTEGER NOT NULL DEFAULT 0,
      total_count INTEGER NOT NULL DEFAULT 0,
      cursor TEXT,
      position INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS messages (
      id TEXT PRIMARY KEY,
      folder_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      header_json TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_messages_folder ON messages(folder_id, position);
  `);
}

function isAddressList(value: unknown): value is Address[] {
    return Array.isArray(value) && value.every(a =>
        isRecord(a) && typeof a.email === 'string' && (a.name === null || typeof a.name === 'string'));
}

/** Rebuild a header from stored JSON; anything that doesn't look right is skipped. */
function parseStoredHeader(json: string, folderId: string): MessageHeader | null {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch {
        return null;
    }
    if (!isRecord(raw)) return null;
    const { id, threadId, subject, preview, receivedAt, hasAttachment, size, from, to, cc, flags } = raw;
    if (!isRecord(flags)) return null;
    if (typeof id !== 'string' || typeof threadId !== 'string' || typeof subject !== 'string') return null;
    if (typeof preview !== 'string' || typeof receivedAt !== 'number' || typeof size !== 'number') return null;
    if (!isAddressList(from) || !isAddressList(to) || !isAddressList(cc)) return null;
    return {
        id,
        folderId,
        threadId,
        from,
        to,
        cc,
        subject,
        preview,
        receivedAt,
        flags: {
            read: flags.read === true,
            starred: flags.starred === true,
            answered: flags.answered === true,
            draft: flags.draft === true,
        },
        hasAttachment: hasAttachment === true,
        size,
    };
}

/**
 * Optional on-disk copy of folder metadata, headers and sync cursors, so a
 * restart can show mail before the first sync lands. Bodies and summaries
 * are never written. The file is private to the user.
 *
 * A loaded cursor is only a starting hint: the first sync of each folder
 * validates it with the server and falls back to a full resync if the
 * server no longer accepts it.
 */
export class SnapshotStore {
    private db: DatabaseType;

    constructor(readonly filePath: string) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });
        this.db = new Database(filePath);
        fs.chmodSync(filePath, 0o600);
        setupSchema(this.db);
    }

    save(data: CacheSnapshot): void {
        const insertFolder = this.db.prepare(
            'INSERT INTO folders (id, name, role, parent_id, sort_order, unread_count, total_count, cursor, position) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)'
        );
        const insertMessage = this.db.prepare(
            'INSERT OR IGNORE INTO messages (id, folder_id, position, header_json) VALUES (?, ?, ?, ?)'
        );
        const headers = new Map(data.messages.map(m => [m.id, m]));
        let written = 0;

        this.db.transaction(() => {
            this.db.prepare('DELETE FROM messages').run();
            this.db.prepare('DELETE FROM folders').run();
            data.folders.forEach((folder, folderPos) => {
                insertFolder.run(
                    folder.id, folder.name, folder.role, folder.parentId, folder.sortOrder,
                    folder.unreadCount, folder.totalCount, folder.cursor, folderPos,
                );
                folder.index.forEach((id, pos) => {
                    const header = headers.get(id);
                    if (!header) return;
                    // folder membership lives in folder_id
                    const stored = JSON.stringify({ ...header, folderId: undefined });
                    written += insertMessage.run(id, folder.id, pos, stored).changes;
                });
            });
        })();
        logDebug(`[SNAPSHOT] Saved ${data.folders.length} folders, ${written} headers to ${this.filePath}`);
    }

    /** Returns null when the file holds nothing usable. */
    load(): CacheSnapshot | null {
        try {
            const folderRows = this.db.prepare<[], FolderRow>(
                'SELECT id, name, role, parent_id, sort_order, unread_count, total_count, cursor, position FROM folders ORDER BY position'
            ).all();
            if (folderRows.length === 0) return null;
            const messageRows = this.db.prepare<[], MessageRow>(
                'SELECT id, folder_id, position, header_json FROM messages ORDER BY folder_id, position'
            ).all();

            const messages: MessageHeader[] = [];
            const indexes: Map<string, string[]> = new Map();
            let skipped = 0;
            for (const row of messageRows) {
                const header = parseStoredHeader(row.header_json, row.folder_id);
                if (!header || header.id !== row.id) {
                    skipped++;
                    continue;
                }
                messages.push(header);
                const index = indexes.get(row.folder_id) ?? [];
                index.push(row.id);
                indexes.set(row.folder_id, index);
            }
            if (skipped > 0) logDebug(`[SNAPSHOT] Skipped ${skipped} unreadable header(s)`);

            return {
                folders: folderRows.map(row => ({
                    id: row.id,
                    name: row.name,
                    role: isFolderRole(row.role) ? row.role : null,
                    parentId: row.parent_id,
                    sortOrder: row.sort_order,
                    unreadCount: row.unread_count,
                    totalCount: row.total_count,
                    cursor: row.cursor,
                    index: indexes.get(row.id) ?? [],
                })),
                messages,
            };
        } catch (err) {
            logDebug(`[SNAPSHOT] Load failed, starting empty: ${describeError(err)}`);
            return null;
        }
    }

    close(): void {
        this.db.close();
    }
}
