import { createStore } from 'zustand/vanilla'
import type { ActionKind, SyncPhase } from '../../engine/types.js'

export interface FolderStatus {
    phase: SyncPhase
    /** log-safe text of the last failure, cleared on success */
    error: string | null
    consecutiveFailures: number
    lastSyncedAt: number | null
    /** epoch ms before which no automatic sync runs */
    nextAttemptAt: number | null
}

export interface Notification {
    id: number
    kind: 'action-failed' | 'auth-required'
    text: string
    messageId: string | null
    action: ActionKind | null
    createdAt: number
}

export interface StatusState {
    folders: Record<string, FolderStatus>
    notifications: Notification[]
    authRequired: boolean

    setFolderStatus: (folderId: string, patch: Partial<FolderStatus>) => void
    pushNotification: (n: Omit<Notification, 'id' | 'createdAt'>) => Notification
    dismissNotification: (id: number) => void
    setAuthRequired: (required: boolean) => void
}

const IDLE: FolderStatus = {
    phase: 'idle',
    error: null,
    consecutiveFailures: 0,
    lastSyncedAt: null,
    nextAttemptAt: null,
}

/**
 * UI-facing status: per-folder sync indicator, dismissible notifications and
 * the auth-required flag. One store per engine instance, never a singleton.
 */
export function createStatusStore() {
    let nextId = 1
    return createStore<StatusState>()((set) => ({
        folders: {},
        notifications: [],
        authRequired: false,

        setFolderStatus: (folderId, patch) => set((state) => ({
            folders: {
                ...state.folders,
                [folderId]: { ...(state.folders[folderId] ?? IDLE), ...patch },
            },
        })),
        pushNotification: (n) => {
            const notification: Notification = { ...n, id: nextId++, createdAt: Date.now() }
            set((state) => ({ notifications: [...state.notifications, notification] }))
            return notification
        },
        dismissNotification: (id) => set((state) => ({
            notifications: state.notifications.filter(n => n.id !== id),
        })),
        setAuthRequired: (authRequired) => set({ authRequired }),
    }))
}

export type StatusStore = ReturnType<typeof createStatusStore>

export function folderStatus(store: StatusStore, folderId: string): FolderStatus {
    return store.getState().folders[folderId] ?? IDLE
}
