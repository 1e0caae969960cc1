export { MailCore } from './mailCore.js';
export type { MailCoreDeps } from './mailCore.js';
export { resolveConfig, DEFAULT_HOST } from './config.js';
export type { CoreConfig } from './config.js';
export { SessionContext } from './session.js';
export { JmapClient } from './jmapClient.js';
export { CacheStore } from './cacheStore.js';
export { ChangeFeed, ChangeSubscription } from './changeFeed.js';
export type { ChangeEvent, ChangeEventType } from './changeFeed.js';
export { SnapshotStore } from './snapshot.js';
export type { SyncOutcome } from './syncCoordinator.js';
export { configureLogPath } from './logger.js';
export * from './errors.js';
export * from './types.js';
export { createStatusStore, folderStatus } from '../src/stores/statusStore.js';
export type { StatusStore, StatusState, FolderStatus, Notification } from '../src/stores/statusStore.js';
