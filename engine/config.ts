import { ConfigError } from './errors.js';
import { isRecord } from './utils.js';

/**
 * Resolved engine configuration. Built from the plain object the
 * config-file collaborator hands over (snake_case keys, seconds).
 */
export interface CoreConfig {
    host: string;
    maxMessages: number;
    refreshIntervalMs: number;
    pageSize: number;
    syncWindow: number;
    maxRetries: number;
    maxBackoffMs: number;
    requestTimeoutMs: number;
    shutdownTimeoutMs: number;
    snapshotPath: string | null;
}

export const DEFAULT_HOST = 'api.fastmail.com';

const DEFAULTS = {
    max_messages: 500,
    refresh_interval: 30,
    page_size: 50,
    sync_window: 500,
    max_retries: 3,
    max_backoff: 300,
    request_timeout: 30,
    shutdown_timeout: 10,
};

type IntegerKey = keyof typeof DEFAULTS;

// Upper bounds keep a typo (e.g. minutes entered as ms) from wedging the client
const LIMITS: Record<IntegerKey, [number, number]> = {
    max_messages: [1, 100_000],
    refresh_interval: [5, 86_400],
    page_size: [1, 1_000],
    sync_window: [1, 100_000],
    max_retries: [1, 20],
    max_backoff: [1, 86_400],
    request_timeout: [1, 600],
    shutdown_timeout: [0, 600],
};

function readInteger(raw: Record<string, unknown>, key: IntegerKey): number {
    const value = raw[key];
    if (value === undefined || value === null) return DEFAULTS[key];
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new ConfigError(key, 'expected an integer');
    }
    const [min, max] = LIMITS[key];
    if (value < min || value > max) {
        throw new ConfigError(key, `must be between ${min} and ${max}`);
    }
    return value;
}

function readOptionalString(raw: Record<string, unknown>, key: string): string | null {
    const value = raw[key];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigError(key, 'expected a non-empty string');
    }
    return value.trim();
}

export function resolveConfig(input: unknown = {}): Readonly<CoreConfig> {
    if (!isRecord(input)) {
        throw new ConfigError('(root)', 'expected an object');
    }

    const host = readOptionalString(input, 'host') ?? DEFAULT_HOST;
    if (/\s/.test(host)) throw new ConfigError('host', 'must not contain whitespace');

    const pageSize = readInteger(input, 'page_size');
    const syncWindow = readInteger(input, 'sync_window');
    if (syncWindow < pageSize) {
        throw new ConfigError('sync_window', 'must be at least page_size');
    }

    return Object.freeze({
        host,
        maxMessages: readInteger(input, 'max_messages'),
        refreshIntervalMs: readInteger(input, 'refresh_interval') * 1000,
        pageSize,
        syncWindow,
        maxRetries: readInteger(input, 'max_retries'),
        maxBackoffMs: readInteger(input, 'max_backoff') * 1000,
        requestTimeoutMs: readInteger(input, 'request_timeout') * 1000,
        shutdownTimeoutMs: readInteger(input, 'shutdown_timeout') * 1000,
        snapshotPath: readOptionalString(input, 'snapshot_path'),
    });
}
