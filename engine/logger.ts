import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

let debugLogPath: string | null = null;

function getLogPath(): string {
    if (!debugLogPath) {
        debugLogPath = path.join(os.homedir(), '.cache', 'fastmail-tui', 'debug.log');
    }
    return debugLogPath;
}

/** Point the debug log somewhere else (the cache directory from config, a temp dir in tests). */
export function configureLogPath(logPath: string): void {
    debugLogPath = logPath;
}

export function logDebug(message: string): void {
    try {
        const logPath = getLogPath();
        fs.mkdirSync(path.dirname(logPath), { recursive: true });
        const timestamp = new Date().toISOString();
        fs.appendFileSync(logPath, `[${timestamp}] ${message}\n`);
    } catch {
        // Ignore if we can't write to log directory
    }
}
