import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { configureLogPath, logDebug } from './logger.js';

describe('logDebug', () => {
    const dir = path.join(os.tmpdir(), `fastmail-tui-logger-${process.pid}`);

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('appends timestamped lines, creating the directory', () => {
        const file = path.join(dir, 'logs', 'debug.log');
        configureLogPath(file);

        logDebug('[SYNC] one');
        logDebug('[SYNC] two');

        const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[SYNC\] two$/);
    });

    it('never throws when the log cannot be written', () => {
        fs.mkdirSync(dir, { recursive: true });
        const blocker = path.join(dir, 'file');
        fs.writeFileSync(blocker, '');
        configureLogPath(path.join(blocker, 'debug.log'));

        expect(() => logDebug('lost')).not.toThrow();
    });
});
