import { describe, it, expect } from 'vitest';
import { SessionContext } from './session.js';
import { ConfigError } from './errors.js';

describe('SessionContext', () => {
    it('rejects empty or malformed tokens', () => {
        expect(() => new SessionContext('jmap.test', '')).toThrow(ConfigError);
        expect(() => new SessionContext('jmap.test', 'test secret')).toThrow(ConfigError);
        expect(() => new SessionContext('jmap.test', 'test-secret\r\n')).toThrow(ConfigError);
    });

    it('reports a bad token under the config error code', () => {
        try {
            new SessionContext('jmap.test', '');
            expect.unreachable('constructor should have thrown');
        } catch (err) {
            expect(err instanceof ConfigError && err.code).toBe('CONFIG');
            expect(err instanceof ConfigError && err.key).toBe('token');
        }
    });

    it('swaps the credential only through replaceCredential', () => {
        const session = new SessionContext('jmap.test', 'test-secret');
        session.replaceCredential('test-secret-2');

        expect(session.credential).toBe('test-secret-2');
        expect(() => session.replaceCredential('')).toThrow(ConfigError);
        expect(session.credential).toBe('test-secret-2');
    });

    it('tracks the active folder', () => {
        const session = new SessionContext('jmap.test', 'test-secret');
        expect(session.activeFolderId).toBeNull();

        session.setActiveFolder('inbox');
        expect(session.activeFolderId).toBe('inbox');
    });

    it.each([
        ['jmap.test', 'https://jmap.test'],
        ['jmap.test/', 'https://jmap.test'],
        ['http://localhost:8080', 'http://localhost:8080'],
        ['HTTPS://jmap.test//', 'HTTPS://jmap.test'],
    ])('derives the base url from %s', (host, expected) => {
        expect(new SessionContext(host, 'test-secret').baseUrl).toBe(expected);
    });
});
