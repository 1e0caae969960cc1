import { ConfigError } from './errors.js';

/**
 * Explicit session context handed to every component constructor.
 * Holds the bearer token and the folder the UI is looking at; there is
 * no module-level session state anywhere in the engine.
 */
export class SessionContext {
    readonly host: string;
    private token: string;
    private activeFolder: string | null = null;

    constructor(host: string, token: string) {
        this.host = host;
        this.token = SessionContext.checkToken(token);
    }

    private static checkToken(token: string): string {
        if (!token || typeof token !== 'string' || token.length > 4096 || /[\r\n\s]/.test(token)) {
            throw new ConfigError('token', 'expected a non-empty API token without whitespace');
        }
        return token;
    }

    get credential(): string {
        return this.token;
    }

    /** Only the re-authentication flow may call this; normal operation treats the token as read-only. */
    replaceCredential(token: string): void {
        this.token = SessionContext.checkToken(token);
    }

    get activeFolderId(): string | null {
        return this.activeFolder;
    }

    setActiveFolder(folderId: string | null): void {
        this.activeFolder = folderId;
    }

    /** Base URL for session discovery; a bare host means https */
    get baseUrl(): string {
        const trimmed = this.host.replace(/\/+$/, '');
        return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
    }
}
