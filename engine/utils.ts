/** Strip carriage return, newline, and null bytes so server text can't forge log lines */
export function stripCRLF(s: string): string {
    return s.replace(/[\r\n\0]/g, ' ');
}

/** Resolve after `ms`, driven by the regular timer queue (fake-timer friendly) */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/** Exponential delay: base * 2^attempt, capped */
export function backoffDelay(baseMs: number, attempt: number, capMs: number): number {
    return Math.min(baseMs * Math.pow(2, attempt), capMs);
}

/**
 * Race `promise` against a timer. Resolves true when the promise settled in
 * time, false on timeout. Never rejects.
 */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>(resolve => {
        timeoutId = setTimeout(() => resolve(false), ms);
    });
    try {
        return await Promise.race([
            promise.then(() => true, () => true),
            timedOut,
        ]);
    } finally {
        clearTimeout(timeoutId);
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
