/**
 * Methods and Tools
 * @desc    Small helpers shared by the adapter and the player library
 * @license Apache License 2.0
 */
import { parseExpression } from 'cron-parser';
import { networkInterfaces } from 'node:os';

/**
 * Convert error to string
 * @param error - any kind of thrown error
 * @returns string
 */
export function err2Str(error: unknown): string {
    if (error instanceof Error) {
        if (error.stack) return error.stack;
        if (error.message) return error.message;
        return JSON.stringify(error);
    } else {
        if (typeof error === 'string') return error;
        return JSON.stringify(error);
    }
}

/**
 * Remove a scheme prefix like 'http://' from a host string.
 * @param host - e.g. 'http://volumio.local' or 'volumio.local'
 * @returns e.g. 'volumio.local'
 */
export function stripScheme(host: string): string {
    const trimmed = host.trim();
    const idx = trimmed.indexOf('//');
    return idx === -1 ? trimmed : trimmed.slice(idx + 2);
}

/**
 * String form used to store and compare attribute values.
 * true -> 'true', 50 -> '50'; null, undefined and '' are reported as undefined.
 */
export function toAttributeString(value: unknown): string | undefined {
    if (value === null || value === undefined) return undefined;
    const str = typeof value === 'object' ? JSON.stringify(value) : String(value);
    return str === '' ? undefined : str;
}

/**
 * Milliseconds until the next run of a cron rule.
 * @param expression - cron rule, like '0 0 3 * * *'
 * @return timestamp of next run, or -1 if the rule cannot be parsed
 */
export function getNextCronRun(expression: string, from: Date = new Date()): number {
    try {
        const interval = parseExpression(expression, { currentDate: from });
        return interval.next().getTime();
    } catch {
        return -1;
    }
}

/**
 * First non-internal IPv4 address of this host, used as push notification target.
 */
export function getLocalIp(): string {
    const interfaces = networkInterfaces();
    for (const name of Object.keys(interfaces)) {
        for (const alias of interfaces[name] ?? []) {
            if (alias.family === 'IPv4' && !alias.internal) return alias.address;
        }
    }
    return '127.0.0.1';
}
