import axios from 'axios';

/**
 * Narrowing helpers for untyped JSON response bodies.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follows a path of object keys and returns the value there, or undefined.
 */
export function readPath(value: unknown, ...keys: string[]): unknown {
    let current: unknown = value;
    for (const key of keys) {
        if (!isRecord(current)) {
            return undefined;
        }
        current = current[key];
    }
    return current;
}

export function readString(value: unknown, ...keys: string[]): string | undefined {
    const found = readPath(value, ...keys);
    return typeof found === 'string' && found.length > 0 ? found : undefined;
}

/**
 * Best-effort error text from an HTTP error body, falling back to the axios message.
 */
export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const body: unknown = error.response?.data;
        return readString(body, 'error')
            ?? readString(body, 'error', 'message')
            ?? readString(body, 'description')
            ?? readString(body, 'message')
            ?? error.message;
    }
    return error instanceof Error ? error.message : 'Unknown error';
}
