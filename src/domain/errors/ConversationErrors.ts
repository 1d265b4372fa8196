/**
 * Malformed user input: empty or over-long prompt, bad reference image.
 * Handled in place with a re-prompt; never changes state.
 */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export type UpstreamOperation = 'enhance' | 'generate' | 'upload' | 'download';

/**
 * An enhancement or generation call failed (network, timeout, non-success status).
 */
export class UpstreamError extends Error {
    constructor(
        public readonly operation: UpstreamOperation,
        message: string,
        public readonly status?: number,
        public readonly retryable: boolean = false
    ) {
        super(message);
        this.name = 'UpstreamError';
    }
}

/**
 * The chat transport delivered something that is not a usable event.
 * Logged and ignored.
 */
export class ProtocolError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ProtocolError';
    }
}

/**
 * Retry on missing response (network error or timeout), 429, and 5xx.
 */
export function isRetryableStatus(status: number | undefined): boolean {
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}
