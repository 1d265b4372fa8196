/**
 * Unit Tests for RetryPolicy
 */

import { withRetry, isTransientUpstreamError } from '../../../../src/application/services/RetryPolicy';
import { UpstreamError, ValidationError } from '../../../../src/domain/errors/ConversationErrors';

const transient = () => new UpstreamError('generate', 'Leonardo generate failed (503): busy', 503, true);

describe('RetryPolicy', () => {
    describe('withRetry', () => {
        it('should return result on first successful attempt', async () => {
            const fn = jest.fn().mockResolvedValue('success');

            const result = await withRetry(fn);

            expect(result).toBe('success');
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should retry a transient upstream error and succeed', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(transient())
                .mockResolvedValueOnce('success');

            const result = await withRetry(fn, { initialBackoffMs: 1 });

            expect(result).toBe('success');
            expect(fn).toHaveBeenCalledTimes(2);
        });

        it('should make at most two attempts by default', async () => {
            const fn = jest.fn().mockRejectedValue(transient());

            await expect(withRetry(fn, { initialBackoffMs: 1 })).rejects.toThrow('Leonardo generate failed (503): busy');

            expect(fn).toHaveBeenCalledTimes(2);
        });

        it('should not retry when maxAttempts is 1', async () => {
            const fn = jest.fn().mockRejectedValue(transient());

            await expect(withRetry(fn, { maxAttempts: 1 })).rejects.toBeInstanceOf(UpstreamError);

            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should not retry non-transient errors', async () => {
            const fn = jest.fn().mockRejectedValue(new UpstreamError('enhance', 'unauthorized', 401, false));

            await expect(withRetry(fn, { maxAttempts: 3, initialBackoffMs: 1 })).rejects.toThrow('unauthorized');

            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should call onRetry with growing, capped delays', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(transient())
                .mockRejectedValueOnce(transient())
                .mockRejectedValueOnce(transient())
                .mockResolvedValueOnce('success');
            const onRetry = jest.fn();

            await withRetry(fn, {
                maxAttempts: 4,
                initialBackoffMs: 2,
                backoffMultiplier: 3,
                maxBackoffMs: 10,
                onRetry,
            });

            expect(onRetry.mock.calls.map(([attempt, , delay]) => [attempt, delay])).toEqual([
                [1, 2],
                [2, 6],
                [3, 10],
            ]);
        });

        it('should honour a custom retry predicate', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new Error('flaky'))
                .mockResolvedValueOnce('success');

            const result = await withRetry(fn, { initialBackoffMs: 1, isRetryable: () => true });

            expect(result).toBe('success');
        });
    });

    describe('isTransientUpstreamError', () => {
        it('should accept retryable upstream errors only', () => {
            expect(isTransientUpstreamError(transient())).toBe(true);
            expect(isTransientUpstreamError(new UpstreamError('generate', 'bad request', 400, false))).toBe(false);
            expect(isTransientUpstreamError(new ValidationError('empty'))).toBe(false);
            expect(isTransientUpstreamError(new Error('network'))).toBe(false);
        });
    });
});
