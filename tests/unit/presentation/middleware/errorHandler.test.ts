import express, { Application, Request, Response } from 'express';
import request from 'supertest';
import {
    asyncHandler,
    createErrorHandler,
    HttpError,
    notFoundHandler,
    NotFoundError,
    UnauthorizedError,
} from '../../../../src/presentation/middleware/errorHandler';
import { createTelegramWebhookRoutes } from '../../../../src/presentation/routes/telegramWebhook';

/**
 * Webhook router plus a route whose handler rejects, wired the way createApp wires them.
 */
function buildApp(environment: string, failure: Error = new Error('Session store exploded')): Application {
    const app = express();
    app.use(express.json());
    app.use(createTelegramWebhookRoutes({ handle: jest.fn().mockResolvedValue(undefined) }, 'test-secret'));
    app.post('/broken', asyncHandler(async (_req: Request, _res: Response) => {
        throw failure;
    }));
    app.use(notFoundHandler);
    app.use(createErrorHandler(environment));
    return app;
}

describe('Error Handling Middleware', () => {
    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('HttpError classes', () => {
        test('NotFoundError should default to 404', () => {
            const err = new NotFoundError();
            expect(err).toBeInstanceOf(HttpError);
            expect(err.statusCode).toBe(404);
            expect(err.message).toBe('Resource not found');
        });

        test('UnauthorizedError should default to 401', () => {
            const err = new UnauthorizedError();
            expect(err.statusCode).toBe(401);
            expect(err.name).toBe('UnauthorizedError');
        });
    });

    describe('client errors', () => {
        test('should answer a bad webhook secret with 401 and log a warning', async () => {
            const response = await request(buildApp('production'))
                .post('/telegram-webhook')
                .set('X-Telegram-Bot-Api-Secret-Token', 'wrong-secret')
                .send({ update_id: 1 });

            expect(response.status).toBe(401);
            expect(response.body).toEqual({
                error: { message: 'Invalid webhook secret', code: 'UnauthorizedError' },
            });
            expect(console.warn).toHaveBeenLastCalledWith(
                '[HTTP] 401 UnauthorizedError: Invalid webhook secret (POST /telegram-webhook)'
            );
            expect(console.error).not.toHaveBeenCalled();
        });

        test('should answer unknown routes with 404 naming the route', async () => {
            const response = await request(buildApp('production')).get('/missing');

            expect(response.status).toBe(404);
            expect(response.body).toEqual({
                error: { message: 'No route for GET /missing', code: 'NotFoundError' },
            });
            expect(console.warn).toHaveBeenCalledWith(
                '[HTTP] 404 NotFoundError: No route for GET /missing (GET /missing)'
            );
        });

        test('should keep the message of an HttpError thrown by a route in production', async () => {
            const response = await request(buildApp('production', new HttpError(409, 'Update already processed')))
                .post('/broken');

            expect(response.status).toBe(409);
            expect(response.body).toEqual({
                error: { message: 'Update already processed', code: 'HttpError' },
            });
        });
    });

    describe('server errors', () => {
        test('should hide internal details when the environment is production', async () => {
            const response = await request(buildApp('production')).post('/broken');

            expect(response.status).toBe(500);
            expect(response.body).toEqual({
                error: { message: 'Internal server error', code: 'INTERNAL_ERROR' },
            });
            expect(console.error).toHaveBeenCalledWith(
                '[HTTP] 500 Error on POST /broken:',
                expect.stringContaining('Session store exploded')
            );
        });

        test('should show error details outside production', async () => {
            const response = await request(buildApp('development')).post('/broken');

            expect(response.status).toBe(500);
            expect(response.body).toEqual({
                error: { message: 'Session store exploded', code: 'INTERNAL_ERROR' },
            });
        });

        test('should follow the configured environment rather than NODE_ENV', async () => {
            const originalEnv = process.env.NODE_ENV;
            process.env.NODE_ENV = 'production';
            try {
                const response = await request(buildApp('staging')).post('/broken');
                expect(response.body.error.message).toBe('Session store exploded');
            } finally {
                process.env.NODE_ENV = originalEnv;
            }
        });
    });

    describe('asyncHandler', () => {
        test('should not call next on success', async () => {
            const next = jest.fn();
            const handler = jest.fn().mockResolvedValue(undefined);

            asyncHandler(handler)({} as Request, {} as Response, next);
            await new Promise(resolve => setImmediate(resolve));

            expect(handler).toHaveBeenCalledTimes(1);
            expect(next).not.toHaveBeenCalled();
        });
    });
});
