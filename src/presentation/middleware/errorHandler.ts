import { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';

/**
 * HTTP-facing error carrying the status the webhook should answer with.
 */
export class HttpError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export class NotFoundError extends HttpError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/** Webhook call without the configured secret token. */
export class UnauthorizedError extends HttpError {
    constructor(message: string = 'Unauthorized') {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * Catch-all for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`));
}

/**
 * Builds the final error middleware. Client errors are logged as warnings;
 * anything else is a server fault whose message is withheld in production.
 */
export function createErrorHandler(environment: string): ErrorRequestHandler {
    const exposeInternals = environment !== 'production';

    // Express recognises error middleware by its four parameters
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    return (err: Error, req: Request, res: Response, next: NextFunction): void => {
        const statusCode = err instanceof HttpError ? err.statusCode : 500;
        const route = `${req.method} ${req.path}`;

        if (statusCode < 500) {
            console.warn(`[HTTP] ${statusCode} ${err.name}: ${err.message} (${route})`);
        } else {
            console.error(`[HTTP] ${statusCode} ${err.name} on ${route}:`, err.stack ?? err.message);
        }

        const response: ErrorResponse = err instanceof HttpError
            ? { error: { message: err.message, code: err.name } }
            : {
                error: {
                    message: exposeInternals ? err.message : 'Internal server error',
                    code: 'INTERNAL_ERROR',
                },
            };

        res.status(statusCode).json(response);
    };
}

/**
 * Forwards rejections of an async route to the error middleware.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        fn(req, res, next).catch(next);
    };
}
