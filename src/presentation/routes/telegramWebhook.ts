import { Router, Request, Response, NextFunction } from 'express';
import { ConversationController } from '../../application/ConversationController';
import { ProtocolError } from '../../domain/errors/ConversationErrors';
import { asyncHandler, UnauthorizedError } from '../middleware/errorHandler';
import { parseTelegramUpdate } from '../services/TelegramUpdateParser';
import { InboundEvent } from '../../domain/entities/ConversationEvent';

/**
 * Middleware to validate Telegram webhook secret token.
 */
export function validateTelegramSecret(secretToken: string) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!secretToken) {
            // If no secret is configured, skip validation (dev mode)
            return next();
        }

        const receivedToken = req.headers['x-telegram-bot-api-secret-token'];

        if (receivedToken !== secretToken) {
            console.warn('[Telegram] Invalid webhook secret token received');
            throw new UnauthorizedError('Invalid webhook secret');
        }

        next();
    };
}

/**
 * Creates the Telegram webhook route feeding the conversation controller.
 */
export function createTelegramWebhookRoutes(
    controller: Pick<ConversationController, 'handle'>,
    webhookSecret: string
): Router {
    const router = Router();

    /**
     * POST /telegram-webhook
     *
     * Acknowledges immediately, then processes the update in the background:
     * generations take far longer than Telegram waits before redelivering.
     */
    router.post(
        '/telegram-webhook',
        validateTelegramSecret(webhookSecret),
        asyncHandler(async (req: Request, res: Response) => {
            res.status(200).json({ ok: true });

            const inbound = toInboundEvent(req.body);
            if (!inbound) {
                return;
            }

            controller.handle(inbound).catch((error: unknown) => {
                console.error(`[Telegram] Failed to process update for user ${inbound.userId}:`, error);
            });
        })
    );

    return router;
}

/**
 * Parses the update, logging and dropping anything the bot cannot act on.
 */
function toInboundEvent(body: unknown): InboundEvent | null {
    try {
        return parseTelegramUpdate(body);
    } catch (error) {
        if (error instanceof ProtocolError) {
            console.warn(`[Telegram] Ignoring update: ${error.message}`);
            return null;
        }
        throw error;
    }
}
