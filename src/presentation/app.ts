import express, { Application, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { Config } from '../config';
import { ConversationController } from '../application/ConversationController';
import { ConversationMachine, DEFAULT_REFERENCE_TYPES } from '../domain/services/ConversationMachine';
import { ISessionStore } from '../domain/ports/ISessionStore';
import { InMemorySessionStore } from '../infrastructure/sessions/InMemorySessionStore';
import { LeonardoGenerationClient } from '../infrastructure/leonardo/LeonardoGenerationClient';
import { TelegramChatTransport } from '../infrastructure/telegram/TelegramChatTransport';
import { createTelegramWebhookRoutes } from './routes/telegramWebhook';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppDependencies {
    controller: Pick<ConversationController, 'handle'>;
    sessionStore: Pick<ISessionStore, 'size'>;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
            sessions: deps.sessionStore.size(),
        });
    });

    // Routes
    app.use(createTelegramWebhookRoutes(deps.controller, config.telegramWebhookSecret));

    app.use(notFoundHandler);
    // Error handler (must be last)
    app.use(createErrorHandler(config.environment));

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): {
    controller: ConversationController;
    sessionStore: InMemorySessionStore;
} {
    const newCycleId = (): string => uuidv4();

    const machine = new ConversationMachine({
        maxPromptLength: config.maxPromptLength,
        maxReferenceBytes: config.maxReferenceImageBytes,
        allowedReferenceTypes: DEFAULT_REFERENCE_TYPES,
        newCycleId,
    });

    const sessionStore = new InMemorySessionStore(config.sessionTtlSeconds);

    const generationClient = new LeonardoGenerationClient(config.leonardoApiKey, {
        baseUrl: config.leonardoBaseUrl,
        modelId: config.leonardoModelId,
        referenceModelId: config.leonardoReferenceModelId,
        width: config.imageWidth,
        height: config.imageHeight,
        timeoutMs: config.upstreamTimeoutMs,
        pollIntervalMs: config.generationPollIntervalMs,
        maxPolls: config.generationMaxPolls,
        maxReferenceBytes: config.maxReferenceImageBytes,
    });

    const transport = new TelegramChatTransport(
        config.telegramBotToken,
        config.telegramApiBaseUrl,
        config.upstreamTimeoutMs
    );

    const controller = new ConversationController({
        machine,
        sessionStore,
        generationClient,
        transport,
        newCycleId,
        upstreamMaxRetries: config.upstreamMaxRetries,
        retryBackoffMs: config.retryBackoffMs,
    });

    return { controller, sessionStore };
}
