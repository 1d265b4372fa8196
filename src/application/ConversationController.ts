import {
    ChoiceOrigin,
    ConversationEffect,
    ConversationEvent,
    InboundEvent,
    UpstreamEvent,
} from '../domain/entities/ConversationEvent';
import { ConversationSession, ReferenceImage, createConversationSession } from '../domain/entities/ConversationSession';
import { UpstreamError, ValidationError } from '../domain/errors/ConversationErrors';
import { IChatTransport } from '../domain/ports/IChatTransport';
import { IGenerationClient, ReferenceImagePayload } from '../domain/ports/IGenerationClient';
import { ISessionStore } from '../domain/ports/ISessionStore';
import { ConversationMachine } from '../domain/services/ConversationMachine';
import { MESSAGES } from '../domain/services/ConversationMessages';
import { withRetry } from './services/RetryPolicy';

export interface ConversationControllerDependencies {
    machine: ConversationMachine;
    sessionStore: ISessionStore;
    generationClient: IGenerationClient;
    transport: IChatTransport;
    newCycleId: () => string;
    /** Automatic retries of a transient upstream failure (default: 1) */
    upstreamMaxRetries?: number;
    /** Delay before an automatic retry in milliseconds (default: 1000) */
    retryBackoffMs?: number;
}

type UpstreamEffect = Extract<ConversationEffect, { type: 'enhance' | 'generate' }>;

/**
 * Drives each user's session through the conversation machine.
 *
 * One event per user is processed at a time. While a user's event is in flight
 * (typically an upstream call), further events from that user are answered with a
 * "please wait" notice. Cancel is the exception: it resets the session at once and
 * releases the user, so the next event starts a new cycle while the abandoned call
 * finishes in the background; its result is discarded because its cycle id no
 * longer matches. Different users never wait on each other.
 */
export class ConversationController {
    private readonly deps: ConversationControllerDependencies;
    /** User id -> token of the handle() call currently holding that user */
    private readonly inFlight = new Map<string, symbol>();

    constructor(deps: ConversationControllerDependencies) {
        this.deps = deps;
    }

    async handle(inbound: InboundEvent): Promise<void> {
        const { userId, chatId, event, origin } = inbound;

        if (origin) {
            await this.acknowledge(chatId, origin);
        }

        if (this.inFlight.has(userId)) {
            if (event.kind === 'cancel') {
                console.log(`[Conversation] Cancel from user ${userId} during an in-flight request`);
                this.inFlight.delete(userId);
                await this.process(userId, chatId, event);
            } else {
                await this.send(chatId, { type: 'reply', text: MESSAGES.pleaseWait });
            }
            return;
        }

        const token = Symbol(userId);
        this.inFlight.set(userId, token);
        try {
            await this.process(userId, chatId, event);
        } finally {
            // A cancel may have released the user and a newer call may hold it now.
            if (this.inFlight.get(userId) === token) {
                this.inFlight.delete(userId);
            }
        }
    }

    /**
     * True while an event of this user is being processed.
     */
    isBusy(userId: string): boolean {
        return this.inFlight.has(userId);
    }

    private async process(userId: string, chatId: string, first: ConversationEvent): Promise<void> {
        let pending: ConversationEvent | null = first;

        while (pending) {
            const { session, effects } = await this.apply(userId, chatId, pending);
            pending = null;

            for (const effect of effects) {
                if (effect.type === 'enhance' || effect.type === 'generate') {
                    // Re-read on completion: a cancel may have replaced the session meanwhile.
                    pending = await this.callUpstream(session, effect);
                } else {
                    await this.send(chatId, effect);
                }
            }
        }
    }

    private async apply(
        userId: string,
        chatId: string,
        event: ConversationEvent
    ): Promise<{ session: ConversationSession; effects: ConversationEffect[] }> {
        const current = (await this.deps.sessionStore.get(userId))
            ?? createConversationSession(userId, chatId, this.deps.newCycleId());

        const { session, effects } = this.deps.machine.transition(current, event);

        if (session !== current) {
            await this.deps.sessionStore.save(session);
            if (session.state !== current.state) {
                console.log(`[Conversation] User ${userId}: ${current.state} -> ${session.state} (${event.kind})`);
            }
        }

        return { session, effects };
    }

    private async callUpstream(session: ConversationSession, effect: UpstreamEffect): Promise<UpstreamEvent> {
        const { cycleId } = session;

        if (effect.type === 'enhance') {
            try {
                const enhancedPrompt = await this.withUpstreamRetry('enhance', () =>
                    this.deps.generationClient.enhance(effect.prompt)
                );
                return { kind: 'enhancementSucceeded', cycleId, enhancedPrompt };
            } catch (error) {
                if (error instanceof ValidationError) {
                    return { kind: 'enhancementRejected', cycleId, reason: error.message };
                }
                console.warn(`[Conversation] Enhancement failed for user ${session.userId}, using original prompt:`, describe(error));
                return { kind: 'enhancementFailed', cycleId, reason: describe(error) };
            }
        }

        try {
            const reference = effect.referenceImage
                ? await this.fetchReference(effect.referenceImage)
                : undefined;
            const result = await this.withUpstreamRetry('generate', () =>
                this.deps.generationClient.generate(effect.prompt, reference)
            );
            console.log(`[Conversation] Generated ${result.generationId} for user ${session.userId}`);
            return { kind: 'generationSucceeded', cycleId, result };
        } catch (error) {
            if (error instanceof ValidationError) {
                return { kind: 'generationRejected', cycleId, reason: error.message };
            }
            if (error instanceof UpstreamError) {
                console.error(`[Conversation] Generation failed for user ${session.userId}:`, error.message);
            } else {
                console.error(`[Conversation] Unexpected generation error for user ${session.userId}:`, error);
            }
            return { kind: 'generationFailed', cycleId, reason: describe(error) };
        }
    }

    private async fetchReference(image: ReferenceImage): Promise<ReferenceImagePayload> {
        try {
            const data = await this.deps.transport.downloadFile(image.fileId);
            return { data, mimeType: image.mimeType };
        } catch (error) {
            throw new UpstreamError('download', `Could not download the reference image: ${describe(error)}`);
        }
    }

    private withUpstreamRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return withRetry(fn, {
            maxAttempts: 1 + (this.deps.upstreamMaxRetries ?? 1),
            initialBackoffMs: this.deps.retryBackoffMs ?? 1000,
            onRetry: (attempt, error, delayMs) => {
                console.warn(`[Conversation] ${operation} attempt ${attempt} failed (${describe(error)}), retrying in ${delayMs}ms`);
            },
        });
    }

    private async send(chatId: string, effect: Extract<ConversationEffect, { type: 'reply' | 'sendImage' }>): Promise<void> {
        try {
            if (effect.type === 'reply') {
                await this.deps.transport.sendText(chatId, effect.text, effect.choices);
            } else {
                await this.deps.transport.sendImage(chatId, effect.image, effect.caption, effect.choices);
            }
        } catch (error) {
            console.error(`[Conversation] Failed to deliver ${effect.type} to chat ${chatId}:`, describe(error));
        }
    }

    private async acknowledge(chatId: string, origin: ChoiceOrigin): Promise<void> {
        try {
            await this.deps.transport.acknowledgeChoice(origin.callbackQueryId);
            await this.deps.transport.clearChoices(chatId, origin.messageId);
        } catch (error) {
            console.warn(`[Conversation] Could not acknowledge button press in chat ${chatId}:`, describe(error));
        }
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
