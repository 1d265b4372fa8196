import {
    ChoiceOption,
    ConversationEffect,
    ConversationEvent,
    UpstreamEvent,
    UserEvent,
} from '../entities/ConversationEvent';
import {
    ChoiceId,
    ConversationSession,
    ReferenceImage,
    resetSession,
} from '../entities/ConversationSession';
import { MENUS, MESSAGES, parseTypedChoice, withMenu } from './ConversationMessages';

export interface ConversationMachineOptions {
    /** Longest accepted prompt, in characters */
    maxPromptLength: number;
    /** Largest accepted reference image, in bytes */
    maxReferenceBytes: number;
    /** MIME types accepted for reference images */
    allowedReferenceTypes: readonly string[];
    /** Source of fresh cycle ids */
    newCycleId: () => string;
    /** Clock used for updatedAt */
    now?: () => Date;
}

export interface Transition {
    session: ConversationSession;
    effects: ConversationEffect[];
}

export const DEFAULT_REFERENCE_TYPES: readonly string[] = ['image/jpeg', 'image/png', 'image/webp'];

/**
 * Image-generation dialogue as an explicit finite-state machine.
 *
 * `transition` is pure: it never performs I/O, it returns the next session and the
 * effects the caller must carry out. Upstream calls are requested as `enhance` and
 * `generate` effects; their outcomes come back as upstream events tagged with the
 * cycle id they were issued for, and are ignored when that cycle is no longer current.
 */
export class ConversationMachine {
    private readonly options: ConversationMachineOptions;

    constructor(options: ConversationMachineOptions) {
        this.options = options;
    }

    transition(session: ConversationSession, event: ConversationEvent): Transition {
        switch (event.kind) {
            case 'cancel':
                return {
                    session: resetSession(session, this.options.newCycleId()),
                    effects: [reply(MESSAGES.cancelled)],
                };
            case 'help':
                return unchanged(session, [reply(MESSAGES.welcome), ...this.promptFor(session)]);
            case 'enhancementSucceeded':
            case 'enhancementFailed':
            case 'enhancementRejected':
            case 'generationSucceeded':
            case 'generationFailed':
            case 'generationRejected':
                if (event.cycleId !== session.cycleId) {
                    return unchanged(session);
                }
                return this.onUpstream(session, event);
            default:
                return this.onUserInput(session, event);
        }
    }

    /**
     * Effects that re-ask for whatever the current state expects.
     */
    promptFor(session: ConversationSession): ConversationEffect[] {
        switch (session.state) {
            case 'Idle':
                return [reply(MESSAGES.idleHint)];
            case 'AwaitingPrompt':
                return [reply(MESSAGES.askPrompt)];
            case 'AwaitingEnhancementChoice':
                return [menuReply(
                    MESSAGES.enhancementOffer(session.originalPrompt ?? '', session.enhancedPrompt ?? ''),
                    MENUS.enhancement
                )];
            case 'AwaitingReferenceDecision':
                return [menuReply(
                    session.referenceImage ? MESSAGES.referenceRetryQuestion : MESSAGES.referenceQuestion,
                    this.menuFor(session)
                )];
            case 'AwaitingReferenceUpload':
                return [reply(MESSAGES.askReferenceUpload(this.options.maxReferenceBytes))];
            case 'Generating':
                return [reply(MESSAGES.pleaseWait)];
            case 'AwaitingIteration':
                return [menuReply(MESSAGES.nextStep, MENUS.iteration)];
        }
    }

    /**
     * Options valid in the current state; empty where no menu applies.
     */
    menuFor(session: ConversationSession): ChoiceOption[] {
        switch (session.state) {
            case 'AwaitingEnhancementChoice':
                return MENUS.enhancement;
            case 'AwaitingReferenceDecision':
                return session.referenceImage ? MENUS.referenceWithRetry : MENUS.reference;
            case 'AwaitingIteration':
                return MENUS.iteration;
            default:
                return [];
        }
    }

    private onUserInput(session: ConversationSession, event: Exclude<UserEvent, { kind: 'cancel' | 'help' }>): Transition {
        switch (session.state) {
            case 'Idle':
                if (event.kind === 'start') {
                    return {
                        session: this.touch({ ...session, state: 'AwaitingPrompt' }),
                        effects: [reply(MESSAGES.welcome), reply(MESSAGES.askPrompt)],
                    };
                }
                return unchanged(session, [reply(MESSAGES.idleHint)]);

            case 'AwaitingPrompt':
                if (event.kind === 'text') {
                    return this.onPrompt(session, event.text);
                }
                return this.reprompt(session);

            case 'AwaitingReferenceUpload':
                if (event.kind === 'image') {
                    return this.onReferenceImage(session, event.image);
                }
                return this.reprompt(session);

            case 'Generating':
                return unchanged(session, [reply(MESSAGES.pleaseWait)]);

            case 'AwaitingEnhancementChoice':
            case 'AwaitingReferenceDecision':
            case 'AwaitingIteration': {
                const choice = this.resolveChoice(session, event);
                if (!choice) {
                    return this.reprompt(session);
                }
                return this.onChoice(session, choice);
            }
        }
    }

    private onPrompt(session: ConversationSession, text: string): Transition {
        if (text.trim().length === 0) {
            return unchanged(session, [reply(MESSAGES.emptyPrompt)]);
        }
        // Characters, not UTF-16 code units.
        const length = [...text].length;
        if (length > this.options.maxPromptLength) {
            return unchanged(session, [reply(MESSAGES.promptTooLong(length, this.options.maxPromptLength))]);
        }

        // A new prompt opens a new generation cycle.
        const next = this.touch({
            ...this.withoutCycleFields(session),
            state: 'AwaitingPrompt',
            originalPrompt: text,
            cycleId: this.options.newCycleId(),
        });
        return { session: next, effects: [{ type: 'enhance', prompt: text }] };
    }

    private onReferenceImage(session: ConversationSession, image: ReferenceImage): Transition {
        if (!this.options.allowedReferenceTypes.includes(image.mimeType)) {
            return unchanged(session, [reply(MESSAGES.referenceWrongType(image.mimeType))]);
        }
        if (image.sizeBytes > this.options.maxReferenceBytes) {
            return unchanged(session, [reply(MESSAGES.referenceTooLarge(image.sizeBytes, this.options.maxReferenceBytes))]);
        }
        return this.startGeneration({ ...session, referenceImage: image });
    }

    private onChoice(session: ConversationSession, choice: ChoiceId): Transition {
        switch (choice) {
            case 'use_enhanced':
                return this.choosePrompt(session, session.enhancedPrompt);
            case 'use_original':
                return this.choosePrompt(session, session.originalPrompt);
            case 'reenhance':
                if (!session.originalPrompt) {
                    return this.reprompt(session);
                }
                return unchanged(session, [{ type: 'enhance', prompt: session.originalPrompt }]);
            case 'attach_reference':
                return {
                    session: this.touch({ ...session, state: 'AwaitingReferenceUpload' }),
                    effects: [reply(MESSAGES.askReferenceUpload(this.options.maxReferenceBytes))],
                };
            case 'skip_reference':
                return this.startGeneration({ ...session, referenceImage: undefined });
            case 'retry_generation':
            case 'regenerate':
                return this.startGeneration(session);
            case 'edit_prompt':
                return {
                    session: this.touch({ ...this.withoutCycleFields(session), state: 'AwaitingPrompt' }),
                    effects: [reply(MESSAGES.askNewPrompt)],
                };
            case 'end':
                return {
                    session: resetSession(session, this.options.newCycleId()),
                    effects: [reply(MESSAGES.ended)],
                };
        }
    }

    private onUpstream(session: ConversationSession, event: UpstreamEvent): Transition {
        const enhancing =
            (session.state === 'AwaitingPrompt' || session.state === 'AwaitingEnhancementChoice') &&
            session.originalPrompt !== undefined;

        switch (event.kind) {
            case 'enhancementSucceeded': {
                if (!enhancing) {
                    return unchanged(session);
                }
                const next = this.touch({
                    ...session,
                    state: 'AwaitingEnhancementChoice',
                    enhancedPrompt: event.enhancedPrompt,
                });
                return { session: next, effects: this.promptFor(next) };
            }
            case 'enhancementFailed': {
                if (!enhancing) {
                    return unchanged(session);
                }
                // Fail open: continue with the prompt exactly as entered.
                const next = this.touch({
                    ...session,
                    state: 'AwaitingReferenceDecision',
                    activePrompt: session.originalPrompt,
                });
                return { session: next, effects: [reply(MESSAGES.enhancementFailed), ...this.promptFor(next)] };
            }
            case 'enhancementRejected': {
                if (!enhancing) {
                    return unchanged(session);
                }
                const next = this.touch({ ...this.withoutCycleFields(session), state: 'AwaitingPrompt' });
                return { session: next, effects: [reply(event.reason), reply(MESSAGES.askPrompt)] };
            }
            case 'generationSucceeded': {
                if (session.state !== 'Generating') {
                    return unchanged(session);
                }
                const next = this.touch({ ...session, state: 'AwaitingIteration', lastResult: event.result });
                return {
                    session: next,
                    effects: [{
                        type: 'sendImage',
                        image: event.result,
                        caption: withMenu(MESSAGES.resultCaption, MENUS.iteration),
                        choices: MENUS.iteration,
                    }],
                };
            }
            case 'generationFailed': {
                if (session.state !== 'Generating') {
                    return unchanged(session);
                }
                const next = this.touch({ ...session, state: 'AwaitingReferenceDecision' });
                return { session: next, effects: [reply(MESSAGES.generationFailed(event.reason)), ...this.promptFor(next)] };
            }
            case 'generationRejected': {
                if (session.state !== 'Generating') {
                    return unchanged(session);
                }
                // The prompt was validated on entry, so the reference image is what was refused.
                const next = this.touch({ ...session, state: 'AwaitingReferenceDecision', referenceImage: undefined });
                return { session: next, effects: [reply(event.reason), ...this.promptFor(next)] };
            }
        }
    }

    private choosePrompt(session: ConversationSession, prompt: string | undefined): Transition {
        if (!prompt) {
            return this.reprompt(session);
        }
        const next = this.touch({ ...session, state: 'AwaitingReferenceDecision', activePrompt: prompt });
        return { session: next, effects: this.promptFor(next) };
    }

    private startGeneration(session: ConversationSession): Transition {
        if (!session.activePrompt) {
            // Nothing to generate from; go back to prompt entry.
            const next = this.touch({ ...this.withoutCycleFields(session), state: 'AwaitingPrompt' });
            return { session: next, effects: [reply(MESSAGES.askPrompt)] };
        }
        const next = this.touch({ ...session, state: 'Generating' });
        return {
            session: next,
            effects: [
                reply(next.referenceImage ? MESSAGES.generatingWithReference : MESSAGES.generating),
                { type: 'generate', prompt: session.activePrompt, referenceImage: next.referenceImage },
            ],
        };
    }

    private resolveChoice(session: ConversationSession, event: UserEvent): ChoiceId | null {
        const menu = this.menuFor(session);
        if (event.kind === 'choice') {
            return menu.some((option) => option.id === event.choice) ? event.choice : null;
        }
        if (event.kind === 'text') {
            return parseTypedChoice(event.text, menu);
        }
        return null;
    }

    private reprompt(session: ConversationSession): Transition {
        return unchanged(session, this.promptFor(session));
    }

    private withoutCycleFields(session: ConversationSession): ConversationSession {
        return {
            ...session,
            originalPrompt: undefined,
            enhancedPrompt: undefined,
            activePrompt: undefined,
            referenceImage: undefined,
        };
    }

    private touch(session: ConversationSession): ConversationSession {
        const now = this.options.now ? this.options.now() : new Date();
        return { ...session, updatedAt: now.toISOString() };
    }
}

function reply(text: string): ConversationEffect {
    return { type: 'reply', text };
}

function menuReply(text: string, choices: ChoiceOption[]): ConversationEffect {
    return { type: 'reply', text: withMenu(text, choices), choices };
}

function unchanged(session: ConversationSession, effects: ConversationEffect[] = []): Transition {
    return { session, effects };
}
