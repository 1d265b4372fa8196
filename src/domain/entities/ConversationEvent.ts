import { ChoiceId, GeneratedImage, ReferenceImage } from './ConversationSession';

/**
 * Events a user produces through the chat transport.
 */
export type UserEvent =
    | { kind: 'start' }
    | { kind: 'cancel' }
    | { kind: 'help' }
    | { kind: 'text'; text: string }
    | { kind: 'choice'; choice: ChoiceId }
    | { kind: 'image'; image: ReferenceImage };

/**
 * Events produced by completed upstream calls.
 * Each carries the cycle it was issued for.
 * "Failed" means the call itself failed; "Rejected" means the upstream or client refused the input.
 */
export type UpstreamEvent =
    | { kind: 'enhancementSucceeded'; cycleId: string; enhancedPrompt: string }
    | { kind: 'enhancementFailed'; cycleId: string; reason: string }
    | { kind: 'enhancementRejected'; cycleId: string; reason: string }
    | { kind: 'generationSucceeded'; cycleId: string; result: GeneratedImage }
    | { kind: 'generationFailed'; cycleId: string; reason: string }
    | { kind: 'generationRejected'; cycleId: string; reason: string };

export type ConversationEvent = UserEvent | UpstreamEvent;

/**
 * Transport metadata attached to a button press.
 */
export interface ChoiceOrigin {
    /** Message whose buttons were pressed */
    messageId: number;
    /** Callback query to acknowledge */
    callbackQueryId: string;
}

/**
 * A user event addressed to a session, as delivered by the transport.
 */
export interface InboundEvent {
    userId: string;
    chatId: string;
    event: UserEvent;
    /** Present when the event came from a button rather than typed text */
    origin?: ChoiceOrigin;
}

/**
 * A menu entry shown with an outbound message.
 */
export interface ChoiceOption {
    id: ChoiceId;
    label: string;
}

/**
 * Side effects requested by a transition.
 * reply/sendImage go to the user; enhance/generate go upstream.
 */
export type ConversationEffect =
    | { type: 'reply'; text: string; choices?: ChoiceOption[] }
    | { type: 'sendImage'; image: GeneratedImage; caption: string; choices: ChoiceOption[] }
    | { type: 'enhance'; prompt: string }
    | { type: 'generate'; prompt: string; referenceImage?: ReferenceImage };
