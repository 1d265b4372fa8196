/**
 * Dialogue states of a conversation session.
 * Exactly one is active per session.
 */
export type ConversationState =
    | 'Idle'
    | 'AwaitingPrompt'
    | 'AwaitingEnhancementChoice'
    | 'AwaitingReferenceDecision'
    | 'AwaitingReferenceUpload'
    | 'Generating'
    | 'AwaitingIteration';

/**
 * Menu options a user can pick, either by button or by typed shortcut.
 */
export type ChoiceId =
    | 'use_enhanced'
    | 'use_original'
    | 'reenhance'
    | 'attach_reference'
    | 'skip_reference'
    | 'retry_generation'
    | 'regenerate'
    | 'edit_prompt'
    | 'end';

export const CHOICE_IDS: readonly ChoiceId[] = [
    'use_enhanced',
    'use_original',
    'reenhance',
    'attach_reference',
    'skip_reference',
    'retry_generation',
    'regenerate',
    'edit_prompt',
    'end',
];

export function isChoiceId(value: string): value is ChoiceId {
    return CHOICE_IDS.some((id) => id === value);
}

/**
 * Handle to a user-supplied reference image.
 * The bytes stay on the chat platform until generation needs them.
 */
export interface ReferenceImage {
    /** Chat-platform file identifier */
    fileId: string;
    /** Declared MIME type, e.g. image/jpeg */
    mimeType: string;
    /** Declared size in bytes */
    sizeBytes: number;
}

/**
 * Opaque handle to a generated image.
 */
export interface GeneratedImage {
    /** URL the image can be fetched or displayed from */
    url: string;
    /** Upstream generation identifier */
    generationId: string;
}

/**
 * ConversationSession holds one user's progress through a generation cycle.
 */
export interface ConversationSession {
    userId: string;
    chatId: string;
    state: ConversationState;
    originalPrompt?: string;
    enhancedPrompt?: string;
    /** Prompt actually sent to generation */
    activePrompt?: string;
    referenceImage?: ReferenceImage;
    lastResult?: GeneratedImage;
    /** Identifies the current generation cycle; late upstream results carrying another id are ignored */
    cycleId: string;
    createdAt: string;
    updatedAt: string;
}

/**
 * Creates a fresh session in the Idle state.
 */
export function createConversationSession(
    userId: string,
    chatId: string,
    cycleId: string,
    now: Date = new Date()
): ConversationSession {
    return {
        userId,
        chatId,
        state: 'Idle',
        cycleId,
        createdAt: now.toISOString(),
        updatedAt: now.toISOString(),
    };
}

/**
 * Returns the session in the Idle state with every in-progress field discarded.
 */
export function resetSession(session: ConversationSession, cycleId: string): ConversationSession {
    return {
        userId: session.userId,
        chatId: session.chatId,
        state: 'Idle',
        cycleId,
        createdAt: session.createdAt,
        updatedAt: new Date().toISOString(),
    };
}
