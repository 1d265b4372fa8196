import { ChoiceOption } from '../entities/ConversationEvent';
import { ChoiceId } from '../entities/ConversationSession';

const KEYCAPS = ['1️⃣', '2️⃣', '3️⃣', '4️⃣', '5️⃣'];

export type MenuName = 'enhancement' | 'reference' | 'referenceWithRetry' | 'iteration';

/**
 * Choice menus, in the order their numeric shortcuts refer to.
 */
export const MENUS: Record<MenuName, ChoiceOption[]> = {
    enhancement: [
        { id: 'use_enhanced', label: 'Use the enhanced prompt' },
        { id: 'reenhance', label: 'Try another enhancement' },
        { id: 'use_original', label: 'Use my original prompt' },
    ],
    reference: [
        { id: 'attach_reference', label: "Yes, I'll upload an image" },
        { id: 'skip_reference', label: 'No, generate from scratch' },
    ],
    referenceWithRetry: [
        { id: 'attach_reference', label: 'Upload a different image' },
        { id: 'skip_reference', label: 'Generate without a reference' },
        { id: 'retry_generation', label: 'Try again with the same image' },
    ],
    iteration: [
        { id: 'regenerate', label: 'Generate a new variation' },
        { id: 'edit_prompt', label: 'Modify the prompt' },
        { id: 'end', label: "I'm done" },
    ],
};

/**
 * Appends the numbered menu so the message also works without buttons.
 */
export function withMenu(text: string, choices: ChoiceOption[]): string {
    const lines = choices.map((choice, i) => `${KEYCAPS[i] ?? `${i + 1}.`} ${choice.label}`);
    const numbers = choices.map((_, i) => `${i + 1}`);
    const hint = numbers.length > 1
        ? `Tap a button or reply with ${numbers.slice(0, -1).join(', ')} or ${numbers[numbers.length - 1]}`
        : 'Tap the button or reply with 1';
    return `${text}\n\n${lines.join('\n')}\n\n${hint}`;
}

/**
 * Resolves typed input against a menu: its number, its id, or its label.
 */
export function parseTypedChoice(input: string, choices: ChoiceOption[]): ChoiceId | null {
    const normalized = input.trim().toLowerCase();
    if (/^\d+$/.test(normalized)) {
        const choice = choices[parseInt(normalized, 10) - 1];
        return choice ? choice.id : null;
    }
    const match = choices.find(
        (choice) => choice.id === normalized || choice.label.toLowerCase() === normalized
    );
    return match ? match.id : null;
}

export const MESSAGES = {
    welcome:
        '👋 Welcome to the AI Image Studio!\n\n' +
        "I'll help you turn an idea into an image. Here's how it works:\n\n" +
        '1️⃣ Describe the image you want\n' +
        '2️⃣ Pick your prompt or my enhanced version\n' +
        '3️⃣ Optionally add a reference image\n' +
        '4️⃣ Generate and refine\n\n' +
        'Send /cancel at any time to start over.',
    askPrompt: 'Please describe the image you would like to create.',
    askNewPrompt: 'Please provide a new prompt for your image.',
    emptyPrompt: 'Please send a text description of the image you want.',
    promptTooLong: (length: number, max: number): string =>
        `📝 Your prompt is too long! Please keep it under ${max} characters.\n\n` +
        `Current length: ${length} characters\n\n` +
        'Please try again with a shorter description.',
    enhancementOffer: (original: string, enhanced: string): string =>
        "I've enhanced your prompt. Here's what I suggest:\n\n" +
        `Original: ${original}\n` +
        `Enhanced: ${enhanced}\n\n` +
        'Which one should I use?',
    enhancementFailed: "⚠️ I couldn't enhance your prompt right now, so I'll use it exactly as you wrote it.",
    referenceQuestion: "Do you have a reference image you'd like to use?",
    referenceRetryQuestion: 'Your prompt and reference image are saved. What would you like to do?',
    askReferenceUpload: (maxBytes: number): string =>
        `Please upload your reference image (JPEG, PNG or WebP, up to ${formatMegabytes(maxBytes)}).`,
    referenceWrongType: (mimeType: string): string =>
        `⚠️ That file type (${mimeType}) isn't supported. Please upload a JPEG, PNG or WebP image.`,
    referenceTooLarge: (sizeBytes: number, maxBytes: number): string =>
        `⚠️ That image is ${formatMegabytes(sizeBytes)}, the limit is ${formatMegabytes(maxBytes)}. Please upload a smaller one.`,
    generating: '🎨 Generating your image...\nThis might take a minute or two. Please wait...',
    generatingWithReference:
        '🎨 Processing your reference image and generating a new image...\nThis might take a minute or two. Please wait...',
    resultCaption: "Here's your generated image! What would you like to do next?",
    generationFailed: (reason: string): string =>
        `❌ Sorry, there was an error generating the image (${reason}).\n` +
        "Your prompt is saved, so you can try again right away.",
    pleaseWait: "⏳ I'm still working on your previous request. Please wait...",
    cancelled: 'Operation cancelled. Type /start to begin again.',
    ended: '🎉 All done! Type /start whenever you want to create another image.',
    idleHint: 'Type /start to begin creating an image.',
    nextStep: 'What would you like to do next?',
} as const;

function formatMegabytes(bytes: number): string {
    const mb = bytes / (1024 * 1024);
    return `${Number.isInteger(mb) ? mb : mb.toFixed(1)} MB`;
}
