import { ChoiceOption } from '../entities/ConversationEvent';
import { GeneratedImage } from '../entities/ConversationSession';

/**
 * IChatTransport - Port for outbound chat operations.
 * Implementations: TelegramChatTransport
 */
export interface IChatTransport {
    /**
     * Sends a text message, with a button menu when choices are given.
     */
    sendText(chatId: string, text: string, choices?: ChoiceOption[]): Promise<void>;

    /**
     * Sends a generated image with a caption and a button menu.
     */
    sendImage(chatId: string, image: GeneratedImage, caption: string, choices?: ChoiceOption[]): Promise<void>;

    /**
     * Removes the buttons from a previously sent message.
     */
    clearChoices(chatId: string, messageId: number): Promise<void>;

    /**
     * Acknowledges a button press so the client stops its loading indicator.
     */
    acknowledgeChoice(callbackQueryId: string): Promise<void>;

    /**
     * Downloads a file the user sent.
     */
    downloadFile(fileId: string): Promise<Buffer>;
}
