import axios from 'axios';
import { ChoiceOption } from '../../domain/entities/ConversationEvent';
import { GeneratedImage } from '../../domain/entities/ConversationSession';
import { IChatTransport } from '../../domain/ports/IChatTransport';
import { describeHttpError, readString } from '../http/JsonReaders';

const MAX_MESSAGE_LENGTH = 4096;
const MAX_CAPTION_LENGTH = 1024;

interface InlineKeyboardMarkup {
    inline_keyboard: Array<Array<{ text: string; callback_data: string }>>;
}

/**
 * Telegram Bot API adapter for outbound messages and file downloads.
 * Messages are sent as plain text, without parse_mode.
 */
export class TelegramChatTransport implements IChatTransport {
    private readonly botToken: string;
    private readonly apiBaseUrl: string;
    private readonly timeoutMs: number;

    constructor(botToken: string, apiBaseUrl: string = 'https://api.telegram.org', timeoutMs: number = 30000) {
        if (!botToken) {
            throw new Error('Telegram bot token is required');
        }
        this.botToken = botToken;
        this.apiBaseUrl = apiBaseUrl;
        this.timeoutMs = timeoutMs;
    }

    async sendText(chatId: string, text: string, choices?: ChoiceOption[]): Promise<void> {
        await this.call('sendMessage', {
            chat_id: chatId,
            text: truncate(text, MAX_MESSAGE_LENGTH),
            ...(choices && choices.length > 0 ? { reply_markup: toKeyboard(choices) } : {}),
        });
    }

    async sendImage(chatId: string, image: GeneratedImage, caption: string, choices?: ChoiceOption[]): Promise<void> {
        await this.call('sendPhoto', {
            chat_id: chatId,
            photo: image.url,
            caption: truncate(caption, MAX_CAPTION_LENGTH),
            ...(choices && choices.length > 0 ? { reply_markup: toKeyboard(choices) } : {}),
        });
    }

    async clearChoices(chatId: string, messageId: number): Promise<void> {
        await this.call('editMessageReplyMarkup', {
            chat_id: chatId,
            message_id: messageId,
            reply_markup: { inline_keyboard: [] },
        });
    }

    async acknowledgeChoice(callbackQueryId: string): Promise<void> {
        await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId });
    }

    /**
     * Resolves a file_id through getFile, then downloads the bytes.
     */
    async downloadFile(fileId: string): Promise<Buffer> {
        const result = await this.call('getFile', { file_id: fileId });
        const filePath = readString(result, 'file_path');
        if (!filePath) {
            throw new Error('Failed to get file path from Telegram');
        }

        try {
            // Format: https://api.telegram.org/file/bot<token>/<file_path>
            const response = await axios.get<ArrayBuffer>(
                `${this.apiBaseUrl}/file/bot${this.botToken}/${filePath}`,
                { responseType: 'arraybuffer', timeout: this.timeoutMs }
            );
            return Buffer.from(response.data);
        } catch (error) {
            throw new Error(`Failed to download Telegram file: ${describeHttpError(error)}`);
        }
    }

    /**
     * Calls a Bot API method and returns its `result`.
     */
    private async call(method: string, body: Record<string, unknown>): Promise<unknown> {
        try {
            const response = await axios.post(
                `${this.apiBaseUrl}/bot${this.botToken}/${method}`,
                body,
                { timeout: this.timeoutMs }
            );
            if (response.data?.ok !== true) {
                throw new Error(`Telegram ${method} returned ok=false`);
            }
            return response.data.result;
        } catch (error) {
            const message = describeHttpError(error);
            console.error(`[Telegram] ${method} failed: ${message}`);
            throw new Error(`Telegram ${method} failed: ${message}`);
        }
    }
}

function toKeyboard(choices: ChoiceOption[]): InlineKeyboardMarkup {
    return {
        inline_keyboard: choices.map((choice) => [{ text: choice.label, callback_data: choice.id }]),
    };
}

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.substring(0, max - 3)}...` : text;
}
