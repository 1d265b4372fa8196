import { InboundEvent, UserEvent } from '../../domain/entities/ConversationEvent';
import { isChoiceId } from '../../domain/entities/ConversationSession';
import { ProtocolError } from '../../domain/errors/ConversationErrors';
import { isRecord, readPath } from '../../infrastructure/http/JsonReaders';

/**
 * Telegram photos are always re-encoded as JPEG.
 */
const PHOTO_MIME_TYPE = 'image/jpeg';

const COMMANDS: Record<string, UserEvent> = {
    '/start': { kind: 'start' },
    '/cancel': { kind: 'cancel' },
    '/reset': { kind: 'cancel' },
    '/help': { kind: 'help' },
};

/**
 * Converts a Telegram update into an inbound conversation event.
 * @throws ProtocolError when the update is malformed or carries nothing the dialogue understands
 */
export function parseTelegramUpdate(update: unknown): InboundEvent {
    if (!isRecord(update)) {
        throw new ProtocolError('Update is not an object');
    }
    if (isRecord(update.callback_query)) {
        return parseCallbackQuery(update.callback_query);
    }
    if (isRecord(update.message)) {
        return parseMessage(update.message);
    }
    throw new ProtocolError(`Update ${String(update.update_id)} has neither a message nor a callback query`);
}

function parseMessage(message: Record<string, unknown>): InboundEvent {
    const userId = readId(message, 'from', 'id');
    const chatId = readId(message, 'chat', 'id');
    if (!userId || !chatId) {
        throw new ProtocolError('Message is missing its sender or chat');
    }

    const text = message.text;
    if (typeof text === 'string') {
        if (text.startsWith('/')) {
            // "/start@SomeBot extra" -> "/start"
            const command = text.split(/\s+/)[0].split('@')[0].toLowerCase();
            const event = COMMANDS[command];
            if (!event) {
                throw new ProtocolError(`Unsupported command ${command}`);
            }
            return { userId, chatId, event };
        }
        return { userId, chatId, event: { kind: 'text', text } };
    }

    if (Array.isArray(message.photo) && message.photo.length > 0) {
        // Sizes are ordered smallest first
        const largest: unknown = message.photo[message.photo.length - 1];
        const fileId = readPath(largest, 'file_id');
        if (typeof fileId !== 'string' || fileId.length === 0) {
            throw new ProtocolError('Photo is missing its file_id');
        }
        return {
            userId,
            chatId,
            event: { kind: 'image', image: { fileId, mimeType: PHOTO_MIME_TYPE, sizeBytes: readSize(largest) } },
        };
    }

    if (isRecord(message.document)) {
        const document = message.document;
        const fileId = document.file_id;
        if (typeof fileId !== 'string' || fileId.length === 0) {
            throw new ProtocolError('Document is missing its file_id');
        }
        const mimeType = typeof document.mime_type === 'string' ? document.mime_type : 'application/octet-stream';
        return {
            userId,
            chatId,
            event: { kind: 'image', image: { fileId, mimeType, sizeBytes: readSize(document) } },
        };
    }

    throw new ProtocolError(`Unsupported message type in chat ${chatId}`);
}

function parseCallbackQuery(query: Record<string, unknown>): InboundEvent {
    const userId = readId(query, 'from', 'id');
    const chatId = readId(query, 'message', 'chat', 'id');
    const messageId = readPath(query, 'message', 'message_id');
    const callbackQueryId = query.id;
    if (!userId || !chatId || typeof messageId !== 'number' || typeof callbackQueryId !== 'string') {
        throw new ProtocolError('Callback query is missing its sender, message or id');
    }
    const data = query.data;
    if (typeof data !== 'string' || !isChoiceId(data)) {
        throw new ProtocolError(`Unknown callback data ${String(data)}`);
    }

    return {
        userId,
        chatId,
        event: { kind: 'choice', choice: data },
        origin: { messageId, callbackQueryId },
    };
}

function readId(value: unknown, ...keys: string[]): string | undefined {
    const id = readPath(value, ...keys);
    if (typeof id === 'number' || (typeof id === 'string' && id.length > 0)) {
        return String(id);
    }
    return undefined;
}

function readSize(file: unknown): number {
    const size = readPath(file, 'file_size');
    return typeof size === 'number' ? size : 0;
}
