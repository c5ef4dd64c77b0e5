// src/events.ts

import { z } from 'zod';
import type { InlineKeyboardMarkup, ReplyKeyboardMarkup } from 'telegraf/types';

// --- INBOUND ---

export type CommandEvent = {
    type: 'command';
    userId: number;
    chatId: number;
    messageId: number;
    name: string;
    args: string[];
};

export type TextEvent = {
    type: 'text';
    userId: number;
    chatId: number;
    messageId: number;
    text: string;
};

export type CallbackEvent = {
    type: 'callback';
    userId: number;
    chatId: number;
    messageId?: number;
    callbackId: string;
    data: string;
};

export type BotEvent = CommandEvent | TextEvent | CallbackEvent;

// Only the parts of a Telegram update the bot reads.
const UserSchema = z.object({ id: z.number().int() });
const ChatSchema = z.object({ id: z.number().int() });

const TextMessageUpdateSchema = z.object({
    message: z.object({
        message_id: z.number().int(),
        from: UserSchema,
        chat: ChatSchema,
        text: z.string(),
    }),
});

const CallbackQueryUpdateSchema = z.object({
    callback_query: z.object({
        id: z.string(),
        from: UserSchema,
        data: z.string(),
        message: z
            .object({
                message_id: z.number().int(),
                chat: ChatSchema,
            })
            .optional(),
    }),
});

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

/**
 * Turns a raw Telegram update into a bot event.
 * Returns undefined for updates the bot does not handle (photos, edits, inline queries, ...).
 */
export function parseUpdate(raw: unknown): BotEvent | undefined {
    const callback = CallbackQueryUpdateSchema.safeParse(raw);
    if (callback.success) {
        const query = callback.data.callback_query;
        // Callbacks from inline-mode messages carry no chat; answer in the user's private chat.
        return {
            type: 'callback',
            userId: query.from.id,
            chatId: query.message?.chat.id ?? query.from.id,
            messageId: query.message?.message_id,
            callbackId: query.id,
            data: query.data,
        };
    }

    const message = TextMessageUpdateSchema.safeParse(raw);
    if (!message.success) return undefined;
    const { message_id, from, chat, text } = message.data.message;

    const command = COMMAND_PATTERN.exec(text.trim());
    if (command) {
        const [, name, rest] = command;
        return {
            type: 'command',
            userId: from.id,
            chatId: chat.id,
            messageId: message_id,
            name: name.toLowerCase(),
            args: rest ? rest.split(/\s+/).filter(Boolean) : [],
        };
    }
    return { type: 'text', userId: from.id, chatId: chat.id, messageId: message_id, text };
}

// --- OUTBOUND ---

export type Keyboard = InlineKeyboardMarkup | ReplyKeyboardMarkup;

/** Send a new message. `remember: 'keyboard'` marks it as the persistent menu message. */
export type ReplyResponse = {
    kind: 'reply';
    chatId: number;
    text: string;
    markdown?: boolean;
    keyboard?: Keyboard;
    remember?: 'keyboard';
};

/**
 * Show a list view: edit `previousMessageId` in place unless `forceNew`,
 * otherwise replace it (never deleting `protectedMessageId`).
 */
export type ListResponse = {
    kind: 'list';
    chatId: number;
    text: string;
    keyboard?: InlineKeyboardMarkup;
    previousMessageId: number | null;
    protectedMessageId: number | null;
    forceNew: boolean;
};

export type EditResponse = {
    kind: 'edit';
    chatId: number;
    messageId: number;
    text: string;
    markdown?: boolean;
    keyboard?: InlineKeyboardMarkup;
};

export type DeleteResponse = {
    kind: 'delete';
    chatId: number;
    messageId: number;
};

export type AnswerResponse = {
    kind: 'answer';
    callbackId: string;
    text?: string;
};

export type OutboundResponse = ReplyResponse | ListResponse | EditResponse | DeleteResponse | AnswerResponse;

export function describeEvent(event: BotEvent): string {
    switch (event.type) {
        case 'command':
            return `/${event.name}${event.args.length ? ' ' + event.args.join(' ') : ''}`;
        case 'text':
            return event.text;
        case 'callback':
            return `[${event.data}]`;
    }
}
