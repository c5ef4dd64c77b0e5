// src/telegrafSource.test.ts

import { TelegramError } from 'telegraf';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ListResponse } from './events';
import type { Logger } from './logger';
import { TelegrafEventSource } from './telegrafSource';

const notModified = () =>
    new TelegramError({ error_code: 400, description: 'Bad Request: message is not modified' });

describe('TelegrafEventSource.deliver()', () => {
    let log: Logger;
    let source: TelegrafEventSource;

    beforeEach(() => {
        log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        source = new TelegrafEventSource('test-token', { log });
    });

    function mockTelegram() {
        const { telegram } = source.bot;
        return {
            sendMessage: vi.spyOn(telegram, 'sendMessage').mockResolvedValue({ message_id: 501 } as never),
            editMessageText: vi.spyOn(telegram, 'editMessageText').mockResolvedValue(true as never),
            deleteMessage: vi.spyOn(telegram, 'deleteMessage').mockResolvedValue(true),
            answerCbQuery: vi.spyOn(telegram, 'answerCbQuery').mockResolvedValue(true),
        };
    }

    const list = (overrides: Partial<ListResponse> = {}): ListResponse => ({
        kind: 'list',
        chatId: 7,
        text: '📋 *Full list:*\n',
        previousMessageId: 40,
        protectedMessageId: 5,
        forceNew: false,
        ...overrides,
    });

    it('sends a reply and returns its message id', async () => {
        const api = mockTelegram();

        await expect(source.deliver({ kind: 'reply', chatId: 7, text: 'Hi', markdown: true })).resolves.toBe(501);
        expect(api.sendMessage).toHaveBeenCalledWith(7, 'Hi', { parse_mode: 'Markdown', reply_markup: undefined });
    });

    it('treats an unchanged edit as done', async () => {
        const api = mockTelegram();
        api.editMessageText.mockRejectedValue(notModified());

        await expect(source.deliver({ kind: 'edit', chatId: 7, messageId: 12, text: 'Cancelled.' })).resolves.toBe(12);
    });

    it('passes other edit failures on', async () => {
        const api = mockTelegram();
        api.editMessageText.mockRejectedValue(new Error('message to edit not found'));

        await expect(source.deliver({ kind: 'edit', chatId: 7, messageId: 12, text: 'Cancelled.' })).rejects.toThrow(
            'message to edit not found',
        );
    });

    it('edits the previous list message in place', async () => {
        const api = mockTelegram();

        await expect(source.deliver(list())).resolves.toBe(40);
        expect(api.editMessageText).toHaveBeenCalledWith(7, 40, undefined, '📋 *Full list:*\n', {
            parse_mode: 'Markdown',
            reply_markup: undefined,
        });
        expect(api.sendMessage).not.toHaveBeenCalled();
    });

    it('keeps the list message when its content is unchanged', async () => {
        const api = mockTelegram();
        api.editMessageText.mockRejectedValue(notModified());

        await expect(source.deliver(list())).resolves.toBe(40);
        expect(api.deleteMessage).not.toHaveBeenCalled();
        expect(api.sendMessage).not.toHaveBeenCalled();
    });

    it('replaces the list message when it cannot be edited', async () => {
        const api = mockTelegram();
        api.editMessageText.mockRejectedValue(new Error('message to edit not found'));

        await expect(source.deliver(list())).resolves.toBe(501);
        expect(log.warn).toHaveBeenCalledWith('Could not edit list message 40: message to edit not found');
        expect(api.deleteMessage).toHaveBeenCalledWith(7, 40);
        expect(api.sendMessage).toHaveBeenCalledWith(7, '📋 *Full list:*\n', {
            parse_mode: 'Markdown',
            reply_markup: undefined,
        });
    });

    it('sends a new list message without deleting the menu keyboard message', async () => {
        const api = mockTelegram();

        await expect(source.deliver(list({ previousMessageId: 5, forceNew: true }))).resolves.toBe(501);
        expect(api.editMessageText).not.toHaveBeenCalled();
        expect(api.deleteMessage).not.toHaveBeenCalled();
    });

    it('sends the first list message without touching older ones', async () => {
        const api = mockTelegram();

        await expect(source.deliver(list({ previousMessageId: null }))).resolves.toBe(501);
        expect(api.editMessageText).not.toHaveBeenCalled();
        expect(api.deleteMessage).not.toHaveBeenCalled();
    });

    it('logs a failed delete instead of failing', async () => {
        const api = mockTelegram();
        api.deleteMessage.mockRejectedValue(new Error("message can't be deleted"));

        await expect(source.deliver({ kind: 'delete', chatId: 7, messageId: 9 })).resolves.toBeUndefined();
        expect(log.warn).toHaveBeenCalledWith("Failed to delete message 9: message can't be deleted");
    });

    it('answers callback queries', async () => {
        const api = mockTelegram();

        await expect(source.deliver({ kind: 'answer', callbackId: 'cb-1' })).resolves.toBeUndefined();
        expect(api.answerCbQuery).toHaveBeenCalledWith('cb-1', undefined);
    });
});

describe('TelegrafEventSource.run()', () => {
    let log: Logger;
    let source: TelegrafEventSource;
    let launchCallbacks: Array<() => void>;

    beforeEach(() => {
        log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        source = new TelegrafEventSource('test-token', { log });
        launchCallbacks = [];
        vi.spyOn(source.bot, 'launch').mockImplementation(((_options: unknown, onLaunch: () => void) => {
            launchCallbacks.push(onLaunch);
            return new Promise<void>(() => undefined);
        }) as never);
    });

    it('stops Telegraf when stopped after launch', async () => {
        const stopBot = vi.spyOn(source.bot, 'stop').mockImplementation(() => undefined);
        const running = source.run(async () => undefined);
        launchCallbacks[0]();

        source.stop('SIGTERM');
        await expect(running).resolves.toBeUndefined();
        expect(stopBot).toHaveBeenCalledWith('SIGTERM');
    });

    it('stops Telegraf once a launch interrupted by stop() reports in', async () => {
        const stopBot = vi.spyOn(source.bot, 'stop').mockImplementation(() => undefined);
        const running = source.run(async () => undefined);

        source.stop('SIGINT');
        await expect(running).resolves.toBeUndefined();
        expect(stopBot).not.toHaveBeenCalled();

        launchCallbacks[0]();
        expect(stopBot).toHaveBeenCalledWith('SIGINT');
        expect(log.info).not.toHaveBeenCalledWith('🚀 Bot is running! Open Telegram and talk to it.');
    });

    it('retries the stop until Telegraf has started polling', async () => {
        vi.useFakeTimers();
        try {
            const stopBot = vi
                .spyOn(source.bot, 'stop')
                .mockImplementationOnce(() => {
                    throw new Error('Bot is not running!');
                })
                .mockImplementation(() => undefined);
            const running = source.run(async () => undefined);
            source.stop('SIGINT');
            await running;

            launchCallbacks[0]();
            expect(stopBot).toHaveBeenCalledTimes(1);
            vi.advanceTimersByTime(100);
            expect(stopBot).toHaveBeenCalledTimes(2);
            expect(stopBot).toHaveBeenLastCalledWith('SIGINT');
        } finally {
            vi.useRealTimers();
        }
    });
});
