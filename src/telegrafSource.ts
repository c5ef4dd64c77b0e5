// src/telegrafSource.ts

import { Telegraf, TelegramError } from 'telegraf';
import type { WebhookConfig } from './config';
import { describeError } from './errors';
import { parseUpdate, type BotEvent, type ListResponse, type OutboundResponse } from './events';
import { consoleLogger, type Logger } from './logger';
import type { EventSource } from './runtime';

export type TelegrafSourceOptions = {
    /** Long polling when absent. */
    webhook?: WebhookConfig;
    log?: Logger;
};

const STOP_ATTEMPTS = 50;
const STOP_RETRY_MS = 100;

const isNotModified = (error: unknown) =>
    error instanceof TelegramError && error.description.includes('message is not modified');

/** Telegram transport for the runtime, on top of Telegraf. */
export class TelegrafEventSource implements EventSource {
    readonly bot: Telegraf;
    private readonly webhook?: WebhookConfig;
    private readonly log: Logger;
    private onEvent: ((event: BotEvent) => Promise<void>) | null = null;
    private launched = false;
    private pendingStop: string | null = null;
    private resolveStopped: (() => void) | null = null;

    constructor(token: string, options: TelegrafSourceOptions = {}) {
        this.bot = new Telegraf(token);
        this.webhook = options.webhook;
        this.log = options.log ?? consoleLogger;

        this.bot.use(async (ctx, next) => {
            const event = parseUpdate(ctx.update);
            if (!event || !this.onEvent) return next();
            await this.onEvent(event);
        });
        this.bot.catch((error, ctx) => {
            this.log.error(`❌ Error handling Telegram update ${ctx.update.update_id}: ${describeError(error)}`);
        });
    }

    run(onEvent: (event: BotEvent) => Promise<void>): Promise<void> {
        this.onEvent = onEvent;
        const mode = this.webhook ? `webhook on ${this.webhook.domain}:${this.webhook.port}` : 'long polling';
        this.log.info(`🤖 Bot is starting in ${mode} mode...`);

        return new Promise<void>((resolve, reject) => {
            this.resolveStopped = resolve;
            const options: Telegraf.LaunchOptions = this.webhook
                ? {
                      webhook: {
                          domain: this.webhook.domain,
                          port: this.webhook.port,
                          secretToken: this.webhook.secretToken,
                      },
                  }
                : {};
            this.bot
                .launch(options, () => {
                    this.launched = true;
                    if (this.pendingStop !== null) {
                        const reason = this.pendingStop;
                        this.pendingStop = null;
                        this.stopTelegraf(reason);
                        return;
                    }
                    this.log.info('🚀 Bot is running! Open Telegram and talk to it.');
                })
                .catch((error: unknown) => {
                    this.launched = false;
                    if (!this.resolveStopped) {
                        this.log.warn(`Telegram launch failed after stop: ${describeError(error)}`);
                        return;
                    }
                    this.resolveStopped = null;
                    reject(error);
                });
        });
    }

    stop(reason = 'stop'): void {
        if (this.launched) {
            this.stopTelegraf(reason);
        } else if (this.resolveStopped) {
            // Launch still in flight: Telegraf is stopped once it reports in.
            this.pendingStop = reason;
        }
        this.onEvent = null;
        this.resolveStopped?.();
        this.resolveStopped = null;
    }

    /**
     * Telegraf calls back after `getMe`, before polling or the webhook server
     * exists, and refuses to stop until one does; retry until it takes.
     */
    private stopTelegraf(reason: string, attemptsLeft = STOP_ATTEMPTS): void {
        this.launched = false;
        try {
            this.bot.stop(reason);
        } catch (error) {
            if (attemptsLeft <= 1) {
                this.log.warn(`Could not stop Telegraf: ${describeError(error)}`);
                return;
            }
            setTimeout(() => this.stopTelegraf(reason, attemptsLeft - 1), STOP_RETRY_MS);
        }
    }

    async deliver(response: OutboundResponse): Promise<number | undefined> {
        const { telegram } = this.bot;
        switch (response.kind) {
            case 'reply': {
                const message = await telegram.sendMessage(response.chatId, response.text, {
                    parse_mode: response.markdown ? 'Markdown' : undefined,
                    reply_markup: response.keyboard,
                });
                return message.message_id;
            }
            case 'edit': {
                try {
                    await telegram.editMessageText(response.chatId, response.messageId, undefined, response.text, {
                        parse_mode: response.markdown ? 'Markdown' : undefined,
                        reply_markup: response.keyboard,
                    });
                } catch (error) {
                    if (!isNotModified(error)) throw error;
                }
                return response.messageId;
            }
            case 'delete':
                await this.tryDelete(response.chatId, response.messageId);
                return undefined;
            case 'answer':
                try {
                    await telegram.answerCbQuery(response.callbackId, response.text);
                } catch (error) {
                    this.log.warn(`Failed to answer callback ${response.callbackId}: ${describeError(error)}`);
                }
                return undefined;
            case 'list':
                return this.showList(response);
        }
    }

    /**
     * Edits the previous list message in place when allowed; otherwise replaces it
     * with a new message at the bottom of the chat. The menu keyboard message is never deleted.
     */
    private async showList(response: ListResponse): Promise<number> {
        const { telegram } = this.bot;
        const { chatId, text, keyboard, previousMessageId, protectedMessageId } = response;

        if (previousMessageId !== null && !response.forceNew) {
            try {
                await telegram.editMessageText(chatId, previousMessageId, undefined, text, {
                    parse_mode: 'Markdown',
                    reply_markup: keyboard,
                });
                return previousMessageId;
            } catch (error) {
                if (isNotModified(error)) return previousMessageId;
                this.log.warn(`Could not edit list message ${previousMessageId}: ${describeError(error)}`);
            }
        }

        if (previousMessageId !== null && previousMessageId !== protectedMessageId) {
            await this.tryDelete(chatId, previousMessageId);
        }
        const message = await telegram.sendMessage(chatId, text, { parse_mode: 'Markdown', reply_markup: keyboard });
        return message.message_id;
    }

    private async tryDelete(chatId: number, messageId: number): Promise<void> {
        try {
            await this.bot.telegram.deleteMessage(chatId, messageId);
        } catch (error) {
            this.log.warn(`Failed to delete message ${messageId}: ${describeError(error)}`);
        }
    }
}
