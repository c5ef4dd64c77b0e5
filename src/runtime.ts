// src/runtime.ts

import { respond, type Outcome } from './botLogic';
import type { EventErrorPolicy } from './config';
import { StartupError, StorageUnavailable, UnhandledEventError, describeError } from './errors';
import { describeEvent, type BotEvent, type OutboundResponse } from './events';
import { consoleLogger, type Logger } from './logger';
import { decodeSession, encodeSession, sessionKey, type Session } from './session';
import { ShoppingList } from './shoppingList';
import { StateStore } from './stateStore';

/**
 * Delivers inbound events to the runtime and carries its responses back out.
 * The transport (long polling, webhook, a test double) lives behind this.
 */
export interface EventSource {
    /** Feeds events to `onEvent` until stopped; resolves once stopped. */
    run(onEvent: (event: BotEvent) => Promise<void>): Promise<void>;
    /** Sends one response; resolves with the id of the message it produced, if any. */
    deliver(response: OutboundResponse): Promise<number | undefined>;
    stop(reason?: string): void;
}

export type BotRuntimeOptions = {
    databasePath: string;
    source: EventSource;
    allowedUsers: readonly number[];
    eventErrors?: EventErrorPolicy;
    log?: Logger;
};

export class BotRuntime {
    private readonly databasePath: string;
    private readonly source: EventSource;
    private readonly allowedUsers: readonly number[];
    private readonly eventErrors: EventErrorPolicy;
    private readonly log: Logger;

    private store: StateStore | null = null;
    private list: ShoppingList | null = null;
    private queue: Promise<void> = Promise.resolve();
    private fatal: UnhandledEventError | null = null;

    constructor(opts: BotRuntimeOptions) {
        this.databasePath = opts.databasePath;
        this.source = opts.source;
        this.allowedUsers = opts.allowedUsers;
        this.eventErrors = opts.eventErrors ?? 'fatal';
        this.log = opts.log ?? consoleLogger;
    }

    get isRunning(): boolean {
        return this.store !== null;
    }

    /**
     * Opens the state store, then runs the event loop until `stop()` or a fatal
     * event error. Rejects with `StartupError` when the store cannot be opened.
     */
    async start(): Promise<void> {
        if (this.store) throw new StartupError('Runtime is already running');

        let store: StateStore;
        try {
            store = StateStore.open(this.databasePath);
        } catch (error) {
            throw new StartupError(`Cannot open state store: ${describeError(error)}`, error);
        }
        try {
            this.list = new ShoppingList(store.database);
        } catch (error) {
            store.close();
            throw new StartupError(`Cannot prepare shopping list tables: ${describeError(error)}`, error);
        }
        this.store = store;
        this.fatal = null;
        this.log.info(`📦 State store opened at ${this.databasePath} (${store.size()} records)`);

        try {
            await this.source.run((event) => this.dispatch(event));
        } finally {
            await this.queue;
            this.store = null;
            this.list = null;
            store.close();
            this.log.info('📦 State store closed');
        }
        if (this.fatal) throw this.fatal;
    }

    /**
     * Processes one event: reads the user's record, computes the new session and
     * responses, writes the record back, then emits the responses.
     * Events are handled strictly one after another.
     */
    handle(event: BotEvent): Promise<void> {
        const next = this.queue.then(() => this.process(event)).catch((error: unknown) => {
            throw this.fail(event, error);
        });
        // The caller sees the failure through `next`; the queue itself keeps going.
        this.queue = next.catch(() => undefined);
        return next;
    }

    stop(reason = 'stop'): void {
        if (!this.store) return;
        this.log.info(`🛑 Stopping bot (${reason})...`);
        this.source.stop(reason);
    }

    private async dispatch(event: BotEvent): Promise<void> {
        try {
            await this.handle(event);
        } catch (error) {
            if (error !== this.fatal) this.log.error(`❌ ${describeError(error)}`);
        }
    }

    /**
     * Applies the error policy to a failed event. Storage failures always stop
     * the runtime; other failures do so unless the policy is `isolate`.
     * Runs before the next queued event starts.
     */
    private fail(event: BotEvent, error: unknown): UnhandledEventError {
        const failure = error instanceof UnhandledEventError ? error : new UnhandledEventError(event.type, event.userId, error);
        const storageFailure = failure.cause instanceof StorageUnavailable;
        if (this.fatal || !this.store || (this.eventErrors === 'isolate' && !storageFailure)) return failure;

        this.fatal = failure;
        this.log.error(`💥 ${failure.message}. Shutting down.`);
        this.stop('fatal error');
        return failure;
    }

    private async process(event: BotEvent): Promise<void> {
        const { store, list } = this;
        if (!store || !list) {
            throw new UnhandledEventError(event.type, event.userId, new Error('runtime is not running'));
        }
        if (this.fatal) {
            this.log.warn(`⏭️ Dropping ${event.type} event from ${event.userId}: shutting down`);
            return;
        }
        this.log.info(`📨 ${event.type} from ${event.userId}: ${describeEvent(event)}`);

        const key = sessionKey(event.userId);
        let outcome: Outcome;
        try {
            outcome = store.transaction(() => {
                const current = decodeSession(store.get(key)?.payload);
                const result = respond(event, current, { list, allowedUsers: this.allowedUsers, log: this.log });
                store.put(key, encodeSession(result.session));
                return result;
            });
        } catch (error) {
            throw new UnhandledEventError(event.type, event.userId, error);
        }

        let session: Session = outcome.session;
        let tracked = false;
        try {
            for (const response of outcome.responses) {
                const messageId = await this.source.deliver(response);
                if (messageId === undefined) continue;
                if (response.kind === 'reply' && response.remember === 'keyboard') {
                    session = { ...session, keyboardMessageId: messageId };
                    tracked = true;
                } else if (response.kind === 'list' && messageId !== session.lastListMessageId) {
                    session = { ...session, lastListMessageId: messageId };
                    tracked = true;
                }
            }
        } catch (error) {
            throw new UnhandledEventError(event.type, event.userId, error);
        } finally {
            if (tracked) store.put(key, encodeSession(session));
        }
    }
}
