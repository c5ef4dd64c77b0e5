// src/app.ts

import { loadConfig } from './config';
import { describeError } from './errors';
import { consoleLogger, type Logger } from './logger';
import { BotRuntime } from './runtime';
import { TelegrafEventSource } from './telegrafSource';

export type AppOptions = {
    env?: NodeJS.ProcessEnv;
    log?: Logger;
};

/** Loads the config and runs the bot until a signal or a fatal error. */
export async function main({ env = process.env, log = consoleLogger }: AppOptions = {}): Promise<void> {
    const config = loadConfig(env, log);
    const source = new TelegrafEventSource(config.botToken, { webhook: config.webhook, log });
    const runtime = new BotRuntime({
        databasePath: config.databasePath,
        source,
        allowedUsers: config.allowedUsers,
        eventErrors: config.eventErrors,
        log,
    });

    // Enable graceful stop on process exit signals.
    const onSigint = () => runtime.stop('SIGINT');
    const onSigterm = () => runtime.stop('SIGTERM');
    process.once('SIGINT', onSigint);
    process.once('SIGTERM', onSigterm);

    try {
        await runtime.start();
    } finally {
        process.off('SIGINT', onSigint);
        process.off('SIGTERM', onSigterm);
    }
    log.info('👋 Bot stopped.');
}

/** Runs `main` and turns a failure into a non-zero exit code. */
export async function runMain(options: AppOptions = {}): Promise<void> {
    const log = options.log ?? consoleLogger;
    try {
        await main(options);
    } catch (error) {
        log.error(`💥 Bot failed: ${describeError(error)}`);
        process.exitCode = 1;
    }
}
