// src/config.ts

import { z } from 'zod';
import { consoleLogger, type Logger } from './logger';

export const DEFAULT_DATABASE_PATH = 'data/shopping_list.db';

const TOKEN_REQUIRED = '"BOT_TOKEN" env variable is required!';

/** Unset and blank variables both count as missing. */
const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const AllowedUsersSchema = z
    .string()
    .default('')
    .transform((value, ctx) => {
        const ids: number[] = [];
        for (const entry of value.split(',').map((part) => part.trim())) {
            if (!entry) continue;
            if (!/^-?\d+$/.test(entry)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `ALLOWED_USERS entry "${entry}" is not a Telegram user id` });
                return z.NEVER;
            }
            ids.push(Number(entry));
        }
        return ids;
    });

const EnvSchema = z.object({
    BOT_TOKEN: z.string({ required_error: TOKEN_REQUIRED }).trim().min(1, TOKEN_REQUIRED),
    ALLOWED_USERS: AllowedUsersSchema,
    DATABASE_URL: optionalString,
    WEBHOOK_DOMAIN: optionalString,
    PORT: z.coerce.number().int().positive().default(3000),
    TELEGRAM_WEBHOOK_SECRET: optionalString,
    EVENT_ERRORS: z.enum(['fatal', 'isolate']).default('fatal'),
});

export type EventErrorPolicy = 'fatal' | 'isolate';

export interface WebhookConfig {
    domain: string;
    port: number;
    secretToken?: string;
}

export interface BotConfig {
    botToken: string;
    allowedUsers: number[];
    databasePath: string;
    /** Long polling when absent. */
    webhook?: WebhookConfig;
    eventErrors: EventErrorPolicy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, log: Logger = consoleLogger): BotConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid configuration: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    const vars = parsed.data;

    if (vars.ALLOWED_USERS.length === 0) {
        log.warn('"ALLOWED_USERS" env variable is not set. Nobody will be able to use the bot.');
    }

    return {
        botToken: vars.BOT_TOKEN,
        allowedUsers: vars.ALLOWED_USERS,
        databasePath: vars.DATABASE_URL ?? DEFAULT_DATABASE_PATH,
        webhook: vars.WEBHOOK_DOMAIN
            ? { domain: vars.WEBHOOK_DOMAIN, port: vars.PORT, secretToken: vars.TELEGRAM_WEBHOOK_SECRET }
            : undefined,
        eventErrors: vars.EVENT_ERRORS,
    };
}
