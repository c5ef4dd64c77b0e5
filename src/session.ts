// src/session.ts

import { z } from 'zod';

const ConversationSchema = z.discriminatedUnion('step', [
    z.object({ step: z.literal('idle') }),
    z.object({ step: z.literal('choosing_category') }),
    z.object({ step: z.literal('entering_item_name'), categoryId: z.number().int() }),
    z.object({ step: z.literal('renaming_category'), categoryId: z.number().int() }),
]);

/** `null` is the category picker, `'all'` the full list, a number one category. */
const ListViewSchema = z.union([z.literal('all'), z.number().int(), z.null()]);

export const SessionSchema = z.object({
    conversation: ConversationSchema.default({ step: 'idle' }),
    showBought: z.boolean().default(false),
    editMode: z.boolean().default(false),
    lastView: ListViewSchema.default(null),
    keyboardMessageId: z.number().int().nullable().default(null),
    lastListMessageId: z.number().int().nullable().default(null),
});

export type Session = z.infer<typeof SessionSchema>;
export type Conversation = z.infer<typeof ConversationSchema>;
export type ListView = z.infer<typeof ListViewSchema>;

export const IDLE: Conversation = { step: 'idle' };

export function defaultSession(): Session {
    return SessionSchema.parse({});
}

/** Reads a stored session payload; anything unreadable starts a fresh session. */
export function decodeSession(payload: string | undefined): Session {
    if (payload === undefined) return defaultSession();
    let raw: unknown;
    try {
        raw = JSON.parse(payload);
    } catch {
        return defaultSession();
    }
    const parsed = SessionSchema.safeParse(raw);
    return parsed.success ? parsed.data : defaultSession();
}

export function encodeSession(session: Session): string {
    return JSON.stringify(session);
}

export function sessionKey(userId: number): string {
    return `user:${userId}`;
}
