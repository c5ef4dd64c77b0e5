// src/botLogic.ts

import { Markup } from 'telegraf';
import type { InlineKeyboardMarkup, ReplyKeyboardMarkup } from 'telegraf/types';
import type { BotEvent, CallbackEvent, CommandEvent, OutboundResponse, TextEvent } from './events';
import type { Logger } from './logger';
import * as M from './messages';
import { IDLE, type ListView, type Session } from './session';
import type { Category, Item, ShoppingList } from './shoppingList';

// --- TYPES ---
export interface BotDeps {
    list: ShoppingList;
    allowedUsers: readonly number[];
    log: Logger;
}

export interface Outcome {
    session: Session;
    responses: OutboundResponse[];
}

interface Turn {
    event: BotEvent;
    session: Session;
    deps: BotDeps;
    responses: OutboundResponse[];
}

type Button = ReturnType<typeof Markup.button.callback>;

// --- KEYBOARD HELPERS ---
// Telegram rejects messages with more than ~100 inline rows.
const MAX_LIST_ROWS = 90;
const BOTTOM_NAV_ROW_LIMIT = 88;
const PICKER_TOP_SHOW_ALL_THRESHOLD = 6;

const button = (text: string, data: string): Button => Markup.button.callback(text, data);
const inlineKeyboard = (rows: Button[][]): InlineKeyboardMarkup => Markup.inlineKeyboard(rows).reply_markup;

export const mainKeyboard = (): ReplyKeyboardMarkup =>
    Markup.keyboard([
        [M.BUTTON_ADD_ITEM, M.BUTTON_SHOW_LIST],
        [M.BUTTON_TOGGLE_BOUGHT, M.BUTTON_MANAGE_CATS],
    ])
        .resize()
        .persistent().reply_markup;

/** Categories two per row, plus Cancel. */
const createCategoryKeyboard = (categories: Category[]) => {
    const rows: Button[][] = [];
    for (let i = 0; i < categories.length; i += 2) {
        rows.push(categories.slice(i, i + 2).map((c) => button(c.name, `dept_${c.id}`)));
    }
    rows.push([button(M.BUTTON_CANCEL, 'cancel')]);
    return inlineKeyboard(rows);
};

const createCategoryPickKeyboard = (categories: Category[], prefix: string) => {
    const rows = categories.map((c) => [button(c.name, `${prefix}_${c.id}`)]);
    rows.push([button('⬅️ Back', 'cat_menu')]);
    return inlineKeyboard(rows);
};

const categoryMenuKeyboard = () =>
    inlineKeyboard([[button('✏️ Rename', 'cat_rename')], [button('🗑 Delete', 'cat_delete')]]);

const backToCategories = () => [button('⬅️ Back to categories', 'list_cats')];
const modeRow = (editMode: boolean, ref: string) => [
    editMode ? button('✅ Done', `toggle_edit_${ref}`) : button('⚙️ Delete mode', `toggle_edit_${ref}`),
];
const itemRow = (item: Item, editMode: boolean, ref: string) => [
    editMode
        ? button(`🗑 Delete: ${item.name}`, `del_${item.id}_${ref}`)
        : button(`${item.isBought ? '✅' : '⬜️'} ${item.name}`, `tog_${item.id}_${ref}`),
];

// --- RESPONSE HELPERS ---
const chatOf = (turn: Turn) => turn.event.chatId;

function reply(turn: Turn, text: string, extra: { keyboard?: InlineKeyboardMarkup | ReplyKeyboardMarkup; markdown?: boolean } = {}) {
    turn.responses.push({ kind: 'reply', chatId: chatOf(turn), text, ...extra });
}

/** Rewrites the message a callback came from; falls back to a new message when Telegram sent none. */
function editOrReply(turn: Turn, text: string, extra: { keyboard?: InlineKeyboardMarkup; markdown?: boolean } = {}) {
    const { event } = turn;
    if (event.type === 'callback' && event.messageId !== undefined) {
        turn.responses.push({ kind: 'edit', chatId: event.chatId, messageId: event.messageId, text, ...extra });
    } else {
        reply(turn, text, extra);
    }
}

/**
 * Renders a list view into the tracked list message.
 * `null` shows the category picker, `'all'` every item grouped by category.
 */
function showList(turn: Turn, view: ListView, forceNew = false) {
    const { list } = turn.deps;
    const { session } = turn;
    const userId = turn.event.userId;

    let text: string;
    let keyboard: InlineKeyboardMarkup | undefined;

    const category = typeof view === 'number' ? list.category(userId, view) : undefined;
    if (typeof view === 'number' && !category) view = null;
    session.lastView = view;

    if (view === 'all') {
        const items = list.items(userId, session.showBought);
        if (items.length === 0) {
            text = M.MSG_LIST_EMPTY;
        } else {
            text = M.MSG_FULL_LIST + (session.editMode ? M.MSG_EDIT_MODE : '');
            const back = backToCategories();
            const mode = modeRow(session.editMode, 'all');
            let rows: Button[][] = [back, mode];
            for (const c of list.categories(userId)) {
                const inCategory = items.filter((item) => item.categoryId === c.id);
                if (inCategory.length === 0) continue;
                text += `\n*${M.escapeMarkdown(c.name)}*\n`;
                for (const item of inCategory) rows.push(itemRow(item, session.editMode, 'all'));
            }
            if (rows.length > MAX_LIST_ROWS) {
                rows = rows.slice(0, MAX_LIST_ROWS);
                text += M.MSG_LIST_TRUNCATED;
            }
            if (rows.length < BOTTOM_NAV_ROW_LIMIT) rows.push(mode, back);
            keyboard = inlineKeyboard(rows);
        }
    } else if (category) {
        const items = list.items(userId, session.showBought).filter((item) => item.categoryId === category.id);
        const name = M.escapeMarkdown(category.name);
        if (items.length === 0) {
            text = M.format(M.MSG_CATEGORY_EMPTY, name);
            keyboard = inlineKeyboard([[button('⬅️ Back', 'list_cats')]]);
        } else {
            text = M.format(M.MSG_CATEGORY_VIEW, name) + (session.editMode ? M.MSG_EDIT_MODE : '');
            const ref = String(category.id);
            keyboard = inlineKeyboard([
                backToCategories(),
                ...items.map((item) => itemRow(item, session.editMode, ref)),
                modeRow(session.editMode, ref),
                backToCategories(),
            ]);
        }
    } else {
        const categories = list.categoriesWithItems(userId, session.showBought);
        const rows: Button[][] = [];
        if (categories.length > PICKER_TOP_SHOW_ALL_THRESHOLD) rows.push([button('📝 Show all', 'list_all')]);
        for (const c of categories) rows.push([button(c.name, `list_${c.id}`)]);
        rows.push([button('📝 Show all', 'list_all')]);
        text = M.MSG_CHOOSE_CATEGORY;
        keyboard = inlineKeyboard(rows);
    }

    turn.responses.push({
        kind: 'list',
        chatId: chatOf(turn),
        text,
        keyboard,
        previousMessageId: session.lastListMessageId,
        protectedMessageId: session.keyboardMessageId,
        forceNew,
    });
}

function cancelConversation(turn: Turn) {
    turn.session.conversation = IDLE;
    editOrReply(turn, M.MSG_CANCELLED);
}

// --- MAIN MENU BUTTONS ---
function startAddItem(turn: Turn) {
    const { list } = turn.deps;
    const userId = turn.event.userId;
    let categories = list.categories(userId);
    if (categories.length === 0) {
        list.seed(userId);
        categories = list.categories(userId);
    }
    turn.session.conversation = { step: 'choosing_category' };
    reply(turn, M.MSG_CHOOSE_DEPARTMENT, { keyboard: createCategoryKeyboard(categories) });
}

function toggleBoughtView(turn: Turn, event: TextEvent) {
    // The button press itself is removed from the chat.
    turn.responses.push({ kind: 'delete', chatId: event.chatId, messageId: event.messageId });
    turn.session.showBought = !turn.session.showBought;
    showList(turn, turn.session.lastView, true);
}

function onMenuButton(turn: Turn, event: TextEvent, buttonText: string) {
    switch (buttonText) {
        case M.BUTTON_ADD_ITEM:
            return startAddItem(turn);
        case M.BUTTON_SHOW_LIST:
            return showList(turn, null, true);
        case M.BUTTON_TOGGLE_BOUGHT:
            return toggleBoughtView(turn, event);
        case M.BUTTON_MANAGE_CATS:
            return reply(turn, M.MSG_CATEGORY_MENU, { keyboard: categoryMenuKeyboard(), markdown: true });
    }
}

// --- COMMANDS ---
function onCommand(turn: Turn, event: CommandEvent) {
    const { list, log } = turn.deps;
    switch (event.name) {
        case 'start': {
            list.seed(event.userId);
            turn.session.conversation = IDLE;
            log.info(`🌱 Seeded shopping list for user ${event.userId}`);
            turn.responses.push({
                kind: 'reply',
                chatId: event.chatId,
                text: M.MSG_WELCOME,
                keyboard: mainKeyboard(),
                remember: 'keyboard',
            });
            return;
        }
        case 'add_cat': {
            const name = event.args.join(' ').trim();
            if (!name) return reply(turn, M.MSG_ADD_CAT_USAGE);
            return reply(turn, list.addCategory(event.userId, name) ? M.format(M.MSG_CATEGORY_ADDED, name) : M.MSG_CATEGORY_DUPLICATE);
        }
        case 'clear_bought': {
            const removed = list.clearBought(event.userId);
            return reply(turn, removed > 0 ? M.format(M.MSG_BOUGHT_CLEARED, removed) : M.MSG_NO_BOUGHT_ITEMS);
        }
        case 'cancel':
            return cancelConversation(turn);
    }
}

// --- FREE TEXT ---
function onText(turn: Turn, event: TextEvent) {
    const text = event.text.trim();
    const { conversation } = turn.session;

    if (text === M.BUTTON_CANCEL) {
        if (conversation.step !== 'idle') cancelConversation(turn);
        return;
    }
    if (M.MAIN_MENU_BUTTONS.includes(text)) {
        turn.session.conversation = IDLE;
        return onMenuButton(turn, event, text);
    }
    if (!text) return;

    const { list } = turn.deps;
    switch (conversation.step) {
        case 'entering_item_name': {
            turn.session.conversation = IDLE;
            const item = list.addItem(event.userId, text, conversation.categoryId);
            return reply(turn, item ? M.MSG_ITEM_ADDED : M.MSG_CATEGORY_GONE);
        }
        case 'renaming_category': {
            const result = list.renameCategory(event.userId, conversation.categoryId, text);
            // On a name clash the user stays in the rename step and can type another name.
            if (result !== 'exists') turn.session.conversation = IDLE;
            if (result === 'renamed') return reply(turn, M.MSG_CATEGORY_RENAMED);
            return reply(turn, result === 'exists' ? M.MSG_CATEGORY_EXISTS : M.MSG_CATEGORY_GONE);
        }
    }
}

// --- INLINE BUTTONS ---
const parseRef = (ref: string): 'all' | number => (ref === 'all' ? 'all' : Number(ref));

function onCallback(turn: Turn, event: CallbackEvent) {
    const { list } = turn.deps;
    const { session } = turn;
    const { userId, data } = event;
    let match: RegExpExecArray | null;

    if (data === 'cancel') return cancelConversation(turn);

    if ((match = /^dept_(\d+)$/.exec(data))) {
        const category = list.category(userId, Number(match[1]));
        if (!category) {
            session.conversation = IDLE;
            return editOrReply(turn, M.MSG_CATEGORY_GONE);
        }
        session.conversation = { step: 'entering_item_name', categoryId: category.id };
        return editOrReply(turn, `Category: ${category.name}\n\n${M.MSG_ENTER_ITEM_NAME}`);
    }

    if (data === 'list_cats') {
        session.editMode = false;
        return showList(turn, null);
    }
    if ((match = /^list_(all|\d+)$/.exec(data))) return showList(turn, parseRef(match[1]));

    if ((match = /^toggle_edit_(all|\d+)$/.exec(data))) {
        session.editMode = !session.editMode;
        return showList(turn, parseRef(match[1]));
    }
    if ((match = /^tog_(\d+)_(all|\d+)$/.exec(data))) {
        list.toggleBought(userId, Number(match[1]));
        return showList(turn, parseRef(match[2]));
    }
    if ((match = /^del_(\d+)_(all|\d+)$/.exec(data))) {
        list.deleteItem(userId, Number(match[1]));
        return showList(turn, parseRef(match[2]));
    }

    // Category management
    if (data === 'cat_menu') return editOrReply(turn, M.MSG_CATEGORY_MENU, { keyboard: categoryMenuKeyboard(), markdown: true });
    if (data === 'cat_delete') {
        return editOrReply(turn, M.MSG_CHOOSE_CATEGORY_TO_DELETE, {
            keyboard: createCategoryPickKeyboard(list.categories(userId), 'catdel'),
        });
    }
    if (data === 'cat_rename') {
        return editOrReply(turn, M.MSG_CHOOSE_CATEGORY_TO_RENAME, {
            keyboard: createCategoryPickKeyboard(list.categories(userId), 'catren'),
        });
    }
    if ((match = /^catdel_(\d+)$/.exec(data))) {
        const category = list.category(userId, Number(match[1]));
        if (!category) return editOrReply(turn, M.MSG_CATEGORY_GONE);
        const count = list.countItems(userId, category.id);
        return editOrReply(turn, M.format(M.MSG_CONFIRM_DELETE_CATEGORY, M.escapeMarkdown(category.name), count), {
            markdown: true,
            keyboard: inlineKeyboard([
                [button('🗑 Yes, delete', `catdelok_${category.id}`)],
                [button('⬅️ Back', 'cat_menu')],
            ]),
        });
    }
    if ((match = /^catdelok_(\d+)$/.exec(data))) {
        const categoryId = Number(match[1]);
        const removed = list.deleteCategory(userId, categoryId);
        if (removed === undefined) return editOrReply(turn, M.MSG_CATEGORY_GONE);
        if (session.lastView === categoryId) session.lastView = null;
        const { conversation } = session;
        if (
            (conversation.step === 'entering_item_name' || conversation.step === 'renaming_category') &&
            conversation.categoryId === categoryId
        ) {
            session.conversation = IDLE;
        }
        return editOrReply(turn, M.format(M.MSG_CATEGORY_DELETED, removed));
    }
    if ((match = /^catren_(\d+)$/.exec(data))) {
        const category = list.category(userId, Number(match[1]));
        if (!category) return editOrReply(turn, M.MSG_CATEGORY_GONE);
        session.conversation = { step: 'renaming_category', categoryId: category.id };
        return editOrReply(turn, `Category: ${category.name}\n\n${M.MSG_ENTER_NEW_CATEGORY_NAME}`);
    }
}

// --- ENTRY POINT ---
/**
 * Computes the next session state and the responses for one inbound event.
 * Runs inside the runtime's session transaction, so it must stay synchronous.
 */
export function respond(event: BotEvent, session: Session, deps: BotDeps): Outcome {
    const turn: Turn = { event, session: { ...session }, deps, responses: [] };

    if (event.type === 'callback') turn.responses.push({ kind: 'answer', callbackId: event.callbackId });

    if (event.type === 'command' && event.name === 'test') {
        reply(turn, M.MSG_ALIVE);
        return { session: turn.session, responses: turn.responses };
    }

    if (!deps.allowedUsers.includes(event.userId)) {
        deps.log.warn(`⛔ Unauthorized access attempt by user ${event.userId}`);
        reply(turn, M.MSG_ACCESS_DENIED);
        return { session: turn.session, responses: turn.responses };
    }

    switch (event.type) {
        case 'command':
            onCommand(turn, event);
            break;
        case 'text':
            onText(turn, event);
            break;
        case 'callback':
            onCallback(turn, event);
            break;
    }
    return { session: turn.session, responses: turn.responses };
}
