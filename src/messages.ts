// src/messages.ts

// Main reply-keyboard buttons
export const BUTTON_ADD_ITEM = '➕ Add';
export const BUTTON_SHOW_LIST = '📋 List';
export const BUTTON_TOGGLE_BOUGHT = '👁 Show/Hide bought';
export const BUTTON_MANAGE_CATS = '⚙️ Categories';
export const BUTTON_CANCEL = '❌ Cancel';

export const MAIN_MENU_BUTTONS = [BUTTON_ADD_ITEM, BUTTON_SHOW_LIST, BUTTON_TOGGLE_BOUGHT, BUTTON_MANAGE_CATS];

export const MSG_WELCOME = `Hi! 👋

This bot keeps your shopping list.

Use the buttons below to:
• Add an item
• Show the shopping list
• Show/hide bought items
• Manage categories

/clear_bought removes every bought item.`;

export const MSG_ALIVE = 'The bot is up and can see your messages! ✅';
export const MSG_ACCESS_DENIED = "⛔️ You don't have access to this bot.";
export const MSG_CANCELLED = 'Cancelled.';
export const MSG_CHOOSE_DEPARTMENT = 'Choose a category for the item:';
export const MSG_ENTER_ITEM_NAME = 'Type the item name:';
export const MSG_ITEM_ADDED = '✅ Item added to the list!';
export const MSG_LIST_EMPTY = '📭 The shopping list is empty.';
export const MSG_BOUGHT_CLEARED = '🗑 Removed {} bought items.';
export const MSG_NO_BOUGHT_ITEMS = 'There are no bought items to remove.';
export const MSG_ADD_CAT_USAGE = 'Usage: /add_cat Category name';
export const MSG_CATEGORY_ADDED = "✅ Category '{}' added.";
export const MSG_CATEGORY_DUPLICATE = '❌ That category already exists.';
export const MSG_CATEGORY_GONE = 'That category no longer exists.';

// Category management
export const MSG_CATEGORY_MENU = '⚙️ *Category management*\n\nChoose an action (add one with /add\\_cat):';
export const MSG_CHOOSE_CATEGORY_TO_DELETE = 'Choose a category to delete:';
export const MSG_CHOOSE_CATEGORY_TO_RENAME = 'Choose a category to rename:';
export const MSG_ENTER_NEW_CATEGORY_NAME = 'Type the new category name:';
export const MSG_CATEGORY_DELETED = '✅ Category deleted together with {} items.';
export const MSG_CATEGORY_RENAMED = '✅ Category renamed.';
export const MSG_CATEGORY_EXISTS = '❌ A category with that name already exists.';
export const MSG_CONFIRM_DELETE_CATEGORY = '⚠️ Delete category *{}*?\n\nIt holds {} items. All of them will be deleted!';

// List views
export const MSG_CHOOSE_CATEGORY = '🗂 *Choose a category:*';
export const MSG_FULL_LIST = '📋 *Full list:*\n';
export const MSG_CATEGORY_VIEW = '📂 *Category:* {}\n';
export const MSG_CATEGORY_EMPTY = 'Category *{}* is empty.';
export const MSG_EDIT_MODE = '⚠️ _Delete mode_\n';
export const MSG_LIST_TRUNCATED = '\n\n⚠️ _The list is too long, only the first items are shown._';

/** Fills `{}` placeholders left to right. */
export function format(template: string, ...values: Array<string | number>): string {
    let index = 0;
    return template.replace(/\{\}/g, () => String(values[index++] ?? ''));
}

/** Escapes user-provided text for Telegram's legacy Markdown parse mode. */
export function escapeMarkdown(text: string): string {
    return text.replace(/([_*`[])/g, '\\$1');
}
