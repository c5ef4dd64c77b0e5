// src/shoppingList.ts

import type Database from 'better-sqlite3';
import seed from './data/seed.json';

export interface Category {
    id: number;
    name: string;
}

export interface Item {
    id: number;
    name: string;
    categoryId: number;
    isBought: boolean;
    createdAt: string;
}

export type RenameResult = 'renamed' | 'exists' | 'missing';

interface SeedData {
    categories: string[];
    items: Record<string, string[]>;
}

interface ItemRow {
    id: number;
    name: string;
    category_id: number;
    is_bought: number;
    created_at: string;
}

const SEED: SeedData = seed;

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    UNIQUE(user_id, name)
);

CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
    is_bought INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_items_user_id ON items(user_id);
CREATE INDEX IF NOT EXISTS idx_items_category_id ON items(category_id);
`;

const toItem = (row: ItemRow): Item => ({
    id: row.id,
    name: row.name,
    categoryId: row.category_id,
    isBought: row.is_bought === 1,
    createdAt: row.created_at,
});

/**
 * Per-user categories and items, kept in the state store's SQLite file.
 * Every query is scoped by `userId`; ids of other users' rows behave as missing.
 */
export class ShoppingList {
    constructor(private readonly db: Database.Database) {
        db.exec(SCHEMA_SQL);
    }

    /**
     * Adds the default categories the user lacks, and the default items when
     * the user has no items at all.
     */
    seed(userId: number): void {
        this.db.transaction(() => {
            const insertCategory = this.db.prepare<[number, string]>(
                'INSERT OR IGNORE INTO categories (user_id, name) VALUES (?, ?)',
            );
            for (const name of SEED.categories) insertCategory.run(userId, name);

            const existing = this.db
                .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM items WHERE user_id = ?')
                .get(userId);
            if ((existing?.count ?? 0) > 0) return;

            const byName = new Map(this.categories(userId).map(c => [c.name, c.id]));
            const insertItem = this.db.prepare<[number, string, number]>(
                'INSERT INTO items (user_id, name, category_id, is_bought) VALUES (?, ?, ?, 0)',
            );
            for (const [categoryName, names] of Object.entries(SEED.items)) {
                const categoryId = byName.get(categoryName);
                if (categoryId === undefined) continue;
                for (const name of names) insertItem.run(userId, name, categoryId);
            }
        })();
    }

    categories(userId: number): Category[] {
        return this.db
            .prepare<[number], Category>('SELECT id, name FROM categories WHERE user_id = ? ORDER BY id')
            .all(userId);
    }

    category(userId: number, categoryId: number): Category | undefined {
        return this.db
            .prepare<[number, number], Category>('SELECT id, name FROM categories WHERE user_id = ? AND id = ?')
            .get(userId, categoryId);
    }

    /** Categories holding at least one item; only unbought items count unless `includeBought`. */
    categoriesWithItems(userId: number, includeBought = false): Category[] {
        const boughtFilter = includeBought ? '' : 'AND i.is_bought = 0';
        return this.db
            .prepare<[number], Category>(`
                SELECT DISTINCT c.id, c.name
                FROM categories c
                INNER JOIN items i ON i.category_id = c.id AND i.user_id = c.user_id
                WHERE c.user_id = ? ${boughtFilter}
                ORDER BY c.id
            `)
            .all(userId);
    }

    /** Returns false when the user already has a category with this name. */
    addCategory(userId: number, name: string): boolean {
        const result = this.db
            .prepare<[number, string]>('INSERT OR IGNORE INTO categories (user_id, name) VALUES (?, ?)')
            .run(userId, name);
        return result.changes > 0;
    }

    renameCategory(userId: number, categoryId: number, name: string): RenameResult {
        const category = this.category(userId, categoryId);
        if (!category) return 'missing';
        if (category.name === name) return 'renamed';
        const clash = this.db
            .prepare<[number, string], { id: number }>('SELECT id FROM categories WHERE user_id = ? AND name = ?')
            .get(userId, name);
        if (clash) return 'exists';
        this.db
            .prepare<[string, number, number]>('UPDATE categories SET name = ? WHERE id = ? AND user_id = ?')
            .run(name, categoryId, userId);
        return 'renamed';
    }

    /** Deletes the category with its items; returns how many items went with it. */
    deleteCategory(userId: number, categoryId: number): number | undefined {
        return this.db.transaction(() => {
            if (!this.category(userId, categoryId)) return undefined;
            const removed = this.db
                .prepare<[number, number]>('DELETE FROM items WHERE user_id = ? AND category_id = ?')
                .run(userId, categoryId);
            this.db
                .prepare<[number, number]>('DELETE FROM categories WHERE user_id = ? AND id = ?')
                .run(userId, categoryId);
            return removed.changes;
        })();
    }

    countItems(userId: number, categoryId: number): number {
        const row = this.db
            .prepare<[number, number], { count: number }>(
                'SELECT COUNT(*) AS count FROM items WHERE user_id = ? AND category_id = ?',
            )
            .get(userId, categoryId);
        return row?.count ?? 0;
    }

    /** Items sorted by name, case-insensitively. Bought items are left out unless `includeBought`. */
    items(userId: number, includeBought = false): Item[] {
        const boughtFilter = includeBought ? '' : 'AND is_bought = 0';
        return this.db
            .prepare<[number], ItemRow>(`
                SELECT id, name, category_id, is_bought, created_at
                FROM items
                WHERE user_id = ? ${boughtFilter}
                ORDER BY name COLLATE NOCASE, id
            `)
            .all(userId)
            .map(toItem);
    }

    addItem(userId: number, name: string, categoryId: number): Item | undefined {
        if (!this.category(userId, categoryId)) return undefined;
        const result = this.db
            .prepare<[number, string, number]>(
                'INSERT INTO items (user_id, name, category_id, is_bought) VALUES (?, ?, ?, 0)',
            )
            .run(userId, name, categoryId);
        const row = this.db
            .prepare<[number], ItemRow>('SELECT id, name, category_id, is_bought, created_at FROM items WHERE id = ?')
            .get(Number(result.lastInsertRowid));
        return row ? toItem(row) : undefined;
    }

    /** Flips the bought flag; resolves to the new flag, or undefined for an unknown item. */
    toggleBought(userId: number, itemId: number): boolean | undefined {
        const row = this.db
            .prepare<[number, number], { is_bought: number }>(
                'SELECT is_bought FROM items WHERE id = ? AND user_id = ?',
            )
            .get(itemId, userId);
        if (!row) return undefined;
        const next = row.is_bought === 1 ? 0 : 1;
        this.db
            .prepare<[number, number, number]>('UPDATE items SET is_bought = ? WHERE id = ? AND user_id = ?')
            .run(next, itemId, userId);
        return next === 1;
    }

    deleteItem(userId: number, itemId: number): boolean {
        return this.db
            .prepare<[number, number]>('DELETE FROM items WHERE id = ? AND user_id = ?')
            .run(itemId, userId).changes > 0;
    }

    clearBought(userId: number): number {
        return this.db
            .prepare<[number]>('DELETE FROM items WHERE user_id = ? AND is_bought = 1')
            .run(userId).changes;
    }
}
