import type { SqlValue } from 'sql.js';

export function text(value: SqlValue | undefined): string {
    if (value === null || value === undefined) return '';
    return typeof value === 'string' ? value : String(value);
}

export function nullableText(value: SqlValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : String(value);
}

export function num(value: SqlValue | undefined): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

/** Narrows a stored string to a known literal, falling back when the row holds something else. */
export function oneOf<T extends string>(allowed: readonly T[], value: SqlValue | undefined, fallback: T): T {
    const raw = nullableText(value);
    const match = allowed.find(candidate => candidate === raw);
    return match ?? fallback;
}

export function parseStringList(raw: string | null | undefined): string[] {
    if (!raw) return [];
    try {
        const parsed: unknown = JSON.parse(raw);
        return Array.isArray(parsed) ? parsed.map(item => String(item)) : [];
    } catch {
        return [];
    }
}

/**
 * Builds the SET clause of a partial update from the defined keys of `data`.
 * Only keys listed in `columns` are considered.
 */
export function buildUpdate<T extends object>(data: T, columns: readonly (keyof T & string)[]): { sets: string[]; values: SqlValue[] } {
    const sets: string[] = [];
    const values: SqlValue[] = [];
    for (const column of columns) {
        const value = data[column];
        if (value === undefined) continue;
        sets.push(`${column} = ?`);
        values.push(toSqlValue(value));
    }
    return { sets, values };
}

function toSqlValue(value: unknown): SqlValue {
    if (value === null) return null;
    if (typeof value === 'string' || typeof value === 'number') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    return JSON.stringify(value);
}
