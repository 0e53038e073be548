import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase } from '../database';
import { DOC_TYPES, Document, NewDocument } from '../types';
import { nullableText, num, oneOf, text } from '../values';

const DOCUMENT_COLUMNS = 'id, project_id, name, category, doc_type, content, version, updated_at';

function rowToDocument(row: SqlValue[]): Document {
    return {
        id: text(row[0]),
        project_id: text(row[1]),
        name: text(row[2]),
        category: text(row[3]),
        doc_type: oneOf(DOC_TYPES, row[4], 'text'),
        content: nullableText(row[5]),
        version: num(row[6]),
        updated_at: text(row[7]),
    };
}

export const DocumentRepo = {
    listByProject(projectId: string): Document[] {
        const db = getDatabase();
        const result = db.exec(
            `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE project_id = ? ORDER BY rowid ASC`,
            [projectId]
        );
        if (result.length === 0) return [];
        return result[0].values.map(rowToDocument);
    },

    get(id: string): Document | null {
        const db = getDatabase();
        const stmt = db.prepare(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = ?`);
        stmt.bind([id]);
        if (stmt.step()) {
            const row = stmt.get();
            stmt.free();
            return rowToDocument(row);
        }
        stmt.free();
        return null;
    },

    create(data: NewDocument): Document {
        const db = getDatabase();
        const id = uuid();
        const now = new Date().toISOString();

        db.run(
            `INSERT INTO documents (${DOCUMENT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, 1, ?)`,
            [id, data.project_id, data.name, data.category ?? 'General', data.doc_type ?? 'text', data.content ?? null, now]
        );
        saveDatabase();

        const created = this.get(id);
        if (!created) {
            throw new Error(`Document ${id} was not persisted`);
        }
        return created;
    },

    /**
     * Human edit. A content change bumps the version; a rename alone does not.
     */
    update(id: string, data: { name?: string; content?: string }): Document | null {
        const db = getDatabase();
        const sets: string[] = [];
        const values: SqlValue[] = [];

        if (data.content !== undefined) {
            sets.push('content = ?', 'version = version + 1');
            values.push(data.content);
        }
        if (data.name !== undefined) {
            sets.push('name = ?');
            values.push(data.name);
        }

        if (sets.length === 0) return this.get(id);

        sets.push('updated_at = ?');
        values.push(new Date().toISOString());
        values.push(id);

        db.run(`UPDATE documents SET ${sets.join(', ')} WHERE id = ?`, values);
        saveDatabase();

        return this.get(id);
    },
};
