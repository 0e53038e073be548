import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase } from '../database';
import { Deliverable, DELIVERABLE_STATUSES, NewDeliverable } from '../types';
import { nullableText, num, oneOf, text } from '../values';

const DELIVERABLE_COLUMNS = 'id, project_id, title, status, owner, cost, due_date';

function rowToDeliverable(row: SqlValue[]): Deliverable {
    return {
        id: text(row[0]),
        project_id: text(row[1]),
        title: text(row[2]),
        status: oneOf(DELIVERABLE_STATUSES, row[3], 'Pending'),
        owner: text(row[4]),
        cost: num(row[5]),
        due_date: nullableText(row[6]),
    };
}

export const DeliverableRepo = {
    listByProject(projectId: string): Deliverable[] {
        const db = getDatabase();
        const result = db.exec(
            `SELECT ${DELIVERABLE_COLUMNS} FROM deliverables WHERE project_id = ? ORDER BY rowid ASC`,
            [projectId]
        );
        if (result.length === 0) return [];
        return result[0].values.map(rowToDeliverable);
    },

    get(id: string): Deliverable | null {
        const db = getDatabase();
        const stmt = db.prepare(`SELECT ${DELIVERABLE_COLUMNS} FROM deliverables WHERE id = ?`);
        stmt.bind([id]);
        if (stmt.step()) {
            const row = stmt.get();
            stmt.free();
            return rowToDeliverable(row);
        }
        stmt.free();
        return null;
    },

    create(data: NewDeliverable): Deliverable {
        const db = getDatabase();
        const id = uuid();

        db.run(
            `INSERT INTO deliverables (${DELIVERABLE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
            [id, data.project_id, data.title, data.status ?? 'Pending', data.owner ?? 'Agent', data.cost ?? 0, data.due_date ?? null]
        );
        saveDatabase();

        const created = this.get(id);
        if (!created) {
            throw new Error(`Deliverable ${id} was not persisted`);
        }
        return created;
    },
};
