import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase } from '../database';
import { NewTask, Task, TASK_PRIORITIES, TASK_STATUSES, TaskStatus } from '../types';
import { buildUpdate, nullableText, oneOf, text } from '../values';

const TASK_COLUMNS = 'id, project_id, title, priority, status, phase, due_date, created_at';

type TaskPatch = Partial<Omit<Task, 'id' | 'created_at'>>;
const UPDATABLE: (keyof TaskPatch & string)[] = ['project_id', 'title', 'priority', 'status', 'phase', 'due_date'];

function rowToTask(row: SqlValue[]): Task {
    return {
        id: text(row[0]),
        project_id: nullableText(row[1]),
        title: text(row[2]),
        priority: oneOf(TASK_PRIORITIES, row[3], 'Normal'),
        status: oneOf(TASK_STATUSES, row[4], 'Todo'),
        phase: nullableText(row[5]),
        due_date: nullableText(row[6]),
        created_at: text(row[7]),
    };
}

export const TaskRepo = {
    list(options?: { project_id?: string | null; status?: TaskStatus; limit?: number }): Task[] {
        const db = getDatabase();
        let sql = `SELECT ${TASK_COLUMNS} FROM tasks`;
        const conditions: string[] = [];
        const values: SqlValue[] = [];

        if (options?.project_id !== undefined) {
            if (options.project_id === null) {
                conditions.push('project_id IS NULL');
            } else {
                conditions.push('project_id = ?');
                values.push(options.project_id);
            }
        }
        if (options?.status) {
            conditions.push('status = ?');
            values.push(options.status);
        }

        if (conditions.length > 0) {
            sql += ' WHERE ' + conditions.join(' AND ');
        }
        sql += ' ORDER BY created_at ASC, rowid ASC';

        if (options?.limit) {
            sql += ' LIMIT ?';
            values.push(options.limit);
        }

        const result = db.exec(sql, values);
        if (result.length === 0) return [];
        return result[0].values.map(rowToTask);
    },

    get(id: string): Task | null {
        const db = getDatabase();
        const stmt = db.prepare(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = ?`);
        stmt.bind([id]);
        if (stmt.step()) {
            const row = stmt.get();
            stmt.free();
            return rowToTask(row);
        }
        stmt.free();
        return null;
    },

    create(data: NewTask): Task {
        const db = getDatabase();
        const id = uuid();
        const now = new Date().toISOString();

        db.run(
            `INSERT INTO tasks (${TASK_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                id,
                data.project_id ?? null,
                data.title,
                data.priority ?? 'Normal',
                data.status ?? 'Todo',
                data.phase ?? null,
                data.due_date ?? null,
                now,
            ]
        );
        saveDatabase();

        const created = this.get(id);
        if (!created) {
            throw new Error(`Task ${id} was not persisted`);
        }
        return created;
    },

    update(id: string, data: TaskPatch): Task | null {
        const db = getDatabase();
        const { sets, values } = buildUpdate(data, UPDATABLE);

        if (sets.length === 0) return this.get(id);

        values.push(id);
        db.run(`UPDATE tasks SET ${sets.join(', ')} WHERE id = ?`, values);
        saveDatabase();

        return this.get(id);
    },

    delete(id: string): void {
        const db = getDatabase();
        db.run('DELETE FROM tasks WHERE id = ?', [id]);
        saveDatabase();
    },
};
