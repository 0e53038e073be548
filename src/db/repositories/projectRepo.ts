import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase, withTransaction } from '../database';
import { NewProject, Project, ProjectPatch, PROJECT_STAGES, REVIEW_STATUSES } from '../types';
import { buildUpdate, nullableText, num, oneOf, text } from '../values';

const PROJECT_COLUMNS = 'id, name, category, client, stage, status, review_status, budget_cap, invoiced_total, internal_cost, client_brief, executive_summary, strategic_tensions, design_principles, created_at, updated_at';

const UPDATABLE: (keyof ProjectPatch & string)[] = [
    'name', 'category', 'client', 'stage', 'status', 'review_status', 'budget_cap', 'invoiced_total',
    'internal_cost', 'client_brief', 'executive_summary', 'strategic_tensions', 'design_principles',
];

// Children are removed explicitly: sql.js resets PRAGMA foreign_keys whenever the file is exported
const CHILD_TABLES = ['workflow_steps', 'deliverables', 'tasks', 'documents', 'risks', 'invoices', 'activity_log'];

function rowToProject(row: SqlValue[]): Project {
    return {
        id: text(row[0]),
        name: text(row[1]),
        category: text(row[2]),
        client: nullableText(row[3]),
        stage: oneOf(PROJECT_STAGES, row[4], 'Intake'),
        status: text(row[5]),
        review_status: oneOf(REVIEW_STATUSES, row[6], 'PENDING'),
        budget_cap: num(row[7]),
        invoiced_total: num(row[8]),
        internal_cost: num(row[9]),
        client_brief: text(row[10]),
        executive_summary: nullableText(row[11]),
        strategic_tensions: text(row[12]) || '[]',
        design_principles: text(row[13]) || '[]',
        created_at: text(row[14]),
        updated_at: text(row[15]),
    };
}

export const ProjectRepo = {
    list(): Project[] {
        const db = getDatabase();
        const result = db.exec(`SELECT ${PROJECT_COLUMNS} FROM projects ORDER BY created_at ASC`);
        if (result.length === 0) return [];
        return result[0].values.map(rowToProject);
    },

    get(id: string): Project | null {
        const db = getDatabase();
        const stmt = db.prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = ?`);
        stmt.bind([id]);
        if (stmt.step()) {
            const row = stmt.get();
            stmt.free();
            return rowToProject(row);
        }
        stmt.free();
        return null;
    },

    create(data: NewProject): Project {
        const db = getDatabase();
        const id = uuid();
        const now = new Date().toISOString();
        const stage = data.stage ?? 'Intake';

        db.run(
            `INSERT INTO projects (${PROJECT_COLUMNS})
             VALUES (?, ?, ?, ?, ?, ?, 'PENDING', ?, 0, 0, ?, ?, ?, ?, ?, ?)`,
            [
                id,
                data.name,
                data.category || 'Brand Identity',
                data.client ?? null,
                stage,
                data.status || stage,
                data.budget_cap ?? 0,
                data.client_brief ?? '',
                data.executive_summary ?? null,
                data.strategic_tensions ?? '[]',
                data.design_principles ?? '[]',
                now,
                now,
            ]
        );
        saveDatabase();

        const created = this.get(id);
        if (!created) {
            throw new Error(`Project ${id} was not persisted`);
        }
        return created;
    },

    update(id: string, data: ProjectPatch): Project | null {
        const db = getDatabase();
        const { sets, values } = buildUpdate(data, UPDATABLE);

        if (sets.length === 0) return this.get(id);

        sets.push('updated_at = ?');
        values.push(new Date().toISOString());
        values.push(id);

        db.run(`UPDATE projects SET ${sets.join(', ')} WHERE id = ?`, values);
        saveDatabase();

        return this.get(id);
    },

    /**
     * Delete a project together with every row that belongs to it
     */
    delete(id: string): void {
        withTransaction(() => {
            const db = getDatabase();
            for (const table of CHILD_TABLES) {
                db.run(`DELETE FROM ${table} WHERE project_id = ?`, [id]);
            }
            db.run('DELETE FROM projects WHERE id = ?', [id]);
        });
    },
};
