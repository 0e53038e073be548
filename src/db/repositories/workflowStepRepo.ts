import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase } from '../database';
import { NewWorkflowStep, PHASES, STEP_STATUSES, STEP_TYPES, StepOption, WorkflowStep } from '../types';
import { nullableText, num, oneOf, text } from '../values';

const STEP_COLUMNS = 'id, project_id, state_id, step_type, agent, title, body, options_json, chosen_option, status, phase, sort_order, created_at, resolved_at';

function isOption(value: unknown): value is StepOption {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseOptions(raw: string | null): StepOption[] {
    if (!raw) return [];
    try {
        const parsed: unknown = JSON.parse(raw);
        return Array.isArray(parsed) ? parsed.filter(isOption) : [];
    } catch {
        console.warn('[WorkflowStepRepo] Ignoring unreadable options_json');
        return [];
    }
}

function rowToStep(row: SqlValue[]): WorkflowStep {
    return {
        id: text(row[0]),
        project_id: text(row[1]),
        state_id: nullableText(row[2]),
        step_type: oneOf(STEP_TYPES, row[3], 'agent_output'),
        agent: text(row[4]),
        title: text(row[5]),
        body: text(row[6]),
        options: parseOptions(nullableText(row[7])),
        chosen_option: nullableText(row[8]),
        status: oneOf(STEP_STATUSES, row[9], 'active'),
        phase: oneOf(PHASES, row[10], 'strategy'),
        sort_order: num(row[11]),
        created_at: text(row[12]),
        resolved_at: nullableText(row[13]),
    };
}

export const WorkflowStepRepo = {
    listByProject(projectId: string): WorkflowStep[] {
        const db = getDatabase();
        const result = db.exec(
            `SELECT ${STEP_COLUMNS} FROM workflow_steps WHERE project_id = ? ORDER BY sort_order ASC, created_at ASC`,
            [projectId]
        );
        if (result.length === 0) return [];
        return result[0].values.map(rowToStep);
    },

    listActive(projectId: string): WorkflowStep[] {
        return this.listByProject(projectId).filter(step => step.status === 'active');
    },

    countByProject(projectId: string): number {
        const db = getDatabase();
        const result = db.exec('SELECT COUNT(*) FROM workflow_steps WHERE project_id = ?', [projectId]);
        if (result.length === 0) return 0;
        return num(result[0].values[0][0]);
    },

    get(id: string): WorkflowStep | null {
        const db = getDatabase();
        const stmt = db.prepare(`SELECT ${STEP_COLUMNS} FROM workflow_steps WHERE id = ?`);
        stmt.bind([id]);
        if (stmt.step()) {
            const row = stmt.get();
            stmt.free();
            return rowToStep(row);
        }
        stmt.free();
        return null;
    },

    create(data: NewWorkflowStep): WorkflowStep {
        const db = getDatabase();
        const id = uuid();
        const now = new Date().toISOString();

        db.run(
            `INSERT INTO workflow_steps (${STEP_COLUMNS})
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, NULL, ?, ?, ?, ?, ?)`,
            [
                id,
                data.project_id,
                data.state_id,
                data.step_type,
                data.agent,
                data.title,
                data.body,
                JSON.stringify(data.options ?? []),
                data.status ?? 'active',
                data.phase,
                data.sort_order,
                now,
                data.resolved_at ?? null,
            ]
        );
        saveDatabase();

        const created = this.get(id);
        if (!created) {
            throw new Error(`Workflow step ${id} was not persisted`);
        }
        return created;
    },

    /**
     * Mark a step resolved, recording what the founder chose or wrote
     */
    resolve(id: string, chosenOption: string, resolvedAt: string = new Date().toISOString()): WorkflowStep | null {
        const db = getDatabase();
        db.run(
            "UPDATE workflow_steps SET status = 'resolved', chosen_option = ?, resolved_at = ? WHERE id = ?",
            [chosenOption, resolvedAt, id]
        );
        saveDatabase();
        return this.get(id);
    },
};
