import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase } from '../database';
import { ActivityLog, LOG_SEVERITIES, NewActivityLog } from '../types';
import { nullableText, oneOf, text } from '../values';

const LOG_COLUMNS = 'id, project_id, agent, message, severity, created_at';

function rowToLog(row: SqlValue[]): ActivityLog {
    return {
        id: text(row[0]),
        project_id: nullableText(row[1]),
        agent: text(row[2]),
        message: text(row[3]),
        severity: oneOf(LOG_SEVERITIES, row[4], 'INFO'),
        created_at: text(row[5]),
    };
}

export const ActivityLogRepo = {
    /** Newest first */
    recent(limit: number = 50, projectId?: string): ActivityLog[] {
        const db = getDatabase();
        const result = projectId
            ? db.exec(`SELECT ${LOG_COLUMNS} FROM activity_log WHERE project_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`, [projectId, limit])
            : db.exec(`SELECT ${LOG_COLUMNS} FROM activity_log ORDER BY created_at DESC, rowid DESC LIMIT ?`, [limit]);
        if (result.length === 0) return [];
        return result[0].values.map(rowToLog);
    },

    append(data: NewActivityLog): ActivityLog {
        const db = getDatabase();
        const entry: ActivityLog = {
            id: uuid(),
            project_id: data.project_id ?? null,
            agent: data.agent,
            message: data.message,
            severity: data.severity ?? 'INFO',
            created_at: new Date().toISOString(),
        };
        db.run(
            `INSERT INTO activity_log (${LOG_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?)`,
            [entry.id, entry.project_id, entry.agent, entry.message, entry.severity, entry.created_at]
        );
        saveDatabase();
        return entry;
    },
};
