import type { SqlValue } from 'sql.js';
import { v4 as uuid } from 'uuid';
import { getDatabase, saveDatabase } from '../database';
import { Invoice, INVOICE_STATUSES, InvoiceStatus, Risk, RISK_SEVERITIES, RISK_STATUSES, RiskSeverity } from '../types';
import { nullableText, num, oneOf, text } from '../values';

function rowToRisk(row: SqlValue[]): Risk {
    return {
        id: text(row[0]),
        project_id: text(row[1]),
        description: text(row[2]),
        severity: oneOf(RISK_SEVERITIES, row[3], 'Low'),
        category: text(row[4]),
        status: oneOf(RISK_STATUSES, row[5], 'Active'),
    };
}

function rowToInvoice(row: SqlValue[]): Invoice {
    return {
        id: text(row[0]),
        project_id: text(row[1]),
        amount: num(row[2]),
        status: oneOf(INVOICE_STATUSES, row[3], 'Draft'),
        due_date: nullableText(row[4]),
    };
}

export const RiskRepo = {
    listByProject(projectId: string): Risk[] {
        const db = getDatabase();
        const result = db.exec(
            'SELECT id, project_id, description, severity, category, status FROM risks WHERE project_id = ? ORDER BY rowid ASC',
            [projectId]
        );
        if (result.length === 0) return [];
        return result[0].values.map(rowToRisk);
    },

    create(data: { project_id: string; description: string; severity?: RiskSeverity; category?: string }): Risk {
        const db = getDatabase();
        const id = uuid();
        const severity = data.severity ?? 'Low';
        const category = data.category ?? 'General';
        db.run(
            "INSERT INTO risks (id, project_id, description, severity, category, status) VALUES (?, ?, ?, ?, ?, 'Active')",
            [id, data.project_id, data.description, severity, category]
        );
        saveDatabase();
        return { id, project_id: data.project_id, description: data.description, severity, category, status: 'Active' };
    },
};

export const InvoiceRepo = {
    listByProject(projectId: string): Invoice[] {
        const db = getDatabase();
        const result = db.exec(
            'SELECT id, project_id, amount, status, due_date FROM invoices WHERE project_id = ? ORDER BY rowid ASC',
            [projectId]
        );
        if (result.length === 0) return [];
        return result[0].values.map(rowToInvoice);
    },

    create(data: { project_id: string; amount: number; status?: InvoiceStatus; due_date?: string | null }): Invoice {
        const db = getDatabase();
        const id = uuid();
        const status = data.status ?? 'Draft';
        const dueDate = data.due_date ?? null;
        db.run(
            'INSERT INTO invoices (id, project_id, amount, status, due_date) VALUES (?, ?, ?, ?, ?)',
            [id, data.project_id, data.amount, status, dueDate]
        );
        saveDatabase();
        return { id, project_id: data.project_id, amount: data.amount, status, due_date: dueDate };
    },
};
