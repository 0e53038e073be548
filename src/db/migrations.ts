import type { Database } from 'sql.js';
import { STATE_DEFINITIONS } from '../workflow/states';

/**
 * Migration definition
 */
interface Migration {
    version: number;
    name: string;
    up: (db: Database) => void;
}

function columnNames(db: Database, table: string): string[] {
    const result = db.exec(`PRAGMA table_info(${table})`);
    if (result.length === 0) return [];
    return result[0].values.map(row => String(row[1]));
}

/**
 * All migrations in order. Each migration should be idempotent where possible.
 * Version numbers must be sequential and never reused.
 */
export const MIGRATIONS: Migration[] = [
    {
        version: 1,
        name: 'add_workflow_state_id',
        up: (db: Database) => {
            if (!columnNames(db, 'workflow_steps').includes('state_id')) {
                db.run('ALTER TABLE workflow_steps ADD COLUMN state_id TEXT');
            }
            // Steps written before state ids existed are matched by their type and display title
            for (const def of STATE_DEFINITIONS) {
                db.run(
                    'UPDATE workflow_steps SET state_id = ? WHERE state_id IS NULL AND step_type = ? AND title = ?',
                    [def.id, def.stepType, def.title]
                );
            }
        }
    },
    {
        version: 2,
        name: 'add_deliverable_cost',
        up: (db: Database) => {
            if (!columnNames(db, 'deliverables').includes('cost')) {
                db.run('ALTER TABLE deliverables ADD COLUMN cost REAL NOT NULL DEFAULT 0');
            }
        }
    }
];

/**
 * Create the schema_migrations table if it doesn't exist
 */
function ensureMigrationsTable(db: Database): void {
    db.run(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            version INTEGER PRIMARY KEY,
            name TEXT NOT NULL,
            applied_at TEXT NOT NULL
        )
    `);
}

function getAppliedVersions(db: Database): Set<number> {
    const result = db.exec('SELECT version FROM schema_migrations');
    if (result.length === 0) return new Set();
    return new Set(result[0].values.map(row => Number(row[0])));
}

function recordMigration(db: Database, migration: Migration): void {
    db.run(
        'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
        [migration.version, migration.name, new Date().toISOString()]
    );
}

/**
 * Run all pending migrations in order
 * @returns Array of migration names that were applied
 */
export function runMigrations(db: Database, migrations: Migration[] = MIGRATIONS): string[] {
    ensureMigrationsTable(db);

    const applied = getAppliedVersions(db);
    const pending = migrations
        .filter(m => !applied.has(m.version))
        .sort((a, b) => a.version - b.version);
    const appliedNames: string[] = [];

    for (const migration of pending) {
        console.log(`[Database] Running migration ${migration.version}: ${migration.name}`);
        try {
            migration.up(db);
            recordMigration(db, migration);
            appliedNames.push(migration.name);
        } catch (error) {
            console.error(`[Database] Migration ${migration.version} failed:`, error);
            throw error;
        }
    }

    if (appliedNames.length > 0) {
        console.log(`[Database] Applied ${appliedNames.length} migration(s)`);
    }

    return appliedNames;
}

/**
 * Get current schema version (highest applied migration)
 */
export function getSchemaVersion(db: Database): number {
    ensureMigrationsTable(db);
    const result = db.exec('SELECT MAX(version) FROM schema_migrations');
    if (result.length === 0 || result[0].values[0][0] === null) return 0;
    return Number(result[0].values[0][0]);
}
