import initSqlJs, { Database } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { SCHEMA } from './schema';
import { runMigrations } from './migrations';

let db: Database | null = null;
let dbPath: string | null = null;
let transactionDepth = 0;

/**
 * Opens the studio database. Pass `null` to keep everything in memory (tests, dry runs).
 */
export async function initDatabase(filePath: string | null): Promise<Database> {
    if (db) {
        closeDatabase();
    }

    // A wasm file shipped next to the compiled code wins over the one in node_modules
    const wasmPath = path.join(__dirname, 'sql-wasm.wasm');
    const SQL = await initSqlJs({
        locateFile: (file: string, scriptDirectory: string) => {
            if (file === 'sql-wasm.wasm' && fs.existsSync(wasmPath)) {
                return wasmPath;
            }
            return path.join(scriptDirectory, file);
        }
    });

    dbPath = filePath;
    const existing = dbPath !== null && fs.existsSync(dbPath);

    if (dbPath && existing) {
        db = new SQL.Database(fs.readFileSync(dbPath));
    } else {
        if (dbPath) {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        db = new SQL.Database();
    }
    db.run(SCHEMA);

    const applied = runMigrations(db);
    if (applied.length > 0 || !existing) {
        saveDatabase();
    }

    return db;
}

export function getDatabase(): Database {
    if (!db) {
        throw new Error('Database not initialized. Call initDatabase first.');
    }
    return db;
}

/**
 * Writes the database to disk. Deferred while a transaction is open, since
 * `export()` reopens the connection and would drop it.
 */
export function saveDatabase(): void {
    if (!db) {
        throw new Error('Database not initialized');
    }
    if (transactionDepth > 0 || !dbPath) {
        return;
    }
    const data = db.export();
    fs.writeFileSync(dbPath, Buffer.from(data));
}

/**
 * Runs `work` as one unit: every write inside commits together or not at all.
 * Nested calls join the outer transaction.
 */
export function withTransaction<T>(work: () => T): T {
    const database = getDatabase();
    if (transactionDepth > 0) {
        transactionDepth++;
        try {
            return work();
        } finally {
            transactionDepth--;
        }
    }

    database.run('BEGIN TRANSACTION');
    transactionDepth = 1;
    let result: T;
    try {
        result = work();
        database.run('COMMIT');
    } catch (error) {
        database.run('ROLLBACK');
        throw error;
    } finally {
        transactionDepth = 0;
    }
    saveDatabase();
    return result;
}

export function closeDatabase(): void {
    if (db) {
        db.close();
        db = null;
        dbPath = null;
        transactionDepth = 0;
    }
}
