import Database from 'better-sqlite3';
import log from '../logger';

export interface Migration {
    version: number;
    description: string;
    up(db: Database.Database): void;
}

// Append only: a history database in the field may sit at any of these versions
export const migrations: Migration[] = [
    {
        version: 1,
        description: 'Baseline schema (tests table)',
        up(_db) {
            // Created by TestHistory.init() with CREATE TABLE IF NOT EXISTS
        }
    },
    {
        version: 2,
        description: 'Add batch_id column to tests',
        up(db) {
            db.exec('ALTER TABLE tests ADD COLUMN batch_id TEXT');
        }
    },
    {
        version: 3,
        description: 'Index tests by device and creation time',
        up(db) {
            db.exec('CREATE INDEX IF NOT EXISTS idx_tests_device_created ON tests (device_id, created_at)');
        }
    }
];

export interface AppliedMigration {
    version: number;
    description: string;
    appliedAt: string;
}

function createLedger(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS _migrations (
            version     INTEGER PRIMARY KEY,
            description TEXT    NOT NULL,
            applied_at  TEXT    NOT NULL
        )
    `);
}

export function schemaVersion(db: Database.Database): number {
    createLedger(db);
    const row = db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM _migrations').get();
    return row?.version ?? 0;
}

export function appliedMigrations(db: Database.Database): AppliedMigration[] {
    createLedger(db);
    return db
        .prepare<[], AppliedMigration>('SELECT version, description, applied_at AS appliedAt FROM _migrations ORDER BY version')
        .all();
}

/**
 * Brings the history schema up to the newest migration and returns the
 * versions applied by this call. A migration and its ledger row commit
 * together.
 */
export function runMigrations(db: Database.Database, clock: () => Date = () => new Date()): number[] {
    const from = schemaVersion(db);
    const pending = migrations.filter(m => m.version > from);
    if (pending.length === 0) {
        return [];
    }

    const record = db.prepare<[number, string, string]>('INSERT INTO _migrations (version, description, applied_at) VALUES (?, ?, ?)');
    const apply = db.transaction((migration: Migration) => {
        migration.up(db);
        record.run(migration.version, migration.description, clock().toISOString());
    });
    for (const migration of pending) {
        apply(migration);
        log.info(`[History] schema v${migration.version}: ${migration.description}`);
    }
    return pending.map(m => m.version);
}
