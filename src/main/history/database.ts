import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { getErrorMessage } from '../errors';
import log from '../logger';
import type { TestInfo } from '../workflow/types';
import { runMigrations } from './migrations';

export interface TestRecord {
    testId: string;
    deviceId: string;
    testType: string;
    name: string;
    status: string;
    directory: string;
    createdAt: string;
    completedAt: string | null;
    completedSteps: number;
    totalSteps: number;
    batchId: string | null;
}

interface TestRow {
    test_id: string;
    device_id: string;
    test_type: string;
    name: string;
    status: string;
    directory: string;
    created_at: string;
    completed_at: string | null;
    completed_steps: number;
    total_steps: number;
    batch_id: string | null;
}

// The subset of test_info.json the index needs
const TestInfoFileSchema = z.object({
    test_id: z.string(),
    device_id: z.string(),
    test_type: z.string(),
    name: z.string().optional(),
    status: z.string(),
    created_at: z.string(),
    completed_at: z.string().optional(),
    batch_id: z.string().optional(),
    steps: z.array(z.unknown()).default([]),
    summary: z.object({
        completed_steps: z.number(),
        total_steps: z.number()
    }).optional()
});

type TestInfoFile = z.infer<typeof TestInfoFileSchema>;

function toRecord(row: TestRow): TestRecord {
    return {
        testId: row.test_id,
        deviceId: row.device_id,
        testType: row.test_type,
        name: row.name,
        status: row.status,
        directory: row.directory,
        createdAt: row.created_at,
        completedAt: row.completed_at,
        completedSteps: row.completed_steps,
        totalSteps: row.total_steps,
        batchId: row.batch_id
    };
}

/**
 * SQLite index over finished tests. The files under the data root stay the
 * source of truth; the index can be rebuilt from them at any time.
 */
export class TestHistory {
    private db: Database.Database;

    constructor(filename: string = ':memory:') {
        if (filename !== ':memory:') {
            fs.mkdirSync(path.dirname(filename), { recursive: true });
        }
        this.db = new Database(filename);
        this.init();
    }

    private init(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS tests (
                test_id         TEXT PRIMARY KEY,
                device_id       TEXT NOT NULL,
                test_type       TEXT NOT NULL,
                name            TEXT NOT NULL,
                status          TEXT NOT NULL,
                directory       TEXT NOT NULL,
                created_at      TEXT NOT NULL,
                completed_at    TEXT,
                completed_steps INTEGER NOT NULL DEFAULT 0,
                total_steps     INTEGER NOT NULL DEFAULT 0
            )
        `);
        runMigrations(this.db);
    }

    public record(info: TestInfo | TestInfoFile, directory: string, status: string = info.status): void {
        this.db.prepare(`
            INSERT INTO tests (test_id, device_id, test_type, name, status, directory, created_at, completed_at, completed_steps, total_steps, batch_id)
            VALUES (@test_id, @device_id, @test_type, @name, @status, @directory, @created_at, @completed_at, @completed_steps, @total_steps, @batch_id)
            ON CONFLICT(test_id) DO UPDATE SET
                device_id = excluded.device_id,
                test_type = excluded.test_type,
                name = excluded.name,
                status = excluded.status,
                directory = excluded.directory,
                created_at = excluded.created_at,
                completed_at = excluded.completed_at,
                completed_steps = excluded.completed_steps,
                total_steps = excluded.total_steps,
                batch_id = excluded.batch_id
        `).run({
            test_id: info.test_id,
            device_id: info.device_id,
            test_type: info.test_type,
            name: info.name || info.test_id,
            status,
            directory,
            created_at: info.created_at,
            completed_at: info.completed_at ?? null,
            completed_steps: info.summary?.completed_steps ?? info.steps.length,
            total_steps: info.summary?.total_steps ?? info.steps.length,
            batch_id: info.batch_id ?? null
        });
    }

    public get(testId: string): TestRecord | null {
        const row = this.db.prepare<[string], TestRow>('SELECT * FROM tests WHERE test_id = ?').get(testId);
        return row ? toRecord(row) : null;
    }

    public list(filter: { deviceId?: string; status?: string; limit?: number } = {}): TestRecord[] {
        const rows = this.db.prepare<{ deviceId: string | null; status: string | null; limit: number }, TestRow>(`
            SELECT * FROM tests
            WHERE (@deviceId IS NULL OR device_id = @deviceId)
              AND (@status IS NULL OR status = @status)
            ORDER BY created_at DESC
            LIMIT @limit
        `).all({ deviceId: filter.deviceId ?? null, status: filter.status ?? null, limit: filter.limit ?? 100 });
        return rows.map(toRecord);
    }

    public remove(testId: string): boolean {
        return this.db.prepare('DELETE FROM tests WHERE test_id = ?').run(testId).changes > 0;
    }

    /**
     * Re-indexes every test directory under `rootDir`
     * (`<root>/<device>/<test dir>/test_info.json`). A directory holding only
     * the in-progress snapshot is recorded as `interrupted`.
     */
    public async rebuildFromDisk(rootDir: string): Promise<number> {
        let indexed = 0;
        const devices = await readDirs(rootDir);
        for (const deviceDir of devices) {
            for (const testDir of await readDirs(deviceDir)) {
                const final = await readTestInfo(path.join(testDir, 'test_info.json'));
                const snapshot = final ? null : await readTestInfo(path.join(testDir, 'test_info_temp.json'));
                const info = final ?? snapshot;
                if (!info) {
                    continue;
                }
                this.record(info, testDir, final ? info.status : 'interrupted');
                indexed++;
            }
        }
        log.info(`[History] Indexed ${indexed} test(s) from ${rootDir}`);
        return indexed;
    }

    public close(): void {
        this.db.close();
    }
}

async function readDirs(dir: string): Promise<string[]> {
    try {
        const entries = await fs.promises.readdir(dir, { withFileTypes: true });
        return entries.filter(e => e.isDirectory()).map(e => path.join(dir, e.name)).sort();
    } catch (error) {
        log.warn(`[History] Cannot read ${dir}:`, getErrorMessage(error));
        return [];
    }
}

async function readTestInfo(filePath: string): Promise<TestInfoFile | null> {
    if (!fs.existsSync(filePath)) {
        return null;
    }
    try {
        const parsed = TestInfoFileSchema.safeParse(JSON.parse(await fs.promises.readFile(filePath, 'utf-8')));
        if (parsed.success) {
            return parsed.data;
        }
        log.warn(`[History] Ignoring malformed ${filePath}`);
    } catch (error) {
        log.warn(`[History] Cannot read ${filePath}:`, getErrorMessage(error));
    }
    return null;
}
