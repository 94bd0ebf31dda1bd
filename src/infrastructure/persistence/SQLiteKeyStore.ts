import Database from 'better-sqlite3';
import type { IKeyValueStore } from '../../Platform/Ports.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

interface KvRow {
    key: string;
    value: string;
}

export class SQLiteKeyStore implements IKeyValueStore {
    private db: Database.Database;

    constructor(dbPath: string = 'vault.db') {
        try {
            this.db = new Database(dbPath);
        } catch (e) {
            throw new KernelError(ErrorCode.STORAGE_FAILURE, `Cannot open store at ${dbPath}`, { operation: 'open' }, { cause: e });
        }
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS kv (
                key TEXT PRIMARY KEY NOT NULL,
                value TEXT NOT NULL
            )
        `);
    }

    async get(key: string): Promise<string | null> {
        const row = this.guarded('get', () =>
            this.db.prepare<[string], KvRow>('SELECT key, value FROM kv WHERE key = ?').get(key));
        return row ? row.value : null;
    }

    async put(key: string, value: string): Promise<void> {
        this.guarded('put', () =>
            this.db.prepare('INSERT OR REPLACE INTO kv (key, value) VALUES (?, ?)').run(key, value));
    }

    async has(key: string): Promise<boolean> {
        return (await this.get(key)) !== null;
    }

    async entries(prefix: string = ''): Promise<Array<[string, string]>> {
        const rows = this.guarded('entries', () =>
            this.db.prepare<[number, string], KvRow>(
                'SELECT key, value FROM kv WHERE substr(key, 1, ?) = ? ORDER BY key ASC'
            ).all(prefix.length, prefix));
        return rows.map((r): [string, string] => [r.key, r.value]);
    }

    public close() {
        this.db.close();
    }

    private guarded<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            throw new KernelError(ErrorCode.STORAGE_FAILURE, e instanceof Error ? e.message : String(e), { operation }, { cause: e });
        }
    }
}
