import Database from 'better-sqlite3';
import type { IReplayStore } from '../../Platform/Ports.js';
import { systemClock } from '../../kernel-core/L3/Entropy.js';
import type { ISystemClock } from '../../kernel-core/L3/Entropy.js';

/**
 * Consumed command ids, kept on disk so a restart does not reopen them.
 */
export class SQLiteReplayStore implements IReplayStore {
    private db: Database.Database;

    constructor(dbPath: string = 'registry.db', private clock: ISystemClock = systemClock) {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS seen_commands (
                commandId TEXT PRIMARY KEY,
                seenAt INTEGER NOT NULL
            )
        `);
    }

    has(commandId: string): boolean {
        return this.db.prepare<[string], { commandId: string }>('SELECT commandId FROM seen_commands WHERE commandId = ?').get(commandId) !== undefined;
    }

    add(commandId: string): void {
        this.db.prepare('INSERT OR IGNORE INTO seen_commands (commandId, seenAt) VALUES (?, ?)').run(commandId, this.clock.now());
    }

    public close() {
        this.db.close();
    }
}
