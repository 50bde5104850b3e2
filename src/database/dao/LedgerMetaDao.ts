import Database from 'better-sqlite3';
import { BaseDao } from './BaseDao';

/**
 * 台账元数据（键值）
 */
export class LedgerMetaDao extends BaseDao {
  constructor(db: Database.Database) {
    super(db);
  }

  get(key: string): string | undefined {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM ledger_meta WHERE key = ?')
      .get(key);
    return row?.value;
  }

  set(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO ledger_meta (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      )
      .run(key, value);
  }

  touch(at: string = this.now()): void {
    this.set('last_updated', at);
  }

  getLastUpdated(): string | undefined {
    return this.get('last_updated');
  }
}
