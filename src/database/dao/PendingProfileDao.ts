import Database from 'better-sqlite3';
import { BaseDao } from './BaseDao';
import { PendingEntry, ProfileRecord } from '../../types';
import { decodeJson, profileRecordSchema } from '../codec';
import { logger } from '../../utils/logger';

interface PendingRow {
  key: string;
  priority: number;
  profileData: string;
  queuedAt: string;
}

export class PendingProfileDao extends BaseDao {
  constructor(db: Database.Database) {
    super(db);
  }

  /**
   * 入队；同键已在队列中时不写，返回 false
   */
  insert(key: string, profile: ProfileRecord, priority: number): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO pending_profiles (key, platform, username, priority, profile_data, queued_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(key) DO NOTHING`
      )
      .run(key, profile.platform, profile.username, priority, JSON.stringify(profile), this.now());
    return result.changes > 0;
  }

  /**
   * 按优先级、入队顺序读取，读取时排除已进入历史的键
   */
  listUnprocessed(limit: number): PendingEntry[] {
    const rows = this.db
      .prepare<[number], PendingRow>(
        `SELECT key, priority, profile_data AS profileData, queued_at AS queuedAt
         FROM pending_profiles
         WHERE key NOT IN (SELECT key FROM processed_profiles)
         ORDER BY priority ASC, seq ASC
         LIMIT ?`
      )
      .all(limit);

    const entries: PendingEntry[] = [];
    for (const row of rows) {
      const profile = decodeJson(profileRecordSchema, row.profileData);
      if (!profile) {
        logger.warn(`待筛选记录无法解析，已跳过: ${row.key}`);
        continue;
      }
      entries.push({ key: row.key, profile, priority: row.priority, queuedAt: row.queuedAt });
    }
    return entries;
  }

  removeKeys(keys: string[]): number {
    const stmt = this.db.prepare('DELETE FROM pending_profiles WHERE key = ?');
    let removed = 0;
    for (const key of keys) {
      removed += stmt.run(key).changes;
    }
    return removed;
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM pending_profiles')
      .get();
    return row?.count ?? 0;
  }

  deleteAll(): number {
    return this.db.prepare('DELETE FROM pending_profiles').run().changes;
  }
}
