import Database from 'better-sqlite3';
import { BaseDao } from './BaseDao';
import { HistoryEntry, Platform, PlatformBreakdown } from '../../types';
import { isPlatform } from '../../utils/identity';

export class ProcessedProfileDao extends BaseDao {
  constructor(db: Database.Database) {
    super(db);
  }

  exists(key: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM processed_profiles WHERE key = ?')
      .get(key);
    return row !== undefined;
  }

  /**
   * 插入一条历史；同键已存在时不写，返回 false
   */
  insert(entry: HistoryEntry): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO processed_profiles (
          key, platform, username, name, approved, screening_result, profile_data, processed_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(key) DO NOTHING`
      )
      .run(
        entry.key,
        entry.platform,
        entry.username,
        entry.name,
        this.toFlag(entry.approved),
        JSON.stringify(entry.screeningResult),
        JSON.stringify(entry.profileSnapshot),
        entry.processedAt
      );
    return result.changes > 0;
  }

  countByPlatform(): Partial<Record<Platform, PlatformBreakdown>> {
    const rows = this.db
      .prepare<[], { platform: string; total: number; approved: number | null }>(
        `SELECT platform, COUNT(*) AS total, SUM(approved) AS approved
         FROM processed_profiles GROUP BY platform ORDER BY platform`
      )
      .all();

    const breakdown: Partial<Record<Platform, PlatformBreakdown>> = {};
    for (const row of rows) {
      if (isPlatform(row.platform)) {
        breakdown[row.platform] = { total: row.total, approved: row.approved ?? 0 };
      }
    }
    return breakdown;
  }

  deleteAll(): number {
    return this.db.prepare('DELETE FROM processed_profiles').run().changes;
  }
}
