import Database from 'better-sqlite3';
import { logger } from '../utils/logger';

/**
 * 创建台账所需的表
 */
export const createTables = (db: Database.Database): void => {
  // 已筛选过的账号（每个身份键只写一次）
  db.exec(`
    CREATE TABLE IF NOT EXISTS processed_profiles (
      key TEXT PRIMARY KEY,
      platform TEXT NOT NULL CHECK(platform IN ('instagram', 'tiktok', 'youtube')),
      username TEXT NOT NULL,
      name TEXT NOT NULL,
      approved INTEGER NOT NULL CHECK(approved IN (0, 1)),
      screening_result TEXT NOT NULL,
      profile_data TEXT NOT NULL,
      processed_at TEXT NOT NULL
    )
  `);

  // 待筛选队列
  db.exec(`
    CREATE TABLE IF NOT EXISTS pending_profiles (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      key TEXT UNIQUE NOT NULL,
      platform TEXT NOT NULL,
      username TEXT NOT NULL,
      priority INTEGER NOT NULL DEFAULT 0,
      profile_data TEXT NOT NULL,
      queued_at TEXT NOT NULL
    )
  `);

  // 通过名单（只追加）
  db.exec(`
    CREATE TABLE IF NOT EXISTS approved_profiles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      key TEXT UNIQUE NOT NULL,
      approved_at TEXT NOT NULL,
      approved_date TEXT NOT NULL,
      name TEXT NOT NULL,
      username TEXT NOT NULL,
      platform TEXT NOT NULL,
      followers INTEGER NOT NULL,
      engagement_rate REAL NOT NULL,
      profile_url TEXT NOT NULL,
      bio TEXT NOT NULL,
      age_ok INTEGER NOT NULL,
      target_body_type INTEGER NOT NULL,
      target_class INTEGER NOT NULL,
      target_nationality INTEGER NOT NULL,
      is_real_person INTEGER NOT NULL,
      confidence INTEGER NOT NULL,
      reason TEXT NOT NULL,
      source_tag TEXT NOT NULL
    )
  `);

  // 汇总计数器
  db.exec(`
    CREATE TABLE IF NOT EXISTS ledger_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  // 运行记录（滚动保留）
  db.exec(`
    CREATE TABLE IF NOT EXISTS run_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT UNIQUE NOT NULL,
      mode TEXT NOT NULL,
      status TEXT NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      summary TEXT NOT NULL
    )
  `);
};

export const createIndexes = (db: Database.Database): void => {
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_processed_platform ON processed_profiles(platform);
    CREATE INDEX IF NOT EXISTS idx_pending_order ON pending_profiles(priority, seq);
    CREATE INDEX IF NOT EXISTS idx_approved_date ON approved_profiles(approved_date);
  `);
};

export const initSchema = (db: Database.Database): void => {
  createTables(db);
  createIndexes(db);
  logger.debug('台账表结构已就绪');
};
