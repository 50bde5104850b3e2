import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { getLedgerConfig } from '../config';
import { logger, describeError } from '../utils/logger';
import { LedgerUnavailableError } from '../utils/errors';
import { initSchema } from './schema';

let dbInstance: Database.Database | null = null;

export interface OpenLedgerOptions {
  lockTimeoutMs: number;
}

const CORRUPTION_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT', 'SQLITE_CANTOPEN']);

const isCorruption = (error: unknown): boolean =>
  error instanceof Database.SqliteError && CORRUPTION_CODES.has(error.code);

const connect = (dbPath: string, options: OpenLedgerOptions): Database.Database => {
  const db = new Database(dbPath, { timeout: options.lockTimeoutMs });
  try {
    db.pragma('journal_mode = WAL');
    const check = db.pragma('quick_check', { simple: true });
    if (check !== 'ok') {
      throw new Database.SqliteError(`quick_check 失败: ${String(check)}`, 'SQLITE_CORRUPT');
    }
    initSchema(db);
    return db;
  } catch (error) {
    db.close();
    throw error;
  }
};

/**
 * 把损坏的台账文件（及 WAL 附属文件）挪到一边
 */
const quarantine = (dbPath: string): string => {
  const target = `${dbPath}.corrupt-${Date.now()}`;
  fs.renameSync(dbPath, target);
  for (const suffix of ['-wal', '-shm']) {
    if (fs.existsSync(`${dbPath}${suffix}`)) {
      fs.renameSync(`${dbPath}${suffix}`, `${target}${suffix}`);
    }
  }
  return target;
};

/**
 * 打开台账数据库
 * 文件损坏或无法读取时按"空台账"继续运行：原文件改名保留，新建空库。
 * 代价是已筛选过的账号可能被再次筛选。
 */
export const openLedgerDatabase = (
  dbPath: string,
  options: OpenLedgerOptions
): Database.Database => {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  try {
    return connect(dbPath, options);
  } catch (error) {
    if (!isCorruption(error) || dbPath === ':memory:' || !fs.existsSync(dbPath)) {
      throw new LedgerUnavailableError(`无法打开台账: ${describeError(error)}`, error);
    }

    const moved = quarantine(dbPath);
    logger.error(`台账文件损坏，已移至 ${moved}，以空台账继续运行`, {
      error: describeError(error),
    });
    return connect(dbPath, options);
  }
};

/**
 * 获取数据库实例（单例模式）
 */
export const getDatabase = (): Database.Database => {
  if (!dbInstance) {
    const cfg = getLedgerConfig();
    dbInstance = openLedgerDatabase(cfg.path, { lockTimeoutMs: cfg.lockTimeoutMs });
    logger.info(`台账已打开: ${cfg.path}`);
  }
  return dbInstance;
};

/**
 * 关闭数据库连接
 */
export const closeDatabase = (db?: Database.Database): void => {
  const database = db || dbInstance;
  if (database) {
    database.close();
    if (database === dbInstance) {
      dbInstance = null;
    }
    logger.info('台账连接已关闭');
  }
};
