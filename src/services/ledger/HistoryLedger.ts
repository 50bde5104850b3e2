import Database from 'better-sqlite3';
import { DaoFactory } from '../../database/dao';
import {
  ApprovedRow,
  LedgerStatistics,
  MarkResult,
  PendingEntry,
  ProfileIdentity,
  ProfileRecord,
  QualificationTier,
  RecordOutcome,
  RunSummary,
  ScreeningVerdict,
} from '../../types';
import { identityKey } from '../../utils/identity';
import { LedgerUnavailableError } from '../../utils/errors';
import { logger, describeError } from '../../utils/logger';
import { toLocalDate } from '../../utils/time';

export interface HistoryLedgerOptions {
  runLogSize?: number;
  clock?: () => Date;
}

export interface RecordScreeningOptions {
  dailyTarget: number;
}

export interface ClearResult {
  processed: number;
  pending: number;
}

const LOCK_ERROR_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT']);

const TIER_PRIORITY: Record<QualificationTier, number> = {
  qualified: 0,
  needs_verification: 1,
};

/**
 * 历史台账
 *
 * 记录哪些账号已经筛选过、哪些在排队、哪些已通过。
 * 所有写操作都在 IMMEDIATE 事务里完成：事务开始即持有写锁，
 * 提交或回滚（包括抛异常）时释放；拿不到锁会等到 busy_timeout 后失败。
 */
export class HistoryLedger {
  private readonly daos: DaoFactory;
  private readonly runLogSize: number;
  private readonly clock: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: HistoryLedgerOptions = {}
  ) {
    this.daos = new DaoFactory(db);
    this.runLogSize = Math.max(options.runLogSize ?? 30, 1);
    this.clock = options.clock ?? (() => new Date());
  }

  isProcessed(identity: ProfileIdentity): boolean {
    return this.read('isProcessed', () =>
      this.daos.getProcessedProfileDao().exists(identityKey(identity))
    );
  }

  /**
   * 写入一条历史；同一身份第二次写入不做任何修改
   */
  markAsProcessed(profile: ProfileRecord, verdict: ScreeningVerdict): MarkResult {
    const key = identityKey(profile);
    const result = this.write('markAsProcessed', (): MarkResult => {
      const inserted = this.insertHistory(key, profile, verdict);
      this.daos.getPendingProfileDao().removeKeys([key]);
      if (inserted) {
        this.daos.getLedgerMetaDao().touch(this.clock().toISOString());
      }
      return inserted ? 'recorded' : 'duplicate';
    });

    if (result === 'duplicate') {
      logger.warn(`账号已在历史中，忽略重复写入: ${key}`);
    }
    return result;
  }

  /**
   * 去掉已在历史中的候选，保持原有顺序
   */
  filterUnprocessed<T extends ProfileIdentity>(candidates: T[]): T[] {
    return this.read('filterUnprocessed', () => {
      const dao = this.daos.getProcessedProfileDao();
      return candidates.filter((candidate) => !dao.exists(identityKey(candidate)));
    });
  }

  /**
   * 合并进待筛选队列，返回新加入的数量
   */
  savePending(candidates: ProfileRecord[]): number {
    if (candidates.length === 0) {
      return 0;
    }

    const added = this.write('savePending', () => {
      const processedDao = this.daos.getProcessedProfileDao();
      const pendingDao = this.daos.getPendingProfileDao();
      let count = 0;
      for (const candidate of candidates) {
        const key = identityKey(candidate);
        if (processedDao.exists(key)) {
          continue;
        }
        if (pendingDao.insert(key, candidate, TIER_PRIORITY[candidate.tier])) {
          count++;
        }
      }
      if (count > 0) {
        this.daos.getLedgerMetaDao().touch(this.clock().toISOString());
      }
      return count;
    });

    logger.info(`待筛选队列新增 ${added} 个账号（提交 ${candidates.length} 个）`);
    return added;
  }

  /**
   * 读取待筛选账号：已验证档优先，其次按入队顺序
   */
  getPending(limit: number): PendingEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.read('getPending', () => this.daos.getPendingProfileDao().listUnprocessed(limit));
  }

  removeFromPending(identities: ProfileIdentity[]): number {
    if (identities.length === 0) {
      return 0;
    }
    return this.write('removeFromPending', () =>
      this.daos.getPendingProfileDao().removeKeys(identities.map(identityKey))
    );
  }

  /**
   * 追加一行通过记录
   */
  appendApproved(profile: ProfileRecord, verdict: ScreeningVerdict): boolean {
    return this.write('appendApproved', () => this.insertApproved(identityKey(profile), profile, verdict));
  }

  /**
   * 在同一把锁里完成：写历史、追加通过名单、移出队列
   * 当日名额已满时不做任何写入，账号留在队列中
   */
  recordScreening(
    profile: ProfileRecord,
    verdict: ScreeningVerdict,
    options: RecordScreeningOptions
  ): RecordOutcome {
    const key = identityKey(profile);

    return this.write('recordScreening', (): RecordOutcome => {
      const pendingDao = this.daos.getPendingProfileDao();

      if (this.daos.getProcessedProfileDao().exists(key)) {
        pendingDao.removeKeys([key]);
        logger.warn(`账号已在历史中，跳过记录: ${key}`);
        return 'duplicate';
      }

      if (verdict.approved) {
        const today = toLocalDate(this.clock());
        if (this.daos.getApprovedProfileDao().countByDate(today) >= options.dailyTarget) {
          return 'quota_full';
        }
      }

      this.insertHistory(key, profile, verdict);
      // 清空历史后再次通过的账号，名单里已有一行，不再追加
      const appended = verdict.approved && this.insertApproved(key, profile, verdict);
      pendingDao.removeKeys([key]);
      this.daos.getLedgerMetaDao().touch(this.clock().toISOString());

      if (!verdict.approved) {
        return 'rejected';
      }
      if (!appended) {
        logger.warn(`账号已在通过名单中，不重复追加: ${key}`);
        return 'duplicate';
      }
      return 'approved';
    });
  }

  getTodayApprovedCount(): number {
    return this.read('getTodayApprovedCount', () =>
      this.daos.getApprovedProfileDao().countByDate(toLocalDate(this.clock()))
    );
  }

  getApprovedByDate(date: string): ApprovedRow[] {
    return this.read('getApprovedByDate', () => this.daos.getApprovedProfileDao().findByDate(date));
  }

  getStatistics(): LedgerStatistics {
    return this.read('getStatistics', () => {
      const byPlatform = this.daos.getProcessedProfileDao().countByPlatform();
      let totalProcessed = 0;
      let totalApproved = 0;
      for (const breakdown of Object.values(byPlatform)) {
        if (!breakdown) {
          continue;
        }
        totalProcessed += breakdown.total;
        totalApproved += breakdown.approved;
      }

      return {
        totalProcessed,
        totalApproved,
        totalRejected: totalProcessed - totalApproved,
        approvalRate:
          totalProcessed > 0 ? Math.round((totalApproved / totalProcessed) * 10000) / 100 : 0,
        pendingCount: this.daos.getPendingProfileDao().count(),
        approvedOutputRows: this.daos.getApprovedProfileDao().count(),
        byPlatform,
        lastUpdated: this.daos.getLedgerMetaDao().getLastUpdated(),
      };
    });
  }

  appendRunSummary(summary: RunSummary): void {
    this.write('appendRunSummary', () => {
      this.daos.getRunLogDao().append(summary, this.runLogSize);
    });
  }

  getRecentRuns(limit: number = this.runLogSize): RunSummary[] {
    return this.read('getRecentRuns', () => this.daos.getRunLogDao().recent(limit));
  }

  /**
   * 清空历史和队列；通过名单保留
   */
  clearHistory(): ClearResult {
    const result = this.write('clearHistory', () => {
      const processed = this.daos.getProcessedProfileDao().deleteAll();
      const pending = this.daos.getPendingProfileDao().deleteAll();
      this.daos.getLedgerMetaDao().touch(this.clock().toISOString());
      return { processed, pending };
    });
    logger.warn(`历史已清空: ${result.processed} 条历史, ${result.pending} 条待筛选`);
    return result;
  }

  private insertHistory(key: string, profile: ProfileRecord, verdict: ScreeningVerdict): boolean {
    return this.daos.getProcessedProfileDao().insert({
      key,
      platform: profile.platform,
      username: profile.username,
      name: profile.displayName || profile.username,
      approved: verdict.approved,
      screeningResult: verdict,
      profileSnapshot: profile,
      processedAt: this.clock().toISOString(),
    });
  }

  private insertApproved(key: string, profile: ProfileRecord, verdict: ScreeningVerdict): boolean {
    const now = this.clock();
    return this.daos.getApprovedProfileDao().insert({
      key,
      profile,
      verdict,
      approvedAt: now.toISOString(),
      approvedDate: toLocalDate(now),
    });
  }

  private write<T>(operation: string, fn: () => T): T {
    return this.read(operation, () => this.db.transaction(fn).immediate());
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof Database.SqliteError && LOCK_ERROR_CODES.has(error.code)) {
        throw new LedgerUnavailableError(`台账被占用，${operation} 未完成: ${describeError(error)}`, error);
      }
      throw error;
    }
  }
}
