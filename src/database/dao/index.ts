import Database from 'better-sqlite3';
import { ProcessedProfileDao } from './ProcessedProfileDao';
import { PendingProfileDao } from './PendingProfileDao';
import { ApprovedProfileDao } from './ApprovedProfileDao';
import { LedgerMetaDao } from './LedgerMetaDao';
import { RunLogDao } from './RunLogDao';

/**
 * DAO工厂类
 * 每个数据库连接一个工厂，DAO 按需创建
 */
export class DaoFactory {
  private processedDao?: ProcessedProfileDao;
  private pendingDao?: PendingProfileDao;
  private approvedDao?: ApprovedProfileDao;
  private metaDao?: LedgerMetaDao;
  private runLogDao?: RunLogDao;

  constructor(private readonly db: Database.Database) {}

  getProcessedProfileDao(): ProcessedProfileDao {
    if (!this.processedDao) {
      this.processedDao = new ProcessedProfileDao(this.db);
    }
    return this.processedDao;
  }

  getPendingProfileDao(): PendingProfileDao {
    if (!this.pendingDao) {
      this.pendingDao = new PendingProfileDao(this.db);
    }
    return this.pendingDao;
  }

  getApprovedProfileDao(): ApprovedProfileDao {
    if (!this.approvedDao) {
      this.approvedDao = new ApprovedProfileDao(this.db);
    }
    return this.approvedDao;
  }

  getLedgerMetaDao(): LedgerMetaDao {
    if (!this.metaDao) {
      this.metaDao = new LedgerMetaDao(this.db);
    }
    return this.metaDao;
  }

  getRunLogDao(): RunLogDao {
    if (!this.runLogDao) {
      this.runLogDao = new RunLogDao(this.db);
    }
    return this.runLogDao;
  }
}

export { ProcessedProfileDao, PendingProfileDao, ApprovedProfileDao, LedgerMetaDao, RunLogDao };
export type { ApprovedInsert } from './ApprovedProfileDao';
