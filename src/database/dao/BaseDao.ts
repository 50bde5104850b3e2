import Database from 'better-sqlite3';

/**
 * 基础DAO类
 */
export abstract class BaseDao {
  constructor(protected readonly db: Database.Database) {}

  /**
   * 获取当前时间戳
   */
  protected now(): string {
    return new Date().toISOString();
  }

  protected toFlag(value: boolean): number {
    return value ? 1 : 0;
  }

  protected fromFlag(value: number): boolean {
    return value === 1;
  }
}
