import Database from 'better-sqlite3';
import { BaseDao } from './BaseDao';
import { RunSummary } from '../../types';
import { decodeJson, runSummarySchema } from '../codec';

export class RunLogDao extends BaseDao {
  constructor(db: Database.Database) {
    super(db);
  }

  /**
   * 写入运行记录并只保留最近 keep 条
   */
  append(summary: RunSummary, keep: number): void {
    this.db
      .prepare(
        `INSERT INTO run_log (run_id, mode, status, started_at, finished_at, summary)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(run_id) DO UPDATE SET
           status = excluded.status,
           finished_at = excluded.finished_at,
           summary = excluded.summary`
      )
      .run(
        summary.runId,
        summary.mode,
        summary.status,
        summary.startedAt,
        summary.finishedAt,
        JSON.stringify(summary)
      );

    this.db
      .prepare(
        `DELETE FROM run_log WHERE id NOT IN (
          SELECT id FROM run_log ORDER BY id DESC LIMIT ?
        )`
      )
      .run(keep);
  }

  recent(limit: number): RunSummary[] {
    const rows = this.db
      .prepare<[number], { summary: string }>('SELECT summary FROM run_log ORDER BY id DESC LIMIT ?')
      .all(limit);
    return rows.flatMap((row) => {
      const summary = decodeJson(runSummarySchema, row.summary);
      return summary ? [summary] : [];
    });
  }
}
