import { randomUUID } from 'crypto';
import { HistoryLedger } from '../ledger/HistoryLedger';
import { ProfileCollector } from '../collector/ProfileCollector';
import { ProfileSource } from '../collector/types';
import { ProfileScreener } from '../screening/ProfileScreener';
import { RunMode, RunStatus, RunSummary } from '../../types';
import { LedgerUnavailableError, PipelineBusyError, ScreeningUnavailableError } from '../../utils/errors';
import { identityKey } from '../../utils/identity';
import { logger, describeError } from '../../utils/logger';

export interface PipelineOptions {
  dailyTarget: number;
  oversampleFactor: number;
  maxPerSource: number;
}

export interface CollectionOutcome {
  collected: number;
  qualified: number;
  newPending: number;
  sourcesAttempted: number;
  sourcesFailed: number;
  errors: string[];
}

export interface ScreeningOutcome {
  status: Extract<RunStatus, 'completed' | 'quota_met'>;
  screened: number;
  newApproved: number;
  rejected: number;
  deferred: number;
  totalToday: number;
  dailyTarget: number;
  errors: string[];
}

/**
 * 调度器和状态接口依赖的运行入口
 */
export interface PipelineRunner {
  run(mode?: RunMode, targetOverride?: number): Promise<RunSummary>;
  isRunning(): boolean;
}

/**
 * 两阶段流水线：采集 → 过滤 → 入队，然后 筛选 → 记录
 * 每个阶段都可以单独运行；中断后再次运行会从队列中继续
 */
export class ProspectionPipeline implements PipelineRunner {
  private running = false;

  constructor(
    private readonly ledger: HistoryLedger,
    private readonly collector: ProfileCollector,
    private readonly screener: ProfileScreener,
    private readonly sources: ProfileSource[],
    private readonly options: PipelineOptions,
    private readonly clock: () => Date = () => new Date()
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  getDailyTarget(): number {
    return this.options.dailyTarget;
  }

  /**
   * 采集候选账号，去掉已处理过的，合并进待筛选队列
   */
  async runCollection(): Promise<CollectionOutcome> {
    if (this.sources.length === 0) {
      logger.warn('没有可用的采集来源，请检查 Instagram / 视频平台配置');
    }

    const result = await this.collector.collect(this.sources, this.options.maxPerSource, new Set<string>());
    const fresh = this.ledger.filterUnprocessed(result.profiles);
    const newPending = this.ledger.savePending(fresh);

    logger.info(
      `采集阶段完成: 抓取 ${result.stats.fetched}, 合格 ${result.profiles.length}, ` +
        `未处理 ${fresh.length}, 新入队 ${newPending}`
    );

    return {
      collected: result.stats.fetched,
      qualified: result.profiles.length,
      newPending,
      sourcesAttempted: result.stats.sourcesAttempted,
      sourcesFailed: result.stats.sourcesFailed,
      errors: result.errors,
    };
  }

  /**
   * 从队列取出账号筛选，直到当日名额用完
   * 取出数量 = 剩余名额 × oversampleFactor
   */
  async runScreening(targetOverride?: number): Promise<ScreeningOutcome> {
    const dailyTarget = targetOverride ?? this.options.dailyTarget;
    const approvedBefore = this.ledger.getTodayApprovedCount();
    const remaining = dailyTarget - approvedBefore;

    const outcome: ScreeningOutcome = {
      status: 'completed',
      screened: 0,
      newApproved: 0,
      rejected: 0,
      deferred: 0,
      totalToday: approvedBefore,
      dailyTarget,
      errors: [],
    };

    if (remaining <= 0) {
      logger.info(`今日已通过 ${approvedBefore}/${dailyTarget}，名额已满，跳过筛选`);
      outcome.status = 'quota_met';
      return outcome;
    }

    const pending = this.ledger.getPending(Math.ceil(remaining * this.options.oversampleFactor));
    if (pending.length === 0) {
      logger.info('待筛选队列为空');
      return outcome;
    }

    logger.info(`剩余名额 ${remaining}，取出 ${pending.length} 个待筛选账号`);

    const batch = await this.screener.screen(
      pending.map((entry) => entry.profile),
      remaining,
      ({ profile, verdict }) => {
        const recorded = this.ledger.recordScreening(profile, verdict, { dailyTarget });
        switch (recorded) {
          case 'approved':
            outcome.newApproved++;
            return 'recorded';
          case 'rejected':
            outcome.rejected++;
            return 'recorded';
          case 'duplicate':
            return 'ignored';
          case 'quota_full':
            // 其他进程先用完了名额，账号留在队列里
            outcome.deferred++;
            logger.info(`名额已被占满，${identityKey(profile)} 留待下次筛选`);
            return 'stop';
        }
      }
    );

    outcome.screened = batch.approved.length + batch.rejected.length;
    outcome.deferred += batch.failures.length;
    outcome.errors.push(...batch.failures.map((failure) => failure.error));
    outcome.totalToday = this.ledger.getTodayApprovedCount();
    if (outcome.totalToday >= dailyTarget) {
      outcome.status = 'quota_met';
    }

    logger.info(
      `筛选阶段完成: 筛选 ${outcome.screened}, 通过 ${outcome.newApproved}, 拒绝 ${outcome.rejected}, ` +
        `延后 ${outcome.deferred}, 今日累计 ${outcome.totalToday}/${dailyTarget}`
    );
    return outcome;
  }

  /**
   * 执行一次完整运行并写入运行记录
   */
  async run(mode: RunMode = 'full', targetOverride?: number): Promise<RunSummary> {
    if (this.running) {
      throw new PipelineBusyError();
    }
    this.running = true;
    try {
      return await this.execute(mode, targetOverride);
    } finally {
      this.running = false;
    }
  }

  private async execute(mode: RunMode, targetOverride?: number): Promise<RunSummary> {
    const started = this.clock();
    const summary: RunSummary = {
      runId: randomUUID(),
      mode,
      status: mode === 'collect' ? 'collect_only' : 'completed',
      startedAt: started.toISOString(),
      finishedAt: started.toISOString(),
      elapsedMs: 0,
      collected: 0,
      qualified: 0,
      newPending: 0,
      screened: 0,
      newApproved: 0,
      rejected: 0,
      deferred: 0,
      totalToday: 0,
      dailyTarget: targetOverride ?? this.options.dailyTarget,
      sourcesAttempted: 0,
      sourcesFailed: 0,
      errors: [],
    };

    logger.info(`流水线开始 (${mode})，运行 ID ${summary.runId}`);

    try {
      if (mode !== 'screen') {
        const collection = await this.runCollection();
        summary.collected = collection.collected;
        summary.qualified = collection.qualified;
        summary.newPending = collection.newPending;
        summary.sourcesAttempted = collection.sourcesAttempted;
        summary.sourcesFailed = collection.sourcesFailed;
        summary.errors.push(...collection.errors);

        if (collection.sourcesAttempted > 0 && collection.sourcesFailed === collection.sourcesAttempted) {
          summary.status = 'failed';
          summary.errors.push('所有采集来源均失败');
        }
      }

      if (mode !== 'collect') {
        const screening = await this.runScreening(targetOverride);
        summary.screened = screening.screened;
        summary.newApproved = screening.newApproved;
        summary.rejected = screening.rejected;
        summary.deferred = screening.deferred;
        summary.totalToday = screening.totalToday;
        summary.dailyTarget = screening.dailyTarget;
        summary.errors.push(...screening.errors);
        if (summary.status !== 'failed') {
          summary.status = screening.status;
        }
      } else {
        summary.totalToday = this.ledger.getTodayApprovedCount();
      }
    } catch (error) {
      // 台账不可用、筛选服务不可用或其他异常：本次运行失败，已写入的结果保留
      summary.status = 'failed';
      summary.errors.push(describeError(error));
      if (error instanceof LedgerUnavailableError || error instanceof ScreeningUnavailableError) {
        logger.error(`流水线中止: ${describeError(error)}`);
      } else {
        logger.error('流水线异常中止', error);
      }
    }

    const finished = this.clock();
    summary.finishedAt = finished.toISOString();
    summary.elapsedMs = finished.getTime() - started.getTime();

    try {
      this.ledger.appendRunSummary(summary);
    } catch (error) {
      logger.error(`运行记录写入失败: ${describeError(error)}`);
    }

    logger.info(
      `流水线结束 (${summary.status}): 新增通过 ${summary.newApproved}, 今日 ${summary.totalToday}/${summary.dailyTarget}, ` +
        `错误 ${summary.errors.length}, 用时 ${summary.elapsedMs}ms`
    );
    return summary;
  }
}
