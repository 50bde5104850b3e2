import cron from 'node-cron';
import { PipelineRunner } from './ProspectionPipeline';
import { RunSummary } from '../../types';
import { ConfigValidationError, PipelineBusyError } from '../../utils/errors';
import { logger } from '../../utils/logger';

/**
 * 每日采集调度器
 * 按 cron 表达式触发完整流水线；上一次还没跑完时跳过本次
 */
export class ProspectionScheduler {
  private task?: cron.ScheduledTask;

  constructor(
    private pipeline: PipelineRunner,
    private cronExpression: string = '0 9 * * *' // 默认每天早上9点执行
  ) {}

  /**
   * 启动调度器
   */
  start(): void {
    if (this.task) {
      logger.warn('采集调度器已经在运行');
      return;
    }
    if (!cron.validate(this.cronExpression)) {
      throw new ConfigValidationError(`无效的 cron 表达式: ${this.cronExpression}`);
    }

    this.task = cron.schedule(this.cronExpression, () => {
      this.trigger().catch((error: unknown) => {
        logger.error('定时采集任务执行失败:', error);
      });
    });

    logger.info(`采集调度器已启动，执行计划: ${this.cronExpression}`);
  }

  /**
   * 停止调度器
   */
  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = undefined;
      logger.info('采集调度器已停止');
    }
  }

  /**
   * 手动触发一次；已有运行在进行时返回 undefined
   */
  async trigger(): Promise<RunSummary | undefined> {
    if (this.pipeline.isRunning()) {
      logger.warn('上一次采集仍在进行，跳过本次触发');
      return undefined;
    }

    try {
      logger.info('开始执行定时采集任务');
      return await this.pipeline.run('full');
    } catch (error) {
      if (error instanceof PipelineBusyError) {
        logger.warn('上一次采集仍在进行，跳过本次触发');
        return undefined;
      }
      throw error;
    }
  }

  /**
   * 检查调度器是否在运行
   */
  isRunning(): boolean {
    return this.task !== undefined;
  }
}
