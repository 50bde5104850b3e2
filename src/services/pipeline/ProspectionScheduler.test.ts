import { ProspectionScheduler } from './ProspectionScheduler';
import { PipelineRunner } from './ProspectionPipeline';
import { ConfigValidationError, PipelineBusyError } from '../../utils/errors';
import { RunSummary } from '../../types';

const summary: RunSummary = {
  runId: 'run-1',
  mode: 'full',
  status: 'completed',
  startedAt: '2026-03-10T09:00:00.000Z',
  finishedAt: '2026-03-10T09:01:00.000Z',
  elapsedMs: 60000,
  collected: 0,
  qualified: 0,
  newPending: 0,
  screened: 0,
  newApproved: 0,
  rejected: 0,
  deferred: 0,
  totalToday: 0,
  dailyTarget: 20,
  sourcesAttempted: 0,
  sourcesFailed: 0,
  errors: [],
};

const makePipeline = (running = false) => {
  const run = jest.fn<Promise<RunSummary>, [string?, number?]>().mockResolvedValue(summary);
  const isRunning = jest.fn<boolean, []>().mockReturnValue(running);
  const pipeline: PipelineRunner = { run, isRunning };
  return { pipeline, run, isRunning };
};

describe('ProspectionScheduler', () => {
  let scheduler: ProspectionScheduler | undefined;

  afterEach(() => {
    scheduler?.stop();
  });

  describe('调度器控制', () => {
    test('应该能够启动和停止调度器', () => {
      scheduler = new ProspectionScheduler(makePipeline().pipeline);
      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);

      scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);
    });

    test('重复启动保持运行', () => {
      scheduler = new ProspectionScheduler(makePipeline().pipeline);
      scheduler.start();
      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
    });

    test('无效的 cron 表达式启动失败', () => {
      scheduler = new ProspectionScheduler(makePipeline().pipeline, 'not a cron');
      expect(() => scheduler?.start()).toThrow(ConfigValidationError);
      expect(scheduler.isRunning()).toBe(false);
    });
  });

  describe('手动触发', () => {
    test('执行一次完整流水线', async () => {
      const { pipeline, run } = makePipeline();
      scheduler = new ProspectionScheduler(pipeline);

      await expect(scheduler.trigger()).resolves.toEqual(summary);
      expect(run).toHaveBeenCalledWith('full');
    });

    test('上一次仍在运行时跳过', async () => {
      const { pipeline, run } = makePipeline(true);
      scheduler = new ProspectionScheduler(pipeline);

      await expect(scheduler.trigger()).resolves.toBeUndefined();
      expect(run).not.toHaveBeenCalled();
    });

    test('并发触发撞上运行锁时跳过', async () => {
      const { pipeline, run } = makePipeline();
      run.mockRejectedValue(new PipelineBusyError());
      scheduler = new ProspectionScheduler(pipeline);

      await expect(scheduler.trigger()).resolves.toBeUndefined();
    });
  });
});
