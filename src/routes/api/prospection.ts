/**
 * 采集流水线状态与触发路由
 */
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, AppError } from '../../middleware/errorHandler';
import { HistoryLedger } from '../../services/ledger/HistoryLedger';
import { PipelineRunner } from '../../services/pipeline/ProspectionPipeline';
import { ApiResponse, ApprovedRow, LedgerStatistics, PendingEntry, RunSummary } from '../../types';
import { isLocalDate, toLocalDate } from '../../utils/time';
import { logger, describeError } from '../../utils/logger';
import { PipelineBusyError } from '../../utils/errors';

export interface ProspectionRouteContext {
  ledger: HistoryLedger;
  pipeline: PipelineRunner;
  dailyTarget: number;
  clock?: () => Date;
}

export interface ProspectionStats extends LedgerStatistics {
  todayApproved: number;
  dailyTarget: number;
  running: boolean;
}

const runRequestSchema = z
  .object({
    mode: z.enum(['full', 'collect', 'screen']).default('full'),
    target: z.number().int().min(0).optional(),
  })
  .strict();

/**
 * 解析分页上限，缺省或非法时使用默认值
 */
const parseLimit = (raw: unknown, fallback: number, max: number): number => {
  if (typeof raw !== 'string' || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new AppError(400, 'limit 必须是正整数');
  }
  return Math.min(value, max);
};

export const createProspectionRouter = (ctx: ProspectionRouteContext): Router => {
  const router: Router = Router();
  const clock = ctx.clock ?? (() => new Date());

  /**
   * GET /api/prospection/stats
   * 台账统计 + 今日进度
   */
  router.get(
    '/stats',
    asyncHandler(async (_req: Request, res: Response) => {
      const response: ApiResponse<ProspectionStats> = {
        success: true,
        data: {
          ...ctx.ledger.getStatistics(),
          todayApproved: ctx.ledger.getTodayApprovedCount(),
          dailyTarget: ctx.dailyTarget,
          running: ctx.pipeline.isRunning(),
        },
      };
      res.json(response);
    })
  );

  /**
   * GET /api/prospection/pending?limit=50
   */
  router.get(
    '/pending',
    asyncHandler(async (req: Request, res: Response) => {
      const limit = parseLimit(req.query['limit'], 50, 500);
      const response: ApiResponse<PendingEntry[]> = {
        success: true,
        data: ctx.ledger.getPending(limit),
      };
      res.json(response);
    })
  );

  /**
   * GET /api/prospection/approved?date=YYYY-MM-DD
   * 不传日期时返回今天
   */
  router.get(
    '/approved',
    asyncHandler(async (req: Request, res: Response) => {
      const rawDate = req.query['date'];
      const date = typeof rawDate === 'string' && rawDate !== '' ? rawDate : toLocalDate(clock());
      if (!isLocalDate(date)) {
        throw new AppError(400, 'date 格式必须是 YYYY-MM-DD');
      }

      const response: ApiResponse<ApprovedRow[]> = {
        success: true,
        data: ctx.ledger.getApprovedByDate(date),
      };
      res.json(response);
    })
  );

  /**
   * GET /api/prospection/runs?limit=10
   */
  router.get(
    '/runs',
    asyncHandler(async (req: Request, res: Response) => {
      const limit = parseLimit(req.query['limit'], 10, 100);
      const response: ApiResponse<RunSummary[]> = {
        success: true,
        data: ctx.ledger.getRecentRuns(limit),
      };
      res.json(response);
    })
  );

  /**
   * POST /api/prospection/run
   * 后台启动一次运行，结果写入运行记录
   */
  router.post(
    '/run',
    asyncHandler(async (req: Request, res: Response) => {
      const body = runRequestSchema.parse(req.body ?? {});
      if (ctx.pipeline.isRunning()) {
        throw new PipelineBusyError();
      }

      ctx.pipeline.run(body.mode, body.target).catch((error: unknown) => {
        logger.error(`手动触发的运行失败: ${describeError(error)}`);
      });

      const response: ApiResponse<{ mode: string; target?: number }> = {
        success: true,
        data: { mode: body.mode, target: body.target },
        message: '已开始运行',
      };
      res.status(202).json(response);
    })
  );

  return router;
};
