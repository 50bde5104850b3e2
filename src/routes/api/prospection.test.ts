/**
 * 状态 API 集成测试
 */
import request from 'supertest';
import express from 'express';
import Database from 'better-sqlite3';
import { createApp } from '../../app';
import { initSchema } from '../../database/schema';
import { HistoryLedger } from '../../services/ledger/HistoryLedger';
import { PipelineRunner } from '../../services/pipeline/ProspectionPipeline';
import { makeProfile, makeVerdict } from '../../testing/fixtures';
import { LedgerUnavailableError } from '../../utils/errors';
import { RunSummary } from '../../types';

const fixedClock = () => new Date(2026, 2, 10, 14, 30, 0);

const summary: RunSummary = {
  runId: 'run-1',
  mode: 'full',
  status: 'completed',
  startedAt: '2026-03-10T09:00:00.000Z',
  finishedAt: '2026-03-10T09:01:00.000Z',
  elapsedMs: 60000,
  collected: 3,
  qualified: 2,
  newPending: 2,
  screened: 2,
  newApproved: 1,
  rejected: 1,
  deferred: 0,
  totalToday: 1,
  dailyTarget: 5,
  sourcesAttempted: 1,
  sourcesFailed: 0,
  errors: [],
};

describe('状态 API', () => {
  let db: Database.Database;
  let ledger: HistoryLedger;
  let app: express.Application;
  let run: jest.Mock<Promise<RunSummary>, [string?, number?]>;
  let isRunning: jest.Mock<boolean, []>;

  beforeEach(() => {
    db = new Database(':memory:');
    initSchema(db);
    ledger = new HistoryLedger(db, { clock: fixedClock });

    run = jest.fn<Promise<RunSummary>, [string?, number?]>().mockResolvedValue(summary);
    isRunning = jest.fn<boolean, []>().mockReturnValue(false);
    const pipeline: PipelineRunner = { run, isRunning };

    app = createApp({ ledger, pipeline, dailyTarget: 5, clock: fixedClock });
  });

  afterEach(() => {
    db.close();
  });

  const seedLedger = (): void => {
    ledger.recordScreening(makeProfile(), makeVerdict(true), { dailyTarget: 5 });
    ledger.recordScreening(makeProfile({ username: 'creator_b' }), makeVerdict(false), { dailyTarget: 5 });
    ledger.savePending([makeProfile({ username: 'creator_c' })]);
  };

  test('GET /health 返回运行状态', async () => {
    const response = await request(app).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
    expect(response.body.running).toBe(false);
  });

  test('GET /api 列出可用端点', async () => {
    const response = await request(app).get('/api').expect(200);

    expect(response.body.endpoints.stats).toBe('/api/prospection/stats');
  });

  describe('GET /api/prospection/stats', () => {
    test('返回台账统计和今日进度', async () => {
      seedLedger();

      const response = await request(app).get('/api/prospection/stats').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({
        totalProcessed: 2,
        totalApproved: 1,
        totalRejected: 1,
        approvalRate: 50,
        pendingCount: 1,
        approvedOutputRows: 1,
        todayApproved: 1,
        dailyTarget: 5,
        running: false,
      });
      expect(response.body.data.byPlatform).toEqual({ instagram: { total: 2, approved: 1 } });
    });

    test('台账被占用时返回 503', async () => {
      jest.spyOn(ledger, 'getStatistics').mockImplementation(() => {
        throw new LedgerUnavailableError('台账被其他进程占用');
      });

      const response = await request(app).get('/api/prospection/stats').expect(503);

      expect(response.body).toEqual({ success: false, error: '台账被其他进程占用' });
    });
  });

  describe('GET /api/prospection/pending', () => {
    test('返回队列中的账号', async () => {
      seedLedger();

      const response = await request(app).get('/api/prospection/pending').expect(200);

      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0].key).toBe('instagram:creator_c');
      expect(response.body.data[0].profile.username).toBe('creator_c');
    });

    test('limit 非法时返回 400', async () => {
      const response = await request(app).get('/api/prospection/pending?limit=0').expect(400);

      expect(response.body.error).toBe('limit 必须是正整数');
    });
  });

  describe('GET /api/prospection/approved', () => {
    test('按日期返回通过名单', async () => {
      seedLedger();

      const response = await request(app).get('/api/prospection/approved?date=2026-03-10').expect(200);

      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0].username).toBe('creator_a');
      expect(response.body.data[0].approvedDate).toBe('2026-03-10');
    });

    test('不传日期时使用今天', async () => {
      seedLedger();

      const response = await request(app).get('/api/prospection/approved').expect(200);

      expect(response.body.data).toHaveLength(1);
    });

    test('其他日期没有记录', async () => {
      seedLedger();

      const response = await request(app).get('/api/prospection/approved?date=2026-03-09').expect(200);

      expect(response.body.data).toEqual([]);
    });

    test('日期格式错误返回 400', async () => {
      const response = await request(app).get('/api/prospection/approved?date=2026-13-01').expect(400);

      expect(response.body).toEqual({ success: false, error: 'date 格式必须是 YYYY-MM-DD' });
    });
  });

  describe('GET /api/prospection/runs', () => {
    test('返回最近的运行记录', async () => {
      ledger.appendRunSummary(summary);

      const response = await request(app).get('/api/prospection/runs').expect(200);

      expect(response.body.data).toEqual([summary]);
    });
  });

  describe('POST /api/prospection/run', () => {
    test('按参数启动运行', async () => {
      const response = await request(app)
        .post('/api/prospection/run')
        .send({ mode: 'screen', target: 3 })
        .expect(202);

      expect(response.body).toEqual({
        success: true,
        data: { mode: 'screen', target: 3 },
        message: '已开始运行',
      });
      expect(run).toHaveBeenCalledWith('screen', 3);
    });

    test('空请求体默认完整运行', async () => {
      await request(app).post('/api/prospection/run').send({}).expect(202);

      expect(run).toHaveBeenCalledWith('full', undefined);
    });

    test('模式非法时返回 400', async () => {
      const response = await request(app).post('/api/prospection/run').send({ mode: 'all' }).expect(400);

      expect(response.body.error).toMatch(/^参数无效: mode/);
      expect(run).not.toHaveBeenCalled();
    });

    test('已有运行时返回 409', async () => {
      isRunning.mockReturnValue(true);

      const response = await request(app).post('/api/prospection/run').send({}).expect(409);

      expect(response.body).toEqual({ success: false, error: '已有流水线任务在运行' });
      expect(run).not.toHaveBeenCalled();
    });

    test('后台运行失败不影响响应', async () => {
      run.mockRejectedValue(new Error('boom'));

      await request(app).post('/api/prospection/run').send({ mode: 'collect' }).expect(202);

      expect(run).toHaveBeenCalledWith('collect', undefined);
    });
  });

  test('未知路由返回 404', async () => {
    const response = await request(app).get('/api/unknown').expect(404);

    expect(response.body).toEqual({ success: false, error: '请求的资源不存在' });
  });
});
