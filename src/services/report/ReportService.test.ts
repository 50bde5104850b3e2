import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ReportService, escapeCsv, isReportFormat } from './ReportService';
import { HistoryLedger } from '../ledger/HistoryLedger';
import { initSchema } from '../../database/schema';
import { makeProfile, makeVerdict } from '../../testing/fixtures';

const clock = () => new Date(2026, 2, 10, 18, 0, 0);

describe('ReportService', () => {
  let db: Database.Database;
  let ledger: HistoryLedger;
  let dir: string;
  let service: ReportService;

  beforeEach(() => {
    db = new Database(':memory:');
    initSchema(db);
    ledger = new HistoryLedger(db, { clock });
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reports-'));
    service = new ReportService(ledger, dir, clock);

    ledger.recordScreening(
      makeProfile({ username: 'ana', displayName: 'Ana "Fit"', bio: 'moda, treino\nvida', engagementRate: 3.456 }),
      makeVerdict(true, { reason: 'ok | aprovado', confidence: 90 }),
      { dailyTarget: 10 }
    );
    ledger.recordScreening(makeProfile({ username: 'rejeitada' }), makeVerdict(false), { dailyTarget: 10 });
  });

  afterEach(() => {
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('escapeCsv 按 RFC 4180 转义', () => {
    expect(escapeCsv('simples')).toBe('simples');
    expect(escapeCsv('a,b')).toBe('"a,b"');
    expect(escapeCsv('diz "oi"')).toBe('"diz ""oi"""');
    expect(escapeCsv('linha\nnova')).toBe('"linha\nnova"');
    expect(escapeCsv(true)).toBe('true');
  });

  test('CSV 只包含当日通过的账号', () => {
    const lines = service.render('csv', '2026-03-10').split('\r\n');

    expect(lines[0]).toBe(
      'approved_at,name,username,platform,followers,engagement_rate,profile_url,bio,age_ok,' +
        'target_body_type,target_class,target_nationality,is_real_person,confidence,reason,source_tag'
    );
    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe(
      `${clock().toISOString()},"Ana ""Fit""",ana,instagram,25000,3.456,` +
        'https://www.instagram.com/creator_a/,"moda, treino\nvida",true,true,true,true,true,90,ok | aprovado,seed'
    );
    expect(lines[2]).toBe('');
  });

  test('JSON 报告包含日期和总数', () => {
    const report = JSON.parse(service.render('json', '2026-03-10'));

    expect(report.date).toBe('2026-03-10');
    expect(report.total).toBe(1);
    expect(report.prospects[0].username).toBe('ana');
  });

  test('Markdown 表格转义竖线', () => {
    const markdown = service.render('markdown', '2026-03-10');

    expect(markdown).toContain('# 每日合作账号名单 - 2026-03-10');
    expect(markdown).toContain('- instagram: 1');
    expect(markdown).toContain(
      '| 1 | Ana "Fit" | instagram | [@ana](https://www.instagram.com/creator_a/) | 25000 | 3.46% | 90% | ok \\| aprovado |'
    );
  });

  test('没有通过账号的日期', () => {
    expect(service.render('markdown', '2026-03-09')).toContain('当日没有通过筛选的账号。');
    expect(service.render('csv', '2026-03-09').split('\r\n')).toHaveLength(2);
  });

  test('写入 prospects_<date> 文件', () => {
    const files = service.writeAll();

    expect(files.map((file) => path.basename(file))).toEqual([
      'prospects_2026-03-10.json',
      'prospects_2026-03-10.csv',
      'prospects_2026-03-10.md',
    ]);
    expect(fs.readFileSync(path.join(dir, 'prospects_2026-03-10.md'), 'utf-8')).toContain('| 1 |');
  });

  test('isReportFormat', () => {
    expect(isReportFormat('markdown')).toBe(true);
    expect(isReportFormat('html')).toBe(false);
  });
});
