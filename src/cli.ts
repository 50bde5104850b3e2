import fs from 'fs';
import { parseArgs } from 'util';
import { ReportFormat, RunMode, RunSummary } from './types';
import { isReportFormat, REPORT_FORMATS } from './services/report/ReportService';
import { ConfigValidationError } from './utils/errors';

export interface CliOptions {
  mode: RunMode;
  target?: number;
  reports: ReportFormat[];
  serve: boolean;
  schedule: boolean;
  stats: boolean;
}

export const USAGE = `用法: niche-prospector [选项]

  (无选项)            采集 + 筛选完整运行一次
  --collect           只采集，结果进入待筛选队列
  --screen            只筛选队列中的账号
  --target <n>        覆盖当日通过目标
  --report <格式>     运行后导出名单: json | csv | markdown | all
  --stats             打印台账统计后退出
  --serve             启动状态 API
  --schedule          按 cron 计划每日运行
  -h, --help          显示帮助`;

/**
 * 解析命令行参数
 */
export const parseCliArgs = (argv: string[]): CliOptions | 'help' => {
  const { values } = parseArgs({
    args: argv,
    options: {
      collect: { type: 'boolean', default: false },
      screen: { type: 'boolean', default: false },
      target: { type: 'string' },
      report: { type: 'string' },
      stats: { type: 'boolean', default: false },
      serve: { type: 'boolean', default: false },
      schedule: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) {
    return 'help';
  }

  if (values.collect && values.screen) {
    throw new ConfigValidationError('--collect 和 --screen 不能同时使用');
  }

  let target: number | undefined;
  if (values.target !== undefined) {
    target = Number(values.target);
    if (!Number.isInteger(target) || target < 0) {
      throw new ConfigValidationError(`--target 必须是非负整数: ${values.target}`);
    }
  }

  let reports: ReportFormat[] = [];
  if (values.report !== undefined) {
    const format = values.report.trim().toLowerCase();
    if (format === 'all') {
      reports = [...REPORT_FORMATS];
    } else if (isReportFormat(format)) {
      reports = [format];
    } else {
      throw new ConfigValidationError(`不支持的报告格式: ${values.report}`);
    }
  }

  return {
    mode: values.collect ? 'collect' : values.screen ? 'screen' : 'full',
    target,
    reports,
    serve: Boolean(values.serve),
    schedule: Boolean(values.schedule),
    stats: Boolean(values.stats),
  };
};

export const isCiEnvironment = (env: NodeJS.ProcessEnv): boolean =>
  Boolean(env['CI'] || env['GITHUB_ACTIONS']);

/**
 * CI 步骤输出：approved=<本次新增> total_today=<今日累计>
 */
export const formatCiOutput = (summary: RunSummary): string[] => [
  `approved=${summary.newApproved}`,
  `total_today=${summary.totalToday}`,
];

/**
 * 打印 CI 输出行，存在 GITHUB_OUTPUT 时同时追加进去
 */
export const emitCiOutput = (
  summary: RunSummary,
  env: NodeJS.ProcessEnv,
  print: (line: string) => void
): void => {
  const lines = formatCiOutput(summary);
  lines.forEach(print);

  const outputFile = env['GITHUB_OUTPUT'];
  if (outputFile) {
    fs.appendFileSync(outputFile, `${lines.join('\n')}\n`, 'utf-8');
  }
};
