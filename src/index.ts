#!/usr/bin/env node
import type http from 'http';
import {
  getCollectorConfig,
  getInstagramConfig,
  getLedgerConfig,
  getPipelineConfig,
  getQualificationThresholds,
  getReportConfig,
  getScreeningConfig,
  getVideoApiConfig,
} from './config';
import { getDatabase, closeDatabase } from './database/init';
import { HistoryLedger } from './services/ledger/HistoryLedger';
import { ProfileCollector } from './services/collector/ProfileCollector';
import { InstagramDiscoveryClient } from './services/collector/InstagramDiscoveryClient';
import { VideoPlatformClient } from './services/collector/VideoPlatformClient';
import { RateLimiter } from './services/rateLimit/RateLimiter';
import { LlmClassifier } from './services/screening/LlmClassifier';
import { ProfileScreener } from './services/screening/ProfileScreener';
import { ProspectionPipeline } from './services/pipeline/ProspectionPipeline';
import { ProspectionScheduler } from './services/pipeline/ProspectionScheduler';
import { buildSources } from './services/pipeline/sources';
import { ReportService } from './services/report/ReportService';
import { CliOptions, emitCiOutput, isCiEnvironment, parseCliArgs, USAGE } from './cli';
import { createServer, startServer, shutdownServer } from './server';
import { logger, describeError } from './utils/logger';

interface Runtime {
  ledger: HistoryLedger;
  pipeline: ProspectionPipeline;
}

let server: http.Server | null = null;
let scheduler: ProspectionScheduler | null = null;
let shuttingDown = false;

// eslint-disable-next-line no-console
const print = (line: string): void => console.log(line);

/**
 * 组装台账、采集、筛选和流水线
 */
const buildRuntime = (): Runtime => {
  const ledgerConfig = getLedgerConfig();
  const pipelineConfig = getPipelineConfig();
  const collectorConfig = getCollectorConfig();
  const screeningConfig = getScreeningConfig();
  const instagramConfig = getInstagramConfig();
  const videoConfig = getVideoApiConfig();

  const ledger = new HistoryLedger(getDatabase(), { runLogSize: ledgerConfig.runLogSize });

  const collector = new ProfileCollector(
    {
      instagram: new InstagramDiscoveryClient(instagramConfig, {
        sampleSize: collectorConfig.engagementSampleSize,
        timeoutMs: collectorConfig.requestTimeoutMs,
      }),
      video: new VideoPlatformClient(videoConfig, { timeoutMs: collectorConfig.requestTimeoutMs }),
    },
    new RateLimiter({ minDelayMs: collectorConfig.minDelayMs, maxDelayMs: collectorConfig.maxDelayMs }),
    {
      thresholds: getQualificationThresholds(),
      engagementSampleSize: collectorConfig.engagementSampleSize,
    }
  );

  const screener = new ProfileScreener(
    new LlmClassifier(screeningConfig),
    new RateLimiter({ minDelayMs: screeningConfig.minDelayMs, maxDelayMs: screeningConfig.maxDelayMs })
  );

  const sources = buildSources({
    instagram: instagramConfig,
    video: videoConfig,
    maxHashtags: pipelineConfig.maxHashtags,
  });

  const pipeline = new ProspectionPipeline(ledger, collector, screener, sources, {
    dailyTarget: pipelineConfig.dailyTarget,
    oversampleFactor: pipelineConfig.oversampleFactor,
    maxPerSource: pipelineConfig.maxPerSource,
  });

  return { ledger, pipeline };
};

const gracefulShutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`收到 ${signal} 信号，开始优雅关闭...`);

  scheduler?.stop();

  try {
    if (server) {
      await shutdownServer(server);
    }
  } catch (error) {
    logger.error('关闭 HTTP 服务器失败', error);
  }

  try {
    closeDatabase();
  } catch (error) {
    logger.error('关闭数据库失败', error);
  }

  process.exit(0);
};

/**
 * 常驻模式：状态 API 和/或定时任务
 */
const startDaemon = async (options: CliOptions, runtime: Runtime): Promise<void> => {
  if (options.schedule) {
    scheduler = new ProspectionScheduler(runtime.pipeline, getPipelineConfig().cron);
    scheduler.start();
  }

  if (options.serve) {
    const { createApp } = await import('./app');
    const app = createApp({
      ledger: runtime.ledger,
      pipeline: runtime.pipeline,
      dailyTarget: runtime.pipeline.getDailyTarget(),
    });
    server = createServer(app);
    await startServer(server);
  }

  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
};

/**
 * 单次运行，返回退出码
 */
const runOnce = async (options: CliOptions, runtime: Runtime): Promise<number> => {
  const summary = await runtime.pipeline.run(options.mode, options.target);

  if (options.reports.length > 0) {
    const reports = new ReportService(runtime.ledger, getReportConfig().outputDir);
    for (const format of options.reports) {
      reports.write(format);
    }
  }

  if (isCiEnvironment(process.env)) {
    emitCiOutput(summary, process.env, print);
  }

  return summary.status === 'failed' ? 1 : 0;
};

const main = async (argv: string[]): Promise<number | undefined> => {
  const options = parseCliArgs(argv);
  if (options === 'help') {
    print(USAGE);
    return 0;
  }

  const runtime = buildRuntime();

  if (options.stats) {
    print(JSON.stringify(runtime.ledger.getStatistics(), null, 2));
    closeDatabase();
    return 0;
  }

  if (options.serve || options.schedule) {
    await startDaemon(options, runtime);
    return undefined;
  }

  try {
    return await runOnce(options, runtime);
  } finally {
    closeDatabase();
  }
};

main(process.argv.slice(2))
  .then((code) => {
    if (code !== undefined) {
      process.exitCode = code;
    }
  })
  .catch((error: unknown) => {
    logger.error(`启动失败: ${describeError(error)}`);
    process.exit(1);
  });
