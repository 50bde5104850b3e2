import config from 'config';
import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { Platform } from '../types';
import { ConfigValidationError } from '../utils/errors';

// 加载环境变量
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const projectRoot = path.resolve(__dirname, '../../');

/**
 * 台账配置
 */
export interface LedgerConfig {
  path: string;
  lockTimeoutMs: number;
  runLogSize: number;
}

/**
 * 资格阈值
 */
export interface QualificationThresholds {
  minFollowers: number;
  minEngagementRate: number;
  allowUnverified: boolean;
  unverifiedMinFollowers: number;
}

export interface PipelineConfig {
  dailyTarget: number;
  oversampleFactor: number;
  maxPerSource: number;
  maxHashtags: number;
  cron: string;
}

export interface CollectorConfig {
  engagementSampleSize: number;
  requestTimeoutMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface InstagramConfig {
  apiBase: string;
  accessToken?: string;
  userId?: string;
  seedProfiles: string[];
  hashtags: string[];
}

export interface VideoApiConfig {
  baseUrl?: string;
  apiKey?: string;
  platforms: Array<Extract<Platform, 'tiktok' | 'youtube'>>;
  keywords: string[];
}

export interface ScreeningCriteriaText {
  age: string;
  bodyType: string;
  incomeClass: string;
  nationality: string;
}

export interface ScreeningConfig {
  apiBase: string;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  requestTimeoutMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  criteria: ScreeningCriteriaText;
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface ReportConfig {
  outputDir: string;
}

const readEnv = (name: string): string | undefined => {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
};

const readNumber = (key: string, envName?: string): number => {
  const raw = envName ? readEnv(envName) : undefined;
  const value = raw !== undefined ? Number(raw) : config.get<number>(key);
  if (!Number.isFinite(value)) {
    throw new ConfigValidationError(`${envName ?? key} 不是有效数字`);
  }
  return value;
};

const readNonNegativeInt = (key: string, envName?: string): number => {
  const value = readNumber(key, envName);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigValidationError(`${envName ?? key} 必须是非负整数`);
  }
  return value;
};

const readStringList = (key: string, envName?: string): string[] => {
  const raw = envName ? readEnv(envName) : undefined;
  const list = raw !== undefined ? raw.split(',') : config.get<string[]>(key);
  return list.map((item) => item.trim()).filter(Boolean);
};

const resolvePath = (value: string): string =>
  path.isAbsolute(value) ? value : path.resolve(projectRoot, value);

/**
 * 获取台账配置
 */
export const getLedgerConfig = (): LedgerConfig => {
  const ledgerPath = resolvePath(readEnv('LEDGER_PATH') || config.get<string>('ledger.path'));

  // 确保数据目录存在
  const dir = path.dirname(ledgerPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  return {
    path: ledgerPath,
    lockTimeoutMs: readNonNegativeInt('ledger.lockTimeoutMs', 'LEDGER_LOCK_TIMEOUT_MS'),
    runLogSize: Math.max(readNonNegativeInt('ledger.runLogSize'), 1),
  };
};

/**
 * 获取资格阈值
 */
export const getQualificationThresholds = (): QualificationThresholds => {
  const minEngagementRate = readNumber('qualification.minEngagementRate', 'MIN_ENGAGEMENT_RATE');
  if (minEngagementRate < 0 || minEngagementRate > 100) {
    throw new ConfigValidationError('MIN_ENGAGEMENT_RATE 必须在 0-100 之间');
  }

  return {
    minFollowers: readNonNegativeInt('qualification.minFollowers', 'MIN_FOLLOWERS'),
    minEngagementRate,
    allowUnverified: config.get<boolean>('qualification.allowUnverified'),
    unverifiedMinFollowers: readNonNegativeInt('qualification.unverifiedMinFollowers'),
  };
};

export const getPipelineConfig = (): PipelineConfig => {
  const oversampleFactor = readNumber('pipeline.oversampleFactor');
  if (oversampleFactor < 1) {
    throw new ConfigValidationError('pipeline.oversampleFactor 不能小于 1');
  }

  return {
    dailyTarget: readNonNegativeInt('pipeline.dailyTarget', 'DAILY_TARGET'),
    oversampleFactor,
    maxPerSource: Math.max(readNonNegativeInt('pipeline.maxPerSource'), 1),
    maxHashtags: readNonNegativeInt('pipeline.maxHashtags'),
    cron: readEnv('PIPELINE_CRON') || config.get<string>('pipeline.cron'),
  };
};

export const getCollectorConfig = (): CollectorConfig => {
  const minDelayMs = readNonNegativeInt('collector.minDelayMs');
  const maxDelayMs = readNonNegativeInt('collector.maxDelayMs');
  if (maxDelayMs < minDelayMs) {
    throw new ConfigValidationError('collector.maxDelayMs 不能小于 minDelayMs');
  }

  return {
    engagementSampleSize: Math.max(readNonNegativeInt('collector.engagementSampleSize'), 1),
    requestTimeoutMs: readNonNegativeInt('collector.requestTimeoutMs'),
    minDelayMs,
    maxDelayMs,
  };
};

export const getInstagramConfig = (): InstagramConfig => ({
  apiBase: config.get<string>('instagram.apiBase'),
  accessToken: readEnv('INSTAGRAM_ACCESS_TOKEN'),
  userId: readEnv('INSTAGRAM_USER_ID'),
  seedProfiles: readStringList('instagram.seedProfiles', 'INSTAGRAM_SEED_PROFILES'),
  hashtags: readStringList('instagram.hashtags', 'INSTAGRAM_HASHTAGS'),
});

export const getVideoApiConfig = (): VideoApiConfig => {
  const platforms = readStringList('videoApi.platforms');
  const invalid = platforms.filter((p) => p !== 'tiktok' && p !== 'youtube');
  if (invalid.length > 0) {
    throw new ConfigValidationError(`videoApi.platforms 包含不支持的平台: ${invalid.join(', ')}`);
  }

  return {
    baseUrl: readEnv('VIDEO_API_BASE_URL') || config.get<string>('videoApi.baseUrl') || undefined,
    apiKey: readEnv('VIDEO_API_KEY'),
    platforms: platforms.filter((p): p is 'tiktok' | 'youtube' => p === 'tiktok' || p === 'youtube'),
    keywords: readStringList('videoApi.keywords', 'VIDEO_KEYWORDS'),
  };
};

export const getScreeningConfig = (): ScreeningConfig => {
  const minDelayMs = readNonNegativeInt('screening.minDelayMs');
  const maxDelayMs = readNonNegativeInt('screening.maxDelayMs');
  if (maxDelayMs < minDelayMs) {
    throw new ConfigValidationError('screening.maxDelayMs 不能小于 minDelayMs');
  }

  return {
    apiBase: readEnv('OPENAI_BASE_URL') || config.get<string>('screening.apiBase'),
    apiKey: readEnv('OPENAI_API_KEY'),
    model: readEnv('OPENAI_MODEL') || config.get<string>('screening.model'),
    maxTokens: readNonNegativeInt('screening.maxTokens'),
    temperature: readNumber('screening.temperature'),
    requestTimeoutMs: readNonNegativeInt('screening.requestTimeoutMs'),
    minDelayMs,
    maxDelayMs,
    criteria: config.get<ScreeningCriteriaText>('screening.criteria'),
  };
};

/**
 * 获取服务器配置
 */
export const getServerConfig = (): ServerConfig => ({
  port: Number(readEnv('PORT')) || config.get<number>('server.port'),
  host: readEnv('HOST') || config.get<string>('server.host'),
});

export const getReportConfig = (): ReportConfig => ({
  outputDir: resolvePath(readEnv('REPORT_DIR') || config.get<string>('report.outputDir')),
});
