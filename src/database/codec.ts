import { z } from 'zod';
import { PLATFORMS } from '../types';

/**
 * 台账中 JSON 列的结构
 * 读出时重新校验，坏行按缺失处理
 */
export const profileRecordSchema = z.object({
  platform: z.enum(PLATFORMS),
  username: z.string().min(1),
  displayName: z.string(),
  followerCount: z.number().int().nonnegative(),
  engagementRate: z.number().min(0).max(100),
  engagementMeasured: z.boolean(),
  bio: z.string(),
  location: z.string(),
  contentDescription: z.string(),
  profileUrl: z.string(),
  verified: z.boolean(),
  sourceTag: z.string(),
  collectedAt: z.string(),
  tier: z.enum(['qualified', 'needs_verification']),
});

export const runSummarySchema = z.object({
  runId: z.string(),
  mode: z.enum(['full', 'collect', 'screen']),
  status: z.enum(['completed', 'quota_met', 'collect_only', 'failed']),
  startedAt: z.string(),
  finishedAt: z.string(),
  elapsedMs: z.number(),
  collected: z.number(),
  qualified: z.number(),
  newPending: z.number(),
  screened: z.number(),
  newApproved: z.number(),
  rejected: z.number(),
  deferred: z.number(),
  totalToday: z.number(),
  dailyTarget: z.number(),
  sourcesAttempted: z.number(),
  sourcesFailed: z.number(),
  errors: z.array(z.string()),
});

/**
 * 解析 JSON 文本并校验；失败返回 undefined
 */
export const decodeJson = <S extends z.ZodTypeAny>(
  schema: S,
  text: string
): z.infer<S> | undefined => {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
};
