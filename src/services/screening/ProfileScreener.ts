import { ProfileClassifier } from './LlmClassifier';
import { RateLimiter } from '../rateLimit/RateLimiter';
import { ProfileRecord, ScreenedProfile, ScreeningBatchResult } from '../../types';
import { ScreeningUnavailableError } from '../../utils/errors';
import { identityKey } from '../../utils/identity';
import { logger, describeError } from '../../utils/logger';

/**
 * 结论交给回调后的去向
 * - recorded: 已记录，计入通过/拒绝
 * - ignored: 没有记录（例如已在历史中），不计数，继续下一个
 * - stop: 没有记录，停止后续筛选（例如当日名额已被占满）
 */
export type VerdictDisposition = 'recorded' | 'ignored' | 'stop';

export type VerdictHandler = (screened: ScreenedProfile) => VerdictDisposition;

/**
 * 批量筛选
 * 按输入顺序逐个调用分类器，已记录的通过数达到 maxApproved 后停止。
 * 单个账号的传输失败记入 failures，账号保持待筛选；服务不可用时整批停止。
 */
export class ProfileScreener {
  constructor(
    private readonly classifier: ProfileClassifier,
    private readonly rateLimiter: RateLimiter
  ) {}

  async screen(
    pending: ProfileRecord[],
    maxApproved: number,
    onVerdict?: VerdictHandler
  ): Promise<ScreeningBatchResult> {
    const result: ScreeningBatchResult = { approved: [], rejected: [], failures: [] };
    if (maxApproved <= 0) {
      return result;
    }

    logger.info(`开始筛选 ${pending.length} 个账号（目标通过 ${maxApproved} 个）`);

    for (const [i, profile] of pending.entries()) {
      if (result.approved.length >= maxApproved) {
        logger.info(`已达到 ${maxApproved} 个通过，停止筛选`);
        break;
      }

      const key = identityKey(profile);
      await this.rateLimiter.throttle();

      let screened: ScreenedProfile;
      try {
        screened = { profile, verdict: await this.classifier.classify(profile) };
      } catch (error) {
        if (error instanceof ScreeningUnavailableError) {
          throw error;
        }
        const message = `${key} 筛选失败: ${describeError(error)}`;
        result.failures.push({ profile, error: message });
        logger.warn(message);
        continue;
      }

      const disposition = onVerdict ? onVerdict(screened) : 'recorded';
      if (disposition === 'stop') {
        logger.info(`${key} 的结论未记录，停止筛选`);
        break;
      }
      if (disposition === 'ignored') {
        logger.info(`${key} 的结论未记录，跳过`);
        continue;
      }

      if (screened.verdict.approved) {
        result.approved.push(screened);
      } else {
        result.rejected.push(screened);
      }
      logger.info(
        `筛选 ${key}: ${screened.verdict.approved ? '通过' : '拒绝'} (置信度 ${screened.verdict.confidence}%)`
      );

      if ((i + 1) % 10 === 0) {
        logger.info(
          `进度 ${i + 1}/${pending.length}: 通过 ${result.approved.length}, 拒绝 ${result.rejected.length}`
        );
      }
    }

    logger.info(
      `筛选完成: 通过 ${result.approved.length}, 拒绝 ${result.rejected.length}, 失败 ${result.failures.length}`
    );
    return result;
  }
}
