import {
  CollectionResult,
  DiscoveryClients,
  InstagramDiscovery,
  ProfileSource,
  VideoDiscovery,
  describeSource,
} from './types';
import { RateLimiter } from '../rateLimit/RateLimiter';
import { classifyQualification } from '../qualification/QualificationFilter';
import { computeEngagementRate, roundRate } from '../qualification/engagement';
import { QualificationThresholds } from '../../config';
import { CollectionStats, Platform, ProfileRecord, RawProfile } from '../../types';
import { identityKey, normalizeUsername } from '../../utils/identity';
import { logger, describeError } from '../../utils/logger';

export interface ProfileCollectorOptions {
  thresholds: QualificationThresholds;
  engagementSampleSize: number;
}

interface SourceContext {
  tag: string;
  seen: Set<string>;
  profiles: ProfileRecord[];
  stats: CollectionStats;
  errors: string[];
}

/**
 * 候选账号采集
 *
 * 逐个来源拉取账号资料、计算互动率并分档；同一次运行内按身份键去重，先到先得。
 * 单个来源失败只记录错误，不影响其他来源。这里不写任何持久化数据。
 */
export class ProfileCollector {
  constructor(
    private readonly clients: DiscoveryClients,
    private readonly rateLimiter: RateLimiter,
    private readonly options: ProfileCollectorOptions,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async collect(
    sources: ProfileSource[],
    maxPerSource: number,
    seen: Set<string> = new Set<string>()
  ): Promise<CollectionResult> {
    const profiles: ProfileRecord[] = [];
    const errors: string[] = [];
    const stats: CollectionStats = {
      sourcesAttempted: 0,
      sourcesFailed: 0,
      fetched: 0,
      qualified: 0,
      needsVerification: 0,
      belowThreshold: 0,
      duplicates: 0,
    };

    for (const source of sources) {
      const tag = describeSource(source);
      const context: SourceContext = { tag, seen, profiles, stats, errors };
      stats.sourcesAttempted++;
      const before = profiles.length;

      try {
        await this.collectSource(source, Math.max(maxPerSource, 1), context);
        logger.info(`来源 ${tag} 采集完成，新增 ${profiles.length - before} 个候选`);
      } catch (error) {
        stats.sourcesFailed++;
        const message = `来源 ${tag} 采集失败: ${describeError(error)}`;
        errors.push(message);
        logger.error(message);
      }
    }

    logger.info(
      `采集结束: ${stats.fetched} 个账号, 合格 ${stats.qualified}, 待验证 ${stats.needsVerification}, ` +
        `未达标 ${stats.belowThreshold}, 重复 ${stats.duplicates}, 失败来源 ${stats.sourcesFailed}/${stats.sourcesAttempted}`
    );

    return { profiles, errors, stats };
  }

  private async collectSource(source: ProfileSource, limit: number, context: SourceContext): Promise<void> {
    switch (source.kind) {
      case 'seed':
        await this.collectUsernames(source.platform, source.usernames.slice(0, limit), context);
        return;
      case 'hashtag': {
        const instagram = this.requireInstagram();
        await this.rateLimiter.throttle();
        const usernames = await instagram.findHashtagMentions(source.hashtag, limit);
        await this.collectUsernames('instagram', usernames, context);
        return;
      }
      case 'keyword': {
        const video = this.requireVideo();
        await this.rateLimiter.throttle();
        const found = await video.searchProfiles(source.platform, source.keyword, limit);
        for (const raw of found.profiles) {
          this.accept(raw, context);
        }
        // 只有 ID 的结果逐个查询详情，每次查询前同样限速
        await this.collectUsernames(source.platform, found.lookups.slice(0, limit), context);
        return;
      }
    }
  }

  /**
   * 逐个查询用户名；全部查询都失败时整个来源算失败
   */
  private async collectUsernames(platform: Platform, usernames: string[], context: SourceContext): Promise<void> {
    let attempted = 0;
    let failed = 0;
    let lastError: unknown;

    for (const candidate of usernames) {
      const username = normalizeUsername(candidate);
      if (!username) {
        continue;
      }
      if (context.seen.has(identityKey({ platform, username }))) {
        context.stats.duplicates++;
        continue;
      }

      attempted++;
      try {
        await this.rateLimiter.throttle();
        const raw = await this.lookup(platform, username);
        if (raw) {
          this.accept(raw, context);
        } else {
          logger.debug(`账号不可用或不存在: ${platform}:${username}`);
        }
      } catch (error) {
        failed++;
        lastError = error;
        const message = `${context.tag} 查询 ${platform}:${username} 失败: ${describeError(error)}`;
        context.errors.push(message);
        logger.warn(message);
      }
    }

    if (attempted > 0 && failed === attempted) {
      throw lastError instanceof Error ? lastError : new Error(`全部 ${attempted} 个账号查询失败`);
    }
  }

  private lookup(platform: Platform, username: string): Promise<RawProfile | null> {
    if (platform === 'instagram') {
      return this.requireInstagram().fetchProfile(username);
    }
    return this.requireVideo().fetchProfile(platform, username);
  }

  /**
   * 计算互动率并分档，只保留 qualified / needs_verification
   */
  private accept(raw: RawProfile, context: SourceContext): void {
    const key = identityKey(raw);
    if (context.seen.has(key)) {
      context.stats.duplicates++;
      return;
    }
    context.seen.add(key);
    context.stats.fetched++;

    const engagement = computeEngagementRate(raw.followerCount, raw.engagement, this.options.engagementSampleSize);
    const decision = classifyQualification(
      {
        followerCount: raw.followerCount,
        engagementRate: engagement.rate,
        engagementMeasured: engagement.measured,
      },
      this.options.thresholds
    );

    if (decision === 'rejected') {
      context.stats.belowThreshold++;
      logger.debug(
        `未达标 ${key}: ${raw.followerCount} 粉丝, 互动率 ${roundRate(engagement.rate)}%` +
          (engagement.measured ? '' : ' (未测得)')
      );
      return;
    }

    if (decision === 'qualified') {
      context.stats.qualified++;
    } else {
      context.stats.needsVerification++;
    }

    context.profiles.push({
      platform: raw.platform,
      username: raw.username,
      displayName: raw.displayName,
      followerCount: raw.followerCount,
      engagementRate: roundRate(engagement.rate),
      engagementMeasured: engagement.measured,
      bio: raw.bio,
      location: raw.location ?? '',
      contentDescription: raw.contentDescription ?? '',
      profileUrl: raw.profileUrl,
      verified: raw.verified,
      sourceTag: context.tag,
      collectedAt: this.clock().toISOString(),
      tier: decision,
    });
  }

  private requireInstagram(): InstagramDiscovery {
    if (!this.clients.instagram) {
      throw new Error('未配置 Instagram 客户端');
    }
    return this.clients.instagram;
  }

  private requireVideo(): VideoDiscovery {
    if (!this.clients.video) {
      throw new Error('未配置视频平台客户端');
    }
    return this.clients.video;
  }
}
