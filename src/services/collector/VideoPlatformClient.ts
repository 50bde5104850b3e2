import { z } from 'zod';
import { VideoDiscovery, VideoPlatform, VideoSearchResult } from './types';
import { VideoApiConfig } from '../../config';
import { EngagementSample, RawProfile } from '../../types';
import { fetchJson } from '../../utils/http';
import { CollaboratorError } from '../../utils/errors';
import { normalizeUsername } from '../../utils/identity';
import { parseCompactCount } from '../qualification/engagement';

const count = z.union([z.number(), z.string()]).transform((value) =>
  typeof value === 'number' ? value : parseCompactCount(value)
);

const tiktokAuthorSchema = z.object({
  uniqueId: z.string(),
  nickname: z.string().optional(),
  signature: z.string().optional(),
  verified: z.boolean().optional(),
});

const tiktokAuthorStatsSchema = z.object({
  followerCount: count.optional(),
  heartCount: count.optional(),
  videoCount: count.optional(),
});

const tiktokSearchSchema = z.object({
  data: z
    .array(
      z.object({
        item: z
          .object({
            desc: z.string().optional(),
            author: tiktokAuthorSchema.optional(),
            authorStats: tiktokAuthorStatsSchema.optional(),
            stats: z
              .object({
                diggCount: count.optional(),
                commentCount: count.optional(),
              })
              .optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

const tiktokUserSchema = z.object({
  userInfo: z
    .object({
      user: tiktokAuthorSchema,
      stats: tiktokAuthorStatsSchema.optional(),
    })
    .optional(),
});

const youtubeSearchSchema = z.object({
  contents: z
    .array(
      z.object({
        type: z.string(),
        video: z
          .object({
            channelId: z.string().optional(),
            channelTitle: z.string().optional(),
            title: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

const youtubeChannelSchema = z.object({
  channelId: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  country: z.string().optional(),
  isVerified: z.boolean().optional(),
  stats: z
    .object({
      subscribers: count.optional(),
      videos: count.optional(),
      views: count.optional(),
    })
    .optional(),
  subscriberCountText: z.string().optional(),
});

type TiktokAuthor = z.infer<typeof tiktokAuthorSchema>;
type TiktokAuthorStats = z.infer<typeof tiktokAuthorStatsSchema>;

export interface VideoClientOptions {
  timeoutMs: number;
}

/**
 * TikTok 用每条视频的平均获赞作为代理指标；
 * 作者统计缺失时退回当前视频的点赞加评论
 */
const tiktokEngagement = (
  stats: TiktokAuthorStats | undefined,
  videoStats?: { diggCount?: number; commentCount?: number }
): EngagementSample => {
  const hearts = stats?.heartCount ?? 0;
  const videos = stats?.videoCount ?? 0;
  if (videos > 0 && hearts > 0) {
    return { kind: 'proxy', averageInteractions: hearts / videos };
  }
  if (videoStats && (videoStats.diggCount !== undefined || videoStats.commentCount !== undefined)) {
    return { kind: 'posts', posts: [{ likes: videoStats.diggCount, comments: videoStats.commentCount }] };
  }
  return { kind: 'none' };
};

const toTiktokProfile = (
  author: TiktokAuthor,
  stats: TiktokAuthorStats | undefined,
  engagement: EngagementSample,
  contentDescription = ''
): RawProfile => ({
  platform: 'tiktok',
  username: author.uniqueId,
  displayName: author.nickname || author.uniqueId,
  followerCount: Math.max(Math.round(stats?.followerCount ?? 0), 0),
  bio: author.signature ?? '',
  contentDescription,
  profileUrl: `https://www.tiktok.com/@${author.uniqueId}`,
  verified: author.verified ?? false,
  engagement,
});

/**
 * TikTok / YouTube 数据代理客户端
 *
 * 代理接口：
 *   GET /tiktok/search?keyword=   GET /tiktok/user?uniqueId=
 *   GET /youtube/search?q=        GET /youtube/channel?id=
 */
export class VideoPlatformClient implements VideoDiscovery {
  constructor(
    private readonly config: VideoApiConfig,
    private readonly options: VideoClientOptions
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.baseUrl && this.config.apiKey);
  }

  async fetchProfile(platform: VideoPlatform, username: string): Promise<RawProfile | null> {
    return platform === 'tiktok'
      ? this.fetchTiktokUser(normalizeUsername(username))
      : this.fetchYoutubeChannel(normalizeUsername(username));
  }

  async searchProfiles(platform: VideoPlatform, keyword: string, limit: number): Promise<VideoSearchResult> {
    if (platform === 'tiktok') {
      return { profiles: await this.searchTiktok(keyword, limit), lookups: [] };
    }
    return { profiles: [], lookups: await this.searchYoutube(keyword, limit) };
  }

  private async searchTiktok(keyword: string, limit: number): Promise<RawProfile[]> {
    const response = await this.get('tiktok', '/tiktok/search', { keyword }, tiktokSearchSchema);
    const profiles: RawProfile[] = [];
    const seen = new Set<string>();

    for (const entry of response?.data ?? []) {
      const item = entry.item;
      const author = item?.author;
      if (!item || !author?.uniqueId) {
        continue;
      }
      const key = author.uniqueId.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      profiles.push(
        toTiktokProfile(author, item.authorStats, tiktokEngagement(item.authorStats, item.stats), item.desc)
      );
      if (profiles.length >= limit) {
        break;
      }
    }
    return profiles;
  }

  private async fetchTiktokUser(uniqueId: string): Promise<RawProfile | null> {
    const response = await this.get('tiktok', '/tiktok/user', { uniqueId }, tiktokUserSchema);
    const info = response?.userInfo;
    if (!info) {
      return null;
    }
    return toTiktokProfile(info.user, info.stats, tiktokEngagement(info.stats));
  }

  /**
   * 搜索结果只有频道 ID，订阅数和播放量由调用方逐个查询频道详情
   */
  private async searchYoutube(keyword: string, limit: number): Promise<string[]> {
    const response = await this.get('youtube', '/youtube/search', { q: keyword }, youtubeSearchSchema);
    const channelIds: string[] = [];
    for (const content of response?.contents ?? []) {
      const channelId = content.type === 'video' ? content.video?.channelId : undefined;
      if (channelId && !channelIds.includes(channelId)) {
        channelIds.push(channelId);
      }
      if (channelIds.length >= limit) {
        break;
      }
    }
    return channelIds;
  }

  private async fetchYoutubeChannel(channelId: string): Promise<RawProfile | null> {
    const channel = await this.get('youtube', '/youtube/channel', { id: channelId }, youtubeChannelSchema);
    if (!channel) {
      return null;
    }

    const id = channel.channelId ?? channelId;
    const subscribers =
      channel.stats?.subscribers ?? parseCompactCount(channel.subscriberCountText);
    const videos = channel.stats?.videos ?? 0;
    const views = channel.stats?.views ?? 0;

    return {
      platform: 'youtube',
      username: id,
      displayName: channel.title || id,
      followerCount: Math.max(Math.round(subscribers), 0),
      bio: channel.description ?? '',
      location: channel.country,
      profileUrl: `https://www.youtube.com/channel/${id}`,
      verified: channel.isVerified ?? false,
      // 平均每条视频播放量作为代理指标
      engagement:
        videos > 0 && views > 0 ? { kind: 'proxy', averageInteractions: views / videos } : { kind: 'none' },
    };
  }

  private async get<S extends z.ZodTypeAny>(
    platform: VideoPlatform,
    pathname: string,
    params: Record<string, string>,
    schema: S
  ): Promise<z.infer<S> | null> {
    const { baseUrl, apiKey } = this.config;
    if (!baseUrl || !apiKey) {
      throw new CollaboratorError(platform, '缺少 VIDEO_API_BASE_URL 或 VIDEO_API_KEY');
    }
    const url = `${baseUrl.replace(/\/+$/, '')}${pathname}?${new URLSearchParams(params).toString()}`;
    return fetchJson(url, schema, {
      collaborator: platform,
      timeoutMs: this.options.timeoutMs,
      headers: { 'x-api-key': apiKey },
    });
  }
}
