import { z } from 'zod';
import { InstagramDiscovery } from './types';
import { InstagramConfig } from '../../config';
import { RawProfile } from '../../types';
import { fetchJson } from '../../utils/http';
import { CollaboratorError } from '../../utils/errors';
import { normalizeUsername } from '../../utils/identity';
import { logger } from '../../utils/logger';

const businessDiscoverySchema = z.object({
  business_discovery: z
    .object({
      username: z.string(),
      name: z.string().optional(),
      biography: z.string().optional(),
      website: z.string().optional(),
      followers_count: z.number().int().nonnegative().default(0),
      media: z
        .object({
          data: z.array(
            z.object({
              like_count: z.number().optional(),
              comments_count: z.number().optional(),
              caption: z.string().optional(),
            })
          ),
        })
        .optional(),
    })
    .optional(),
});

const hashtagSearchSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

const recentMediaSchema = z.object({
  data: z.array(z.object({ id: z.string(), caption: z.string().optional() })),
});

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
  }),
});

// 账号不存在、私密或不是商业/创作者账号
const PROFILE_UNAVAILABLE_CODES = new Set([110]);
const PROFILE_UNAVAILABLE_SUBCODES = new Set([2207013]);

/**
 * Business Discovery 的 400 是否只是"这个账号查不到"
 * 令牌失效(190)、限流(4/17/32)等同样返回 400，但属于接口不可用
 */
export const isProfileUnavailable = (detail: unknown): boolean => {
  const parsed = graphErrorSchema.safeParse(detail);
  if (!parsed.success) {
    return false;
  }
  const { code, error_subcode: subcode } = parsed.data.error;
  return (
    (code !== undefined && PROFILE_UNAVAILABLE_CODES.has(code)) ||
    (subcode !== undefined && PROFILE_UNAVAILABLE_SUBCODES.has(subcode))
  );
};

const describeGraphError = (error: CollaboratorError): string => {
  const parsed = graphErrorSchema.safeParse(error.detail);
  if (!parsed.success) {
    return `请求失败(${error.status ?? '未知'})`;
  }
  const { code, message } = parsed.data.error;
  return `Graph API 拒绝请求(code ${code ?? '未知'}): ${message ?? '无说明'}`;
};

const MENTION_PATTERN = /@([A-Za-z0-9_.]+)/g;

/**
 * 从帖子文案里提取 @ 提及，保持出现顺序并去重
 */
export const extractMentions = (captions: string[]): string[] => {
  const seen = new Set<string>();
  const mentions: string[] = [];
  for (const caption of captions) {
    for (const match of caption.matchAll(MENTION_PATTERN)) {
      const username = (match[1] ?? '').replace(/\.+$/, '');
      const key = username.toLowerCase();
      if (username.length < 3 || seen.has(key)) {
        continue;
      }
      seen.add(key);
      mentions.push(username);
    }
  }
  return mentions;
};

export interface InstagramClientOptions {
  sampleSize: number;
  timeoutMs: number;
}

/**
 * Instagram Graph API 客户端（Business Discovery + 话题搜索）
 */
export class InstagramDiscoveryClient implements InstagramDiscovery {
  constructor(
    private readonly config: InstagramConfig,
    private readonly options: InstagramClientOptions
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.accessToken && this.config.userId);
  }

  async fetchProfile(username: string): Promise<RawProfile | null> {
    const { userId, accessToken } = this.credentials();
    const handle = normalizeUsername(username);
    const fields =
      `business_discovery.username(${handle})` +
      `{username,name,biography,website,followers_count,media_count,` +
      `media.limit(${this.options.sampleSize}){like_count,comments_count,caption}}`;

    let response: z.infer<typeof businessDiscoverySchema> | null;
    try {
      response = await fetchJson(
        this.buildUrl(userId, { fields, access_token: accessToken }),
        businessDiscoverySchema,
        { collaborator: 'instagram', timeoutMs: this.options.timeoutMs }
      );
    } catch (error) {
      if (error instanceof CollaboratorError && error.status === 400) {
        if (isProfileUnavailable(error.detail)) {
          logger.debug(`Instagram 账号不可查询: @${handle}`);
          return null;
        }
        throw new CollaboratorError('instagram', describeGraphError(error), 400, error.detail);
      }
      throw error;
    }

    const business = response?.business_discovery;
    if (!business) {
      return null;
    }

    const posts = (business.media?.data ?? []).map((media) => ({
      likes: media.like_count,
      comments: media.comments_count,
    }));
    const captions = (business.media?.data ?? [])
      .map((media) => media.caption ?? '')
      .filter(Boolean)
      .slice(0, 3);

    return {
      platform: 'instagram',
      username: business.username,
      displayName: business.name ?? business.username,
      followerCount: business.followers_count,
      bio: business.biography ?? '',
      contentDescription: captions.join(' | '),
      profileUrl: `https://www.instagram.com/${business.username}/`,
      verified: false,
      engagement: posts.length > 0 ? { kind: 'posts', posts } : { kind: 'none' },
    };
  }

  /**
   * 话题 → 最近帖子 → 文案中的 @ 提及
   */
  async findHashtagMentions(hashtag: string, limit: number): Promise<string[]> {
    const { userId, accessToken } = this.credentials();
    const tag = hashtag.replace(/^#/, '').trim();

    const search = await fetchJson(
      this.buildUrl('ig_hashtag_search', { user_id: userId, q: tag, access_token: accessToken }),
      hashtagSearchSchema,
      { collaborator: 'instagram', timeoutMs: this.options.timeoutMs }
    );
    const hashtagId = search?.data[0]?.id;
    if (!hashtagId) {
      logger.debug(`未找到话题 #${tag}`);
      return [];
    }

    const media = await fetchJson(
      this.buildUrl(`${hashtagId}/recent_media`, {
        user_id: userId,
        fields: 'id,caption',
        limit: String(Math.min(limit * 2, 50)),
        access_token: accessToken,
      }),
      recentMediaSchema,
      { collaborator: 'instagram', timeoutMs: this.options.timeoutMs }
    );

    const captions = (media?.data ?? []).map((item) => item.caption ?? '');
    return extractMentions(captions).slice(0, limit);
  }

  private credentials(): { userId: string; accessToken: string } {
    const { userId, accessToken } = this.config;
    if (!userId || !accessToken) {
      throw new CollaboratorError('instagram', '缺少 INSTAGRAM_ACCESS_TOKEN 或 INSTAGRAM_USER_ID');
    }
    return { userId, accessToken };
  }

  private buildUrl(pathname: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params).toString();
    return `${this.config.apiBase.replace(/\/+$/, '')}/${pathname}?${query}`;
  }
}
