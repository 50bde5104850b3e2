// 候选账号相关类型定义
export const PLATFORMS = ['instagram', 'tiktok', 'youtube'] as const;

export type Platform = (typeof PLATFORMS)[number];

export type QualificationTier = 'qualified' | 'needs_verification';

export interface ProfileIdentity {
  platform: Platform;
  username: string;
}

/**
 * 采集阶段观测到的候选账号
 * engagementMeasured=false 时 engagementRate 的 0 表示"未测得"，而不是真实的零互动
 */
export interface ProfileRecord extends ProfileIdentity {
  displayName: string;
  followerCount: number;
  engagementRate: number;
  engagementMeasured: boolean;
  bio: string;
  location: string;
  contentDescription: string;
  profileUrl: string;
  verified: boolean;
  sourceTag: string;
  collectedAt: string;
  tier: QualificationTier;
}

export interface PostMetrics {
  likes?: number;
  comments?: number;
  views?: number;
}

/**
 * 互动率的数据来源
 * - posts: 最近帖子的点赞/评论
 * - proxy: 平台代理指标（每条视频的平均播放或平均获赞）
 * - none: 接口没有返回任何互动数据
 */
export type EngagementSample =
  | { kind: 'posts'; posts: PostMetrics[] }
  | { kind: 'proxy'; averageInteractions: number }
  | { kind: 'none' };

/**
 * 外部发现接口返回的原始账号数据（已做过结构校验）
 */
export interface RawProfile extends ProfileIdentity {
  displayName: string;
  followerCount: number;
  bio: string;
  location?: string;
  contentDescription?: string;
  profileUrl: string;
  verified: boolean;
  engagement: EngagementSample;
}
