import { CollectionStats, Platform, ProfileRecord, RawProfile } from '../../types';

export type VideoPlatform = Extract<Platform, 'tiktok' | 'youtube'>;

/**
 * 采集来源
 * - seed: 固定的用户名列表
 * - hashtag: Instagram 话题下最近帖子里提到的账号
 * - keyword: 短视频平台的关键词搜索
 */
export type ProfileSource =
  | { kind: 'seed'; platform: Platform; usernames: string[] }
  | { kind: 'hashtag'; hashtag: string }
  | { kind: 'keyword'; platform: VideoPlatform; keyword: string };

/**
 * Instagram 发现接口
 * 私密账号、非商业账号或不存在的账号返回 null
 */
export interface InstagramDiscovery {
  isConfigured(): boolean;
  fetchProfile(username: string): Promise<RawProfile | null>;
  findHashtagMentions(hashtag: string, limit: number): Promise<string[]>;
}

/**
 * 关键词搜索结果
 * profiles: 搜索接口直接给出完整资料的账号
 * lookups: 只拿到 ID、需要再逐个查询详情的账号
 */
export interface VideoSearchResult {
  profiles: RawProfile[];
  lookups: string[];
}

/**
 * TikTok / YouTube 数据代理
 */
export interface VideoDiscovery {
  isConfigured(): boolean;
  fetchProfile(platform: VideoPlatform, username: string): Promise<RawProfile | null>;
  searchProfiles(platform: VideoPlatform, keyword: string, limit: number): Promise<VideoSearchResult>;
}

export interface DiscoveryClients {
  instagram?: InstagramDiscovery;
  video?: VideoDiscovery;
}

export interface CollectionResult {
  profiles: ProfileRecord[];
  errors: string[];
  stats: CollectionStats;
}

export const describeSource = (source: ProfileSource): string => {
  switch (source.kind) {
    case 'seed':
      return `seed:${source.platform}`;
    case 'hashtag':
      return `#${source.hashtag}`;
    case 'keyword':
      return `${source.platform}:${source.keyword}`;
  }
};
