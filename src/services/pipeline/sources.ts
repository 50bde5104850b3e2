import { InstagramConfig, VideoApiConfig } from '../../config';
import { ProfileSource } from '../collector/types';
import { logger } from '../../utils/logger';

export interface SourcePlanOptions {
  instagram: InstagramConfig;
  video: VideoApiConfig;
  maxHashtags: number;
}

/**
 * 根据配置生成采集来源
 * 缺少凭据的平台整个跳过，避免每次运行都记一次失败
 */
export const buildSources = ({ instagram, video, maxHashtags }: SourcePlanOptions): ProfileSource[] => {
  const sources: ProfileSource[] = [];

  if (instagram.accessToken && instagram.userId) {
    if (instagram.seedProfiles.length > 0) {
      sources.push({ kind: 'seed', platform: 'instagram', usernames: instagram.seedProfiles });
    }
    const hashtags = maxHashtags > 0 ? instagram.hashtags.slice(0, maxHashtags) : instagram.hashtags;
    for (const hashtag of hashtags) {
      sources.push({ kind: 'hashtag', hashtag: hashtag.replace(/^#/, '') });
    }
  } else {
    logger.warn('未配置 INSTAGRAM_ACCESS_TOKEN / INSTAGRAM_USER_ID，跳过 Instagram 来源');
  }

  if (video.baseUrl && video.apiKey) {
    for (const platform of video.platforms) {
      for (const keyword of video.keywords) {
        sources.push({ kind: 'keyword', platform, keyword });
      }
    }
  } else {
    logger.warn('未配置 VIDEO_API_BASE_URL / VIDEO_API_KEY，跳过短视频平台来源');
  }

  return sources;
};
