import { buildSources } from './sources';
import { InstagramConfig, VideoApiConfig } from '../../config';

const instagram: InstagramConfig = {
  apiBase: 'https://graph.example.test/v19.0',
  accessToken: 'test-token',
  userId: '1000',
  seedProfiles: ['creator_a', 'creator_b'],
  hashtags: ['#emagrecimento', 'vidasaudavel', 'plussize'],
};

const video: VideoApiConfig = {
  baseUrl: 'https://video.example.test',
  apiKey: 'test-secret',
  platforms: ['tiktok', 'youtube'],
  keywords: ['perda de peso'],
};

describe('buildSources', () => {
  test('种子、话题、关键词按顺序生成', () => {
    expect(buildSources({ instagram, video, maxHashtags: 2 })).toEqual([
      { kind: 'seed', platform: 'instagram', usernames: ['creator_a', 'creator_b'] },
      { kind: 'hashtag', hashtag: 'emagrecimento' },
      { kind: 'hashtag', hashtag: 'vidasaudavel' },
      { kind: 'keyword', platform: 'tiktok', keyword: 'perda de peso' },
      { kind: 'keyword', platform: 'youtube', keyword: 'perda de peso' },
    ]);
  });

  test('maxHashtags 为 0 时不限制话题数量', () => {
    const sources = buildSources({ instagram: { ...instagram, seedProfiles: [] }, video, maxHashtags: 0 });

    expect(sources.filter((source) => source.kind === 'hashtag')).toHaveLength(3);
    expect(sources.some((source) => source.kind === 'seed')).toBe(false);
  });

  test('缺少凭据的平台被跳过', () => {
    const sources = buildSources({
      instagram: { ...instagram, accessToken: undefined },
      video: { ...video, apiKey: undefined },
      maxHashtags: 10,
    });

    expect(sources).toEqual([]);
  });
});
