import { EngagementSample } from '../../types';

export const DEFAULT_SAMPLE_SIZE = 10;

export interface EngagementResult {
  /** 未取整的互动率（0-100） */
  rate: number;
  measured: boolean;
}

const clampRate = (value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.min(value, 100);
};

/**
 * 计算互动率
 * - 帖子样本：100 * (平均点赞 + 平均评论) / 粉丝数，只取最近 sampleSize 条
 * - 平台代理：100 * 平均互动 / 粉丝数
 * 结果限制在 [0, 100]，保留完整精度，比较阈值时不取整
 */
export const computeEngagementRate = (
  followerCount: number,
  sample: EngagementSample,
  sampleSize: number = DEFAULT_SAMPLE_SIZE
): EngagementResult => {
  const denominator = Math.max(followerCount, 1);

  switch (sample.kind) {
    case 'posts': {
      const recent = sample.posts
        .slice(0, Math.max(sampleSize, 1))
        .filter((post) => post.likes !== undefined || post.comments !== undefined);
      if (recent.length === 0) {
        return { rate: 0, measured: false };
      }
      const totalLikes = recent.reduce((sum, post) => sum + (post.likes ?? 0), 0);
      const totalComments = recent.reduce((sum, post) => sum + (post.comments ?? 0), 0);
      const average = (totalLikes + totalComments) / recent.length;
      return { rate: clampRate((100 * average) / denominator), measured: true };
    }
    case 'proxy':
      return { rate: clampRate((100 * sample.averageInteractions) / denominator), measured: true };
    case 'none':
      return { rate: 0, measured: false };
  }
};

/**
 * 存储和展示用，两位小数
 */
export const roundRate = (rate: number): number => Math.round(rate * 100) / 100;

// 长的写在前面，避免 "million" 只匹配到 "mil"
const COUNT_SUFFIXES: Array<[pattern: string, multiplier: number]> = [
  ['thousands?', 1_000],
  ['millions?', 1_000_000],
  ['milh(?:ões|oes|ão|ao)', 1_000_000],
  ['billions?', 1_000_000_000],
  ['mil', 1_000],
  ['mi', 1_000_000],
  ['k', 1_000],
  ['m', 1_000_000],
  ['b', 1_000_000_000],
];

const COUNT_PATTERN = new RegExp(
  `^([\\d.,]+)\\s*(${COUNT_SUFFIXES.map(([pattern]) => pattern).join('|')})?(?![a-zà-ú])`
);

const multiplierFor = (suffix: string): number | undefined =>
  COUNT_SUFFIXES.find(([pattern]) => new RegExp(`^(?:${pattern})$`).test(suffix))?.[1];

/**
 * 解析 "1.5M subscribers"、"12K views"、"1.5 million"、"1,234" 这类计数文本
 * 无法解析时返回 0
 */
export const parseCompactCount = (text: string | undefined | null): number => {
  if (!text) {
    return 0;
  }

  const match = COUNT_PATTERN.exec(text.trim().toLowerCase());
  if (!match) {
    return 0;
  }

  const [, digits = '', suffix] = match;
  const multiplier = suffix ? multiplierFor(suffix) : undefined;

  if (multiplier !== undefined) {
    const value = Number.parseFloat(digits.replace(',', '.'));
    return Number.isFinite(value) ? Math.round(value * multiplier) : 0;
  }

  // 无单位时 "." 和 "," 都视为千分位
  const value = Number.parseInt(digits.replace(/[.,]/g, ''), 10);
  return Number.isFinite(value) ? value : 0;
};
