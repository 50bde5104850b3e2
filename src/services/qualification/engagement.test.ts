import * as fc from 'fast-check';
import { computeEngagementRate, parseCompactCount, roundRate } from './engagement';

describe('engagement', () => {
  describe('computeEngagementRate', () => {
    test('按平均点赞加平均评论除以粉丝数计算', () => {
      const result = computeEngagementRate(10000, {
        kind: 'posts',
        posts: [
          { likes: 300, comments: 20 },
          { likes: 200, comments: 10 },
        ],
      });
      // (250 + 15) / 10000 * 100
      expect(result).toEqual({ rate: 2.65, measured: true });
    });

    test('只取最近 sampleSize 条帖子', () => {
      const posts = [{ likes: 100 }, { likes: 100 }, { likes: 10000 }];
      const result = computeEngagementRate(1000, { kind: 'posts', posts }, 2);
      expect(result.rate).toBe(10);
    });

    test('没有点赞和评论字段时视为未测得', () => {
      const result = computeEngagementRate(5000, { kind: 'posts', posts: [{ views: 900 }] });
      expect(result).toEqual({ rate: 0, measured: false });
    });

    test('空帖子列表视为未测得', () => {
      expect(computeEngagementRate(5000, { kind: 'posts', posts: [] })).toEqual({ rate: 0, measured: false });
    });

    test('代理指标：平均互动除以粉丝数', () => {
      expect(computeEngagementRate(200000, { kind: 'proxy', averageInteractions: 8000 })).toEqual({
        rate: 4,
        measured: true,
      });
    });

    test('粉丝数为 0 时按 1 计算并封顶 100', () => {
      expect(computeEngagementRate(0, { kind: 'proxy', averageInteractions: 50 })).toEqual({
        rate: 100,
        measured: true,
      });
    });

    test('无数据时为 0 且未测得', () => {
      expect(computeEngagementRate(10000, { kind: 'none' })).toEqual({ rate: 0, measured: false });
    });

    test('比较时保留完整精度', () => {
      // 2.4999 不应被四舍五入成 2.5
      const result = computeEngagementRate(10000, { kind: 'proxy', averageInteractions: 249.99 });
      expect(result.rate).toBeLessThan(2.5);
      expect(roundRate(result.rate)).toBe(2.5);
    });

    test('属性：结果始终在 0-100 之间', () => {
      fc.assert(
        fc.property(
          fc.nat({ max: 10_000_000 }),
          fc.array(
            fc.record({
              likes: fc.option(fc.nat({ max: 5_000_000 }), { nil: undefined }),
              comments: fc.option(fc.nat({ max: 500_000 }), { nil: undefined }),
            }),
            { maxLength: 30 }
          ),
          (followers, posts) => {
            const { rate } = computeEngagementRate(followers, { kind: 'posts', posts });
            expect(rate).toBeGreaterThanOrEqual(0);
            expect(rate).toBeLessThanOrEqual(100);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('parseCompactCount', () => {
    test.each([
      ['1.5M subscribers', 1_500_000],
      ['12K views', 12_000],
      ['1,5 mil', 1_500],
      ['2,3 mi de visualizações', 2_300_000],
      ['1,234 views', 1_234],
      ['987', 987],
      ['3B', 3_000_000_000],
      ['1.5 million', 1_500_000],
      ['2 millions', 2_000_000],
      ['10 thousand views', 10_000],
      ['1,2 milhões de inscritos', 1_200_000],
    ])('解析 %s', (text, expected) => {
      expect(parseCompactCount(text)).toBe(expected);
    });

    test('无法解析时返回 0', () => {
      expect(parseCompactCount('No views')).toBe(0);
      expect(parseCompactCount('')).toBe(0);
      expect(parseCompactCount(undefined)).toBe(0);
    });
  });
});
