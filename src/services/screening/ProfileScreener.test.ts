import { ProfileScreener } from './ProfileScreener';
import { ProfileClassifier } from './LlmClassifier';
import { RateLimiter } from '../rateLimit/RateLimiter';
import { CollaboratorError, ScreeningUnavailableError } from '../../utils/errors';
import { makeProfile, makeVerdict } from '../../testing/fixtures';
import { ProfileRecord } from '../../types';

describe('ProfileScreener', () => {
  const rateLimiter = new RateLimiter({ minDelayMs: 0, maxDelayMs: 0 });
  const profiles = ['a', 'b', 'c', 'd'].map((username) => makeProfile({ username }));

  const classifierFrom = (decide: (profile: ProfileRecord) => Promise<boolean>) => {
    const classify = jest.fn(async (profile: ProfileRecord) => makeVerdict(await decide(profile)));
    const classifier: ProfileClassifier = { classify };
    return { classifier, classify };
  };

  test('按输入顺序筛选，通过数达到上限后停止', async () => {
    const { classifier, classify } = classifierFrom(async (p) => p.username !== 'b');
    const screener = new ProfileScreener(classifier, rateLimiter);

    const result = await screener.screen(profiles, 2);

    expect(result.approved.map((s) => s.profile.username)).toEqual(['a', 'c']);
    expect(result.rejected.map((s) => s.profile.username)).toEqual(['b']);
    expect(classify).toHaveBeenCalledTimes(3);
  });

  test('maxApproved 为 0 时不调用分类器', async () => {
    const { classifier, classify } = classifierFrom(async () => true);
    const result = await new ProfileScreener(classifier, rateLimiter).screen(profiles, 0);

    expect(result).toEqual({ approved: [], rejected: [], failures: [] });
    expect(classify).not.toHaveBeenCalled();
  });

  test('传输失败记入 failures 并继续后面的账号', async () => {
    const { classifier } = classifierFrom(async (p) => {
      if (p.username === 'a') {
        throw new CollaboratorError('llm', '请求超时(30000ms)');
      }
      return true;
    });
    const result = await new ProfileScreener(classifier, rateLimiter).screen(profiles.slice(0, 2), 5);

    expect(result.failures).toEqual([
      { profile: profiles[0], error: 'instagram:a 筛选失败: llm: 请求超时(30000ms)' },
    ]);
    expect(result.approved.map((s) => s.profile.username)).toEqual(['b']);
  });

  test('服务不可用时整批停止', async () => {
    const { classifier, classify } = classifierFrom(async () => {
      throw new ScreeningUnavailableError('缺少 OPENAI_API_KEY，无法进行筛选');
    });

    await expect(new ProfileScreener(classifier, rateLimiter).screen(profiles, 5)).rejects.toThrow(
      ScreeningUnavailableError
    );
    expect(classify).toHaveBeenCalledTimes(1);
  });

  test('回调返回 false 时停止', async () => {
    const { classifier, classify } = classifierFrom(async () => false);
    const seen: string[] = [];

    await new ProfileScreener(classifier, rateLimiter).screen(profiles, 5, (screened) => {
      seen.push(screened.profile.username);
      return seen.length < 2 ? 'recorded' : 'stop';
    });

    expect(seen).toEqual(['a', 'b']);
    expect(classify).toHaveBeenCalledTimes(2);
  });

  test('未记录的结论不计入通过数，也不进入结果', async () => {
    const { classifier, classify } = classifierFrom(async () => true);

    const result = await new ProfileScreener(classifier, rateLimiter).screen(profiles, 2, (screened) =>
      screened.profile.username === 'a' ? 'ignored' : 'recorded'
    );

    expect(result.approved.map((s) => s.profile.username)).toEqual(['b', 'c']);
    expect(result.rejected).toEqual([]);
    expect(classify).toHaveBeenCalledTimes(3);
  });

  test('回调要求停止时，当前结论不进入结果', async () => {
    const { classifier } = classifierFrom(async () => true);

    const result = await new ProfileScreener(classifier, rateLimiter).screen(profiles, 5, (screened) =>
      screened.profile.username === 'b' ? 'stop' : 'recorded'
    );

    expect(result.approved.map((s) => s.profile.username)).toEqual(['a']);
  });
});
