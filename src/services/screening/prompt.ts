import { ScreeningCriteriaText } from '../../config';
import { ProfileRecord } from '../../types';

export const SYSTEM_PROMPT =
  'You are an analyst who reviews social-media creator profiles for partnership fit. ' +
  'Answer ONLY with a valid JSON object, no markdown.';

const orFallback = (value: string, fallback: string): string => (value.trim() ? value.trim() : fallback);

/**
 * 组装单个账号的筛选提示词
 */
export const buildScreeningPrompt = (profile: ProfileRecord, criteria: ScreeningCriteriaText): string =>
  [
    'Evaluate whether this creator matches every criterion below.',
    '',
    `Name: ${orFallback(profile.displayName, profile.username)}`,
    `Username: @${profile.username}`,
    `Platform: ${profile.platform}`,
    `Followers: ${profile.followerCount}`,
    `Engagement rate: ${profile.engagementMeasured ? `${profile.engagementRate}%` : 'not measured'}`,
    `Bio: ${orFallback(profile.bio, 'not available')}`,
    `Location: ${orFallback(profile.location, 'not informed')}`,
    `Content: ${orFallback(profile.contentDescription, 'not available')}`,
    '',
    'Questions (answer true or false):',
    `1. age_ok: the person ${criteria.age}`,
    `2. target_body_type: the person ${criteria.bodyType}`,
    `3. target_class: the person ${criteria.incomeClass}`,
    `4. target_nationality: the person ${criteria.nationality}`,
    '5. is_real_person: this is a real individual, not a brand, store or fan page',
    '',
    'Reply with exactly this JSON shape:',
    '{"age_ok":bool,"target_body_type":bool,"target_class":bool,"target_nationality":bool,' +
      '"is_real_person":bool,"approved":bool,"reason":"short explanation","confidence":0-100}',
    'approved must be true only when all five answers are true.',
  ].join('\n');
