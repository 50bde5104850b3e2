import { ProfileRecord, ScreeningVerdict } from '../types';

/**
 * 测试用候选账号
 */
export const makeProfile = (overrides: Partial<ProfileRecord> = {}): ProfileRecord => ({
  platform: 'instagram',
  username: 'creator_a',
  displayName: 'Creator A',
  followerCount: 25000,
  engagementRate: 3.2,
  engagementMeasured: true,
  bio: 'moda e estilo de vida',
  location: 'Sao Paulo',
  contentDescription: '',
  profileUrl: 'https://www.instagram.com/creator_a/',
  verified: false,
  sourceTag: 'seed',
  collectedAt: '2026-03-10T09:00:00.000Z',
  tier: 'qualified',
  ...overrides,
});

export const makeVerdict = (approved: boolean, overrides: Partial<ScreeningVerdict> = {}): ScreeningVerdict => ({
  ageOk: approved,
  targetBodyType: approved,
  targetClass: approved,
  targetNationality: approved,
  isRealPerson: approved,
  approved,
  reason: approved ? '符合全部条件' : '不符合目标人群',
  confidence: approved ? 85 : 40,
  raw: '{}',
  ...overrides,
});
