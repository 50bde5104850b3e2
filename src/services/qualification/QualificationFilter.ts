import { ProfileRecord, QualificationTier } from '../../types';
import { QualificationThresholds } from '../../config';

export type QualificationDecision = QualificationTier | 'rejected';

type QualificationInput = Pick<ProfileRecord, 'followerCount' | 'engagementRate' | 'engagementMeasured'>;

/**
 * 粉丝数和互动率都达到阈值（含等于）
 * 互动率为 0 或未测得时不通过
 */
export const qualifies = (
  record: Pick<ProfileRecord, 'followerCount' | 'engagementRate'>,
  minFollowers: number,
  minEngagement: number
): boolean => record.followerCount >= minFollowers && record.engagementRate >= minEngagement;

/**
 * 资格分档
 *
 * 测得互动率的账号只看 qualifies()；没有互动数据的账号在允许时，
 * 粉丝数达到 unverifiedMinFollowers 就进入 needs_verification，
 * 排在所有 qualified 之后，照常走大模型筛选。
 */
export const classifyQualification = (
  candidate: QualificationInput,
  thresholds: QualificationThresholds
): QualificationDecision => {
  if (candidate.engagementMeasured) {
    return qualifies(candidate, thresholds.minFollowers, thresholds.minEngagementRate)
      ? 'qualified'
      : 'rejected';
  }

  if (thresholds.allowUnverified && candidate.followerCount >= thresholds.unverifiedMinFollowers) {
    return 'needs_verification';
  }
  return 'rejected';
};
