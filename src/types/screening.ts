// 大模型筛选相关类型定义
import type { ProfileRecord } from './profile';

export interface ScreeningCriteria {
  ageOk: boolean;
  targetBodyType: boolean;
  targetClass: boolean;
  targetNationality: boolean;
  isRealPerson: boolean;
}

export interface ScreeningVerdict extends ScreeningCriteria {
  approved: boolean;
  reason: string;
  confidence: number;
  raw: string;
}

export interface ScreenedProfile {
  profile: ProfileRecord;
  verdict: ScreeningVerdict;
}

export interface ScreeningFailure {
  profile: ProfileRecord;
  error: string;
}

export interface ScreeningBatchResult {
  approved: ScreenedProfile[];
  rejected: ScreenedProfile[];
  failures: ScreeningFailure[];
}
