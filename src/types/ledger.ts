// 历史台账相关类型定义
import type { Platform, ProfileRecord } from './profile';
import type { ScreeningVerdict } from './screening';

export interface HistoryEntry {
  key: string;
  platform: Platform;
  username: string;
  name: string;
  approved: boolean;
  screeningResult: ScreeningVerdict;
  profileSnapshot: ProfileRecord;
  processedAt: string;
}

export interface PendingEntry {
  key: string;
  profile: ProfileRecord;
  priority: number;
  queuedAt: string;
}

export interface ApprovedRow {
  id: number;
  key: string;
  approvedAt: string;
  approvedDate: string;
  name: string;
  username: string;
  platform: Platform;
  followers: number;
  engagementRate: number;
  profileUrl: string;
  bio: string;
  ageOk: boolean;
  targetBodyType: boolean;
  targetClass: boolean;
  targetNationality: boolean;
  isRealPerson: boolean;
  confidence: number;
  reason: string;
  sourceTag: string;
}

export type MarkResult = 'recorded' | 'duplicate';

export type RecordOutcome = 'approved' | 'rejected' | 'duplicate' | 'quota_full';

export interface PlatformBreakdown {
  total: number;
  approved: number;
}

export interface LedgerStatistics {
  totalProcessed: number;
  totalApproved: number;
  totalRejected: number;
  approvalRate: number;
  pendingCount: number;
  approvedOutputRows: number;
  byPlatform: Partial<Record<Platform, PlatformBreakdown>>;
  lastUpdated?: string;
}
