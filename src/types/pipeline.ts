// 流水线运行相关类型定义
export type RunMode = 'full' | 'collect' | 'screen';

export type RunStatus = 'completed' | 'quota_met' | 'collect_only' | 'failed';

export interface CollectionStats {
  sourcesAttempted: number;
  sourcesFailed: number;
  fetched: number;
  qualified: number;
  needsVerification: number;
  belowThreshold: number;
  duplicates: number;
}

export interface RunSummary {
  runId: string;
  mode: RunMode;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  collected: number;
  qualified: number;
  newPending: number;
  screened: number;
  newApproved: number;
  rejected: number;
  deferred: number;
  totalToday: number;
  dailyTarget: number;
  sourcesAttempted: number;
  sourcesFailed: number;
  errors: string[];
}
