// 通用类型定义
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export type ReportFormat = 'json' | 'csv' | 'markdown';
