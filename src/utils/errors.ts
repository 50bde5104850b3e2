/**
 * 台账无法获取写锁或无法打开
 */
export class LedgerUnavailableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'LedgerUnavailableError';
    Object.setPrototypeOf(this, LedgerUnavailableError.prototype);
  }
}

/**
 * 筛选服务整体不可用（例如缺少密钥），整批停止
 */
export class ScreeningUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScreeningUnavailableError';
    Object.setPrototypeOf(this, ScreeningUnavailableError.prototype);
  }
}

/**
 * 外部接口调用失败（超时、非2xx、结构不符）
 * detail 为非 2xx 响应的原始错误体（JSON 解析失败时为文本）
 */
export class CollaboratorError extends Error {
  constructor(
    public readonly collaborator: string,
    message: string,
    public readonly status?: number,
    public readonly detail?: unknown
  ) {
    super(`${collaborator}: ${message}`);
    this.name = 'CollaboratorError';
    Object.setPrototypeOf(this, CollaboratorError.prototype);
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

/**
 * 已有一次运行在进行中
 */
export class PipelineBusyError extends Error {
  constructor(message = '已有流水线任务在运行') {
    super(message);
    this.name = 'PipelineBusyError';
    Object.setPrototypeOf(this, PipelineBusyError.prototype);
  }
}
