import { sleep } from '../../utils/time';

/**
 * 速率限制配置
 */
export interface RateLimitConfig {
  minDelayMs: number; // 最小延迟（毫秒）
  maxDelayMs: number; // 最大延迟（毫秒）
}

/**
 * 调用间隔控制
 * 每次外部调用之间等待一段固定间隔加随机抖动，避免触发平台限流
 */
export class RateLimiter {
  private config: RateLimitConfig;
  private lastCallAt?: number;

  constructor(
    config?: Partial<RateLimitConfig>,
    private readonly wait: (ms: number) => Promise<void> = sleep,
    private readonly now: () => number = Date.now
  ) {
    const minDelayMs = Math.max(config?.minDelayMs ?? 1000, 0);
    this.config = {
      minDelayMs,
      maxDelayMs: Math.max(config?.maxDelayMs ?? 3000, minDelayMs),
    };
  }

  /**
   * 生成随机延迟（毫秒）
   */
  generateRandomDelay(): number {
    const min = this.config.minDelayMs;
    const max = this.config.maxDelayMs;
    return Math.floor(Math.random() * (max - min + 1)) + min;
  }

  /**
   * 在下一次调用前等待
   * 第一次调用不等；距离上次调用已超过延迟时只补足差值
   */
  async throttle(): Promise<number> {
    const now = this.now();
    let waited = 0;
    if (this.lastCallAt !== undefined) {
      const elapsed = now - this.lastCallAt;
      waited = Math.max(this.generateRandomDelay() - elapsed, 0);
      if (waited > 0) {
        await this.wait(waited);
      }
    }
    this.lastCallAt = this.now();
    return waited;
  }

  getConfig(): RateLimitConfig {
    return { ...this.config };
  }
}
