import { Logger } from '@logging/logger.js';
import type { ProgressSink } from '@domain/interfaces/progress.js';

/**
 * 通过日志输出进度的 ProgressSink，适用于终端和后台运行
 */
export class LoggerProgressSink implements ProgressSink {
  private description = '';
  private total = 0;
  private current = 0;

  /**
   * 创建 LoggerProgressSink 实例
   * @param logger 日志记录器
   */
  constructor(private readonly logger: Logger) {}

  start(description: string, total: number, initial: number): void {
    this.description = description;
    this.total = total;
    this.current = initial;
    this.logger.info(`${this.format()} 开始`);
  }

  advance(delta: number): void {
    this.current += delta;
    this.logger.info(this.format());
  }

  resize(total: number): void {
    this.total = total;
    this.logger.info(`${this.format()} 任务总数已更新`);
  }

  close(): void {
    this.logger.info(`${this.format()} 完成`);
  }

  private format(): string {
    const percent =
      this.total > 0 ? Math.floor((this.current / this.total) * 100) : 100;
    return `[${this.description}] ${this.current}/${this.total} (${percent}%)`;
  }
}
