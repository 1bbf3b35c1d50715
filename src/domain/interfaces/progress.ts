/**
 * 进度显示能力，由调用方按运行环境注入给进度跟踪器
 */
export interface ProgressSink {
  /**
   * 开始一次进度显示
   * @param description 描述（通常为包标题）
   * @param total 任务总数
   * @param initial 已完成数量
   */
  start(description: string, total: number, initial: number): void;

  /**
   * 推进进度
   * @param delta 新完成的任务数
   */
  advance(delta: number): void;

  /**
   * 任务总数变化（有任务在跟踪开始后加入）
   * @param total 新的任务总数
   */
  resize?(total: number): void;

  /**
   * 结束显示
   */
  close(): void;
}
