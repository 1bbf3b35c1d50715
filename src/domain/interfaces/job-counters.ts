import type { JobCounterSnapshot } from '@domain/entities/types.js';

/**
 * 计数器变化监听器
 */
export type JobCounterListener = (snapshot: JobCounterSnapshot) => void;

/**
 * 任务计数器来源
 * 由处理接口维护，进度跟踪器只读
 */
export interface JobCounterSource {
  /**
   * 读取当前计数（queued 与 finished 作为一个整体读取）
   * @returns 计数快照
   */
  snapshot(): JobCounterSnapshot;

  /**
   * 订阅计数变化（可选）；提供时跟踪器改为推送模式
   * @param listener 监听器
   * @returns 取消订阅的函数
   */
  subscribe?(listener: JobCounterListener): () => void;
}
