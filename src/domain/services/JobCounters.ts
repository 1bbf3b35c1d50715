import { EventEmitter } from 'events';
import type { JobCounterSnapshot } from '@domain/entities/types.js';
import type {
  JobCounterListener,
  JobCounterSource,
} from '@domain/interfaces/job-counters.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';

const CHANGE_EVENT = 'change';

/**
 * 排队/完成任务计数器
 *
 * 处理接口（任务的生产方）用它记录任务；两个计数总是作为一个不可变快照整体替换，
 * 读方不会看到 queued 已减少而 finished 尚未增加的中间状态。
 * 每次变化都会推送给订阅者。
 */
export class JobCounters implements JobCounterSource {
  private state: JobCounterSnapshot = Object.freeze({ queued: 0, finished: 0 });
  private readonly emitter = new EventEmitter();

  /**
   * @returns 当前计数快照
   */
  snapshot(): JobCounterSnapshot {
    return this.state;
  }

  /**
   * 新任务入队
   * @param count 入队数量
   */
  enqueue(count = 1): void {
    assertCount(count);
    this.commit({
      queued: this.state.queued + count,
      finished: this.state.finished,
    });
  }

  /**
   * 将排队中的任务标记为完成
   * @param count 完成数量
   * @throws VALIDATION_ERROR 完成数量超过排队数量
   */
  complete(count = 1): void {
    assertCount(count);
    if (count > this.state.queued) {
      throw CoreErrorFactory.validation(
        `Cannot complete ${count} jobs, only ${this.state.queued} queued`,
        { count, queued: this.state.queued },
      );
    }
    this.commit({
      queued: this.state.queued - count,
      finished: this.state.finished + count,
    });
  }

  /**
   * 订阅计数变化
   * @param listener 监听器
   * @returns 取消订阅的函数
   */
  subscribe(listener: JobCounterListener): () => void {
    this.emitter.on(CHANGE_EVENT, listener);
    return () => {
      this.emitter.off(CHANGE_EVENT, listener);
    };
  }

  private commit(next: JobCounterSnapshot): void {
    this.state = Object.freeze({ ...next });
    this.emitter.emit(CHANGE_EVENT, this.state);
  }
}

function assertCount(count: number): void {
  if (!Number.isInteger(count) || count <= 0) {
    throw CoreErrorFactory.validation(
      `Job count must be a positive integer, got ${count}`,
      { count },
    );
  }
}
