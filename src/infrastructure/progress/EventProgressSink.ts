import type { ProgressSink } from '@domain/interfaces/progress.js';

/**
 * 进度事件
 */
export interface ProgressEvents {
  start: [description: string, total: number, initial: number];
  advance: [delta: number];
  resize: [total: number];
  close: [];
}

type ProgressListeners = {
  [K in keyof ProgressEvents]: Array<(...args: ProgressEvents[K]) => void>;
};

/**
 * 把进度转发给监听器的 ProgressSink，供界面层（例如 notebook 或 Web 前端）订阅
 */
export class EventProgressSink implements ProgressSink {
  private readonly listeners: ProgressListeners = {
    start: [],
    advance: [],
    resize: [],
    close: [],
  };

  /**
   * 订阅进度事件
   * @param event 事件名
   * @param listener 监听器
   * @returns this
   */
  on<K extends keyof ProgressEvents>(
    event: K,
    listener: (...args: ProgressEvents[K]) => void,
  ): this {
    this.listeners[event].push(listener);
    return this;
  }

  start(description: string, total: number, initial: number): void {
    this.listeners.start.forEach((listener) =>
      listener(description, total, initial),
    );
  }

  advance(delta: number): void {
    this.listeners.advance.forEach((listener) => listener(delta));
  }

  resize(total: number): void {
    this.listeners.resize.forEach((listener) => listener(total));
  }

  close(): void {
    this.listeners.close.forEach((listener) => listener());
  }
}
