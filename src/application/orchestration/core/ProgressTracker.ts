import { Logger } from '@logging/logger.js';
import type { JobCounterSnapshot } from '@domain/entities/types.js';
import type { JobCounterSource } from '@domain/interfaces/job-counters.js';
import type { ProgressSink } from '@domain/interfaces/progress.js';

/** 默认轮询间隔（毫秒） */
export const DEFAULT_PROGRESS_INTERVAL_MS = 200;

/**
 * 进度跟踪器选项
 */
export interface ProgressTrackerOptions {
  /** 描述（通常为包标题） */
  description: string;
  /** 进度显示 */
  sink: ProgressSink;
  /** 轮询间隔（毫秒），计数来源支持订阅时不使用 */
  intervalMs?: number;
  logger: Logger;
}

/**
 * 跟踪结束时的报告
 */
export interface ProgressReport {
  status: 'completed' | 'failed';
  /** 跟踪的任务总数（含开始后加入的任务） */
  total: number;
  finished: number;
  /** 开始后加入的任务数 */
  extended: number;
  /** 观察次数 */
  ticks: number;
  error?: Error;
}

type TrackerState = 'idle' | 'running' | 'done';

/**
 * 进度跟踪器
 *
 * 只读地观察处理接口的排队/完成计数，把新完成的任务数推送给 ProgressSink。
 * 计数来源支持订阅时使用推送模式，否则按固定间隔轮询。
 * 总数在开始时确定；之后加入的任务会扩展本次跟踪的总数。
 * 本地完成数达到总数时自动结束，没有外部取消。
 */
export class ProgressTracker {
  private state: TrackerState = 'idle';
  private total = 0;
  private queued = 0;
  private finished = 0;
  private extended = 0;
  private ticks = 0;
  private timer?: NodeJS.Timeout;
  private unsubscribe?: () => void;
  private readonly completion: Promise<ProgressReport>;
  private readonly resolveCompletion: (report: ProgressReport) => void;

  /**
   * 创建 ProgressTracker 实例
   * @param counters 任务计数来源
   * @param options 跟踪器选项
   */
  constructor(
    private readonly counters: JobCounterSource,
    private readonly options: ProgressTrackerOptions,
  ) {
    let resolve: (report: ProgressReport) => void = () => undefined;
    this.completion = new Promise<ProgressReport>((r) => {
      resolve = r;
    });
    this.resolveCompletion = resolve;
  }

  /** 是否正在跟踪 */
  get isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * 本地视图
   * @returns 本地计数和总数
   */
  view(): JobCounterSnapshot & { total: number } {
    return { queued: this.queued, finished: this.finished, total: this.total };
  }

  /**
   * 跟踪结束时兑现的报告
   * @returns 跟踪报告
   */
  whenComplete(): Promise<ProgressReport> {
    return this.completion;
  }

  /**
   * 开始跟踪，重复调用无效
   */
  start(): void {
    if (this.state !== 'idle') {
      this.options.logger.warn(
        `[${this.options.description}] 进度跟踪已启动，忽略重复调用`,
      );
      return;
    }

    const initial = this.counters.snapshot();
    this.total = initial.queued + initial.finished;
    this.queued = initial.queued;
    this.finished = initial.finished;
    this.state = 'running';
    this.options.sink.start(this.options.description, this.total, this.finished);
    this.options.logger.debug(`[${this.options.description}] 开始跟踪进度`, {
      total: this.total,
      finished: this.finished,
    });

    if (this.finished >= this.total) {
      this.finish('completed');
      return;
    }

    const { subscribe } = this.counters;
    if (subscribe) {
      this.unsubscribe = subscribe.call(this.counters, (snapshot) =>
        this.safeObserve(snapshot),
      );
      // 监听器可能在订阅过程中已经结束跟踪
      if (!this.isRunning) {
        this.detach();
      }
    } else {
      this.timer = setInterval(
        () => this.safeObserve(this.counters.snapshot()),
        this.options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS,
      );
    }
  }

  /**
   * 处理一次计数观察
   * @param snapshot 计数快照
   */
  private observe(snapshot: JobCounterSnapshot): void {
    if (this.state !== 'running') {
      return;
    }
    this.ticks += 1;

    // 开始后加入的任务扩展本次跟踪
    const observedTotal = snapshot.queued + snapshot.finished;
    if (observedTotal > this.total) {
      const added = observedTotal - this.total;
      this.total = observedTotal;
      this.queued += added;
      this.extended += added;
      this.options.sink.resize?.(this.total);
    }

    const delta = this.queued - snapshot.queued;
    if (delta > 0) {
      this.queued -= delta;
      this.finished += delta;
      this.options.sink.advance(delta);
    }

    if (this.finished >= this.total) {
      this.finish('completed');
    }
  }

  private safeObserve(snapshot: JobCounterSnapshot): void {
    try {
      this.observe(snapshot);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.options.logger.error(
        `[${this.options.description}] 进度跟踪失败: ${err.message}`,
      );
      this.finish('failed', err);
    }
  }

  private finish(status: ProgressReport['status'], error?: Error): void {
    if (this.state === 'done') {
      return;
    }
    this.state = 'done';
    this.detach();

    const report: ProgressReport = {
      status,
      total: this.total,
      finished: this.finished,
      extended: this.extended,
      ticks: this.ticks,
      error,
    };
    try {
      if (status === 'completed') {
        this.options.sink.close();
        this.options.logger.info(`[${this.options.description}] 全部任务已完成`, {
          total: this.total,
        });
      }
    } finally {
      this.resolveCompletion(report);
    }
  }

  private detach(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = undefined;
    }
  }
}
