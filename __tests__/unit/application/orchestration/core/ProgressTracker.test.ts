/**
 * 进度跟踪测试
 */

import { ProgressTracker } from '@application/orchestration/core/ProgressTracker.js';
import { JobCounters } from '@domain/services/JobCounters.js';
import type { JobCounterSnapshot } from '@domain/entities/types.js';
import type { JobCounterSource } from '@domain/interfaces/job-counters.js';
import {
  LoggerMock,
  MockFactory,
  ProgressSinkMock,
} from '../../../../utils/test-mocks.js';

describe('ProgressTracker', () => {
  let logger: LoggerMock;
  let sink: ProgressSinkMock;

  const createTracker = (counters: JobCounterSource, intervalMs = 5) =>
    new ProgressTracker(counters, {
      description: 'T1proc',
      sink,
      intervalMs,
      logger,
    });

  beforeEach(() => {
    logger = MockFactory.createLoggerMock();
    sink = MockFactory.createProgressSinkMock();
  });

  describe('推送模式', () => {
    let counters: JobCounters;

    beforeEach(() => {
      counters = new JobCounters();
    });

    test('所有任务已完成时立即结束', async () => {
      counters.enqueue(2);
      counters.complete(2);
      const tracker = createTracker(counters);

      tracker.start();

      expect(tracker.isRunning).toBe(false);
      expect(sink.start).toHaveBeenCalledWith('T1proc', 2, 2);
      expect(sink.close).toHaveBeenCalledTimes(1);
      await expect(tracker.whenComplete()).resolves.toEqual({
        status: 'completed',
        total: 2,
        finished: 2,
        extended: 0,
        ticks: 0,
        error: undefined,
      });
    });

    test('没有任务时立即结束', async () => {
      const tracker = createTracker(counters);

      tracker.start();

      expect(sink.start).toHaveBeenCalledWith('T1proc', 0, 0);
      await expect(tracker.whenComplete()).resolves.toMatchObject({
        status: 'completed',
        total: 0,
      });
    });

    test('按新完成的数量推进', async () => {
      counters.enqueue(3);
      const tracker = createTracker(counters);
      tracker.start();

      expect(sink.start).toHaveBeenCalledWith('T1proc', 3, 0);
      expect(tracker.isRunning).toBe(true);

      counters.complete(1);
      expect(tracker.view()).toEqual({ queued: 2, finished: 1, total: 3 });

      counters.complete(2);

      expect(sink.advance.mock.calls).toEqual([[1], [2]]);
      expect(sink.close).toHaveBeenCalledTimes(1);
      await expect(tracker.whenComplete()).resolves.toMatchObject({
        status: 'completed',
        total: 3,
        finished: 3,
        ticks: 2,
      });
    });

    test('结束后不再观察计数', async () => {
      counters.enqueue(1);
      const tracker = createTracker(counters);
      tracker.start();
      counters.complete(1);
      await tracker.whenComplete();

      counters.enqueue(1);
      counters.complete(1);

      expect(sink.advance).toHaveBeenCalledTimes(1);
      expect(sink.resize).not.toHaveBeenCalled();
    });

    test('开始后加入的任务扩展总数', async () => {
      counters.enqueue(2);
      const tracker = createTracker(counters);
      tracker.start();

      counters.enqueue(1);

      expect(sink.resize).toHaveBeenCalledWith(3);
      expect(sink.advance).not.toHaveBeenCalled();
      expect(tracker.view()).toEqual({ queued: 3, finished: 0, total: 3 });

      counters.complete(3);

      expect(sink.advance).toHaveBeenCalledWith(3);
      await expect(tracker.whenComplete()).resolves.toMatchObject({
        status: 'completed',
        total: 3,
        finished: 3,
        extended: 1,
        ticks: 2,
      });
    });

    test('订阅时已完成则立即取消订阅', async () => {
      const unsubscribe = jest.fn<void, []>();
      const source: JobCounterSource = {
        snapshot: () => ({ queued: 2, finished: 0 }),
        subscribe: (listener) => {
          listener({ queued: 0, finished: 2 });
          return unsubscribe;
        },
      };
      const tracker = createTracker(source);

      tracker.start();

      expect(tracker.isRunning).toBe(false);
      expect(sink.advance).toHaveBeenCalledWith(2);
      expect(unsubscribe).toHaveBeenCalledTimes(1);
      await expect(tracker.whenComplete()).resolves.toMatchObject({
        status: 'completed',
        total: 2,
        finished: 2,
        ticks: 1,
      });
    });

    test('重复启动只记录警告', () => {
      counters.enqueue(1);
      const tracker = createTracker(counters);

      tracker.start();
      tracker.start();

      expect(sink.start).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        '[T1proc] 进度跟踪已启动，忽略重复调用',
      );
    });

    test('进度显示出错时以失败结束', async () => {
      sink.advance.mockImplementation(() => {
        throw new Error('display closed');
      });
      counters.enqueue(2);
      const tracker = createTracker(counters);
      tracker.start();

      counters.complete(1);

      const report = await tracker.whenComplete();
      expect(report.status).toBe('failed');
      expect(report.error?.message).toBe('display closed');
      expect(sink.close).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(
        '[T1proc] 进度跟踪失败: display closed',
      );
    });
  });

  describe('轮询模式', () => {
    let state: JobCounterSnapshot;
    const source: JobCounterSource = { snapshot: () => state };

    beforeEach(() => {
      jest.useFakeTimers();
      state = { queued: 2, finished: 0 };
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    test('按间隔读取计数直到完成', async () => {
      const tracker = createTracker(source, 5);
      tracker.start();

      jest.advanceTimersByTime(5);
      expect(sink.advance).not.toHaveBeenCalled();

      state = { queued: 0, finished: 2 };
      jest.advanceTimersByTime(5);

      expect(sink.advance).toHaveBeenCalledWith(2);
      expect(sink.close).toHaveBeenCalledTimes(1);
      expect(jest.getTimerCount()).toBe(0);
      await expect(tracker.whenComplete()).resolves.toMatchObject({
        status: 'completed',
        finished: 2,
        ticks: 2,
      });
    });
  });
});
