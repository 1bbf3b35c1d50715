/**
 * 任务计数器测试
 */

import { JobCounters } from '@domain/services/JobCounters.js';
import { ErrorType } from '@domain/errors/CoreErrorTypes.js';
import type { JobCounterSnapshot } from '@domain/entities/types.js';
import { captureError } from '../../../utils/test-mocks.js';

describe('JobCounters', () => {
  let counters: JobCounters;

  beforeEach(() => {
    counters = new JobCounters();
  });

  test('入队与完成同时更新两个计数', () => {
    expect(counters.snapshot()).toEqual({ queued: 0, finished: 0 });

    counters.enqueue(3);
    counters.complete(2);

    expect(counters.snapshot()).toEqual({ queued: 1, finished: 2 });
  });

  test('快照不可修改', () => {
    counters.enqueue();
    expect(Object.isFrozen(counters.snapshot())).toBe(true);
  });

  test('完成数量超过排队数量时报错且不修改计数', () => {
    counters.enqueue(1);

    expect(captureError(() => counters.complete(2))).toMatchObject({
      type: ErrorType.VALIDATION_ERROR,
    });
    expect(counters.snapshot()).toEqual({ queued: 1, finished: 0 });
  });

  test('数量必须为正整数', () => {
    expect(() => counters.enqueue(0)).toThrow(
      'Job count must be a positive integer, got 0',
    );
    expect(() => counters.enqueue(1.5)).toThrow(
      'Job count must be a positive integer, got 1.5',
    );
  });

  test('订阅者收到每次变化，取消订阅后不再收到', () => {
    const seen: JobCounterSnapshot[] = [];
    const unsubscribe = counters.subscribe((snapshot) => seen.push(snapshot));

    counters.enqueue(2);
    counters.complete(1);
    unsubscribe();
    counters.complete(1);

    expect(seen).toEqual([
      { queued: 2, finished: 0 },
      { queued: 1, finished: 1 },
    ]);
  });
});
