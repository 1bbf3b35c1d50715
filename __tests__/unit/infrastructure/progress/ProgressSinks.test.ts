/**
 * 进度显示测试
 */

import { LoggerProgressSink } from '@infrastructure/progress/LoggerProgressSink.js';
import { EventProgressSink } from '@infrastructure/progress/EventProgressSink.js';
import { MockFactory } from '../../../utils/test-mocks.js';

describe('LoggerProgressSink', () => {
  test('输出当前进度和百分比', () => {
    const logger = MockFactory.createLoggerMock();
    const sink = new LoggerProgressSink(logger);

    sink.start('T1proc', 4, 1);
    sink.advance(2);
    sink.resize(6);
    sink.close();

    expect(logger.info.mock.calls).toEqual([
      ['[T1proc] 1/4 (25%) 开始'],
      ['[T1proc] 3/4 (75%)'],
      ['[T1proc] 3/6 (50%) 任务总数已更新'],
      ['[T1proc] 3/6 (50%) 完成'],
    ]);
  });
});

describe('EventProgressSink', () => {
  test('把进度转发给监听器', () => {
    const sink = new EventProgressSink();
    const events: string[] = [];

    sink
      .on('start', (description, total, initial) =>
        events.push(`start ${description} ${total} ${initial}`),
      )
      .on('advance', (delta) => events.push(`advance ${delta}`))
      .on('resize', (total) => events.push(`resize ${total}`))
      .on('close', () => events.push('close'));

    sink.start('DWIproc', 3, 0);
    sink.advance(1);
    sink.resize(4);
    sink.close();

    expect(events).toEqual([
      'start DWIproc 3 0',
      'advance 1',
      'resize 4',
      'close',
    ]);
  });
});
