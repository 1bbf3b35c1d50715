// jest.setup.ts
beforeEach(() => {
  process.env = {
    ...process.env, // 保持其他值
    LOG_LEVEL: 'error',
    PIPELINE_LOGGING: 'false',
    PIPELINE_THREADS: '2',
    PIPELINE_VERBOSE: 'false',
    PIPELINE_PROGRESS_INTERVAL_MS: '10',
  };
});
