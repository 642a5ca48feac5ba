import { SERVICE_NAME, formatLogLine } from '../src/utils/logger';

describe('formatLogLine', () => {
  it('should tag each line with the service and append metadata', () => {
    const line = formatLogLine({
      level: 'info',
      message: 'Whale snapshot refreshed',
      timestamp: '2026-01-02 03:04:05',
      service: SERVICE_NAME,
      recordCount: 3,
    });

    expect(line).toBe('2026-01-02 03:04:05 [whale-watch-api] [info] Whale snapshot refreshed {"recordCount":3}');
  });

  it('should print the stack on its own line', () => {
    const line = formatLogLine({
      level: 'error',
      message: 'boom',
      timestamp: '2026-01-02 03:04:05',
      stack: 'Error: boom\n    at run',
    });

    expect(line).toBe('2026-01-02 03:04:05 [whale-watch-api] [error] boom\nError: boom\n    at run');
  });
});
