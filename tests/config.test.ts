import { DEFAULT_ELEXON_BASE_URL, loadConfig } from '../server/config';
import { ConfigurationError } from '../server/utils/errors';
import { LogLevel } from '../server/utils/logger';

describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 5000,
      elexon: {
        baseUrl: DEFAULT_ELEXON_BASE_URL,
        timeoutMs: 30000,
        maxRetries: 3,
        retryDelayMs: 5000,
        concurrency: 4
      },
      logging: {
        dir: './logs',
        toFile: false,
        level: LogLevel.INFO
      },
      dashboardOutput: 'settlement_dashboard.html'
    });
  });

  test('reads and coerces values', () => {
    const config = loadConfig({
      PORT: '8080',
      ELEXON_API_BASE_URL: 'http://localhost:9000/bmrs/',
      FETCH_CONCURRENCY: '2',
      LOG_TO_FILE: 'true',
      LOG_LEVEL: 'debug'
    });

    expect(config.port).toBe(8080);
    expect(config.elexon.baseUrl).toBe('http://localhost:9000/bmrs');
    expect(config.elexon.concurrency).toBe(2);
    expect(config.logging.toFile).toBe(true);
    expect(config.logging.level).toBe(LogLevel.DEBUG);
  });

  test('treats blank variables as unset', () => {
    expect(loadConfig({ PORT: '' }).port).toBe(5000);
  });

  test('names the offending variable', () => {
    expect(() => loadConfig({ FETCH_CONCURRENCY: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ FETCH_CONCURRENCY: '0' })).toThrow(
      'Invalid configuration for FETCH_CONCURRENCY: Number must be greater than or equal to 1'
    );
  });

  test('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration for LOG_LEVEL/);
  });
});
