import { ConfigError, DEFAULT_POLLING, loadConfig, resolvePollingConfig } from '../src/config';

describe('loadConfig', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.host).toBe('127.0.0.1');
    expect(config.dbPath).toBe('data/history.db');
    expect(config.device).toEqual({
      host: '192.168.88.1',
      port: 22,
      username: 'root',
      password: '',
      connectTimeoutMs: 15000,
      connectAttempts: 3,
      connectRetryDelayMs: 2000,
    });
    expect(config.delivery.configDir).toBe('/root/config');
    expect(config.delivery.resultDir).toBe('/root/result');
    expect(config.delivery.resultFileTemplate).toBe('{base}_result.json');
    expect(config.delivery.polling.pollIntervalMs).toBe(3000);
    expect(config.delivery.polling.maxWaitMs).toBe(120000);
    expect(config.delivery.polling.maxAttempts).toBeUndefined();
  });

  test('warns when no device password is set', () => {
    loadConfig({});
    expect(console.warn).toHaveBeenCalledTimes(1);

    loadConfig({ DEVICE_PASSWORD: 'test-secret' });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test('reads device and polling settings', () => {
    const config = loadConfig({
      DEVICE_HOST: '10.0.0.5',
      DEVICE_PORT: '2222',
      DEVICE_USERNAME: 'tester',
      DEVICE_PASSWORD: 'test-secret',
      POLL_INTERVAL_MS: '2000',
      POLL_BACKOFF: 'exponential',
      POLL_STABILITY_MS: '0',
    });

    expect(config.device.host).toBe('10.0.0.5');
    expect(config.device.port).toBe(2222);
    expect(config.device.username).toBe('tester');
    expect(config.device.password).toBe('test-secret');
    expect(config.delivery.polling.pollIntervalMs).toBe(2000);
    expect(config.delivery.polling.backoff).toBe('exponential');
    expect(config.delivery.polling.stabilityCheckMs).toBe(0);
  });

  test('an attempt bound alone replaces the default wall-clock bound', () => {
    const config = loadConfig({ POLL_MAX_ATTEMPTS: '5' });

    expect(config.delivery.polling.maxAttempts).toBe(5);
    expect(config.delivery.polling.maxWaitMs).toBeUndefined();
  });

  test('keeps both bounds when both are set', () => {
    const config = loadConfig({ POLL_MAX_ATTEMPTS: '5', POLL_MAX_WAIT_MS: '60000' });

    expect(config.delivery.polling.maxAttempts).toBe(5);
    expect(config.delivery.polling.maxWaitMs).toBe(60000);
  });

  test('rejects malformed numbers', () => {
    expect(() => loadConfig({ POLL_INTERVAL_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ POLL_INTERVAL_MS: '0' })).toThrow('POLL_INTERVAL_MS must be an integer >= 1 (got "0")');
    expect(() => loadConfig({ DEVICE_PORT: '22.5' })).toThrow(ConfigError);
  });

  test('rejects an unknown backoff policy', () => {
    expect(() => loadConfig({ POLL_BACKOFF: 'random' })).toThrow('POLL_BACKOFF must be "fixed" or "exponential" (got "random")');
  });

  test('rejects remote directories that are relative or climb out', () => {
    expect(() => loadConfig({ REMOTE_CONFIG_DIR: 'config' })).toThrow(ConfigError);
    expect(() => loadConfig({ REMOTE_RESULT_DIR: '/root/../etc' })).toThrow(ConfigError);
  });
});

describe('resolvePollingConfig', () => {
  test('returns the defaults without overrides', () => {
    expect(resolvePollingConfig()).toEqual(DEFAULT_POLLING);
  });

  test('validates bounds', () => {
    expect(() => resolvePollingConfig({ pollIntervalMs: 0 })).toThrow('pollIntervalMs must be positive');
    expect(() => resolvePollingConfig({ maxAttempts: 0 })).toThrow('maxAttempts must be at least 1');
    expect(() => resolvePollingConfig({ backoffMultiplier: 0.5 })).toThrow('backoffMultiplier must be at least 1');
  });
});
