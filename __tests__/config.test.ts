import { describe, it, expect, afterEach } from 'vitest';
import { Config } from '../src/config';
import { getBoolean, getNumber, splitServiceNames, targetComponentName } from '../src/utils';

describe('Config', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
    Config.resetConfig();
  });

  it('should read the environment once per instance', () => {
    process.env.CACHET_API_URL = 'https://status.test/api///';
    process.env.BACKEND_MAX_RETRIES = '5';
    Config.resetConfig();

    expect(Config.Instance.cachetApiUrl).toBe('https://status.test/api');
    expect(Config.Instance.backendMaxRetries).toBe(5);
    expect(Config.Instance).toBe(Config.Instance);
  });

  it('should default the Cachet status codes', () => {
    Config.resetConfig();

    expect(Config.Instance).toMatchObject({
      statusHealthy: 1,
      statusPartial: 3,
      statusDown: 4,
      incidentInvestigating: 1,
      incidentFixed: 4,
      port: 5000,
    });
  });

  it('should ignore invalid numbers', () => {
    process.env.PORT = '0';
    process.env.BACKEND_TIMEOUT_MS = 'soon';
    Config.resetConfig();

    expect(Config.Instance.port).toBe(5000);
    expect(Config.Instance.backendTimeoutMs).toBe(10000);
  });
});

describe('utils', () => {
  it.each([
    ['true', true],
    [' Yes ', true],
    ['on', true],
    [1, true],
    ['0', false],
    ['off', false],
    [false, false],
  ])('getBoolean(%j) should be %s', (value, expected) => {
    expect(getBoolean(value)).toBe(expected);
  });

  it('should return the default for unknown booleans', () => {
    expect(getBoolean('maybe', true)).toBe(true);
    expect(getBoolean(undefined)).toBe(false);
  });

  it('should parse numbers with a floor', () => {
    expect(getNumber('12', 1)).toBe(12);
    expect(getNumber(' ', 7)).toBe(7);
    expect(getNumber('-1', 3)).toBe(3);
  });

  it('should split service labels', () => {
    expect(splitServiceNames(' Web, ,API ,')).toEqual(['Web', 'API']);
    expect(targetComponentName('10.0.0.1:9100', 'Web, API')).toBe('10.0.0.1:9100 | Web, API');
  });
});
