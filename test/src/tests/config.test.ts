/**
 * Environment overrides of the frozen config.
 */

type ConfigModule = typeof import('../../../src/config.js');

const KEYS = ['GPSD_HOST', 'GPSD_PORT', 'GPSD_ATTEMPTS'] as const;

function loadConfig(env: Partial<Record<(typeof KEYS)[number], string>>): ConfigModule['config'] {
  for (const key of KEYS) {
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  const loaded: { module?: ConfigModule } = {};
  jest.isolateModules(() => {
    loaded.module = require('../../../src/config.js');
  });
  if (!loaded.module) {
    throw new Error('config did not load');
  }
  return loaded.module.config;
}

describe('config', () => {
  afterEach(() => {
    for (const key of KEYS) {
      delete process.env[key];
    }
  });

  it('defaults to the fixed oneshot settings', () => {
    const config = loadConfig({});

    expect(config.gpsd.host).toBe('localhost');
    expect(config.gpsd.port).toBe(2947);
    expect(config.poll.attempts).toBe(9);
  });

  it('takes overrides from the environment', () => {
    const config = loadConfig({ GPSD_HOST: 'gps.local', GPSD_PORT: '3000', GPSD_ATTEMPTS: '3' });

    expect(config.gpsd.host).toBe('gps.local');
    expect(config.gpsd.port).toBe(3000);
    expect(config.poll.attempts).toBe(3);
  });

  it('keeps the default attempt budget when the variable is not a number', () => {
    const config = loadConfig({ GPSD_ATTEMPTS: 'many' });

    expect(config.poll.attempts).toBe(9);
  });
});
