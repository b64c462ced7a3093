import { describe, it, expect, afterEach, vi } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { loadSettings } from '../src/utils/settings.js';

describe('loadSettings', () => {
  it('falls back to defaults', () => {
    expect(loadSettings({})).toEqual({
      env: 'development',
      logLevel: 'info',
      port: 3000,
      templatesDir: path.join(os.homedir(), '.query-assembler', 'templates'),
      rateLimit: { windowMs: 900000, max: 100 },
    });
  });

  it('reads and coerces environment variables', () => {
    const settings = loadSettings({
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      LOG_DIR: '/var/log/query-assembler',
      PORT: '8080',
      TEMPLATES_DIR: '/srv/templates',
      RATE_LIMIT_WINDOW_MS: '60000',
      RATE_LIMIT_REQUESTS: '20',
    });
    expect(settings).toEqual({
      env: 'production',
      logLevel: 'debug',
      logDir: '/var/log/query-assembler',
      port: 8080,
      templatesDir: '/srv/templates',
      rateLimit: { windowMs: 60000, max: 20 },
    });
  });

  it('falls back to defaults for values it cannot use', () => {
    expect(
      loadSettings({
        NODE_ENV: 'staging',
        LOG_LEVEL: 'loud',
        LOG_DIR: '',
        PORT: 'eighty',
        TEMPLATES_DIR: '',
        RATE_LIMIT_WINDOW_MS: '0',
        RATE_LIMIT_REQUESTS: '-5',
      }),
    ).toEqual(loadSettings({}));
  });

  it('accepts log levels in any case', () => {
    expect(loadSettings({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(loadSettings({ LOG_LEVEL: ' Warn ' }).logLevel).toBe('warn');
  });
});

describe('module settings', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('lets the query core load under an unrecognized environment', async () => {
    vi.stubEnv('NODE_ENV', 'staging');
    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    vi.resetModules();

    const { settings } = await import('../src/utils/settings.js');
    expect(settings.env).toBe('development');
    expect(settings.logLevel).toBe('debug');

    const { QueryAssembly } = await import('../src/QueryAssembly.js');
    const q = new QueryAssembly();
    q.addTable('orders', 'o', ['id']);
    expect(q.toSQL()).toBe('SELECT\n  o.id\nFROM orders AS o;');
  });
});
