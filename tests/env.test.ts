/**
 * @jest-environment node
 */
import path from 'node:path';

// Keep a developer's .env out of these tests
jest.mock('dotenv', () => ({ config: jest.fn() }));

type EnvModule = typeof import('../src/env');

const ENV_KEYS = ['TOOLS_DIR', 'LOG_LEVEL', 'TOOLS_CONFIG', 'LOG_FILE'];

// (Re)load the module with controlled env/argv
const loadEnvModule = (opts?: { env?: Record<string, string | undefined>; argv?: string[] }): EnvModule => {
  const originalEnv = process.env;
  const originalArgv = process.argv;

  process.env = { ...originalEnv };
  for (const key of ENV_KEYS) delete process.env[key];
  for (const [key, value] of Object.entries(opts?.env ?? {})) {
    if (value !== undefined) process.env[key] = value;
  }
  process.argv = [process.execPath, path.join(process.cwd(), 'fake-script.js'), ...(opts?.argv ?? [])];

  jest.resetModules();
  try {
    const mod: EnvModule = require('../src/env');
    return mod;
  } finally {
    process.env = originalEnv;
    process.argv = originalArgv;
  }
};

describe('env.ts', () => {
  test('everything is undefined by default', () => {
    const mod = loadEnvModule();
    expect(mod.TOOLS_DIR).toBeUndefined();
    expect(mod.LOG_LEVEL).toBeUndefined();
    expect(mod.CONFIG_PATH).toBeUndefined();
    expect(mod.LOG_FILE).toBeUndefined();
  });

  test('reads environment variables', () => {
    const mod = loadEnvModule({
      env: { TOOLS_DIR: '/srv/tools', LOG_LEVEL: 'warn', TOOLS_CONFIG: './tools.json', LOG_FILE: './run.log' },
    });
    expect(mod.TOOLS_DIR).toBe('/srv/tools');
    expect(mod.LOG_LEVEL).toBe('warn');
    expect(mod.CONFIG_PATH).toBe('./tools.json');
    expect(mod.LOG_FILE).toBe('./run.log');
  });

  test('ignores an unknown LOG_LEVEL', () => {
    expect(loadEnvModule({ env: { LOG_LEVEL: 'loud' } }).LOG_LEVEL).toBeUndefined();
  });

  test('CLI flags override the environment', () => {
    const mod = loadEnvModule({
      env: { TOOLS_DIR: '/srv/tools', LOG_LEVEL: 'warn' },
      argv: ['--tools-dir', './t', '--config', './conf/local.json', '--log-file', './x.log', '--log-level', 'error'],
    });
    expect(mod.TOOLS_DIR).toBe('./t');
    expect(mod.CONFIG_PATH).toBe('./conf/local.json');
    expect(mod.LOG_FILE).toBe('./x.log');
    expect(mod.LOG_LEVEL).toBe('error');
  });

  test('--debug selects the debug level and a bad --log-level is ignored', () => {
    expect(loadEnvModule({ argv: ['--debug'] }).LOG_LEVEL).toBe('debug');
    expect(loadEnvModule({ env: { LOG_LEVEL: 'warn' }, argv: ['--log-level', 'bogus'] }).LOG_LEVEL).toBe('warn');
  });

  test('unknown CLI args are ignored', () => {
    const mod = loadEnvModule({ argv: ['--wat', 'lol', '--still-ignored'] });
    expect(mod.CONFIG_PATH).toBeUndefined();
    expect(mod.TOOLS_DIR).toBeUndefined();
  });
});
