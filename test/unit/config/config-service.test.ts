import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigService, DEFAULT_CACHE_DIR, DEFAULT_PYTHON_COMMAND } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const KEYS = ['DDMM_PYTHON', 'DDMM_CACHE_DIR', 'DDMM_NO_CACHE', 'DDMM_HISTORY_FILE', 'LOG_LEVEL'] as const;

describe('ConfigService', { concurrency: false }, () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    ConfigService.resetForTesting();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    ConfigService.resetForTesting();
  });

  it('未设置环境变量时使用默认值', () => {
    const config = ConfigService.getInstance();
    assert.equal(config.pythonCommand, DEFAULT_PYTHON_COMMAND);
    assert.equal(config.cacheDirName, DEFAULT_CACHE_DIR);
    assert.equal(config.cacheEnabled, true);
    assert.equal(config.historyFile, join(homedir(), '.ddmm_history'));
    assert.equal(config.logLevel, LogLevel.INFO);
  });

  it('读取环境变量', () => {
    process.env.DDMM_PYTHON = 'python3.12';
    process.env.DDMM_CACHE_DIR = '.ddmm-build';
    process.env.DDMM_NO_CACHE = '1';
    process.env.DDMM_HISTORY_FILE = '/tmp/ddmm-history';
    process.env.LOG_LEVEL = 'debug';

    const config = ConfigService.getInstance();
    assert.equal(config.pythonCommand, 'python3.12');
    assert.equal(config.cacheDirName, '.ddmm-build');
    assert.equal(config.cacheEnabled, false);
    assert.equal(config.historyFile, '/tmp/ddmm-history');
    assert.equal(config.logLevel, LogLevel.DEBUG);
  });

  it('无法识别的日志级别回退到 INFO', () => {
    process.env.LOG_LEVEL = 'verbose';
    assert.equal(ConfigService.getInstance().logLevel, LogLevel.INFO);
  });

  it('单例在重置前保持不变', () => {
    const first = ConfigService.getInstance();
    process.env.DDMM_PYTHON = 'other-python';
    assert.equal(ConfigService.getInstance(), first);
    ConfigService.resetForTesting();
    assert.equal(ConfigService.getInstance().pythonCommand, 'other-python');
  });

  it('拒绝包含路径分隔符的缓存目录名', () => {
    process.env.DDMM_CACHE_DIR = 'a/b';
    assert.throws(() => ConfigService.getInstance(), /plain directory name/);
  });
});
