/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口
 * - 可测试性：支持测试环境下重置配置
 * - 延迟初始化：使用单例模式，首次访问时初始化
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * spawn(config.pythonCommand, ['--version']);
 * ```
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { LogLevel } from '../utils/logger.js';

export const DEFAULT_PYTHON_COMMAND = 'python3';
export const DEFAULT_CACHE_DIR = '__ddmmcache__';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 宿主 Python 解释器命令（DDMM_PYTHON，默认 python3） */
  readonly pythonCommand: string;

  /** 编译缓存目录名（DDMM_CACHE_DIR，默认 __ddmmcache__） */
  readonly cacheDirName: string;

  /** 是否启用模块缓存（设置 DDMM_NO_CACHE=1 可禁用） */
  readonly cacheEnabled: boolean;

  /** REPL 历史文件（DDMM_HISTORY_FILE，默认 ~/.ddmm_history） */
  readonly historyFile: string;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  private constructor() {
    this.pythonCommand = process.env.DDMM_PYTHON || DEFAULT_PYTHON_COMMAND;
    this.cacheDirName = process.env.DDMM_CACHE_DIR || DEFAULT_CACHE_DIR;
    this.cacheEnabled = process.env.DDMM_NO_CACHE !== '1';
    this.historyFile = process.env.DDMM_HISTORY_FILE || join(homedir(), '.ddmm_history');
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);

    this.validate();
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值，无法识别时回退到 INFO。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * 缓存目录名会被拼接进路径，不能包含路径分隔符。
   */
  private validate(): void {
    if (/[\\/]/.test(this.cacheDirName) || this.cacheDirName === '.' || this.cacheDirName === '..') {
      throw new Error(`DDMM_CACHE_DIR must be a plain directory name, got '${this.cacheDirName}'`);
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
