/**
 * ModuleCache 编译结果缓存
 *
 * 把转换后的 Python 源码按包结构镜像写入 `<root>/<cacheDir>/`，
 * 并在 `.cache-metadata.json` 中记录每个源文件的修改时间。
 * 只有记录的 mtime 与源文件当前 mtime 完全相等时缓存才有效。
 * 源文件删除后，对应的编译结果由 {@link ModuleCache.prune} 清除，避免宿主继续导入。
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync, type Dirent } from 'node:fs';
import { dirname, join, relative, sep } from 'node:path';
import { ConfigService } from '../config/config-service.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { SOURCE_EXTENSION } from './module-finder.js';

export const METADATA_FILE = '.cache-metadata.json';

export interface ModuleCacheConfig {
  /** 缓存目录名 */
  readonly cacheDirName: string;
  /** 为 false 时忽略已有缓存条目，总是重新编译（仍会写入） */
  readonly reuse: boolean;
}

interface CacheEntry {
  readonly mtimeMs: number;
}

interface CacheMetadata {
  readonly entries: Record<string, CacheEntry>;
}

function isCacheMetadata(value: unknown): value is CacheMetadata {
  if (typeof value !== 'object' || value === null || !('entries' in value)) return false;
  const { entries } = value;
  return typeof entries === 'object' && entries !== null;
}

function defaultConfig(): ModuleCacheConfig {
  const config = ConfigService.getInstance();
  return { cacheDirName: config.cacheDirName, reuse: config.cacheEnabled };
}

/**
 * 基于文件系统的编译缓存
 */
export class ModuleCache {
  private readonly config: ModuleCacheConfig;
  private readonly logger: Logger;

  constructor(config: ModuleCacheConfig = defaultConfig(), logger: Logger = createLogger('module-cache')) {
    this.config = config;
    this.logger = logger;
  }

  get cacheDirName(): string {
    return this.config.cacheDirName;
  }

  /**
   * 获取搜索根目录对应的缓存根目录（加入宿主的模块搜索路径）
   */
  cacheRoot(root: string): string {
    return join(root, this.config.cacheDirName);
  }

  /**
   * 获取源文件编译结果的路径：`<cacheRoot>/<相对路径>.py`
   */
  compiledPath(root: string, origin: string): string {
    const rel = relative(root, origin);
    const base = rel.endsWith(SOURCE_EXTENSION) ? rel.slice(0, -SOURCE_EXTENSION.length) : rel;
    return join(this.cacheRoot(root), `${base}.py`);
  }

  /**
   * 读取有效的缓存条目
   *
   * @param root 搜索根目录
   * @param origin 源文件路径
   * @param mtimeMs 源文件当前修改时间
   * @returns 缓存的 Python 源码，缓存缺失或失效返回 null
   */
  read(root: string, origin: string, mtimeMs: number): string | null {
    if (!this.config.reuse) return null;

    const entry = this.readMetadata(root).entries[this.key(root, origin)];
    if (!entry || entry.mtimeMs !== mtimeMs) return null;

    const compiled = this.compiledPath(root, origin);
    if (!existsSync(compiled)) return null;
    try {
      return readFileSync(compiled, 'utf-8');
    } catch (error) {
      this.logger.warn('Failed to read cached module', {
        path: compiled,
        error: errorMessage(error),
      });
      return null;
    }
  }

  /**
   * 写入编译结果与元数据。写入失败只记录日志，不影响本次加载。
   */
  write(root: string, origin: string, mtimeMs: number, source: string): boolean {
    const compiled = this.compiledPath(root, origin);
    try {
      mkdirSync(dirname(compiled), { recursive: true });
      writeFileSync(compiled, source, 'utf-8');

      const metadata = this.readMetadata(root);
      const next: CacheMetadata = {
        entries: { ...metadata.entries, [this.key(root, origin)]: { mtimeMs } },
      };
      writeFileSync(this.metadataPath(root), JSON.stringify(next, null, 2), 'utf-8');
      return true;
    } catch (error) {
      this.logger.warn('Failed to write module cache', {
        path: compiled,
        error: errorMessage(error),
      });
      return false;
    }
  }

  /**
   * 删除源文件已不存在的编译结果（含整个失效的包目录）与元数据条目。
   *
   * @param liveOrigins 搜索根目录下仍然存在的源文件
   * @returns 被删除的文件或目录
   */
  prune(root: string, liveOrigins: readonly string[]): string[] {
    // 没有元数据文件的目录不是本缓存写出的，不做清理
    if (!existsSync(this.metadataPath(root))) return [];

    const live = new Set(liveOrigins.map(origin => this.compiledPath(root, origin)));
    const removed: string[] = [];
    this.pruneDir(this.cacheRoot(root), live, removed);

    const liveKeys = new Set(liveOrigins.map(origin => this.key(root, origin)));
    const { entries } = this.readMetadata(root);
    const kept = Object.entries(entries).filter(([key]) => liveKeys.has(key));
    if (kept.length < Object.keys(entries).length) {
      try {
        const next: CacheMetadata = { entries: Object.fromEntries(kept) };
        writeFileSync(this.metadataPath(root), JSON.stringify(next, null, 2), 'utf-8');
      } catch (error) {
        this.logger.warn('Failed to update cache metadata', { path: this.metadataPath(root), error: errorMessage(error) });
      }
    }
    if (removed.length > 0) {
      this.logger.debug('Pruned stale modules', { root, removed: removed.length });
    }
    return removed;
  }

  private pruneDir(dir: string, live: ReadonlySet<string>, removed: string[]): void {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Failed to scan module cache', { path: dir, error: errorMessage(error) });
      return;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name === '__pycache__') continue;
        const prefix = path + sep;
        if ([...live].some(compiled => compiled.startsWith(prefix))) {
          this.pruneDir(path, live, removed);
          continue;
        }
      } else if (!entry.isFile() || !entry.name.endsWith('.py') || live.has(path)) {
        continue;
      }
      try {
        rmSync(path, { recursive: true, force: true });
        removed.push(path);
      } catch (error) {
        this.logger.warn('Failed to remove stale module', { path, error: errorMessage(error) });
      }
    }
  }

  private key(root: string, origin: string): string {
    return relative(root, origin).split('\\').join('/');
  }

  private metadataPath(root: string): string {
    return join(this.cacheRoot(root), METADATA_FILE);
  }

  private readMetadata(root: string): CacheMetadata {
    const path = this.metadataPath(root);
    if (!existsSync(path)) return { entries: {} };
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (isCacheMetadata(parsed)) return parsed;
      this.logger.warn('Ignoring malformed cache metadata', { path });
    } catch (error) {
      this.logger.warn('Ignoring unreadable cache metadata', {
        path,
        error: errorMessage(error),
      });
    }
    return { entries: {} };
  }
}
