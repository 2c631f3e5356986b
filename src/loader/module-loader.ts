/**
 * @module module-loader
 *
 * .ddmm 模块加载器：定位 → 读取 → 转换，并经由 {@link ModuleCache} 复用编译结果。
 *
 * 源文件读取或解码失败不属于转换器的职责，以 DiagnosticError 形式抛给调用方。
 */

import { existsSync, readFileSync, readdirSync, statSync, type Dirent } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import { transform } from '../frontend/rewriter.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { ModuleCache } from './module-cache.js';
import { ModuleFinder, PACKAGE_INIT, SOURCE_EXTENSION, type ModuleSpec } from './module-finder.js';

const SKIPPED_DIRS = new Set(['node_modules', '__pycache__']);

export interface LoadedModule {
  readonly spec: ModuleSpec;
  /** 转换后的 Python 源码 */
  readonly source: string;
  readonly fromCache: boolean;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 读取 .ddmm 源文件，失败时抛出 F001 / F002 诊断。
 */
export function readSourceFile(file: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new DiagnosticError(Diagnostics.fileNotFound(file).build());
    }
    const reason = errorMessage(error);
    throw new DiagnosticError(Diagnostics.fileReadFailed(file, reason).build());
  }
}

/**
 * 根据源文件相对搜索根目录的位置推导模块规格
 */
export function specForFile(root: string, origin: string): ModuleSpec {
  const absRoot = resolve(root);
  const absOrigin = resolve(origin);
  const parts = relative(absRoot, absOrigin).split(sep);
  const last = parts.pop() ?? '';

  if (last === PACKAGE_INIT) {
    return {
      name: parts.join('.'),
      origin: absOrigin,
      isPackage: true,
      searchLocations: [join(absRoot, ...parts)],
      root: absRoot,
    };
  }
  const stem = last.endsWith(SOURCE_EXTENSION) ? last.slice(0, -SOURCE_EXTENSION.length) : last;
  return {
    name: [...parts, stem].join('.'),
    origin: absOrigin,
    isPackage: false,
    searchLocations: [],
    root: absRoot,
  };
}

export class ModuleLoader {
  constructor(
    readonly cache: ModuleCache = new ModuleCache(),
    private readonly finder: ModuleFinder = new ModuleFinder(),
    private readonly logger: Logger = createLogger('module-loader')
  ) {}

  find(fullname: string, searchPaths: readonly string[]): ModuleSpec | null {
    return this.finder.find(fullname, searchPaths);
  }

  /**
   * 加载模块：缓存有效时直接返回，否则读取并转换源文件后写回缓存。
   */
  load(spec: ModuleSpec): LoadedModule {
    const mtimeMs = this.mtimeOf(spec.origin);
    const cached = this.cache.read(spec.root, spec.origin, mtimeMs);
    if (cached !== null) {
      this.logger.debug('Module cache hit', { module: spec.name });
      return { spec, source: cached, fromCache: true };
    }

    const source = transform(readSourceFile(spec.origin));
    this.cache.write(spec.root, spec.origin, mtimeMs, source);
    this.logger.debug('Module compiled', { module: spec.name, origin: spec.origin });
    return { spec, source, fromCache: false };
  }

  /**
   * 返回模块未经转换的 .ddmm 源码，找不到模块返回 null。
   */
  getSource(fullname: string, searchPaths: readonly string[]): string | null {
    const spec = this.find(fullname, searchPaths);
    return spec ? readSourceFile(spec.origin) : null;
  }

  /**
   * 编译根目录下可导入的全部 .ddmm 文件：根目录中的模块，以及逐层含 `__init__.ddmm` 的包。
   * 跳过隐藏目录与缓存目录；不可读的目录记录警告后跳过。
   * 编译完成后清除源文件已被删除的缓存条目。
   */
  compileTree(root: string): LoadedModule[] {
    const absRoot = resolve(root);
    const origins = this.collectSources(absRoot);
    const modules = origins.map(origin => this.load(specForFile(absRoot, origin)));
    this.cache.prune(absRoot, origins);
    return modules;
  }

  private collectSources(dir: string): string[] {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn('Skipping unreadable directory', { path: dir, error: errorMessage(error) });
      return [];
    }

    const found: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name)) continue;
      if (entry.name === this.cache.cacheDirName) continue;
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        // 宿主只能导入包目录中的模块
        if (existsSync(join(path, PACKAGE_INIT))) {
          found.push(...this.collectSources(path));
        }
      } else if (entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION)) {
        found.push(path);
      }
    }
    return found.sort();
  }

  private mtimeOf(origin: string): number {
    try {
      return statSync(origin).mtimeMs;
    } catch {
      throw new DiagnosticError(Diagnostics.fileNotFound(origin).build());
    }
  }
}
