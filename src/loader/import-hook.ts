/**
 * @module import-hook
 *
 * 让宿主解释器可以直接 `import` .ddmm 模块的显式句柄。
 *
 * 安装后，{@link ImportHook.prepare} 把各搜索根目录下的 .ddmm 文件编译进缓存目录，
 * {@link ImportHook.environment} 把这些缓存目录加到 PYTHONPATH 前面，
 * 解释器于是按原生 .py 模块导入它们；同时通过 {@link SOURCE_MAP_ENV} 告诉引导脚本
 * 每个编译结果对应的源文件。每个实例的安装状态相互独立。
 */

import { delimiter, resolve } from 'node:path';
import { SOURCE_MAP_ENV, type SourceMap } from '../runtime/python-runner.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ModuleLoader, type LoadedModule } from './module-loader.js';

export type InstallStatus = 'installed' | 'already-installed';
export type UninstallStatus = 'uninstalled' | 'not-installed';

export class ImportHook {
  private active = false;
  private prepared: LoadedModule[] = [];
  private readonly roots: readonly string[];

  constructor(
    roots: readonly string[],
    private readonly loader: ModuleLoader = new ModuleLoader(),
    private readonly logger: Logger = createLogger('import-hook')
  ) {
    this.roots = [...new Set(roots.map(root => resolve(root)))];
  }

  get installed(): boolean {
    return this.active;
  }

  get searchRoots(): readonly string[] {
    return this.roots;
  }

  install(): InstallStatus {
    if (this.active) return 'already-installed';
    this.active = true;
    this.logger.debug('Import hook installed', { roots: this.roots });
    return 'installed';
  }

  uninstall(): UninstallStatus {
    if (!this.active) return 'not-installed';
    this.active = false;
    this.logger.debug('Import hook uninstalled', { roots: this.roots });
    return 'uninstalled';
  }

  /**
   * 编译所有搜索根目录下的 .ddmm 模块；未安装时不做任何事。
   */
  prepare(): LoadedModule[] {
    if (!this.active) return [];
    const modules = this.roots.flatMap(root => this.loader.compileTree(root));
    this.prepared = modules;
    this.logger.debug('Import hook prepared', {
      modules: modules.length,
      cached: modules.filter(m => m.fromCache).length,
    });
    return modules;
  }

  /**
   * 返回供解释器使用的环境变量：安装时在 PYTHONPATH 前加入缓存目录，并附上源文件映射。
   */
  environment(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    if (!this.active) return { ...base };
    const { cache } = this.loader;
    const cacheRoots = this.roots.map(root => cache.cacheRoot(root));
    const sourceMap: SourceMap = {
      roots: cacheRoots,
      origins: Object.fromEntries(
        this.prepared.map(({ spec }) => [cache.compiledPath(spec.root, spec.origin), spec.origin])
      ),
    };
    const entries = base.PYTHONPATH ? [...cacheRoots, base.PYTHONPATH] : cacheRoots;
    return { ...base, PYTHONPATH: entries.join(delimiter), [SOURCE_MAP_ENV]: JSON.stringify(sourceMap) };
  }
}
