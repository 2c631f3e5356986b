import { existsSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';

export const SOURCE_EXTENSION = '.ddmm';
export const PACKAGE_INIT = `__init__${SOURCE_EXTENSION}`;

/**
 * 已定位的 .ddmm 模块
 */
export interface ModuleSpec {
  /** 点分模块名，如 `pkg.util` */
  readonly name: string;
  /** 源文件绝对路径 */
  readonly origin: string;
  readonly isPackage: boolean;
  /** 包的子模块搜索目录；普通模块为空 */
  readonly searchLocations: readonly string[];
  /** 找到该模块的搜索路径条目 */
  readonly root: string;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * 把点分模块名解析为 .ddmm 文件。
 *
 * 对每个搜索路径依次尝试 `a/b/c/__init__.ddmm`（包）和 `a/b/c.ddmm`（模块），
 * 第一个存在的文件胜出。
 */
export class ModuleFinder {
  find(fullname: string, searchPaths: readonly string[]): ModuleSpec | null {
    const parts = fullname.split('.');
    if (parts.some(part => part.length === 0)) return null;

    for (const entry of searchPaths) {
      const root = resolve(entry);
      const base = join(root, ...parts);

      const init = join(base, PACKAGE_INIT);
      if (isFile(init)) {
        return { name: fullname, origin: init, isPackage: true, searchLocations: [base], root };
      }

      const file = `${base}${SOURCE_EXTENSION}`;
      if (isFile(file)) {
        return { name: fullname, origin: file, isPackage: false, searchLocations: [], root };
      }
    }

    return null;
  }
}
