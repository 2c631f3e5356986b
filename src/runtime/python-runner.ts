/**
 * @module python-runner
 *
 * 编译并运行服务：把已转换的 Python 源码交给宿主解释器执行。
 *
 * 程序文本通过额外的文件描述符 3 传给解释器内的引导脚本，脚本以源名称编译，
 * 因此 traceback 中出现的是原始 .ddmm 文件名和行号；标准输入保留给被运行的程序。
 * 导入的 .ddmm 模块同样按原始路径编译（见 {@link SOURCE_MAP_ENV}）。
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { Writable } from 'node:stream';
import { ConfigService } from '../config/config-service.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ensureSupportedInterpreter } from './compat.js';

export interface RunRequest {
  /** 已转换的 Python 源码 */
  readonly source: string;
  /** 编译时使用的源名称（文件路径或 `<string>`、`<stdin>`） */
  readonly sourceName: string;
  /** 传给程序的 sys.argv[1:] */
  readonly args?: readonly string[];
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * 宿主编译运行服务。成功或失败都以退出码表示；
 * 语法错误、运行时错误由解释器自行打印带位置的 traceback。
 */
export interface HostRunner {
  run(request: RunRequest): Promise<number>;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface PythonRunnerOptions {
  readonly command?: string;
  /** 运行前是否校验解释器版本（默认 true） */
  readonly checkVersion?: boolean;
  readonly spawn?: SpawnFn;
  readonly logger?: Logger;
}

export interface Invocation {
  readonly command: string;
  readonly args: readonly string[];
}

/** 程序文本所在的文件描述符 */
export const SOURCE_FD = 3;

/**
 * 缓存模块与源文件的对应关系（JSON：`{ roots, origins }`），
 * 引导脚本据此以原始 .ddmm 路径编译缓存中的模块。
 */
export const SOURCE_MAP_ENV = 'DDMM_SOURCE_MAP';

export interface SourceMap {
  /** 缓存目录 */
  readonly roots: readonly string[];
  /** 编译产物路径 → 原始 .ddmm 路径 */
  readonly origins: Readonly<Record<string, string>>;
}

// 只接管缓存目录的 sys.path 条目，其余目录仍走默认的查找器
const SOURCE_MAP_HOOK = [
  'def _ddmm_map_sources():',
  '    import json',
  '    from importlib.machinery import FileFinder, SourceFileLoader',
  `    mapping = json.loads(os.environ.pop("${SOURCE_MAP_ENV}", "") or "{}")`,
  '    roots = [os.path.join(root, "") for root in mapping.get("roots", [])]',
  '    origins = mapping.get("origins", {})',
  '    if not roots:',
  '        return',
  '    class Loader(SourceFileLoader):',
  '        def get_code(self, fullname):',
  '            path = self.get_filename(fullname)',
  '            return compile(self.get_data(path), origins.get(path, path), "exec", dont_inherit=True)',
  '    make_finder = FileFinder.path_hook((Loader, [".py"]))',
  '    def hook(entry):',
  '        if any(os.path.join(os.path.abspath(entry), "").startswith(root) for root in roots):',
  '            return make_finder(entry)',
  '        raise ImportError(entry)',
  '    sys.path_hooks.insert(0, hook)',
  '    sys.path_importer_cache.clear()',
  '_ddmm_map_sources()',
  'del _ddmm_map_sources',
];

const LOAD_PROGRAM = [
  'def _ddmm_load():',
  `    with os.fdopen(${SOURCE_FD}, encoding="utf-8") as src:`,
  '        code = src.read()',
  '    sys.argv = sys.argv[1:]',
  '    name = sys.argv[0]',
  '    if not name.startswith("<"):',
  '        sys.path.insert(0, os.path.dirname(os.path.abspath(name)))',
  '    return code, name',
  '_ddmm_code, _ddmm_name = _ddmm_load()',
  'del _ddmm_load',
];

// traceback 从程序自己的栈帧开始，不含引导脚本
const PRINT_PROGRAM_TRACEBACK = [
  'except BaseException as _ddmm_exc:',
  '    import traceback',
  '    traceback.print_exception(type(_ddmm_exc), _ddmm_exc, _ddmm_exc.__traceback__.tb_next)',
];

export const BOOTSTRAP = [
  'import os, sys',
  ...SOURCE_MAP_HOOK,
  ...LOAD_PROGRAM,
  '_ddmm_globals = {"__name__": "__main__", "__file__": _ddmm_name, "__builtins__": __builtins__}',
  'try:',
  '    exec(compile(_ddmm_code, _ddmm_name, "exec"), _ddmm_globals)',
  'except SystemExit:',
  '    raise',
  ...PRINT_PROGRAM_TRACEBACK,
  '    sys.exit(1)',
].join('\n');

/**
 * `-i` 模式的引导脚本：程序在 `__main__` 中运行，结束后解释器保留其全局变量进入交互模式。
 */
export const INTERACTIVE_BOOTSTRAP = [
  'import os, sys',
  'sys.ps1 = sys.ps2 = ""',
  ...SOURCE_MAP_HOOK,
  ...LOAD_PROGRAM,
  '__file__ = _ddmm_name',
  'del _ddmm_name',
  'try:',
  '    exec(compile(_ddmm_code, __file__, "exec"), globals())',
  'except SystemExit:',
  '    pass',
  ...PRINT_PROGRAM_TRACEBACK,
  'del _ddmm_code',
].join('\n');

/**
 * 把程序文本写入子进程的文件描述符 3 并关闭；子进程没有该通道时返回 false。
 */
export function sendSource(proc: ChildProcess, source: string, logger: Logger): boolean {
  const channel = proc.stdio[SOURCE_FD];
  if (!(channel instanceof Writable)) return false;
  // 解释器提前退出时写入会触发 EPIPE，退出码已经由 close 事件给出
  channel.on('error', error => {
    logger.debug('Source channel closed early', { error: error.message });
  });
  channel.end(source, 'utf8');
  return true;
}

export class PythonRunner implements HostRunner {
  private readonly command: string;
  private readonly checkVersion: boolean;
  private readonly spawnProcess: SpawnFn;
  private readonly logger: Logger;
  private verified: Promise<string> | null = null;

  constructor(options: PythonRunnerOptions = {}) {
    this.command = options.command ?? ConfigService.getInstance().pythonCommand;
    this.checkVersion = options.checkVersion ?? true;
    this.spawnProcess = options.spawn ?? spawn;
    this.logger = options.logger ?? createLogger('python-runner');
  }

  /**
   * 计算解释器命令行：`<python> -c <bootstrap> <sourceName> [...args]`
   */
  buildInvocation(request: RunRequest): Invocation {
    return {
      command: this.command,
      args: ['-c', BOOTSTRAP, request.sourceName, ...(request.args ?? [])],
    };
  }

  async run(request: RunRequest): Promise<number> {
    if (this.checkVersion) {
      this.verified ??= ensureSupportedInterpreter(this.command);
      const version = await this.verified;
      this.logger.debug('Interpreter verified', { command: this.command, version });
    }

    const { command, args } = this.buildInvocation(request);
    this.logger.debug('Spawning interpreter', {
      command,
      sourceName: request.sourceName,
      argc: request.args?.length ?? 0,
    });

    return new Promise<number>((resolve, reject) => {
      const proc = this.spawnProcess(command, args, {
        stdio: ['inherit', 'inherit', 'inherit', 'pipe'],
        env: request.env ?? process.env,
      });

      proc.on('error', error => {
        reject(new DiagnosticError(Diagnostics.interpreterNotFound(command, error.message).build()));
      });
      proc.on('close', (code, signal) => {
        if (signal) {
          this.logger.warn('Interpreter terminated by signal', { signal });
        }
        resolve(code ?? 1);
      });

      if (!sendSource(proc, request.source, this.logger)) {
        reject(new Error(`Interpreter process has no source channel on fd ${SOURCE_FD}`));
      }
    });
  }
}
