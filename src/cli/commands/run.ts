import { delimiter, dirname, resolve } from 'node:path';
import { DiagnosticError, Diagnostics } from '../../diagnostics/diagnostics.js';
import { transform } from '../../frontend/rewriter.js';
import { ImportHook } from '../../loader/import-hook.js';
import { ModuleLoader, readSourceFile } from '../../loader/module-loader.js';
import { startRepl } from '../../repl/repl.js';
import { PythonRunner, type HostRunner, type RunRequest } from '../../runtime/python-runner.js';
import { createLogger } from '../../utils/logger.js';

export interface RunOptions {
  /** 以字符串形式传入的程序（-c） */
  readonly code?: string;
  /** 以模块方式运行（-m） */
  readonly module?: string;
  /** 传给程序的参数 */
  readonly args?: readonly string[];
  /** 运行后进入交互式控制台，控制台与程序共享同一个解释器（-i） */
  readonly interactive?: boolean;
}

export interface RunDependencies {
  readonly runner?: HostRunner;
  readonly loader?: ModuleLoader;
  readonly readStdin?: () => Promise<string>;
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** 交互式控制台；传入 preload 时先运行该程序 */
  readonly repl?: (preload?: RunRequest) => Promise<void>;
}

interface Program {
  /** 转换后的 Python 源码 */
  readonly python: string;
  readonly sourceName: string;
  /** 需要编译进缓存、供程序 import 的 .ddmm 根目录 */
  readonly roots: readonly string[];
}

export const STDIN_TARGET = '-';

export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function moduleSearchPaths(cwd: string, env: NodeJS.ProcessEnv): string[] {
  const extra = (env.PYTHONPATH ?? '').split(delimiter).filter(entry => entry.length > 0);
  return [cwd, ...extra];
}

async function resolveProgram(
  target: string | undefined,
  options: RunOptions,
  loader: ModuleLoader,
  cwd: string,
  env: NodeJS.ProcessEnv,
  readStdin: () => Promise<string>
): Promise<Program | null> {
  if (options.code !== undefined) {
    return { python: transform(options.code), sourceName: '<string>', roots: [cwd] };
  }

  if (options.module !== undefined) {
    const spec = loader.find(options.module, moduleSearchPaths(cwd, env));
    if (!spec) {
      throw new DiagnosticError(Diagnostics.moduleNotFound(options.module).build());
    }
    const loaded = loader.load(spec);
    return { python: loaded.source, sourceName: spec.origin, roots: [spec.root] };
  }

  if (target === STDIN_TARGET) {
    return { python: transform(await readStdin()), sourceName: '<stdin>', roots: [cwd] };
  }

  if (target !== undefined) {
    const file = resolve(cwd, target);
    return { python: transform(readSourceFile(file)), sourceName: target, roots: [dirname(file)] };
  }

  return null;
}

/**
 * 运行 .ddmm 程序（文件、-c 字符串、-m 模块或标准输入）。
 *
 * 运行期间安装导入钩子，使程序可以 import 同目录下的 .ddmm 模块。
 * 指定 `interactive` 时程序在控制台的解释器中运行，结束后进入交互模式。
 *
 * @returns 解释器退出码；没有可运行的目标时返回 null（由调用方进入 REPL）
 */
export async function runCommand(
  target: string | undefined,
  options: RunOptions,
  deps: RunDependencies = {}
): Promise<number | null> {
  const logger = createLogger('run');
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const loader = deps.loader ?? new ModuleLoader();
  const readStdin = deps.readStdin ?? (() => readAll(process.stdin));

  const program = await resolveProgram(target, options, loader, cwd, env, readStdin);
  if (!program) return null;

  const hook = new ImportHook(program.roots, loader, logger.child('import-hook'));
  hook.install();
  try {
    hook.prepare();
    const request: RunRequest = {
      source: program.python,
      sourceName: program.sourceName,
      args: options.args ?? [],
      env: hook.environment(env),
    };

    if (options.interactive) {
      const repl = deps.repl ?? ((preload?: RunRequest) => startRepl({ preload }));
      await repl(request);
      return 0;
    }

    const runner = deps.runner ?? new PythonRunner();
    const exitCode = await runner.run(request);
    logger.debug('Program finished', { sourceName: program.sourceName, exitCode });
    return exitCode;
  } finally {
    hook.uninstall();
  }
}
