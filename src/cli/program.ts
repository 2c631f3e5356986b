import { cac, type CAC } from 'cac';
import { VERSION } from '../version.js';
import { startRepl } from '../repl/repl.js';
import type { RunRequest } from '../runtime/python-runner.js';
import { checkCommand } from './commands/check.js';
import { convertCommand, showTransformCommand } from './commands/convert.js';
import { STDIN_TARGET, runCommand, type RunDependencies } from './commands/run.js';
import { handleError } from './utils/error-handler.js';

export const BRACKET_MAPPING_HELP = `  drake / maye  ->  ( )   parentheses
  Drake / Maye  ->  { }   curly braces
  DRAKE / MAYE  ->  [ ]   square brackets`;

interface RunCliOptions {
  code?: string;
  module?: string;
  interactive?: boolean;
  '--'?: string[];
}

const SUBCOMMANDS = new Set(['show', 'to-python', 'convert', 'check', 'repl']);
const VALUE_OPTIONS = new Set(['-c', '--code', '-m', '--module']);

/**
 * 命令行拆分结果：ddmm 自身的选项交给 cac，运行目标之后的参数原样交给程序。
 */
export interface ScriptInvocation {
  readonly cliArgs: readonly string[];
  /** 运行目标：文件路径或 "-" */
  readonly target?: string;
  readonly scriptArgs: readonly string[];
}

/**
 * 在 cac 解析之前拆出程序参数：第一个位置参数（或 `-c`/`-m` 的值）之后的内容
 * 全部属于程序，即使以 `-` 开头。子命令不拆分。
 *
 * @param args 去掉 node 与脚本路径后的参数
 */
export function splitScriptArguments(args: readonly string[]): ScriptInvocation {
  const [first] = args;
  if (first !== undefined && SUBCOMMANDS.has(first)) {
    return { cliArgs: args, scriptArgs: [] };
  }

  for (const [index, arg] of args.entries()) {
    if (VALUE_OPTIONS.has(arg)) {
      return { cliArgs: args.slice(0, index + 2), scriptArgs: args.slice(index + 2) };
    }
    if (arg.startsWith('--code=') || arg.startsWith('--module=')) {
      return { cliArgs: args.slice(0, index + 1), scriptArgs: args.slice(index + 1) };
    }
    if (arg === '--') {
      return { cliArgs: args.slice(0, index), target: args[index + 1], scriptArgs: args.slice(index + 2) };
    }
    if (arg === STDIN_TARGET || !arg.startsWith('-')) {
      return { cliArgs: args.slice(0, index), target: arg, scriptArgs: args.slice(index + 1) };
    }
  }
  return { cliArgs: args, scriptArgs: [] };
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function stringOption(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  // cac 会把纯数字参数解析为 number
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * 构建 `ddmm` 命令行。
 *
 * @param invocation {@link splitScriptArguments} 拆出的运行目标与程序参数
 */
export function buildCli(
  deps: RunDependencies = {},
  invocation: ScriptInvocation = { cliArgs: [], scriptArgs: [] }
): CAC {
  const cli = cac('ddmm');
  const repl = deps.repl ?? ((preload?: RunRequest) => startRepl({ preload }));

  cli
    .command('[file] [...args]', 'Run a .ddmm program (no file: interactive console, "-": read stdin)')
    .option('-c, --code <code>', 'Program passed in as a string')
    .option('-m, --module <name>', 'Run a .ddmm module as __main__')
    .option('-i, --interactive', 'Start the interactive console after running')
    .allowUnknownOptions()
    .action(
      wrapAction(async (file: string | undefined, args: string[], options: RunCliOptions) => {
        const exitCode = await runCommand(
          invocation.target ?? file,
          {
            code: stringOption(options.code),
            module: stringOption(options.module),
            args: [...args, ...(options['--'] ?? []), ...invocation.scriptArgs],
            interactive: options.interactive === true,
          },
          { ...deps, repl }
        );
        if (exitCode === null) {
          await repl();
        } else {
          process.exitCode = exitCode;
        }
      })
    );

  cli
    .command('show <file>', 'Print the transformed Python source of a .ddmm file')
    .alias('to-python')
    .action(wrapAction((file: string) => showTransformCommand(file)));

  cli
    .command('convert <file>', 'Convert a Python file to Drake Maye syntax (prints to stdout)')
    .action(wrapAction((file: string) => convertCommand(file)));

  cli
    .command('check <file>', 'Validate bracket matching in a .ddmm file')
    .action(wrapAction((file: string) => checkCommand(file)));

  cli
    .command('repl', 'Start the interactive console')
    .action(wrapAction(() => repl()));

  cli.version(VERSION);
  cli.help(sections => [...sections, { title: 'Bracket mapping', body: BRACKET_MAPPING_HELP }]);
  return cli;
}

/**
 * 拆分程序参数，解析其余部分并等待匹配到的命令执行完毕。
 */
export async function runCli(argv: readonly string[], deps: RunDependencies = {}): Promise<void> {
  const [node = 'node', bin = 'ddmm', ...rest] = argv;
  const invocation = splitScriptArguments(rest);
  const cli = buildCli(deps, invocation);
  cli.parse([node, bin, ...invocation.cliArgs], { run: false });
  await cli.runMatchedCommand();
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  await runCli(argv);
}
