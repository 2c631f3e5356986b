import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import readline from 'node:readline';
import { ConfigService } from '../config/config-service.js';
import { VERSION } from '../version.js';
import type { RunRequest } from '../runtime/python-runner.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { DdmmConsole, type ReplSession } from './console.js';
import { PythonReplSession } from './python-session.js';

export const PS1 = 'ddmm>>> ';
export const PS2 = 'ddmm... ';

const HISTORY_LIMIT = 10000;

export const BANNER = `drakedrakemayemaye v${VERSION}
Where every bracket tells a story.

  Bracket Reference:
    drake / maye   ->  ( )   parentheses
    Drake / Maye   ->  { }   curly braces
    DRAKE / MAYE   ->  [ ]   square brackets

Type 'exit drake maye' or Ctrl-D to quit.`;

export interface ReplOptions {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
  readonly historyFile?: string;
  /** 先运行该程序，控制台随后可以访问它留下的全局变量（`ddmm -i`） */
  readonly preload?: RunRequest;
  /** 自定义宿主会话，默认启动常驻 Python 进程 */
  readonly createSession?: (onExit: () => void, preload?: RunRequest) => ReplSession;
}

export function loadHistory(file: string): string[] {
  if (!existsSync(file)) return [];
  return readFileSync(file, 'utf-8')
    .split('\n')
    .filter(line => line.length > 0)
    .slice(-HISTORY_LIMIT);
}

export function saveHistory(file: string, entries: readonly string[]): void {
  writeFileSync(file, `${entries.slice(-HISTORY_LIMIT).join('\n')}\n`, 'utf-8');
}

/**
 * 启动交互式 REPL，在输入结束（Ctrl-D）或解释器退出后 resolve。
 */
export async function startRepl(options: ReplOptions = {}): Promise<void> {
  const logger = createLogger('repl');
  const output = options.output ?? process.stdout;
  const historyFile = options.historyFile ?? ConfigService.getInstance().historyFile;
  const history = loadHistory(historyFile);

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
    prompt: PS1,
    // readline 的历史顺序是最新在前
    history: [...history].reverse(),
    historySize: HISTORY_LIMIT,
  });

  const closeInput = (): void => rl.close();
  const session = options.createSession
    ? options.createSession(closeInput, options.preload)
    : new PythonReplSession({ onExit: closeInput, preload: options.preload, logger: logger.child('session') });
  const ddmm = new DdmmConsole(session);

  output.write(`${BANNER}\n`);
  rl.prompt();

  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  rl.on('line', (line: string) => {
    if (line.trim() !== '') {
      history.push(line);
    }
    const result = ddmm.push(line);
    if (closed) return;
    rl.setPrompt(result === 'more' ? PS2 : PS1);
    rl.prompt();
  });

  rl.on('SIGINT', () => {
    output.write('\nKeyboardInterrupt\n');
    ddmm.resetBuffer();
    rl.setPrompt(PS1);
    rl.prompt();
  });

  if (!closed) {
    await new Promise<void>(resolve => rl.once('close', resolve));
  }

  try {
    saveHistory(historyFile, history);
  } catch (error) {
    logger.warn('Failed to save REPL history', {
      file: historyFile,
      error: errorMessage(error),
    });
  }
  await session.close();
  output.write('\nGoodbye!\n');
}
