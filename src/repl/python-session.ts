import { spawn, type ChildProcess } from 'node:child_process';
import { ConfigService } from '../config/config-service.js';
import { INTERACTIVE_BOOTSTRAP, sendSource, type RunRequest, type SpawnFn } from '../runtime/python-runner.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { ReplSession } from './console.js';

// 宿主交互模式的提示符置空，由 readline 前端显示自己的提示符
const SILENCE_PROMPTS = 'import sys; sys.ps1 = sys.ps2 = ""';

export interface PythonReplSessionOptions {
  readonly command?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** 进入交互模式前先在 `__main__` 中运行的程序（`ddmm -i`） */
  readonly preload?: RunRequest;
  /** 解释器退出（如执行了 exit()）时回调 */
  readonly onExit?: (code: number | null) => void;
  readonly spawn?: SpawnFn;
  readonly logger?: Logger;
}

/**
 * 交互式解释器的命令行参数；有预载程序时改用引导脚本，程序文本经文件描述符 3 传入。
 */
export function sessionArguments(preload?: RunRequest): string[] {
  if (!preload) return ['-u', '-q', '-i', '-c', SILENCE_PROMPTS];
  return ['-u', '-q', '-i', '-c', INTERACTIVE_BOOTSTRAP, preload.sourceName, ...(preload.args ?? [])];
}

/**
 * 常驻的解释器进程（`-i` 交互模式，标准输入为管道），逐块接收转换后的源码。
 */
export class PythonReplSession implements ReplSession {
  private readonly proc: ChildProcess;
  private readonly exited: Promise<void>;
  private readonly logger: Logger;

  constructor(options: PythonReplSessionOptions = {}) {
    const command = options.command ?? ConfigService.getInstance().pythonCommand;
    const { preload } = options;
    const spawnProcess: SpawnFn = options.spawn ?? spawn;
    this.logger = options.logger ?? createLogger('repl-session');
    this.proc = spawnProcess(command, sessionArguments(preload), {
      stdio: preload ? ['pipe', 'inherit', 'inherit', 'pipe'] : ['pipe', 'inherit', 'inherit'],
      env: preload?.env ?? options.env ?? process.env,
    });
    this.exited = new Promise<void>(resolve => {
      this.proc.once('close', code => {
        this.logger.debug('REPL interpreter exited', { code });
        options.onExit?.(code);
        resolve();
      });
      // 启动失败时不一定会有 close 事件
      this.proc.once('error', error => {
        this.logger.error('Failed to start REPL interpreter', error, { command });
        options.onExit?.(null);
        resolve();
      });
    });
    this.proc.stdin?.on('error', error => {
      this.logger.debug('REPL input channel closed', { error: error.message });
    });
    if (preload && !sendSource(this.proc, preload.source, this.logger)) {
      this.logger.warn('Interpreter has no source channel, program not loaded', { sourceName: preload.sourceName });
    }
  }

  execute(source: string): void {
    this.proc.stdin?.write(source);
  }

  close(): Promise<void> {
    if (this.proc.exitCode === null && this.proc.signalCode === null) {
      this.proc.stdin?.end();
    }
    return this.exited;
  }
}
