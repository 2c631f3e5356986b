/**
 * @module console
 *
 * 交互式控制台核心：逐行缓冲输入，输入完整时转换并交给宿主会话执行。
 *
 * 与终端交互（提示符、历史、信号）无关，便于在测试中直接驱动。
 */

import {
  CLOSER_TO_OPENER,
  isOpenKeyword,
  type OpenKeyword,
} from '../config/brackets.js';
import { keywordMatcher } from '../frontend/matchers.js';
import { transform } from '../frontend/rewriter.js';
import { ContextScanner } from '../frontend/scanner.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const REPL_SOURCE_NAME = '<ddmm-repl>';

export type PushResult = 'more' | 'done';

/**
 * 宿主解释器的交互会话
 */
export interface ReplSession {
  execute(source: string): void;
  close(): Promise<void>;
}

/**
 * 判断缓冲的源码是否还需要更多输入才能执行：
 * - 扫描结束时仍在三引号字符串中
 * - 存在未闭合的开启关键字（且没有多余或错配的闭合关键字）
 * - 最后一行以续行反斜杠结尾
 * - 首行开启了代码块（以 `:` 结尾或为装饰器），且最后一行不是空行
 *
 * 单引号字符串跨行属于语法错误，交给宿主报告，不视为未完成。
 */
export function needsMoreInput(source: string): boolean {
  const scanner = new ContextScanner(source, keywordMatcher);
  const open: OpenKeyword[] = [];
  let broken = false;

  for (const span of scanner.spans()) {
    if (span.kind !== 'token') continue;
    if (isOpenKeyword(span.token)) {
      open.push(span.token);
    } else if (open.pop() !== CLOSER_TO_OPENER[span.token]) {
      broken = true;
    }
  }

  if (scanner.frames.some(frame => frame.kind === 'string' && frame.triple)) return true;
  if (!broken && open.length > 0) return true;

  const lines = source.split('\n');
  const last = lines[lines.length - 1] ?? '';
  if (last.endsWith('\\')) return true;

  const first = (lines[0] ?? '').trim();
  const opensBlock = first.endsWith(':') || first.startsWith('@');
  return opensBlock && (lines.length === 1 || last.trim() !== '');
}

export class DdmmConsole {
  private buffer: string[] = [];

  constructor(
    private readonly session: ReplSession,
    private readonly logger: Logger = createLogger('repl')
  ) {}

  /** 是否有尚未执行的缓冲输入 */
  get pending(): boolean {
    return this.buffer.length > 0;
  }

  /**
   * 推入一行输入。返回 `'more'` 表示需要继续输入，`'done'` 表示已执行。
   */
  push(line: string): PushResult {
    this.buffer.push(line);
    const source = this.buffer.join('\n');
    if (needsMoreInput(source)) {
      return 'more';
    }
    this.buffer = [];
    this.runSource(source);
    return 'done';
  }

  resetBuffer(): void {
    this.buffer = [];
  }

  /**
   * 转换并执行一段完整的源码。空白输入直接忽略。
   */
  runSource(source: string): void {
    if (source.trim() === '') return;
    const python = transform(source);
    this.logger.debug('Executing REPL input', { sourceName: REPL_SOURCE_NAME, lines: source.split('\n').length });
    // 交互模式下复合语句需要一个空行结束
    this.session.execute(python.endsWith('\n') ? `${python}\n` : `${python}\n\n`);
  }
}
