/**
 * @module scanner
 *
 * 词法上下文跟踪器：基于上下文栈的扫描器，把输入的每个位置归入
 * 代码、注释、字符串字面量或插值表达式四种上下文之一。
 *
 * **设计**：
 * - 扫描器惰性地产出分类后的文本片段（span），正向重写、反向重写和
 *   括号校验只是它的三个消费者，从而保证三者的上下文转换规则完全一致
 * - 活动上下文中的 token 识别由 {@link TokenMatcher} 决定
 * - 扫描永不抛出异常：输入在字符串或注释内部结束时，扫描器直接停止，
 *   未闭合的栈帧可通过 {@link ContextScanner.frames} 查询
 *
 * **上下文转换（代码 / 插值表达式中，按优先级）**：
 * 1. `#` 进入注释（仅代码上下文）
 * 2. 引号或「前缀字母 + 引号」进入字符串字面量
 * 3. 插值表达式中 `{` 增加嵌套深度，`}` 减少深度，归零时结束插值
 * 4. 匹配器识别的 token
 * 5. 其他字符原样复制
 */

import type { TokenMatcher } from './matchers.js';
import { isQuoteChar } from './matchers.js';

export type Quote = '"' | "'";

export interface CodeFrame {
  readonly kind: 'code';
}

export interface CommentFrame {
  readonly kind: 'comment';
}

export interface StringFrame {
  readonly kind: 'string';
  readonly quote: Quote;
  /** 三引号定界符 */
  readonly triple: boolean;
  /** 原始字符串：反斜杠不转义 */
  readonly raw: boolean;
  /** f-string：`{` / `}` 引入插值表达式 */
  readonly interpolated: boolean;
  /** 字节串：仅记录，行为与普通字面量一致 */
  readonly bytes: boolean;
}

export interface InterpolationFrame {
  readonly kind: 'interpolation';
  readonly braceDepth: number;
}

export type Frame = CodeFrame | CommentFrame | StringFrame | InterpolationFrame;

export type ScanContext = Frame['kind'];

export type ActiveContext = 'code' | 'interpolation';

/** 原样复制的片段 */
export interface VerbatimSpan {
  readonly kind: 'verbatim';
  readonly text: string;
  readonly offset: number;
  readonly line: number;
  readonly context: ScanContext;
}

/** 匹配器识别出的 token 片段，只出现在活动上下文中 */
export interface TokenSpan<T extends string> {
  readonly kind: 'token';
  readonly token: T;
  readonly text: string;
  readonly offset: number;
  readonly end: number;
  readonly line: number;
  readonly context: ActiveContext;
}

export type ScanSpan<T extends string> = VerbatimSpan | TokenSpan<T>;

const CODE_FRAME: CodeFrame = { kind: 'code' };
const COMMENT_FRAME: CommentFrame = { kind: 'comment' };

const STRING_PREFIX_CHARS = new Set(['f', 'F', 'r', 'R', 'b', 'B', 'u', 'U']);

interface StringOpening {
  readonly text: string;
  readonly frame: StringFrame;
}

/**
 * 判断 `pos` 处的引号前是否有奇数个连续反斜杠。
 */
function isEscaped(source: string, pos: number): boolean {
  let count = 0;
  for (let j = pos - 1; j >= 0 && source.charAt(j) === '\\'; j--) {
    count++;
  }
  return count % 2 === 1;
}

/**
 * 检测 `pos` 处是否开始一个字符串字面量（可带 f/r/b/u 前缀的任意大小写组合）。
 */
function detectStringOpening(source: string, pos: number): StringOpening | null {
  let end = pos;
  while (end < source.length && STRING_PREFIX_CHARS.has(source.charAt(end))) {
    end++;
  }
  const quote = source.charAt(end);
  if (!isQuoteChar(quote)) return null;

  const prefix = source.slice(pos, end).toLowerCase();
  const triple = source.startsWith(quote.repeat(3), end);
  const delimiter = triple ? quote.repeat(3) : quote;
  return {
    text: source.slice(pos, end) + delimiter,
    frame: {
      kind: 'string',
      quote,
      triple,
      raw: prefix.includes('r'),
      interpolated: prefix.includes('f'),
      bytes: prefix.includes('b'),
    },
  };
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

/**
 * 单次扫描的状态机。每个实例只扫描一次输入，所有状态都是实例私有的。
 */
export class ContextScanner<T extends string> {
  private readonly stack: Frame[] = [CODE_FRAME];
  private pos = 0;
  private line = 1;

  constructor(
    private readonly source: string,
    private readonly matcher: TokenMatcher<T>
  ) {}

  /** 当前上下文栈（最内层在末尾），栈底始终为代码帧 */
  get frames(): readonly Frame[] {
    return this.stack;
  }

  /** 已扫描位置所在的行号（从 1 开始） */
  get currentLine(): number {
    return this.line;
  }

  *spans(): Generator<ScanSpan<T>, void, undefined> {
    while (this.pos < this.source.length) {
      yield this.step();
    }
  }

  private top(): Frame {
    return this.stack[this.stack.length - 1] ?? CODE_FRAME;
  }

  private step(): ScanSpan<T> {
    const frame = this.top();
    switch (frame.kind) {
      case 'comment':
        return this.stepComment();
      case 'string':
        return this.stepString(frame);
      case 'code':
      case 'interpolation':
        return this.stepActive(frame);
    }
  }

  private stepComment(): VerbatimSpan {
    const ch = this.source.charAt(this.pos);
    const span = this.verbatim(ch, 'comment');
    if (ch === '\n') {
      this.stack.pop();
    }
    return span;
  }

  private stepString(frame: StringFrame): VerbatimSpan {
    const { source, pos } = this;
    const ch = source.charAt(pos);

    if (frame.triple) {
      const delimiter = frame.quote.repeat(3);
      if (source.startsWith(delimiter, pos)) {
        this.stack.pop();
        return this.verbatim(delimiter, 'string');
      }
    } else if (ch === frame.quote) {
      if (frame.raw || !isEscaped(source, pos)) {
        this.stack.pop();
      }
      return this.verbatim(ch, 'string');
    }

    if (frame.interpolated) {
      const next = source.charAt(pos + 1);
      if (ch === '{') {
        if (next === '{') return this.verbatim('{{', 'string');
        const span = this.verbatim('{', 'interpolation');
        this.stack.push({ kind: 'interpolation', braceDepth: 1 });
        return span;
      }
      // 孤立的 `}` 属于畸形输入，原样复制
      if (ch === '}' && next === '}') {
        return this.verbatim('}}', 'string');
      }
    }

    if (!frame.raw && ch === '\\' && pos + 1 < source.length) {
      return this.verbatim(source.slice(pos, pos + 2), 'string');
    }

    return this.verbatim(ch, 'string');
  }

  private stepActive(frame: CodeFrame | InterpolationFrame): ScanSpan<T> {
    const { source, pos } = this;
    const ch = source.charAt(pos);

    // 插值表达式中不能包含注释
    if (frame.kind === 'code' && ch === '#') {
      const span = this.verbatim(ch, 'comment');
      this.stack.push(COMMENT_FRAME);
      return span;
    }

    const opening = detectStringOpening(source, pos);
    if (opening) {
      const span = this.verbatim(opening.text, 'string');
      this.stack.push(opening.frame);
      return span;
    }

    if (frame.kind === 'interpolation') {
      if (ch === '{') {
        this.replaceTop({ kind: 'interpolation', braceDepth: frame.braceDepth + 1 });
      } else if (ch === '}') {
        const depth = frame.braceDepth - 1;
        if (depth === 0) {
          const span = this.verbatim(ch, 'interpolation');
          this.stack.pop();
          return span;
        }
        this.replaceTop({ kind: 'interpolation', braceDepth: depth });
      }
    }

    const token = this.matcher.match(source, pos);
    if (token !== null) {
      const span: TokenSpan<T> = {
        kind: 'token',
        token,
        text: token,
        offset: pos,
        end: pos + token.length,
        line: this.line,
        context: frame.kind,
      };
      this.advance(token);
      return span;
    }

    return this.verbatim(ch, frame.kind);
  }

  private replaceTop(frame: Frame): void {
    this.stack[this.stack.length - 1] = frame;
  }

  private verbatim(text: string, context: ScanContext): VerbatimSpan {
    const span: VerbatimSpan = { kind: 'verbatim', text, offset: this.pos, line: this.line, context };
    this.advance(text);
    return span;
  }

  private advance(text: string): void {
    this.pos += text.length;
    this.line += countNewlines(text);
  }
}

/**
 * 扫描 `source` 并惰性产出分类片段。
 */
export function scan<T extends string>(
  source: string,
  matcher: TokenMatcher<T>
): Generator<ScanSpan<T>, void, undefined> {
  return new ContextScanner(source, matcher).spans();
}
