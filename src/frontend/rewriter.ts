/**
 * @module rewriter
 *
 * 双向源码重写：关键字 ↔ 括号字符。
 *
 * 两个方向都只是 {@link ContextScanner} 的消费者：字符串、注释中的内容原样保留，
 * 只在代码和 f-string 插值表达式中替换 token。重写从不插入或删除换行，
 * 因此下游报告的行号与源文件一一对应。
 */

import {
  BRACKET_TO_KEYWORD,
  KEYWORD_TO_BRACKET,
  isBracketChar,
} from '../config/brackets.js';
import {
  bracketMatcher,
  codePointBefore,
  codePointFrom,
  isIdentifierChar,
  isQuoteChar,
  keywordMatcher,
} from './matchers.js';
import { scan } from './scanner.js';

// 逐字片段按 UTF-16 单元切分，代理对可能落在最后两个片段里
function lastChar(parts: readonly string[]): string {
  const tail = parts.slice(-2).join('');
  return codePointBefore(tail, tail.length);
}

/**
 * 将 Drake Maye 方言源码（.ddmm）转换为 Python 源码。
 *
 * 替换出的括号若与前面的标识符字符相邻，则在前面补一个空格；
 * 若其后紧跟标识符字符或引号，则在后面补一个空格，避免 token 粘连。
 *
 * 本函数不会抛出异常：输入在未闭合的字符串中结束时，返回已累积的结果。
 *
 * @example
 * ```typescript
 * transform("print drake 'hi' maye"); // => "print ( 'hi' )"
 * transform('f"{d DRAKE key MAYE}"'); // => 'f"{d [ key ]}"'
 * ```
 */
export function transform(source: string): string {
  const out: string[] = [];
  for (const span of scan(source, keywordMatcher)) {
    if (span.kind === 'verbatim') {
      out.push(span.text);
      continue;
    }
    if (isIdentifierChar(lastChar(out))) {
      out.push(' ');
    }
    out.push(KEYWORD_TO_BRACKET[span.token]);
    const next = codePointFrom(source, span.end);
    if (isIdentifierChar(next) || isQuoteChar(next)) {
      out.push(' ');
    }
  }
  return out.join('');
}

/**
 * 将 Python 源码转换为 Drake Maye 方言源码，是 {@link transform} 的镜像。
 *
 * 除标识符字符外，前面的闭合引号（`"x")` → `"x" maye`）和后面紧邻的括号字符
 * 也会触发补空格，避免相邻关键字粘成一串。
 *
 * 插值表达式中的六种括号字符全部替换；其中 `{` 同时增加嵌套深度，
 * 使深度归零的 `}` 作为插值结束符原样保留。
 */
export function reverseTransform(source: string): string {
  const out: string[] = [];
  for (const span of scan(source, bracketMatcher)) {
    if (span.kind === 'verbatim') {
      out.push(span.text);
      continue;
    }
    const prev = lastChar(out);
    if (isIdentifierChar(prev) || isQuoteChar(prev)) {
      out.push(' ');
    }
    out.push(BRACKET_TO_KEYWORD[span.token]);
    const next = codePointFrom(source, span.end);
    if (isIdentifierChar(next) || isQuoteChar(next) || isBracketChar(next)) {
      out.push(' ');
    }
  }
  return out.join('');
}
