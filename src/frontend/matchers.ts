/**
 * @module matchers
 *
 * 活动上下文（代码 / 插值表达式）中使用的 token 匹配器。
 *
 * 正向重写与括号校验识别关键字，反向重写识别括号字符；
 * 两者共享同一个扫描器，仅匹配器不同。
 */

import {
  KEYWORDS,
  isBracketChar,
  type BracketChar,
  type BracketKeyword,
} from '../config/brackets.js';

/**
 * 在 `pos` 处尝试匹配一个 token。
 *
 * 返回值即被消费的源文本，匹配失败返回 null。
 */
export interface TokenMatcher<T extends string> {
  match(source: string, pos: number): T | null;
}

const IDENTIFIER_CHAR = /[\p{L}\p{N}_]/u;

/**
 * 检查字符是否可以作为宿主语言标识符的一部分（字母、数字、下划线）。
 */
export function isIdentifierChar(ch: string): boolean {
  return ch.length > 0 && IDENTIFIER_CHAR.test(ch);
}

/**
 * 取 `pos` 之前的完整码点；`pos` 前是代理对的低位时连同高位一起返回。
 */
export function codePointBefore(source: string, pos: number): string {
  if (pos <= 0) return '';
  const low = source.charCodeAt(pos - 1);
  if (pos >= 2 && low >= 0xdc00 && low <= 0xdfff) {
    const high = source.charCodeAt(pos - 2);
    if (high >= 0xd800 && high <= 0xdbff) return source.slice(pos - 2, pos);
  }
  return source.charAt(pos - 1);
}

/**
 * 取从 `pos` 开始的完整码点，越界时返回空串。
 */
export function codePointFrom(source: string, pos: number): string {
  const codePoint = source.codePointAt(pos);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
}

export function isQuoteChar(ch: string): ch is '"' | "'" {
  return ch === '"' || ch === "'";
}

/**
 * 带单词边界检查的关键字匹配：前后相邻字符都不能是标识符字符，
 * 因此 `drakesmith`、`x_drake`、`DRAKES` 都不会被识别。边界按码点判断，
 * 基本多文种平面之外的字母（如 `𝑥drake`）同样算作标识符字符。
 */
export const keywordMatcher: TokenMatcher<BracketKeyword> = {
  match(source: string, pos: number): BracketKeyword | null {
    for (const keyword of KEYWORDS) {
      if (!source.startsWith(keyword, pos)) continue;
      const end = pos + keyword.length;
      if (isIdentifierChar(codePointBefore(source, pos))) continue;
      if (isIdentifierChar(codePointFrom(source, end))) continue;
      return keyword;
    }
    return null;
  },
};

export const bracketMatcher: TokenMatcher<BracketChar> = {
  match(source: string, pos: number): BracketChar | null {
    const ch = source.charAt(pos);
    return isBracketChar(ch) ? ch : null;
  },
};
