/**
 * @module frontend
 *
 * 重写器前端：上下文扫描、双向重写与括号校验。
 *
 * 包含：
 * - 上下文扫描器 (scanner)
 * - token 匹配器 (matchers)
 * - 关键字 ↔ 括号重写 (rewriter)
 * - 括号匹配校验 (bracket-checker)
 */

export { ContextScanner, scan } from './scanner.js';
export type {
  Frame,
  CodeFrame,
  CommentFrame,
  StringFrame,
  InterpolationFrame,
  ScanContext,
  ScanSpan,
  TokenSpan,
  VerbatimSpan,
} from './scanner.js';
export { keywordMatcher, bracketMatcher, isIdentifierChar } from './matchers.js';
export type { TokenMatcher } from './matchers.js';
export { transform, reverseTransform } from './rewriter.js';
export { checkBracketMatching } from './bracket-checker.js';
