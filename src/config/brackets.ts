/**
 * @module brackets
 *
 * 关键字与括号字符的双向映射表。
 *
 * 这是重写器唯一的配置面：六个保留关键字分别对应三种括号的开闭字符。
 */

export type OpenKeyword = 'drake' | 'Drake' | 'DRAKE';
export type CloseKeyword = 'maye' | 'Maye' | 'MAYE';
export type BracketKeyword = OpenKeyword | CloseKeyword;

export type BracketChar = '(' | ')' | '{' | '}' | '[' | ']';

export type BracketFamily = 'paren' | 'curly brace' | 'square bracket';

export const KEYWORD_TO_BRACKET: Readonly<Record<BracketKeyword, BracketChar>> = {
  drake: '(',
  maye: ')',
  Drake: '{',
  Maye: '}',
  DRAKE: '[',
  MAYE: ']',
};

export const BRACKET_TO_KEYWORD: Readonly<Record<BracketChar, BracketKeyword>> = {
  '(': 'drake',
  ')': 'maye',
  '{': 'Drake',
  '}': 'Maye',
  '[': 'DRAKE',
  ']': 'MAYE',
};

export const BRACKET_FAMILY: Readonly<Record<BracketKeyword, BracketFamily>> = {
  drake: 'paren',
  maye: 'paren',
  Drake: 'curly brace',
  Maye: 'curly brace',
  DRAKE: 'square bracket',
  MAYE: 'square bracket',
};

/** 闭合关键字 → 期望的开启关键字 */
export const CLOSER_TO_OPENER: Readonly<Record<CloseKeyword, OpenKeyword>> = {
  maye: 'drake',
  Maye: 'Drake',
  MAYE: 'DRAKE',
};

// 匹配顺序与关键字长度无关：六个关键字互不为前缀（大小写敏感）
export const KEYWORDS: readonly BracketKeyword[] = ['drake', 'Drake', 'DRAKE', 'maye', 'Maye', 'MAYE'];

export function isBracketChar(ch: string): ch is BracketChar {
  return Object.prototype.hasOwnProperty.call(BRACKET_TO_KEYWORD, ch);
}

export function isOpenKeyword(keyword: BracketKeyword): keyword is OpenKeyword {
  return keyword === 'drake' || keyword === 'Drake' || keyword === 'DRAKE';
}
