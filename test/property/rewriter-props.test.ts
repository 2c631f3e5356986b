import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { checkBracketMatching } from '../../src/frontend/bracket-checker.js';
import { reverseTransform, transform } from '../../src/frontend/rewriter.js';

// 不含关键字与括号字符的字母表（缺少 d/m/k/e，拼不出任何关键字）
const inertText = fc.stringOf(
  fc.constantFrom('a', 'b', 'f', 'r', 'x', 'y', 'z', '_', ' ', '\n', '#', '"', "'", '\\', ':', '0', '1', '.', ',', '=')
);

const atom = fc.constantFrom('x', 'items', 'k', 'v', '1', 'for', 'in', 'print', ':', ',');
const pairs = fc.constantFrom(['drake', 'maye'], ['Drake', 'Maye'], ['DRAKE', 'MAYE']);

function expression(depth: number): fc.Arbitrary<string> {
  if (depth === 0) return atom;
  const group = fc
    .tuple(pairs, fc.array(expression(depth - 1), { maxLength: 3 }))
    .map(([[open, close], items]) => [open, ...items, close].join(' '));
  return fc.oneof(atom, group);
}

// 单空格分隔、正确嵌套的方言源码
const canonicalProgram = fc
  .array(expression(3), { minLength: 1, maxLength: 6 })
  .map(parts => parts.join(' '));

const opaquePieces = ['drake', 'maye', 'Drake', 'MAYE', '(', ')', '{', '}', '[', ']', ' ', 'x', '#'];

// 非 f-string 的各种字面量：单双引号、三引号、raw、bytes 及其前缀组合
const opaqueLiteral = fc
  .tuple(
    fc.constantFrom('', 'r', 'R', 'b', 'B', 'rb', 'Br', 'u', 'U'),
    fc.constantFrom('"', "'", '"""', "'''")
  )
  .chain(([prefix, delimiter]) => {
    const quote = delimiter.charAt(0);
    const raw = prefix.toLowerCase().includes('r');
    const pieces = [...opaquePieces];
    // 非 raw 字面量中被转义的引号不结束字符串
    if (!raw) pieces.push(`\\${quote}`);
    if (delimiter.length === 3) pieces.push('\n');
    return fc
      .array(fc.constantFrom(...pieces))
      .map(parts => `${prefix}${delimiter}${parts.join('')}${delimiter}`);
  });

function lineCount(text: string): number {
  return text.split('\n').length;
}

describe('rewriter properties', () => {
  it('不含关键字或括号的输入两个方向都不变', () => {
    fc.assert(
      fc.property(inertText, source => {
        assert.equal(transform(source), source);
        assert.equal(reverseTransform(source), source);
      })
    );
  });

  it('规范空格的方言源码往返不变', () => {
    fc.assert(
      fc.property(canonicalProgram, source => {
        assert.equal(reverseTransform(transform(source)), source);
      })
    );
  });

  it('规范嵌套的源码通过括号校验', () => {
    fc.assert(
      fc.property(canonicalProgram, source => {
        assert.deepEqual(checkBracketMatching(source), []);
      })
    );
  });

  it('各种字符串字面量的内容保持原样', () => {
    fc.assert(
      fc.property(opaqueLiteral, literal => {
        assert.equal(transform(literal), literal);
        assert.equal(reverseTransform(literal), literal);
      })
    );
  });

  it('任意输入都不抛出且保持行数', () => {
    fc.assert(
      fc.property(fc.string(), source => {
        assert.equal(lineCount(transform(source)), lineCount(source));
        assert.equal(lineCount(reverseTransform(source)), lineCount(source));
        checkBracketMatching(source);
      })
    );
  });
});
