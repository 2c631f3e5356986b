import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { reverseTransform, transform } from '../../../src/frontend/rewriter.js';

describe('reverseTransform', () => {
  it('把括号替换为关键字并补齐边界空格', () => {
    assert.equal(reverseTransform('print(x)'), 'print drake x maye');
    assert.equal(reverseTransform('print("hi")'), 'print drake "hi" maye');
  });

  it('相邻括号之间补空格', () => {
    assert.equal(reverseTransform('f(g())'), 'f drake g drake maye maye');
    assert.equal(reverseTransform('x = [1, {2: 3}]'), 'x = DRAKE 1, Drake 2: 3 Maye MAYE');
  });

  it('字符串与注释中的括号保持原样', () => {
    assert.equal(reverseTransform('s = "(a)"  # [b]'), 's = "(a)"  # [b]');
    assert.equal(reverseTransform("'''{\n}'''"), "'''{\n}'''");
  });

  it('插值表达式中的括号全部替换，结束插值的花括号保留', () => {
    assert.equal(reverseTransform('f"{d[k]}"'), 'f"{d DRAKE k MAYE }"');
    assert.equal(reverseTransform('f"{x}"'), 'f"{x}"');
  });

  it('插值表达式中的字典字面量计入嵌套深度', () => {
    const python = `f"{ {'a': 1}['a'] }"`;
    const ddmm = `f"{ Drake 'a': 1 Maye DRAKE 'a' MAYE }"`;
    assert.equal(reverseTransform(python), ddmm);
    assert.equal(transform(ddmm), `f"{ { 'a': 1 } [ 'a' ] }"`);
  });

  it('双写的花括号保持原样', () => {
    assert.equal(reverseTransform('f"{{x}}"'), 'f"{{x}}"');
  });

  it('紧邻基本平面之外的字母时补空格', () => {
    assert.equal(reverseTransform('𝑥(1)'), '𝑥 drake 1 maye');
    assert.equal(reverseTransform('f(𝑦)'), 'f drake 𝑦 maye');
  });

  it('与正向转换互逆', () => {
    const ddmm = "x DRAKE Drake 'k': v Maye for k, v in items drake maye MAYE";
    assert.equal(reverseTransform(transform(ddmm)), ddmm);
  });
});
