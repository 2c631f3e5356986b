import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createInputTransformer, splitLinesKeepEnds } from '../../../src/repl/input-transformer.js';

describe('splitLinesKeepEnds', () => {
  it('保留行尾换行符', () => {
    assert.deepEqual(splitLinesKeepEnds('a\nb'), ['a\n', 'b']);
    assert.deepEqual(splitLinesKeepEnds('a\n\nb\n'), ['a\n', '\n', 'b\n']);
    assert.deepEqual(splitLinesKeepEnds(''), []);
  });
});

describe('createInputTransformer', () => {
  it('整段转换后重新按行切分', () => {
    const transformer = createInputTransformer();
    assert.deepEqual(transformer(['print drake 1 maye\n', 'x = DRAKE\n', '  2,\n', 'MAYE\n']), [
      'print ( 1 )\n',
      'x = [\n',
      '  2,\n',
      ']\n',
    ]);
  });

  it('跨行字符串中的关键字保持原样', () => {
    const transformer = createInputTransformer();
    assert.deepEqual(transformer(['s = """\n', 'drake\n', '"""\n']), ['s = """\n', 'drake\n', '"""\n']);
  });

  it('空输入返回空列表', () => {
    assert.deepEqual(createInputTransformer()([]), []);
  });
});
