import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { checkBracketMatching } from '../../../src/frontend/bracket-checker.js';
import { DiagnosticCode, formatDiagnostic } from '../../../src/diagnostics/diagnostics.js';

describe('checkBracketMatching', () => {
  it('配对完整时返回空列表', () => {
    assert.deepEqual(checkBracketMatching('drake maye'), []);
    assert.deepEqual(checkBracketMatching('x = DRAKE Drake 1: drake maye Maye MAYE'), []);
  });

  it('忽略字符串与注释中的关键字', () => {
    assert.deepEqual(checkBracketMatching('print drake "maye" maye  # drake'), []);
  });

  it('报告错配的括号族', () => {
    const [diag, ...rest] = checkBracketMatching('drake Maye');
    assert.deepEqual(rest, []);
    assert.ok(diag);
    assert.equal(diag.code, DiagnosticCode.B002_MismatchedBrackets);
    assert.equal(
      diag.message,
      "Mismatched brackets: opened with 'drake' (paren) on line 1 but closed with 'Maye' (curly brace)"
    );
    assert.equal(diag.displayName, '<string>');
    assert.equal(diag.line, 1);
    assert.equal(diag.sourceText, 'drake Maye');
    assert.deepEqual(diag.relatedInformation, [{ line: 1, message: "'drake' opened here" }]);
  });

  it('报告未闭合的开启关键字', () => {
    const diagnostics = checkBracketMatching('drake');
    assert.equal(diagnostics.length, 1);
    const [diag] = diagnostics;
    assert.ok(diag);
    assert.equal(diag.code, DiagnosticCode.B003_UnclosedOpener);
    assert.equal(formatDiagnostic(diag), 'Unclosed \'drake\' (paren)\n  File "<string>", line 1\n    drake');
  });

  it('报告多余的闭合关键字', () => {
    const diagnostics = checkBracketMatching('maye');
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0]?.code, DiagnosticCode.B001_UnexpectedCloser);
    assert.equal(diagnostics[0]?.message, "Unexpected closing 'maye' (paren) with no matching opener");
  });

  it('跨行错配时分别记录开启与闭合的行号', () => {
    const diagnostics = checkBracketMatching('x = DRAKE\n  1,\n  2\nmaye\n', 'list.ddmm');
    assert.equal(diagnostics.length, 1);
    const [diag] = diagnostics;
    assert.ok(diag);
    assert.equal(diag.line, 4);
    assert.equal(
      diag.message,
      "Mismatched brackets: opened with 'DRAKE' (square bracket) on line 1 but closed with 'maye' (paren)"
    );
    assert.equal(
      formatDiagnostic(diag),
      diag.message + '\n  File "list.ddmm", line 4\n    maye'
    );
  });

  it('按发现顺序返回诊断', () => {
    const diagnostics = checkBracketMatching('maye\n  Drake');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.line, d.sourceText]),
      [
        [DiagnosticCode.B001_UnexpectedCloser, 1, 'maye'],
        [DiagnosticCode.B003_UnclosedOpener, 2, 'Drake'],
      ]
    );
  });

  it('校验插值表达式中的关键字', () => {
    const diagnostics = checkBracketMatching('f"{d DRAKE k}"');
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0]?.message, "Unclosed 'DRAKE' (square bracket)");
    assert.equal(diagnostics[0]?.sourceText, 'f"{d DRAKE k}"');
  });
});
