import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import {
  ensureSupportedInterpreter,
  isSupportedPythonVersion,
  parsePythonVersion,
} from '../../../src/runtime/compat.js';

describe('parsePythonVersion', () => {
  it('解析解释器版本输出', () => {
    assert.equal(parsePythonVersion('Python 3.12.1'), '3.12.1');
    assert.equal(parsePythonVersion('Python 3.13.0rc1'), '3.13.0');
    assert.equal(parsePythonVersion('Python 3.10'), '3.10.0');
  });

  it('无法识别时返回 null', () => {
    assert.equal(parsePythonVersion('command not found'), null);
    assert.equal(parsePythonVersion(''), null);
  });
});

describe('isSupportedPythonVersion', () => {
  it('要求 3.10 及以上', () => {
    assert.equal(isSupportedPythonVersion('3.10.0'), true);
    assert.equal(isSupportedPythonVersion('3.12.4'), true);
    assert.equal(isSupportedPythonVersion('3.9.18'), false);
    assert.equal(isSupportedPythonVersion('2.7.18'), false);
  });
});

describe('ensureSupportedInterpreter', () => {
  it('无法启动的命令报告 R001', async () => {
    await assert.rejects(
      ensureSupportedInterpreter('ddmm-test-no-such-python'),
      (error: unknown) =>
        error instanceof DiagnosticError && error.diagnostic.code === DiagnosticCode.R001_InterpreterNotFound
    );
  });
});
