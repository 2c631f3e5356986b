/**
 * 宿主 Python 解释器版本检测
 *
 * 封装npm semver库，解析 `python --version` 的输出并校验最低版本
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import semver from 'semver';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import { errorMessage } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/** 支持的最低 Python 版本 */
export const MIN_PYTHON_VERSION = '3.10.0';

/**
 * 从 `python --version` 的输出中提取版本号
 *
 * @param output 解释器输出（如 "Python 3.12.1"）
 * @returns 规范化的版本号字符串，无法识别返回null
 *
 * @example
 * parsePythonVersion("Python 3.12.1")  // "3.12.1"
 * parsePythonVersion("Python 3.13.0rc1")  // "3.13.0"
 * parsePythonVersion("command not found")  // null
 */
export function parsePythonVersion(output: string): string | null {
  const match = /Python\s+(\d+\.\d+(?:\.\d+)?)/.exec(output);
  if (!match?.[1]) return null;
  return semver.coerce(match[1])?.version ?? null;
}

/**
 * 检查版本号是否满足最低版本要求
 *
 * @example
 * isSupportedPythonVersion("3.10.0")  // true
 * isSupportedPythonVersion("3.9.18")  // false
 */
export function isSupportedPythonVersion(version: string): boolean {
  return semver.gte(version, MIN_PYTHON_VERSION);
}

function describeMinimum(): string {
  const min = semver.parse(MIN_PYTHON_VERSION);
  return min ? `${min.major}.${min.minor}` : MIN_PYTHON_VERSION;
}

/**
 * 运行 `<command> --version` 并校验版本
 *
 * @param command 解释器命令
 * @returns 解释器版本号
 * @throws {DiagnosticError} R001 无法启动；R002 版本过低；R003 输出无法识别
 */
export async function ensureSupportedInterpreter(command: string): Promise<string> {
  let output: string;
  try {
    const { stdout, stderr } = await execFileAsync(command, ['--version']);
    // Python 2 把版本写到 stderr
    output = `${stdout}${stderr}`.trim();
  } catch (error) {
    const reason = errorMessage(error);
    throw new DiagnosticError(Diagnostics.interpreterNotFound(command, reason).build());
  }

  const version = parsePythonVersion(output);
  if (version === null) {
    throw new DiagnosticError(Diagnostics.interpreterFailed(command, output).build());
  }
  if (!isSupportedPythonVersion(version)) {
    throw new DiagnosticError(
      Diagnostics.interpreterTooOld(command, version, describeMinimum()).build()
    );
  }
  return version;
}
