import { checkBracketMatching } from '../../frontend/bracket-checker.js';
import { readSourceFile } from '../../loader/module-loader.js';
import { createDiagnosticsError } from '../utils/error-handler.js';

/**
 * 校验文件中的括号关键字配对；存在问题时以诊断错误抛出。
 */
export function checkCommand(file: string): void {
  const diagnostics = checkBracketMatching(readSourceFile(file), file);
  if (diagnostics.length > 0) {
    throw createDiagnosticsError(diagnostics);
  }
  console.log(`${file}: All brackets match!`);
}
