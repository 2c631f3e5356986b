/**
 * @module drakedrakemayemaye
 *
 * Drake Maye 方言的主要 API 接口。
 *
 * 方言用六个保留关键字代替 Python 的括号字符，重写器在两种写法之间双向转换：
 *
 * ```
 * .ddmm 源码 → transform → Python 源码 → 宿主解释器
 * Python 源码 → reverseTransform → .ddmm 源码
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { transform, checkBracketMatching } from 'drakedrakemayemaye';
 *
 * const diagnostics = checkBracketMatching('print drake "hi" maye', 'hello.ddmm');
 * if (diagnostics.length === 0) {
 *   console.log(transform('print drake "hi" maye')); // print ( "hi" )
 * }
 * ```
 */

// 重写器前端
export {
  transform,
  reverseTransform,
  checkBracketMatching,
  ContextScanner,
  scan,
  keywordMatcher,
  bracketMatcher,
  isIdentifierChar,
} from './frontend/index.js';
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
  TokenMatcher,
} from './frontend/index.js';

// 关键字映射表
export {
  KEYWORD_TO_BRACKET,
  BRACKET_TO_KEYWORD,
  BRACKET_FAMILY,
  CLOSER_TO_OPENER,
  KEYWORDS,
} from './config/brackets.js';
export type {
  OpenKeyword,
  CloseKeyword,
  BracketKeyword,
  BracketChar,
  BracketFamily,
} from './config/brackets.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
} from './diagnostics/index.js';
export type { Diagnostic, RelatedInformation } from './diagnostics/index.js';

// 模块加载
export {
  ModuleFinder,
  ModuleCache,
  ModuleLoader,
  ImportHook,
  readSourceFile,
} from './loader/index.js';
export type { ModuleSpec, LoadedModule, InstallStatus, UninstallStatus } from './loader/index.js';

// 宿主解释器
export { PythonRunner } from './runtime/python-runner.js';
export type { HostRunner, RunRequest } from './runtime/python-runner.js';
export { ensureSupportedInterpreter, MIN_PYTHON_VERSION } from './runtime/compat.js';

// 交互式控制台
export { DdmmConsole, needsMoreInput } from './repl/console.js';
export type { ReplSession, PushResult } from './repl/console.js';
export { PythonReplSession } from './repl/python-session.js';
export { startRepl } from './repl/repl.js';
export { createInputTransformer } from './repl/input-transformer.js';
export type { InputTransformer } from './repl/input-transformer.js';

export { ConfigService } from './config/config-service.js';
export { VERSION } from './version.js';
