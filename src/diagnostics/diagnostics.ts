// Structured diagnostics with error codes, file names and line numbers

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

export enum DiagnosticCode {
  // Bracket matching (B001-B099)
  B001_UnexpectedCloser = 'B001',
  B002_MismatchedBrackets = 'B002',
  B003_UnclosedOpener = 'B003',

  // File system (F001-F099)
  F001_FileNotFound = 'F001',
  F002_FileReadFailed = 'F002',

  // Host interpreter (R001-R099)
  R001_InterpreterNotFound = 'R001',
  R002_InterpreterTooOld = 'R002',
  R003_InterpreterFailed = 'R003',

  // Module loading (M001-M099)
  M001_ModuleNotFound = 'M001',
}

export interface RelatedInformation {
  readonly line: number;
  readonly message: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  /** 诊断中显示的源名称（文件路径或 `<string>` 之类的伪名） */
  readonly displayName: string;
  /** 1-based；无源码位置时为 0 */
  readonly line: number;
  /** 出错行的源码文本（已去除首尾空白） */
  readonly sourceText?: string;
  readonly relatedInformation?: readonly RelatedInformation[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get line(): number {
    return this.diagnostic.line;
  }

  override toString(): string {
    return formatDiagnostic(this.diagnostic);
  }
}

export const DEFAULT_DISPLAY_NAME = '<string>';

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private displayName = DEFAULT_DISPLAY_NAME;
  private line = 0;
  private sourceText?: string;
  private relatedInformation: RelatedInformation[] = [];

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withFile(displayName: string): DiagnosticBuilder {
    this.displayName = displayName;
    return this;
  }

  withLine(line: number): DiagnosticBuilder {
    this.line = line;
    return this;
  }

  withSourceText(text: string | undefined): DiagnosticBuilder {
    const trimmed = text?.trim();
    this.sourceText = trimmed ? trimmed : undefined;
    return this;
  }

  withRelated(line: number, message: string): DiagnosticBuilder {
    this.relatedInformation.push({ line, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      displayName: this.displayName,
      line: this.line,
      ...(this.sourceText ? { sourceText: this.sourceText } : {}),
      ...(this.relatedInformation.length > 0
        ? { relatedInformation: [...this.relatedInformation] }
        : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  fileNotFound: (file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.F001_FileNotFound)
      .withMessage(`can't open file '${file}': No such file or directory`)
      .withFile(file),

  fileReadFailed: (file: string, reason: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.F002_FileReadFailed)
      .withMessage(`Error reading ${file}: ${reason}`)
      .withFile(file),

  interpreterNotFound: (command: string, reason: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.R001_InterpreterNotFound)
      .withMessage(`Cannot launch Python interpreter '${command}': ${reason}`)
      .withFile(command),

  interpreterTooOld: (command: string, found: string, required: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.R002_InterpreterTooOld)
      .withMessage(`drakedrakemayemaye requires Python ${required}+, but '${command}' is Python ${found}`)
      .withFile(command),

  interpreterFailed: (command: string, output: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.R003_InterpreterFailed)
      .withMessage(`Unrecognised version output from '${command}': ${output}`)
      .withFile(command),

  moduleNotFound: (name: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.M001_ModuleNotFound)
      .withMessage(`No module named '${name}'`)
      .withFile(name),
};

/**
 * 渲染诊断：
 *
 * ```
 * <message>
 *   File "<displayName>", line <line>
 *     <source text>
 * ```
 *
 * 无行号时省略第二行，无源码文本时省略第三行。
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const parts = [diagnostic.message];
  if (diagnostic.displayName && diagnostic.line > 0) {
    parts.push(`  File "${diagnostic.displayName}", line ${diagnostic.line}`);
  }
  if (diagnostic.sourceText) {
    parts.push(`    ${diagnostic.sourceText}`);
  }
  return parts.join('\n');
}
