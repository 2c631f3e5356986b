import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'brackets' | 'filesystem' | 'interpreter' | 'module' | 'unknown';

interface DiagnosticCarrier extends Error {
  diagnostics: Diagnostic[];
}

const DIAGNOSTIC_CODES: ReadonlySet<string> = new Set(Object.values(DiagnosticCode));

function isDiagnostic(value: unknown): value is Diagnostic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    DIAGNOSTIC_CODES.has(value.code) &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return Array.isArray(value) && value.every(isDiagnostic);
}

function isDiagnosticCarrier(error: unknown): error is DiagnosticCarrier {
  return error instanceof Error && 'diagnostics' in error && isDiagnosticArray(error.diagnostics);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('B')) return 'brackets';
  if (code.startsWith('F')) return 'filesystem';
  if (code.startsWith('R')) return 'interpreter';
  if (code.startsWith('M')) return 'module';
  return 'unknown';
}

function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'interpreter':
      return 'Set DDMM_PYTHON to a Python 3.10+ interpreter';
    case 'module':
      return 'Module names are resolved against the current directory and PYTHONPATH';
    default:
      return null;
  }
}

function printDiagnostics(diags: readonly Diagnostic[]): void {
  const hints = new Set<string>();
  for (const diag of diags) {
    logError(`[${diag.code}] ${formatDiagnostic(diag)}`);
    const hint = hintFor(diag.code);
    if (hint) hints.add(hint);
  }
  for (const hint of hints) {
    logWarn(hint);
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`Permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`No such file or directory: ${error.message}`);
      break;
    default:
      logError(`File system error (${code}): ${error.message}`);
      break;
  }
}

export function createDiagnosticsError(diagnostics: Diagnostic[]): Error {
  const error: DiagnosticCarrier = Object.assign(new Error('CLI_DIAGNOSTIC_ERROR'), { diagnostics });
  return error;
}

export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
    process.exit(1);
  }

  if (isDiagnosticCarrier(error)) {
    printDiagnostics(error.diagnostics);
    process.exit(1);
  }

  if (isDiagnosticArray(error)) {
    printDiagnostics(error);
    process.exit(1);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('An unknown error occurred');
  }

  process.exit(1);
}
