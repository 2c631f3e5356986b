/**
 * CLI 专用输出工具：带颜色与符号前缀的统一输出格式。
 *
 * 警告与错误写到 stderr；设置 NO_COLOR 或输出不是终端时不着色。
 */

enum AnsiColor {
  Reset = '\u001B[0m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
}

function colorEnabled(stream: NodeJS.WriteStream): boolean {
  return !process.env.NO_COLOR && stream.isTTY === true;
}

function decorate(symbol: string, message: string, color: AnsiColor, stream: NodeJS.WriteStream): string {
  const prefix = colorEnabled(stream) ? `${color}${symbol}${AnsiColor.Reset}` : symbol;
  return `${prefix} ${message}`;
}

export function warn(message: string): void {
  console.warn(decorate('⚠', message, AnsiColor.Yellow, process.stderr));
}

export function error(message: string): void {
  console.error(decorate('✗', message, AnsiColor.Red, process.stderr));
}
