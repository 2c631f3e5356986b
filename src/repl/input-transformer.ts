import { transform } from '../frontend/rewriter.js';

export type InputTransformer = (lines: readonly string[]) => string[];

/**
 * 把源码按行切分并保留行尾换行符。
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * 为嵌入式交互 shell 创建输入转换器：整段 cell 转换后重新按行切分。
 * 转换结果为空而输入不为空时返回原始行。
 */
export function createInputTransformer(): InputTransformer {
  return (lines: readonly string[]): string[] => {
    const result = splitLinesKeepEnds(transform(lines.join('')));
    if (result.length === 0 && lines.length > 0) {
      return [...lines];
    }
    return result;
  };
}
