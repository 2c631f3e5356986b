import { reverseTransform, transform } from '../../frontend/rewriter.js';
import { readSourceFile } from '../../loader/module-loader.js';

/**
 * 打印 .ddmm 文件转换后的 Python 源码（show / to-python）。
 */
export function showTransformCommand(file: string): void {
  console.log(transform(readSourceFile(file)));
}

/**
 * 把 Python 文件转换为 Drake Maye 方言并打印。
 */
export function convertCommand(file: string): void {
  console.log(reverseTransform(readSourceFile(file)));
}
