/**
 * @module bracket-checker
 *
 * 括号匹配校验：使用与重写器相同的上下文扫描，只识别关键字，不产生输出。
 *
 * 三类问题以诊断数据返回，从不抛出：
 * - B001 多余的闭合关键字
 * - B002 开闭关键字属于不同括号族
 * - B003 输入结束时仍未闭合的开启关键字
 */

import {
  BRACKET_FAMILY,
  CLOSER_TO_OPENER,
  isOpenKeyword,
  type OpenKeyword,
} from '../config/brackets.js';
import {
  DEFAULT_DISPLAY_NAME,
  DiagnosticBuilder,
  DiagnosticCode,
  type Diagnostic,
} from '../diagnostics/diagnostics.js';
import { keywordMatcher } from './matchers.js';
import { scan } from './scanner.js';

interface OpenBracket {
  readonly keyword: OpenKeyword;
  readonly line: number;
}

/**
 * 校验 .ddmm 源码中的括号关键字是否正确配对。
 *
 * @param source - 方言源码
 * @param displayName - 诊断中显示的源名称
 * @returns 按发现顺序排列的诊断；空数组表示完全配对
 *
 * @example
 * ```typescript
 * checkBracketMatching('drake maye');        // => []
 * checkBracketMatching('drake Maye', 'a.ddmm');
 * // => [{ code: 'B002', message: "Mismatched brackets: opened with 'drake' (paren) on line 1 but closed with 'Maye' (curly brace)", ... }]
 * ```
 */
export function checkBracketMatching(
  source: string,
  displayName: string = DEFAULT_DISPLAY_NAME
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const open: OpenBracket[] = [];
  const lines = source.split('\n');
  const report = (code: DiagnosticCode, line: number): DiagnosticBuilder =>
    DiagnosticBuilder.error(code)
      .withFile(displayName)
      .withLine(line)
      .withSourceText(lines[line - 1]);

  for (const span of scan(source, keywordMatcher)) {
    if (span.kind !== 'token') continue;
    const keyword = span.token;

    if (isOpenKeyword(keyword)) {
      open.push({ keyword, line: span.line });
      continue;
    }

    const opener = open.pop();
    if (!opener) {
      diagnostics.push(
        report(DiagnosticCode.B001_UnexpectedCloser, span.line)
          .withMessage(
            `Unexpected closing '${keyword}' (${BRACKET_FAMILY[keyword]}) with no matching opener`
          )
          .build()
      );
      continue;
    }

    if (opener.keyword !== CLOSER_TO_OPENER[keyword]) {
      diagnostics.push(
        report(DiagnosticCode.B002_MismatchedBrackets, span.line)
          .withMessage(
            `Mismatched brackets: opened with '${opener.keyword}' (${BRACKET_FAMILY[opener.keyword]}) ` +
              `on line ${opener.line} but closed with '${keyword}' (${BRACKET_FAMILY[keyword]})`
          )
          .withRelated(opener.line, `'${opener.keyword}' opened here`)
          .build()
      );
    }
  }

  for (const opener of open) {
    diagnostics.push(
      report(DiagnosticCode.B003_UnclosedOpener, opener.line)
        .withMessage(`Unclosed '${opener.keyword}' (${BRACKET_FAMILY[opener.keyword]})`)
        .build()
    );
  }

  return diagnostics;
}
