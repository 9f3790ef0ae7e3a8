import type { DocumentationError } from '../../types/errors.ts';

/**
 * エラーを表示用の行へ変換する
 *
 * CompositionError は失敗したアサーションを1行ずつ列挙する
 */
export function formatError(error: DocumentationError): string[] {
  switch (error.type) {
    case 'CompositionError':
      return [
        `Error: ${error.failures.length} assertion(s) failed`,
        ...error.failures.map((failure) => `  - [${failure.fragment}] ${failure.message}`),
      ];
    case 'StructuralError':
    case 'ConfigParseError':
    case 'ConfigValidationError':
    case 'TreeDecodeError':
    case 'RenderError':
      return [`Error: ${error.message}`];
  }
}

/**
 * エラーを標準エラー出力へ書いて終了する
 */
export function exitWithError(error: DocumentationError): never {
  for (const line of formatError(error)) {
    console.error(line);
  }
  process.exit(1);
}
