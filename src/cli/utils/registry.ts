import { isErr } from 'option-t/plain_result';
import { allDocumentationOptions } from '../../core/documentation/options.ts';
import { createOptionRegistry, type OptionRegistry } from '../../core/schema/registry.ts';
import { exitWithError } from './report-error.ts';

/**
 * CLI が使うオプションレジストリ
 */
export function loadRegistry(): OptionRegistry {
  const registry = createOptionRegistry(allDocumentationOptions);
  if (isErr(registry)) {
    exitWithError(registry.err);
  }
  return registry.val;
}
