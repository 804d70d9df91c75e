import {
  ArgumentParseError,
  CompileError,
  ImageBuildError,
  ProjectError,
  UnsupportedBuilderError,
  UsageError,
} from '../errors.js';
import type { FailureOutcome } from './buildTypes.js';

/**
 * Map a thrown error onto its terminal outcome.
 *
 * Errors outside the build taxonomy are rethrown untouched.
 */
export function toExitOutcome(err: unknown): FailureOutcome {
  if (err instanceof UsageError) return { kind: 'usage-error', error: err };
  if (err instanceof ProjectError) {
    return { kind: 'usage-error', error: new UsageError(err.message, { cause: err }) };
  }
  if (err instanceof ArgumentParseError) return { kind: 'argument-parse-failure', error: err };
  if (err instanceof UnsupportedBuilderError) return { kind: 'unsupported-builder', error: err };
  if (err instanceof CompileError) return { kind: 'compile-failure', error: err };
  if (err instanceof ImageBuildError) return { kind: 'image-build-failure', error: err };
  throw err;
}
