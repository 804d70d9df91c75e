import { dirname } from 'node:path';

import { splitFields } from '../shell/splitArgs.js';
import type { GoBuildOptions } from './compileTypes.js';

export function buildGoCommand(options: GoBuildOptions): string[] {
  return ['build', '-o', options.binName, ...options.args, options.packagePath];
}

/**
 * Compiler flags for the manager binary.
 *
 * Paths are trimmed relative to the project's parent so the binary does not
 * embed the local checkout location. User flags are appended, never merged.
 */
export function compileArgs(projectRoot: string, goBuildArgs: string): string[] {
  const trimPath = `all=-trimpath=${dirname(projectRoot)}`;
  const args = ['-gcflags', trimPath, '-asmflags', trimPath];

  if (goBuildArgs !== '') {
    args.push(...splitFields(goBuildArgs));
  }
  return args;
}
