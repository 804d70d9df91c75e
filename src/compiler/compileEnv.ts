import type { CompileEnvironment } from './compileTypes.js';

export const TARGET_OS = 'linux';

/**
 * Environment for cross-compiling the manager binary.
 *
 * GOOS is always forced. CGO_ENABLED defaults to 0 but an inherited value,
 * even an empty one, is kept.
 */
export function createCompileEnvironment(inherited: NodeJS.ProcessEnv): CompileEnvironment {
  const env: CompileEnvironment = {};
  for (const [key, value] of Object.entries(inherited)) {
    if (value !== undefined) env[key] = value;
  }

  env.GOOS = TARGET_OS;
  if (!Object.hasOwn(env, 'CGO_ENABLED')) {
    env.CGO_ENABLED = '0';
  }
  return env;
}
