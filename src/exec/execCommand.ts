import { spawnSync } from 'node:child_process';

import { ExecError } from '../errors.js';
import { logInfo } from '../dx/logger.js';
import type { BuilderCommand } from '../image/imageTypes.js';

export type ExecOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export function formatCommand(command: BuilderCommand): string {
  return [command.program, ...command.args].join(' ');
}

/**
 * Run a command to completion with the parent's stdio.
 *
 * Throws {@link ExecError} when the program cannot be started or does not
 * exit with status 0.
 */
export function execCommand(command: BuilderCommand, options: ExecOptions = {}): void {
  logInfo(`Running ${formatCommand(command)}`);

  const res = spawnSync(command.program, [...command.args], {
    cwd: options.cwd,
    env: options.env,
    stdio: 'inherit',
  });

  if (res.error) {
    throw new ExecError(command.program, `failed to start ${command.program}: ${res.error.message}`, null, {
      cause: res.error,
    });
  }
  if (res.signal) {
    throw new ExecError(command.program, `${command.program} was terminated by ${res.signal}`);
  }
  if (res.status !== 0) {
    throw new ExecError(command.program, `${command.program} exited with status ${res.status}`, res.status);
  }
}
