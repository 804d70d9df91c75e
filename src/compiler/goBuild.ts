import { spawnSync } from 'node:child_process';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { ToolchainError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { buildGoCommand } from './buildCommand.js';
import type { GoBuildOptions, GoBuildResult } from './compileTypes.js';

export type GoDiagnostic = {
  file: string;
  line: number;
  col?: number;
  message: string;
};

export function goBinary(env: NodeJS.ProcessEnv = process.env): string {
  return env.GO || 'go';
}

const diagRe = /^(.+?\.go):(\d+)(?::(\d+))?:\s*(.*)$/;

/**
 * Extract `file.go:line[:col]: message` lines from `go build` output.
 *
 * Package headers (`# example.com/pkg`) and other noise are dropped.
 */
export function parseGoDiagnostics(text: string): GoDiagnostic[] {
  const out: GoDiagnostic[] = [];
  for (const l of text.split(/\r?\n/)) {
    const m = diagRe.exec(l.trim());
    if (!m) continue;
    const [, file = '', line = '0', col, message = ''] = m;
    out.push({
      file,
      line: Number(line),
      col: col === undefined ? undefined : Number(col),
      message,
    });
  }
  return out;
}

export function formatGoDiagnostics(diags: GoDiagnostic[]): string {
  return diags
    .map((d) => `${d.file}:${d.line}${d.col === undefined ? '' : `:${d.col}`} - ${d.message}`)
    .join('\n');
}

/**
 * Compile a Go package into `options.binName`.
 *
 * stdout is inherited. stderr is captured, echoed, and mined for file/line
 * diagnostics when the build fails.
 */
export function goBuild(options: GoBuildOptions): GoBuildResult {
  mkdirSync(dirname(options.binName), { recursive: true });

  const go = goBinary(options.env);
  const command = buildGoCommand(options);
  logDebug('go build', { go, cmd: command, dir: options.dir });

  const res = spawnSync(go, command, {
    cwd: options.dir,
    env: options.env,
    encoding: 'utf8',
    stdio: ['inherit', 'inherit', 'pipe'],
  });

  if (res.error) {
    throw new ToolchainError(`failed to run ${go}: ${res.error.message}`);
  }

  const stderr = res.stderr ?? '';
  if (stderr) process.stderr.write(stderr);

  if (res.status === 0) {
    return { binName: options.binName, command };
  }

  const formatted = formatGoDiagnostics(parseGoDiagnostics(stderr));
  const status = res.signal ? `terminated by ${res.signal}` : `exit status ${res.status}`;

  throw new ToolchainError(`go build ${options.packagePath} failed (${status})`, formatted || stderr.trim());
}
