import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import { UsageError } from '../errors.js';
import { logDebug } from './logger.js';

export const CONFIG_FILE = 'opbuild.config.js';

const configSchema = z.object({
  /** Default `--image-builder`. Checked against the supported builders later. */
  imageBuilder: z.string().optional(),
  /** Default `--image-build-args`. */
  imageBuildArgs: z.string().optional(),
  /** Default `--go-build-args`. */
  goBuildArgs: z.string().optional(),
  /** Enable debug logs without env var */
  debug: z.boolean().optional(),
});

export type OpbuildConfig = z.infer<typeof configSchema>;

let cached:
  | { loaded: true; config: OpbuildConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE);
}

function defaultExport(mod: unknown): unknown {
  if (typeof mod === 'object' && mod !== null && 'default' in mod) return mod.default;
  return mod;
}

/**
 * Loads optional `opbuild.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 * - Validated: an invalid shape throws {@link UsageError}
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<OpbuildConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const parsed = configSchema.safeParse(defaultExport(mod));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`invalid ${CONFIG_FILE}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`, {
      cause: parsed.error,
    });
  }

  cached = { loaded: true, config: parsed.data };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
