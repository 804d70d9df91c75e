#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import yargs from 'yargs';

import { IMAGE_REQUIRED, runBuild } from './build/runBuild.js';
import type { BuildDeps, ExitOutcome } from './build/buildTypes.js';
import { goBuild } from './compiler/goBuild.js';
import { loadOptionalConfig } from './dx/config.js';
import type { OpbuildConfig } from './dx/config.js';
import { logDebug, logError, setDebugEnabled } from './dx/logger.js';
import { OpbuildError, UsageError, describeCause } from './errors.js';
import { execCommand } from './exec/execCommand.js';
import { createProjectInspector } from './project/projectInspector.js';
import { IMAGE_BUILDERS, parseBuildRequest } from './request/buildRequest.js';
import type { BuildRequest } from './request/buildRequest.js';

const description = `Compiles the operator code into an executable binary and builds its container image.

<image> is the container image to be built, e.g. "quay.io/example/operator:v0.0.1".
Use --skip-image to only build the operator binary.

The image is built locally. Push it to a registry afterwards, for example:

  $ opbuild quay.io/example/operator:v0.0.1
  $ docker push quay.io/example/operator:v0.0.1`;

const VALUE_FLAGS = new Set(['--image-build-args', '--go-build-args']);

/**
 * Join `--image-build-args X` and `--go-build-args X` into `--flag=X`.
 *
 * Both values routinely start with `-` (`-ldflags ...`, `--build-arg ...`),
 * which yargs would otherwise read as another flag. The next element is
 * always taken as the value, up to a `--` terminator.
 */
export function attachFlagValues(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--') {
      out.push(...args.slice(i));
      break;
    }
    const value = args[i + 1];
    if (VALUE_FLAGS.has(arg) && value !== undefined) {
      out.push(`${arg}=${value}`);
      i++;
    } else {
      out.push(arg);
    }
  }
  return out;
}

export const buildCli = (args: string[]) =>
  yargs(attachFlagValues(args))
    .scriptName('opbuild')
    .usage(`$0 [<image>]\n\n${description}`)
    .option('image-build-args', {
      type: 'string',
      describe: 'Extra image build arguments as one string such as "--build-arg https_proxy=$https_proxy"',
    })
    .option('image-builder', {
      type: 'string',
      describe: `Tool to build OCI images. One of: [${IMAGE_BUILDERS.join(', ')}] (default: docker)`,
    })
    .option('go-build-args', {
      type: 'string',
      describe: 'Extra Go build arguments as one string such as "-ldflags -X=main.xyz=abc"',
    })
    .option('skip-image', {
      type: 'boolean',
      default: false,
      describe: 'If set, only the operator binary is built and the container image build is skipped.',
    })
    .option('debug', {
      type: 'boolean',
      default: false,
      describe: 'Enable debug logging',
    })
    .strictOptions()
    .fail(false)
    .help()
    .exitProcess(false);

export const parseCliArgs = (args: string[]) => buildCli(args).parseSync();

export type ParsedCli = ReturnType<typeof parseCliArgs>;

/** Exactly one positional image, unless the image stage is skipped. Returns the positionals. */
export function requireImageOrSkip(parsed: ParsedCli): string[] {
  const positionals = parsed._.map(String);
  if (positionals.length !== 1 && !parsed.skipImage) {
    throw new UsageError(IMAGE_REQUIRED);
  }
  return positionals;
}

/** Merge flags over config defaults into a validated request. */
export function requestFromArgs(parsed: ParsedCli, config: OpbuildConfig | null): BuildRequest {
  const positionals = requireImageOrSkip(parsed);

  return parseBuildRequest({
    image: positionals[0],
    imageBuilder: parsed.imageBuilder ?? config?.imageBuilder,
    imageBuildArgs: parsed.imageBuildArgs ?? config?.imageBuildArgs,
    goBuildArgs: parsed.goBuildArgs ?? config?.goBuildArgs,
    skipImage: parsed.skipImage,
  });
}

export type CliDependencies = Partial<BuildDeps> & {
  cwd?: string;
};

const isHelpOrVersion = (args: string[]) => {
  const joined = attachFlagValues(args);
  return joined.includes('--help') || joined.includes('-h') || joined.includes('--version');
};

function report(outcome: ExitOutcome): number {
  if (outcome.kind === 'success') return 0;
  logError(`Error: ${outcome.error.message}`);
  return 1;
}

function reportError(err: unknown): number {
  logError(`Error: ${describeCause(err)}`);
  if (!(err instanceof OpbuildError)) logDebug(err);
  return 1;
}

/** Parse, configure and run one build. Resolves to the process exit code. */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  if (isHelpOrVersion(args)) {
    parseCliArgs(args);
    return 0;
  }

  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(args);
  } catch (err) {
    // yargs reports unknown flags and missing values as plain errors.
    return reportError(new UsageError(describeCause(err), { cause: err }));
  }

  const cwd = deps.cwd ?? process.cwd();

  try {
    // Usage is settled before the project's config file is touched.
    requireImageOrSkip(parsed);
    const config = await loadOptionalConfig(cwd);
    setDebugEnabled(parsed.debug || config?.debug === true);
    const request = requestFromArgs(parsed, config);

    return report(
      runBuild(request, {
        inspector: deps.inspector ?? createProjectInspector(cwd),
        toolchain: deps.toolchain ?? goBuild,
        executor: deps.executor ?? ((command) => execCommand(command, { cwd })),
        env: deps.env ?? process.env,
      }),
    );
  } catch (err) {
    return reportError(err);
  }
}

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  process.exitCode = await runCli(process.argv.slice(2));
}
