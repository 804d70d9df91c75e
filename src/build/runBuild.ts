import { basename, join, posix } from 'node:path';

import { compileArgs } from '../compiler/buildCommand.js';
import { createCompileEnvironment } from '../compiler/compileEnv.js';
import type { GoBuildOptions } from '../compiler/compileTypes.js';
import { logInfo } from '../dx/logger.js';
import { CompileError, ImageBuildError, UsageError } from '../errors.js';
import { BUILD_CONTEXT, createBuildCommand } from '../image/buildCommand.js';
import type { BuilderCommand } from '../image/imageTypes.js';
import { BUILD_BIN_DIR, BUILD_DOCKERFILE, MANAGER_DIR } from '../project/projectInspector.js';
import type { BuildRequest } from '../request/buildRequest.js';
import type { BuildDeps, ExitOutcome } from './buildTypes.js';
import { toExitOutcome } from './exitOutcome.js';

export const IMAGE_REQUIRED = 'opbuild requires exactly one <image> argument or --skip-image';

function requireImageOrSkip(request: BuildRequest): void {
  if (request.image === undefined && !request.skipImage) {
    throw new UsageError(IMAGE_REQUIRED);
  }
}

/** Options for compiling `<module>/cmd/manager` into `<root>/build/_output/bin/<name>`. */
export function goBuildOptions(request: BuildRequest, deps: BuildDeps): GoBuildOptions {
  const root = deps.inspector.projectRoot();
  const projectName = basename(root);

  return {
    binName: join(root, BUILD_BIN_DIR, projectName),
    packagePath: posix.join(deps.inspector.goPackage(), MANAGER_DIR),
    args: compileArgs(root, request.goBuildArgs),
    env: createCompileEnvironment(deps.env),
    dir: root,
  };
}

function imageCommand(request: BuildRequest): BuilderCommand | undefined {
  if (request.skipImage || request.image === undefined) return undefined;
  return createBuildCommand({
    builder: request.imageBuilder,
    context: BUILD_CONTEXT,
    dockerfile: BUILD_DOCKERFILE,
    image: request.image,
    extraArgs: request.imageBuildArgs,
  });
}

function executeBuild(request: BuildRequest, deps: BuildDeps): void {
  requireImageOrSkip(request);
  deps.inspector.mustInProjectRoot();

  // Built up front: a bad builder or unparseable extra args must fail before
  // the compiler runs.
  const command = imageCommand(request);

  if (deps.inspector.isGoProject()) {
    const options = goBuildOptions(request, deps);
    try {
      deps.toolchain(options);
    } catch (err) {
      throw new CompileError(err);
    }
  }

  if (command && request.image !== undefined) {
    logInfo(`Building OCI image ${request.image}`);
    try {
      deps.executor(command);
    } catch (err) {
      throw new ImageBuildError(request.image, err);
    }
  } else {
    logInfo('Skipping image building');
  }

  logInfo('Operator build complete.');
}

/**
 * Compile the operator (when it is a Go project) and build its image
 * (unless skipped).
 *
 * Stages run once, in order; the first failure ends the build.
 */
export function runBuild(request: BuildRequest, deps: BuildDeps): ExitOutcome {
  try {
    executeBuild(request, deps);
    return { kind: 'success' };
  } catch (err) {
    return toExitOutcome(err);
  }
}
