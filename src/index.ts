export { runBuild, goBuildOptions, IMAGE_REQUIRED } from './build/runBuild.js';
export { toExitOutcome } from './build/exitOutcome.js';
export type {
  BuildDeps,
  ExitOutcome,
  FailureOutcome,
  ProcessExecutor,
  ToolchainInvoker,
} from './build/buildTypes.js';

export { splitShellArgs, splitFields } from './shell/splitArgs.js';

export { createBuildCommand, BUILD_CONTEXT } from './image/buildCommand.js';
export type { BuilderCommand, ImageBuildRequest } from './image/imageTypes.js';

export { createCompileEnvironment, TARGET_OS } from './compiler/compileEnv.js';
export { buildGoCommand, compileArgs } from './compiler/buildCommand.js';
export { goBuild, parseGoDiagnostics } from './compiler/goBuild.js';
export type { CompileEnvironment, GoBuildOptions, GoBuildResult } from './compiler/compileTypes.js';

export { execCommand } from './exec/execCommand.js';

export {
  createProjectInspector,
  BUILD_BIN_DIR,
  BUILD_DOCKERFILE,
  MANAGER_DIR,
} from './project/projectInspector.js';
export type { ProjectInspector } from './project/projectInspector.js';

export {
  IMAGE_BUILDERS,
  parseBuildRequest,
  isImageBuilder,
} from './request/buildRequest.js';
export type { BuildRequest, ImageBuilder } from './request/buildRequest.js';

export * from './errors.js';
