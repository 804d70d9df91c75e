import type { ProjectInspector } from '../project/projectInspector.js';
import type { GoBuildOptions } from '../compiler/compileTypes.js';
import type { BuilderCommand } from '../image/imageTypes.js';
import type {
  ArgumentParseError,
  CompileError,
  ImageBuildError,
  UnsupportedBuilderError,
  UsageError,
} from '../errors.js';

export type ToolchainInvoker = (options: GoBuildOptions) => void;

export type ProcessExecutor = (command: BuilderCommand) => void;

export type BuildDeps = {
  inspector: ProjectInspector;
  toolchain: ToolchainInvoker;
  executor: ProcessExecutor;
  /** Inherited environment; read once into the compile environment. */
  env: NodeJS.ProcessEnv;
};

/**
 * Terminal result of one build. Usage, builder and argument failures are
 * reported before any external process starts.
 */
export type ExitOutcome =
  | { kind: 'success' }
  | { kind: 'usage-error'; error: UsageError }
  | { kind: 'argument-parse-failure'; error: ArgumentParseError }
  | { kind: 'unsupported-builder'; error: UnsupportedBuilderError }
  | { kind: 'compile-failure'; error: CompileError }
  | { kind: 'image-build-failure'; error: ImageBuildError };

export type FailureOutcome = Exclude<ExitOutcome, { kind: 'success' }>;
