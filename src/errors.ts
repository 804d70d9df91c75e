export type OpbuildErrorCode =
  | 'USAGE'
  | 'ARGUMENT_PARSE'
  | 'COMPILE'
  | 'UNSUPPORTED_BUILDER'
  | 'IMAGE_BUILD'
  | 'PROJECT'
  | 'TOOLCHAIN'
  | 'EXEC';

export class OpbuildError extends Error {
  readonly code: OpbuildErrorCode;

  constructor(code: OpbuildErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad invocation shape, or the working directory is not a project root. */
export class UsageError extends OpbuildError {
  constructor(message: string, options?: ErrorOptions) {
    super('USAGE', message, options);
  }
}

/** A raw extra-argument string could not be split into words. */
export class ArgumentParseError extends OpbuildError {
  readonly input: string;
  readonly reason: string;

  constructor(input: string, reason: string, label = 'argument string') {
    super('ARGUMENT_PARSE', `${label} is not parseable: ${reason} (input: ${JSON.stringify(input)})`);
    this.input = input;
    this.reason = reason;
  }
}

export class UnsupportedBuilderError extends OpbuildError {
  readonly builder: string;

  constructor(builder: string) {
    super('UNSUPPORTED_BUILDER', `${builder} is not supported image builder`);
    this.builder = builder;
  }
}

export class CompileError extends OpbuildError {
  constructor(cause: unknown) {
    super('COMPILE', `failed to build operator binary: ${describeCause(cause)}`, { cause });
  }
}

export class ImageBuildError extends OpbuildError {
  readonly image: string;

  constructor(image: string, cause: unknown) {
    super('IMAGE_BUILD', `failed to output build image ${image}: ${describeCause(cause)}`, { cause });
    this.image = image;
  }
}

export class ProjectError extends OpbuildError {
  constructor(message: string, options?: ErrorOptions) {
    super('PROJECT', message, options);
  }
}

export class ToolchainError extends OpbuildError {
  readonly diagnostics: string;

  constructor(message: string, diagnostics = '') {
    super('TOOLCHAIN', diagnostics ? `${message}\n\n${diagnostics}` : message);
    this.diagnostics = diagnostics;
  }
}

export class ExecError extends OpbuildError {
  readonly program: string;
  readonly exitCode: number | null;

  constructor(program: string, message: string, exitCode: number | null = null, options?: ErrorOptions) {
    super('EXEC', message, options);
    this.program = program;
    this.exitCode = exitCode;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
