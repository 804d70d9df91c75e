/** Environment handed to the toolchain; every value is defined. */
export type CompileEnvironment = Record<string, string>;

export type GoBuildOptions = {
  /** Absolute output path of the binary (`go build -o`). */
  binName: string;
  /** Import path of the package to build, e.g. `example.com/app-operator/cmd/manager`. */
  packagePath: string;
  /** Extra `go build` flags, placed before the package path. */
  args: string[];
  env: CompileEnvironment;
  /** Working directory for the toolchain. Defaults to the current directory. */
  dir?: string;
};

export type GoBuildResult = {
  binName: string;
  command: string[];
};
