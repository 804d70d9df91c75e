export type BuilderCommand = Readonly<{
  program: string;
  args: readonly string[];
}>;

export type ImageBuildRequest = {
  /** Builder tool name as given by the user; validated when the command is built. */
  builder: string;
  /** Build context handed to the builder; always the last argument. */
  context: string;
  dockerfile: string;
  image: string;
  /** Raw, shell-quoted extra arguments (e.g. `--build-arg https_proxy=$https_proxy`). */
  extraArgs?: string;
};
