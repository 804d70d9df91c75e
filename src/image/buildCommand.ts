import { UnsupportedBuilderError } from '../errors.js';
import type { ImageBuilder } from '../request/buildRequest.js';
import { isImageBuilder } from '../request/buildRequest.js';
import { splitShellArgs } from '../shell/splitArgs.js';
import type { BuilderCommand, ImageBuildRequest } from './imageTypes.js';

export const BUILD_CONTEXT = '.';

function templateArgs(builder: ImageBuilder, dockerfile: string, image: string): string[] {
  switch (builder) {
    case 'docker':
    case 'podman':
      return ['build', '-f', dockerfile, '-t', image];
    case 'buildah':
      return ['bud', '--format=docker', '-f', dockerfile, '-t', image];
  }
}

/**
 * Assemble the image build invocation for the selected builder.
 *
 * Order is template, then extra args, then the build context.
 * Throws before anything runs if the builder is unknown or the extra
 * arguments cannot be split.
 */
export function createBuildCommand(request: ImageBuildRequest): BuilderCommand {
  const { builder } = request;
  if (!isImageBuilder(builder)) {
    throw new UnsupportedBuilderError(builder);
  }

  const args = templateArgs(builder, request.dockerfile, request.image);

  if (request.extraArgs) {
    args.push(...splitShellArgs(request.extraArgs, 'image-build-args'));
  }

  args.push(request.context);

  return Object.freeze({ program: builder, args: Object.freeze(args) });
}
