import { z } from 'zod';

import { UsageError } from '../errors.js';

export const IMAGE_BUILDERS = ['docker', 'podman', 'buildah'] as const;

export type ImageBuilder = (typeof IMAGE_BUILDERS)[number];

export const imageBuilderSchema = z.enum(IMAGE_BUILDERS);

export const buildRequestSchema = z.object({
  image: z.string().min(1).optional(),
  /** Checked against {@link IMAGE_BUILDERS} only when the image is built. */
  imageBuilder: z.string().min(1).default('docker'),
  imageBuildArgs: z.string().default(''),
  goBuildArgs: z.string().default(''),
  skipImage: z.boolean().default(false),
});

export type BuildRequest = Readonly<z.infer<typeof buildRequestSchema>>;

export type BuildRequestInput = z.input<typeof buildRequestSchema>;

export function isImageBuilder(value: string): value is ImageBuilder {
  return imageBuilderSchema.safeParse(value).success;
}

/**
 * Validate raw CLI/config input into a frozen {@link BuildRequest}.
 *
 * The builder name is not checked here: with `skipImage` it is never used,
 * and otherwise the build reports it as unsupported before anything runs.
 */
export function parseBuildRequest(input: Record<string, unknown>): BuildRequest {
  const parsed = buildRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new UsageError(`invalid build request: ${where}${issue?.message ?? 'unknown error'}`, {
      cause: parsed.error,
    });
  }
  return Object.freeze(parsed.data);
}
