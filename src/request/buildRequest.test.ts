import { describe, it, expect } from 'vitest';

import { UsageError } from '../errors.js';
import { isImageBuilder, parseBuildRequest } from './buildRequest.js';

describe('parseBuildRequest', () => {
  it('fills defaults', () => {
    expect(parseBuildRequest({ image: 'x:y' })).toEqual({
      image: 'x:y',
      imageBuilder: 'docker',
      imageBuildArgs: '',
      goBuildArgs: '',
      skipImage: false,
    });
  });

  it('treats undefined fields as absent', () => {
    const req = parseBuildRequest({ skipImage: true, imageBuilder: undefined, image: undefined });
    expect(req.imageBuilder).toBe('docker');
    expect(req.image).toBeUndefined();
  });

  it('returns a frozen request', () => {
    expect(Object.isFrozen(parseBuildRequest({ image: 'x:y' }))).toBe(true);
  });

  it('keeps an unknown builder name for the build to reject', () => {
    expect(parseBuildRequest({ image: 'x:y', imageBuilder: 'kaniko' }).imageBuilder).toBe('kaniko');
  });

  it('accepts an unknown builder when skipping the image', () => {
    const req = parseBuildRequest({ skipImage: true, imageBuilder: 'kaniko' });
    expect(req.skipImage).toBe(true);
    expect(req.imageBuilder).toBe('kaniko');
  });

  it('rejects malformed input as a usage error', () => {
    expect(() => parseBuildRequest({ image: 'x:y', skipImage: 'yes' })).toThrow(UsageError);
    expect(() => parseBuildRequest({ image: '' })).toThrow(/^invalid build request: image: /);
  });
});

describe('isImageBuilder', () => {
  it('accepts only the supported builders', () => {
    expect(['docker', 'podman', 'buildah', 'kaniko'].map(isImageBuilder)).toEqual([true, true, true, false]);
  });
});
