import { describe, expect, it } from 'vitest';

import {
  createPackageManifest,
  describe as describeManifest,
  manifest,
  sprintf,
  str,
  uint8,
} from './index.js';

describe('core manifest', () => {
  it('exposes a frozen manifest instance', () => {
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(manifest.name).toBe('@widefmt/core');
  });

  it('returns a shallow copy from describe()', () => {
    const snapshot = describeManifest();

    expect(snapshot).toEqual(manifest);
    expect(snapshot).not.toBe(manifest);
  });

  it('freezes custom manifests', () => {
    const custom = createPackageManifest({
      name: '@widefmt/example',
      summary: 'example manifest',
    });

    expect(Object.isFrozen(custom)).toBe(true);
    expect(custom.name).toBe('@widefmt/example');
  });
});

describe('package entry point', () => {
  it('formats tagged values', () => {
    expect(sprintf('%-4s|%3d|', str('名'), uint8(300))).toBe('名  | 44|');
  });
});
