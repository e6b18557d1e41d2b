import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { findPackageManifest } from './package-manifest.js';

describe('findPackageManifest', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'widefmt-cli-manifest-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('finds the named manifest above the start directory', async () => {
    const start = path.join(workspace, 'dist', 'bin');
    await mkdir(start, { recursive: true });
    await writeFile(
      path.join(workspace, 'package.json'),
      JSON.stringify({ name: '@widefmt/cli', version: '1.4.0', description: 'printf tool' }),
    );

    expect(findPackageManifest(start, '@widefmt/cli')).toEqual({
      name: '@widefmt/cli',
      version: '1.4.0',
      description: 'printf tool',
    });
  });

  it('skips malformed and unrelated manifests on the way up', async () => {
    const nested = path.join(workspace, 'node_modules', 'other');
    const start = path.join(nested, 'lib');
    await mkdir(start, { recursive: true });
    await writeFile(path.join(start, 'package.json'), '{ "name": ');
    await writeFile(path.join(nested, 'package.json'), JSON.stringify({ name: 'other', version: 3 }));
    await writeFile(
      path.join(workspace, 'package.json'),
      JSON.stringify({ name: '@widefmt/cli', version: '2.0.0' }),
    );

    expect(findPackageManifest(start, '@widefmt/cli')).toEqual({
      name: '@widefmt/cli',
      version: '2.0.0',
    });
  });

  it('returns an empty manifest when nothing matches', async () => {
    await writeFile(path.join(workspace, 'package.json'), 'not json');

    expect(findPackageManifest(workspace, '@widefmt/cli-missing-from-tree')).toEqual({});
  });
});
