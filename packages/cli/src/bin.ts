#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createProcessCliIo, createWidefmtCliKernel } from './index.js';
import { findPackageManifest } from './utils/package-manifest.js';

const MANIFEST_NAME = '@widefmt/cli';

const packageManifest = findPackageManifest(
  path.dirname(fileURLToPath(import.meta.url)),
  MANIFEST_NAME,
);

const io = createProcessCliIo({ process });

const kernel = createWidefmtCliKernel({
  programName: 'widefmt',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

const exitCode = await kernel.run();

if (process.argv.length <= 2) {
  const name = packageManifest.name ?? MANIFEST_NAME;
  io.writeOut(
    `${name} formats values with printf templates and measures display columns. ` +
      'Explore `widefmt printf --help` or `widefmt columns --help` to get started.\n',
  );
}

io.exit(exitCode);
