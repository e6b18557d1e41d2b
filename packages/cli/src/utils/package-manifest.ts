import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

const packageManifestSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type PackageManifest = z.infer<typeof packageManifestSchema>;

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
};

const readManifest = (manifestPath: string): PackageManifest | undefined => {
  if (!existsSync(manifestPath)) {
    return undefined;
  }
  const parsed = packageManifestSchema.safeParse(parseJson(readFileSync(manifestPath, 'utf8')));
  return parsed.success ? parsed.data : undefined;
};

/**
 * Walks up from `startDirectory` to the first `package.json` named `name`.
 * Manifests that are malformed or belong to other packages are skipped.
 * @returns The manifest, or an empty object when none is found.
 */
export const findPackageManifest = (startDirectory: string, name: string): PackageManifest => {
  let directory = startDirectory;

  while (true) {
    const manifest = readManifest(path.join(directory, 'package.json'));
    if (manifest?.name === name) {
      return manifest;
    }

    const parentDirectory = path.dirname(directory);
    if (parentDirectory === directory) {
      return {};
    }

    directory = parentDirectory;
  }
};
