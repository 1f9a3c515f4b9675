/**
 * @fnhost/cli - workspace manifests the built bin depends on
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import * as path from 'path';

const PACKAGES_DIR = fileURLToPath(new URL('../..', import.meta.url));

function readManifest(directory: string): Record<string, unknown> {
  return JSON.parse(readFileSync(path.join(PACKAGES_DIR, directory, 'package.json'), 'utf8'));
}

const packages = readdirSync(PACKAGES_DIR, { withFileTypes: true })
  .filter((entry) => entry.isDirectory())
  .map((entry) => entry.name);

describe('workspace manifests', () => {
  it.each(packages)('%s resolves to sources only under the development condition', (name) => {
    expect(readManifest(name).exports).toEqual({
      '.': {
        development: './src/index.ts',
        types: './dist/index.d.ts',
        default: './dist/index.js',
      },
    });
  });

  it('points the fnhost bin at compiled output', () => {
    expect(readManifest('cli').bin).toEqual({ fnhost: './dist/main.js' });
  });
});
