/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const packages = ['data', 'lists', 'encoding', 'schema', 'parser', 'export', 'cli'];

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their sources, so tests need no build
    alias: packages.map((name) => ({
      find: `@dxfio/${name}`,
      replacement: fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
    })),
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
