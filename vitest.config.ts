import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const WORKSPACE_PACKAGES = [
  'kernel',
  'config',
  'privacy',
  'logging',
  'telemetry',
  'telemetry-otel',
  'telemetry-appinsights',
  'secrets',
  'worker-core',
  'host',
  'cli',
];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      WORKSPACE_PACKAGES.map((name) => [
        `@fnhost/${name}`,
        fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
      ])
    ),
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    server: {
      deps: {
        inline: ['clipanion'],
      },
    },
  },
});
