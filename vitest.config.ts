import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/lasercalctl/src/index.ts', 'packages/device/src/serial-transport.ts']
    }
  },
  resolve: {
    alias: {
      '@lasercal/logger': path.resolve(__dirname, 'packages/logger/src'),
      '@lasercal/settings': path.resolve(__dirname, 'packages/settings/src'),
      '@lasercal/curves': path.resolve(__dirname, 'packages/curves/src'),
      '@lasercal/device': path.resolve(__dirname, 'packages/device/src'),
      '@lasercal/engine': path.resolve(__dirname, 'packages/engine/src')
    }
  }
});
