import { defineConfig } from 'vitest/config';

export default defineConfig({
  server: {
    port: 5173
  },
  build: {
    outDir: 'dist',
    sourcemap: true
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'scripts/**/*.test.ts'],
    exclude: ['node_modules', 'dist']
  }
});
