import { fileURLToPath } from 'url';
import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

const source = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  // Vite's built-in esbuild transform forces `keepNames: false`, which lets
  // esbuild rename shadowed classes (e.g. `AddOne` -> `AddOne2`). Transform
  // TypeScript with `keepNames` so class names match what tsc emits.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        if (!/\.(m?ts|tsx)$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, { target: 'es2022', keepNames: true });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  resolve: {
    alias: {
      '@pipeboard/core': source('./packages/core/src/index.ts'),
      '@pipeboard/flow': source('./packages/flow/src/index.ts'),
    },
  },
  test: {
    include: ['packages/**/src/**/__tests__/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
