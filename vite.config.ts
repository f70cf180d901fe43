import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

const srcDir = fileURLToPath(new URL('./src', import.meta.url));

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'HeadlessTable',
      fileName: 'headless-table',
      formats: ['es'],
    },
    sourcemap: true,
  },
  resolve: {
    alias: {
      '@': srcDir,
    },
  },
});
