import { builtinModules } from 'module';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vite';

const entry = (file: string): string => fileURLToPath(new URL(file, import.meta.url));

export default defineConfig({
  build: {
    target: 'node20',
    outDir: 'dist',
    lib: {
      entry: {
        'breath-averager': entry('./src/index.ts'),
        cli: entry('./src/cli.ts'),
      },
      formats: ['es'],
    },
    rollupOptions: {
      // Node built-ins and runtime dependencies stay as imports
      external: [
        ...builtinModules,
        ...builtinModules.map(name => `node:${name}`),
        'commander',
        'pngjs',
        /^dotenv/,
      ],
    },
  },
});
