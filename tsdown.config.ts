import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: {
    core: './src/core/index.ts',
    oauth2: './src/oauth2/index.ts',
    axios: './src/axios/index.ts',
  },
  format: ['esm', 'cjs'],
  clean: true,
  dts: true,
});
