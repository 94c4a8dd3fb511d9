import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['src/**/*.test.ts', 'client/src/**/*.test.tsx'],
    environment: 'node',
    environmentMatchGlobs: [['client/**', 'jsdom']],
  },
});
