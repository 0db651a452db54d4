/// <reference types="vitest" />
import { defineConfig } from 'vite';

export default defineConfig({
  test: {
    name: 'unit',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
