import path from 'path';
import { defineConfig } from 'vitest/config';

const src = path.resolve(__dirname, 'src');

// Mirrors `paths` in tsconfig.json.
export default defineConfig({
  resolve: {
    alias: [
      { find: /^@mqtt\/(.*)$/, replacement: `${src}/MQTT/$1` },
      { find: /^@utils\/(.*)$/, replacement: `${src}/Utils/$1` },
      {
        find: /^(Commands|Common|Diagnostics|Publishers|Routing|Sensors|Statistics)\/(.*)$/,
        replacement: `${src}/$1/$2`,
      },
    ],
  },
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
