import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      STUDY_TRACKER_BCRYPT_ROUNDS: '4',
    },
  },
});
