import { defineConfig } from 'vitest/config';

// Needs a running Neo4j (NEO4J_URI, NEO4J_PASSWORD) and the Firestore emulator (FIRESTORE_EMULATOR_HOST).
export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/src/**/*.integration.test.ts'],
    testTimeout: 30000,
    fileParallelism: false,
  },
});
