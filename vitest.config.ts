import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*_test.ts"],
    retry: 0,
    testTimeout: 20000,
  },
})
