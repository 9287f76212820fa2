import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["{packages,adapters,examples}/*/src/**/*.test.ts"],
    setupFiles: ["packages/session/src/test-setup.ts"],
  },
})
