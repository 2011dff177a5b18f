import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "locjson",
    environment: "node",
    globals: false,
    include: ["packages/*/tests/**/*.test.ts"]
  }
})
