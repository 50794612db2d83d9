import { defineConfig } from "vitest/config"
import path from "path"
import { fileURLToPath } from "url"

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./test/setup.ts"],
    include: ["lib/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    // pdf.js and exceljs fixtures are heavy; keep files sequential
    fileParallelism: false,
    testTimeout: 30_000,
  },
  resolve: {
    alias: {
      "@": path.dirname(fileURLToPath(import.meta.url)),
    },
  },
})
