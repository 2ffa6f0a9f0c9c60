import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(rootDir, "client", "src"),
      "@shared": path.resolve(rootDir, "shared"),
    },
  },
  test: {
    environment: "node",
    include: [
      "tests/**/*.spec.ts",
      "server/**/__tests__/**/*.spec.ts",
      "client/src/**/*.{spec,test}.ts?(x)",
    ],
    environmentMatchGlobs: [["client/src/**/*.{spec,test}.ts?(x)", "jsdom"]],
    setupFiles: ["./tests/setup-vitest.ts"],
  },
});
