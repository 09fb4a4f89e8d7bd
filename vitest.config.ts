import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": root,
    },
  },
  test: {
    include: ["**/__tests__/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**", ".next/**"],
  },
});
