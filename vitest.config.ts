import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": rootDir,
    },
  },
  test: {
    environment: "node",
    include: ["lib/**/__tests__/**/*.test.ts", "scripts/**/__tests__/**/*.test.ts"],
    restoreMocks: true,
    unstubGlobals: true,
  },
});
