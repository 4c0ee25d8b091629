// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/catalog/test/**/*.spec.ts",
      "backend/services/shared/src/**/*.test.ts",
    ],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
